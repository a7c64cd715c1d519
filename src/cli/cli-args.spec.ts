import { CliUsageError } from '../errors';
import { parseCliArgs } from './cli-args';

describe('parseCliArgs', () => {
  it('parses batch mode', () => {
    expect(parseCliArgs(['--config', 'jobs.json'])).toEqual({
      mode: 'batch',
      configPath: 'jobs.json',
      ffmpegPath: undefined,
    });
  });

  it('parses single-file mode with an ffmpeg override', () => {
    expect(
      parseCliArgs([
        '--source', 'clip.mp4',
        '--in', '000010',
        '--out', '000020',
        '--output', 'out/[timestamp].mp4',
        '--ffmpeg-path', '/opt/ffmpeg/bin/ffmpeg',
      ]),
    ).toEqual({
      mode: 'single',
      job: { source: 'clip.mp4', in: '000010', out: '000020', output: 'out/[timestamp].mp4' },
      ffmpegPath: '/opt/ffmpeg/bin/ffmpeg',
    });
  });

  it('returns help for -h', () => {
    expect(parseCliArgs(['-h'])).toEqual({ mode: 'help' });
  });

  it('rejects --config together with --source', () => {
    expect(() => parseCliArgs(['--config', 'jobs.json', '--source', 'clip.mp4'])).toThrow(
      new CliUsageError('argument --source: not allowed with argument --config'),
    );
  });

  it('requires one of --config or --source', () => {
    expect(() => parseCliArgs([])).toThrow('one of the arguments --config --source is required');
  });

  it.each([
    [['--out', '000020', '--output', 'o.mp4'], '--in is required when not using --config'],
    [['--in', '000010', '--output', 'o.mp4'], '--out is required when not using --config'],
    [['--in', '000010', '--out', '000020'], '--output is required when not using --config'],
  ])('reports the first missing single-file option', (rest, message) => {
    expect(() => parseCliArgs(['--source', 'clip.mp4', ...rest])).toThrow(new CliUsageError(message));
  });

  it('wraps unknown options as usage errors', () => {
    expect(() => parseCliArgs(['--config', 'jobs.json', '--fast'])).toThrow(CliUsageError);
  });
});
