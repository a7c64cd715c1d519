import { parseArgs } from 'util';
import { CliUsageError, errorMessage } from '../errors';
import { TrimJob } from '../trim/trim-job.interface';

export type CliCommand =
  | { mode: 'help' }
  | { mode: 'batch'; configPath: string; ffmpegPath?: string }
  | { mode: 'single'; job: TrimJob; ffmpegPath?: string };

export const USAGE = `Usage:
  clip-trimmer --config <config.json> [--ffmpeg-path <path>]
  clip-trimmer --source <video> --in <HHMMSS> --out <HHMMSS> --output <path> [--ffmpeg-path <path>]

Crop a video between two timestamps using FFmpeg stream copy.

Options:
  --config <path>       Path to config.json for batch processing
  --source <path>       Path to input video file
  --in <HHMMSS>         IN timestamp in HHMMSS format
  --out <HHMMSS>        OUT timestamp in HHMMSS format
  --output <path>       Path for the output video, with optional [timestamp] placeholder
  --ffmpeg-path <path>  Path to ffmpeg executable, if not in system PATH
  -h, --help            Show this help`;

function readValues(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        config: { type: 'string' },
        source: { type: 'string' },
        in: { type: 'string' },
        out: { type: 'string' },
        output: { type: 'string' },
        'ffmpeg-path': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new CliUsageError(errorMessage(error));
  }
}

/**
 * `--config` and `--source` are mutually exclusive; `--source` needs
 * `--in`, `--out` and `--output`.
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const values = readValues(argv);

  if (values.help) {
    return { mode: 'help' };
  }

  const ffmpegPath = values['ffmpeg-path'];

  if (values.config !== undefined && values.source !== undefined) {
    throw new CliUsageError('argument --source: not allowed with argument --config');
  }

  if (values.config !== undefined) {
    return { mode: 'batch', configPath: values.config, ffmpegPath };
  }

  if (values.source === undefined) {
    throw new CliUsageError('one of the arguments --config --source is required');
  }

  if (!values.in) {
    throw new CliUsageError('--in is required when not using --config');
  }
  if (!values.out) {
    throw new CliUsageError('--out is required when not using --config');
  }
  if (!values.output) {
    throw new CliUsageError('--output is required when not using --config');
  }

  return {
    mode: 'single',
    job: { source: values.source, in: values.in, out: values.out, output: values.output },
    ffmpegPath,
  };
}
