import * as os from 'os';
import * as path from 'path';
import { ProcessRunner } from './process-runner.service';

describe('ProcessRunner', () => {
  const runner = new ProcessRunner();

  it('reports a nonzero exit code with the captured output', async () => {
    const result = await runner.run(process.execPath, [
      '-e',
      'process.stdout.write("out");process.stderr.write("x");process.exit(3)',
    ]);

    expect(result).toEqual({ code: 3, stdout: 'out', stderr: 'x' });
  });

  it('resolves with code 0 on a clean exit', async () => {
    await expect(runner.run(process.execPath, ['-e', ''])).resolves.toEqual({
      code: 0,
      stdout: '',
      stderr: '',
    });
  });

  it('rejects when the executable cannot be launched', async () => {
    const missing = path.join(os.tmpdir(), 'clip-trimmer-missing', 'ffmpeg');

    await expect(runner.run(missing, ['-version'])).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
