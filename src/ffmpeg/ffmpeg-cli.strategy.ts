import { Injectable, Logger } from '@nestjs/common';
import { ExternalToolFailureError } from '../errors';
import { ProcessResult, ProcessRunner } from './process-runner.service';
import { Toolchain } from './interfaces/toolchain.interface';
import { TrimRequest, TrimStrategy } from './interfaces/trim-strategy.interface';

const STDERR_TAIL_LINES = 5;

@Injectable()
export class FfmpegCliStrategy implements TrimStrategy {
  readonly name = 'system ffmpeg';
  private readonly logger = new Logger(FfmpegCliStrategy.name);

  constructor(private readonly processRunner: ProcessRunner) {}

  async trim(request: TrimRequest, toolchain: Toolchain): Promise<void> {
    const args = this.getFfmpegArgs(request);
    const command = toolchain.ffmpegCommand;
    this.logger.log(`Running command: ${[command, ...args].join(' ')}`);

    let result: ProcessResult;
    try {
      result = await this.processRunner.run(command, args);
    } catch (error) {
      throw new ExternalToolFailureError(command, null, 'could not be launched', { cause: error });
    }

    if (result.code !== 0) {
      const tail = result.stderr.trim().split(/\r?\n/).slice(-STDERR_TAIL_LINES).join('\n');
      if (tail) {
        this.logger.debug(`ffmpeg stderr:\n${tail}`);
      }
      throw new ExternalToolFailureError(command, result.code);
    }
  }

  getFfmpegArgs(request: TrimRequest): string[] {
    return [
      '-i',
      request.source,
      '-ss',
      String(request.startSeconds),
      '-t',
      String(request.durationSeconds),
      '-c',
      'copy', // Copy streams without re-encoding
      '-y', // Overwrite output file if it exists
      request.outputPath,
    ];
  }
}
