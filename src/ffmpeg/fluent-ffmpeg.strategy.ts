import { Injectable, Logger } from '@nestjs/common';
import ffmpeg from 'fluent-ffmpeg';
import { ExternalToolFailureError, errorMessage } from '../errors';
import { Toolchain } from './interfaces/toolchain.interface';
import { TrimRequest, TrimStrategy } from './interfaces/trim-strategy.interface';

/**
 * In-process fallback through the fluent-ffmpeg binding. When the configured
 * command answered its probe the binding runs that binary; otherwise it finds
 * its own (FFMPEG_PATH / FFPROBE_PATH, then PATH), so it can succeed where the
 * configured command cannot be launched.
 */
@Injectable()
export class FluentFfmpegStrategy implements TrimStrategy {
  readonly name = 'fluent-ffmpeg';
  private readonly logger = new Logger(FluentFfmpegStrategy.name);

  async trim(request: TrimRequest, toolchain: Toolchain): Promise<void> {
    this.logger.log(`Trying fluent-ffmpeg binding, output: ${request.outputPath}`);

    // Fails fast when the binding cannot reach ffprobe/ffmpeg at all
    await this.probe(request.source);

    const command = ffmpeg(request.source);
    if (toolchain.systemFfmpeg) {
      command.setFfmpegPath(toolchain.ffmpegCommand);
    }

    await new Promise<void>((resolve, reject) => {
      command
        .seekInput(request.startSeconds)
        .duration(request.durationSeconds)
        .outputOptions(['-c', 'copy', '-y'])
        .on('start', (commandLine: string) => {
          this.logger.debug(`fluent-ffmpeg spawned: ${commandLine}`);
        })
        .on('end', () => resolve())
        .on('error', (error: Error) => {
          reject(new ExternalToolFailureError(this.name, null, error.message, { cause: error }));
        })
        .save(request.outputPath);
    });
  }

  /**
   * True when the binding can run its ffmpeg binary.
   */
  isAvailable(): Promise<boolean> {
    return new Promise((resolve) => {
      ffmpeg.getAvailableFormats((error) => {
        if (error) {
          this.logger.warn(`fluent-ffmpeg cannot access ffmpeg: ${errorMessage(error)}`);
          resolve(false);
          return;
        }
        resolve(true);
      });
    });
  }

  private probe(source: string): Promise<void> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(source, (error: unknown) => {
        if (error) {
          reject(
            new ExternalToolFailureError('ffprobe', null, errorMessage(error), { cause: error }),
          );
          return;
        }
        resolve();
      });
    });
  }
}
