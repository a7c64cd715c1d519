import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FFMPEG_INSTALL_HINT, FFMPEG_NOT_FOUND } from '../constants';
import { ToolUnavailableError, errorMessage } from '../errors';
import { FluentFfmpegStrategy } from './fluent-ffmpeg.strategy';
import { Toolchain } from './interfaces/toolchain.interface';
import { ProcessRunner } from './process-runner.service';

@Injectable()
export class ToolchainService {
  private readonly logger = new Logger(ToolchainService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly processRunner: ProcessRunner,
    private readonly fluentFfmpeg: FluentFfmpegStrategy,
  ) {}

  /**
   * Probe ffmpeg once before any job runs. Throws when neither the
   * subprocess nor the fluent-ffmpeg binding can be used.
   */
  async detect(ffmpegPathOverride?: string): Promise<Toolchain> {
    const ffmpegCommand =
      ffmpegPathOverride ?? this.configService.get<string>('FFMPEG_COMMAND', 'ffmpeg');
    if (ffmpegPathOverride) {
      this.logger.log(`Using provided ffmpeg path: ${ffmpegCommand}`);
    }

    const fallbackEnabled = this.configService.get<boolean>('FFMPEG_FALLBACK', true);
    const systemFfmpeg = await this.probeSystemFfmpeg(ffmpegCommand);

    let fallbackBinding = false;
    let bindingProbed = false;
    if (fallbackEnabled) {
      if (systemFfmpeg) {
        // The binding is pointed at the same binary, which just answered
        fallbackBinding = true;
      } else {
        this.logger.log('System FFmpeg not found, testing fluent-ffmpeg binding...');
        bindingProbed = true;
        fallbackBinding = await this.fluentFfmpeg.isAvailable();
        if (fallbackBinding) {
          this.logger.log('fluent-ffmpeg can access ffmpeg');
        }
      }
    }

    if (!systemFfmpeg && !fallbackBinding) {
      const reason = bindingProbed
        ? `${FFMPEG_NOT_FOUND}, and the fluent-ffmpeg binding cannot reach it either.`
        : `${FFMPEG_NOT_FOUND}.`;
      throw new ToolUnavailableError(`${reason}\n${FFMPEG_INSTALL_HINT}`);
    }

    return { ffmpegCommand, systemFfmpeg, fallbackBinding };
  }

  private async probeSystemFfmpeg(command: string): Promise<boolean> {
    try {
      const result = await this.processRunner.run(command, ['-version']);
      if (result.code === 0) {
        this.logger.log(`Using system FFmpeg: ${command}`);
        return true;
      }
      this.logger.warn(`FFmpeg check returned non-zero code: ${result.code}`);
      if (result.stderr.trim()) {
        this.logger.warn(`STDERR: ${result.stderr.trim()}`);
      }
    } catch (error) {
      this.logger.warn(`Error checking FFmpeg: ${errorMessage(error)}`);
    }
    return false;
  }
}
