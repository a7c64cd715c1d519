import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import { promises as fsPromises } from 'fs';
import * as path from 'path';
import {
  InvalidInTimestampError,
  InvalidOutTimestampError,
  InvalidRangeError,
  InvalidTimestampError,
  OutputDirError,
  SourceNotFoundError,
  errorMessage,
} from '../errors';
import { FfmpegCliStrategy } from '../ffmpeg/ffmpeg-cli.strategy';
import { FluentFfmpegStrategy } from '../ffmpeg/fluent-ffmpeg.strategy';
import { Toolchain } from '../ffmpeg/interfaces/toolchain.interface';
import { TrimRequest, TrimStrategy } from '../ffmpeg/interfaces/trim-strategy.interface';
import { TimestampPrecision } from './output-path';
import { OutputPathService } from './output-path.service';
import { formatClock, parseTimestamp } from './timestamp';
import { TrimJob } from './trim-job.interface';

export interface ProcessVideoOptions {
  toolchain: Toolchain;
  precision: TimestampPrecision;
}

@Injectable()
export class TrimService {
  private readonly logger = new Logger(TrimService.name);

  constructor(
    private readonly outputPathService: OutputPathService,
    private readonly ffmpegCli: FfmpegCliStrategy,
    private readonly fluentFfmpeg: FluentFfmpegStrategy,
  ) {}

  /**
   * Cut `job.in`..`job.out` out of the source with stream copy.
   *
   * Invalid input throws. Tool failures do not: every strategy the toolchain
   * allows is tried in order and the result is false when none succeeds.
   */
  async processVideo(job: TrimJob, options: ProcessVideoOptions): Promise<boolean> {
    if (!fs.existsSync(job.source)) {
      throw new SourceNotFoundError(job.source);
    }

    const startSeconds = this.parseBoundary(job.in, InvalidInTimestampError);
    const endSeconds = this.parseBoundary(job.out, InvalidOutTimestampError);
    const durationSeconds = endSeconds - startSeconds;

    if (durationSeconds <= 0) {
      throw new InvalidRangeError(job.in, job.out);
    }

    const outputPath = this.outputPathService.resolve(job.output, job.source, options.precision);
    await this.ensureOutputDirectory(path.dirname(outputPath));

    const request: TrimRequest = {
      source: job.source,
      outputPath,
      startSeconds,
      durationSeconds,
    };
    this.logger.log(
      `Trimming ${job.source} from ${formatClock(startSeconds)} to ${formatClock(endSeconds)} (${durationSeconds}s)`,
    );

    const strategies = this.getStrategies(options.toolchain);
    if (strategies.length === 0) {
      this.logger.error('Error: Both system ffmpeg and the fluent-ffmpeg binding are unavailable');
      return false;
    }

    for (const strategy of strategies) {
      try {
        await strategy.trim(request, options.toolchain);
        this.logger.log(`Successfully processed (using ${strategy.name}): ${job.source} -> ${outputPath}`);
        return true;
      } catch (error) {
        this.logger.error(`Error processing with ${strategy.name}: ${errorMessage(error)}`);
      }
    }

    return false;
  }

  getStrategies(toolchain: Toolchain): TrimStrategy[] {
    const strategies: TrimStrategy[] = [];
    if (toolchain.systemFfmpeg) {
      strategies.push(this.ffmpegCli);
    }
    if (toolchain.fallbackBinding) {
      strategies.push(this.fluentFfmpeg);
    }
    return strategies;
  }

  private parseBoundary(
    timestamp: string,
    wrap: new (cause: InvalidTimestampError) => Error,
  ): number {
    try {
      return parseTimestamp(timestamp);
    } catch (error) {
      if (error instanceof InvalidTimestampError) {
        throw new wrap(error);
      }
      throw error;
    }
  }

  private async ensureOutputDirectory(directory: string): Promise<void> {
    if (!directory || fs.existsSync(directory)) {
      return;
    }
    try {
      await fsPromises.mkdir(directory, { recursive: true });
      this.logger.log(`Created output directory: ${directory}`);
    } catch (error) {
      throw new OutputDirError(directory, error);
    }
  }
}
