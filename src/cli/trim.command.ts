import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BatchService } from '../batch/batch.service';
import { errorMessage } from '../errors';
import { ToolchainService } from '../ffmpeg/toolchain.service';
import { TimestampPrecision } from '../trim/output-path';
import { TrimService } from '../trim/trim.service';
import { CliCommand, USAGE } from './cli-args';

@Injectable()
export class TrimCommand {
  private readonly logger = new Logger(TrimCommand.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly toolchainService: ToolchainService,
    private readonly trimService: TrimService,
    private readonly batchService: BatchService,
  ) {}

  /**
   * Runs the parsed command and returns the process exit code.
   */
  async execute(command: CliCommand): Promise<number> {
    if (command.mode === 'help') {
      process.stdout.write(`${USAGE}\n`);
      return 0;
    }

    try {
      const toolchain = await this.toolchainService.detect(command.ffmpegPath);

      if (command.mode === 'batch') {
        this.logger.log(`Starting batch processing with config: ${command.configPath}`);
        const summary = await this.batchService.runBatch(command.configPath, toolchain);
        const success = summary.succeeded > 0;
        this.logger.log(
          success ? 'Batch processing completed successfully' : 'Batch processing completed with errors',
        );
        return success ? 0 : 1;
      }

      this.logger.log(`Processing single video: ${command.job.source}`);
      const success = await this.trimService.processVideo(command.job, {
        toolchain,
        precision: this.configService.get<TimestampPrecision>(
          'SINGLE_TIMESTAMP_PRECISION',
          'milliseconds',
        ),
      });
      if (success) {
        this.logger.log('Video processing completed successfully');
      } else {
        this.logger.error('Video processing completed with errors');
      }
      return success ? 0 : 1;
    } catch (error) {
      this.logger.error(`Error: ${errorMessage(error)}`);
      return 1;
    }
  }
}
