import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import { promises as fsPromises } from 'fs';
import {
  ConfigNotFoundError,
  ConfigParseError,
  InvalidFieldError,
  MissingFieldError,
  NoValidConfigsError,
  errorMessage,
} from '../errors';
import { Toolchain } from '../ffmpeg/interfaces/toolchain.interface';
import { TimestampPrecision } from '../trim/output-path';
import { TrimJob } from '../trim/trim-job.interface';
import { TrimService } from '../trim/trim.service';
import { normalizeBatchDocument, validateJobCandidate } from './batch-config';

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

@Injectable()
export class BatchService {
  private readonly logger = new Logger(BatchService.name);
  private readonly precision: TimestampPrecision;

  constructor(
    private readonly configService: ConfigService,
    private readonly trimService: TrimService,
  ) {
    this.precision = this.configService.get<TimestampPrecision>(
      'BATCH_TIMESTAMP_PRECISION',
      'seconds',
    );
  }

  /**
   * Run every job of a batch document in order. Document-level problems
   * throw; a failing job is logged and the batch moves on.
   */
  async runBatch(configPath: string, toolchain: Toolchain): Promise<BatchSummary> {
    const document = await this.loadDocument(configPath);
    const { shape, candidates } = normalizeBatchDocument(document);

    if (candidates.length === 0) {
      throw new NoValidConfigsError();
    }

    const summary: BatchSummary = { total: candidates.length, succeeded: 0, failed: 0, skipped: 0 };
    this.logger.log(`Found ${summary.total} video(s) to process in config file (${shape} format)`);

    for (const [index, candidate] of candidates.entries()) {
      this.logger.log(`Processing video ${index + 1}/${summary.total}`);

      let job: TrimJob;
      try {
        job = validateJobCandidate(candidate.value);
      } catch (error) {
        if (error instanceof MissingFieldError) {
          this.logger.warn(
            `Config ${candidate.label} is missing required parameters: ${error.fields.join(', ')}`,
          );
        } else if (error instanceof InvalidFieldError) {
          this.logger.warn(
            `Config ${candidate.label} has non-string parameters: ${error.fields.join(', ')}`,
          );
        } else {
          throw error;
        }
        summary.skipped++;
        continue;
      }

      try {
        const success = await this.trimService.processVideo(job, {
          toolchain,
          precision: this.precision,
        });
        if (success) {
          summary.succeeded++;
        } else {
          summary.failed++;
        }
      } catch (error) {
        this.logger.error(`Error processing config ${candidate.label}: ${errorMessage(error)}`);
        summary.failed++;
      }
    }

    this.logger.log(
      `Batch processing summary: Successfully processed ${summary.succeeded} out of ${summary.total} videos`,
    );
    return summary;
  }

  private async loadDocument(configPath: string): Promise<unknown> {
    if (!fs.existsSync(configPath)) {
      throw new ConfigNotFoundError(configPath);
    }

    const raw = await fsPromises.readFile(configPath, 'utf-8');
    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new ConfigParseError(configPath, error);
    }
  }
}
