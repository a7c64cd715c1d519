import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import { resolveOutputPath, TimestampPrecision } from './output-path';

@Injectable()
export class OutputPathService {
  private readonly logger = new Logger(OutputPathService.name);

  resolve(pattern: string, sourcePath: string, precision: TimestampPrecision): string {
    const outputPath = resolveOutputPath(pattern, sourcePath, {
      now: new Date(),
      precision,
      isDirectory: (candidate) => this.isDirectory(candidate),
    });

    this.logger.log(`Normalized output path: ${outputPath}`);
    return outputPath;
  }

  private isDirectory(candidate: string): boolean {
    return fs.existsSync(candidate) && fs.statSync(candidate).isDirectory();
  }
}
