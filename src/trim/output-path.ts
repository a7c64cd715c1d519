import * as path from 'path';
import { TIMESTAMP_PLACEHOLDER } from '../constants';

export type TimestampPrecision = 'seconds' | 'milliseconds';

export interface ResolveOutputOptions {
  now: Date;
  precision: TimestampPrecision;
  isDirectory: (candidate: string) => boolean;
}

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

/**
 * Local time as YYYYMMDD_HHMMSS, with three millisecond digits appended
 * (YYYYMMDD_HHMMSSmmm) at millisecond precision.
 */
export function formatFileTimestamp(now: Date, precision: TimestampPrecision): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  const millis = precision === 'milliseconds' ? pad(now.getMilliseconds(), 3) : '';
  return `${date}_${time}${millis}`;
}

function endsWithSeparator(candidate: string): boolean {
  return candidate.endsWith('/') || candidate.endsWith('\\') || candidate.endsWith(path.sep);
}

/**
 * Turn an output pattern into a concrete file path.
 *
 * A pattern naming an existing directory, or ending in a separator, receives
 * `{source-stem}-{timestamp}{source-ext}`; anything else is used as the file
 * path itself once `[timestamp]` has been substituted.
 */
export function resolveOutputPath(
  pattern: string,
  sourcePath: string,
  options: ResolveOutputOptions,
): string {
  const timestamp = formatFileTimestamp(options.now, options.precision);
  let outputPath = path.normalize(pattern).split(TIMESTAMP_PLACEHOLDER).join(timestamp);

  if (endsWithSeparator(outputPath) || options.isDirectory(outputPath)) {
    const { name, ext } = path.parse(path.basename(sourcePath));
    outputPath = path.join(outputPath, `${name}-${timestamp}${ext}`);
  }

  return path.normalize(outputPath);
}
