import { InvalidTimestampError } from '../errors';

const TIMESTAMP_PATTERN = /^\d{6}$/;

/**
 * Convert an HHMMSS timestamp (24-hour clock) to an offset in seconds.
 */
export function parseTimestamp(timestamp: string): number {
  if (!TIMESTAMP_PATTERN.test(timestamp)) {
    throw new InvalidTimestampError(
      `Invalid timestamp: ${timestamp}. Must be in HHMMSS format (6 digits)`,
    );
  }

  const hours = parseInt(timestamp.slice(0, 2), 10);
  const minutes = parseInt(timestamp.slice(2, 4), 10);
  const seconds = parseInt(timestamp.slice(4, 6), 10);

  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new InvalidTimestampError(`Invalid time values in timestamp: ${timestamp}`);
  }

  return hours * 3600 + minutes * 60 + seconds;
}

export function formatClock(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map((part) => String(part).padStart(2, '0')).join(':');
}
