export interface TrimJob {
  readonly source: string;
  readonly in: string; // HHMMSS
  readonly out: string; // HHMMSS
  readonly output: string; // directory, file path or `[timestamp]` pattern
}
