import { Toolchain } from './toolchain.interface';

export interface TrimRequest {
  source: string;
  outputPath: string;
  startSeconds: number;
  durationSeconds: number;
}

export interface TrimStrategy {
  readonly name: string;
  trim(request: TrimRequest, toolchain: Toolchain): Promise<void>;
}
