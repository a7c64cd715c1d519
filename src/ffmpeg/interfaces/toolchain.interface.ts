export interface Toolchain {
  ffmpegCommand: string; // Executable used for the subprocess strategy
  systemFfmpeg: boolean; // `<ffmpegCommand> -version` exited with 0
  fallbackBinding: boolean; // fluent-ffmpeg binding may be used
}
