export const REQUIRED_JOB_FIELDS = ['source', 'in', 'out', 'output'] as const;

export const TIMESTAMP_PLACEHOLDER = '[timestamp]';

export const FFMPEG_NOT_FOUND = 'FFmpeg is not installed or not in your system PATH';

export const FFMPEG_INSTALL_HINT = [
  'Please install FFmpeg to use this tool:',
  '- Windows: Download from https://ffmpeg.org/download.html and add to PATH',
  '- macOS: Use Homebrew: brew install ffmpeg',
  '- Linux: Use your package manager, e.g., apt install ffmpeg',
  'Alternatively, specify the path to the ffmpeg executable using --ffmpeg-path',
].join('\n');
