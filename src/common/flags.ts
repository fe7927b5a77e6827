export const FLAGS = {
  saveFile: {
    flag: "--save-file-path <path>",
    description: "Path to the editor's save file (JSON with a 'clips' array)",
  },
  video: {
    flag: "--video-path <path>",
    description: "Source video the clips were selected from",
  },
  output: {
    flag: "-o, --output <path>",
    description: "Output file, defaults to $RENDER_OUTPUT or 'out.mkv'",
  },
  ffmpegPath: {
    flag: "--ffmpeg-path <path>",
    description: "ffmpeg executable, defaults to $FFMPEG_PATH or 'ffmpeg'",
  },
  ffprobePath: {
    flag: "--ffprobe-path <path>",
    description: "ffprobe executable, defaults to $FFPROBE_PATH or 'ffprobe'",
  },
  overwrite: {
    flag: "-y, --overwrite",
    description: "Overwrite the output file if it exists",
  },
  dryRun: {
    flag: "--dry-run",
    description: "Print the ffmpeg command without running it",
  },
  skipProbe: {
    flag: "--skip-probe",
    description: "Don't check clip ranges against the video's duration",
  },
};
