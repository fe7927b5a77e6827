import * as dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

// An empty value (`FFMPEG_PATH=` in .env) counts as unset
const optionalValue = z.preprocess(
  (value) => (value === "" ? undefined : value),
  z.string().optional()
);

export const EnvSchema = z.object({
  FFMPEG_PATH: optionalValue,
  FFPROBE_PATH: optionalValue,
  RENDER_OUTPUT: optionalValue,
});

export interface ToolConfig {
  ffmpegPath: string;
  ffprobePath: string;
  outputPath: string;
}

export const DEFAULT_CONFIG: ToolConfig = {
  ffmpegPath: "ffmpeg",
  ffprobePath: "ffprobe",
  outputPath: "out.mkv",
};

/**
 * Resolve tool paths from the environment (and .env), falling back to defaults
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ToolConfig {
  const parsed = EnvSchema.parse(env);
  return {
    ffmpegPath: parsed.FFMPEG_PATH ?? DEFAULT_CONFIG.ffmpegPath,
    ffprobePath: parsed.FFPROBE_PATH ?? DEFAULT_CONFIG.ffprobePath,
    outputPath: parsed.RENDER_OUTPUT ?? DEFAULT_CONFIG.outputPath,
  };
}
