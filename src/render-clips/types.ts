import { z } from "zod";

/**
 * A selected range of the source video, in seconds
 */
export const ClipSchema = z.object({
  start: z.number().finite(),
  end: z.number().finite(),
});

/**
 * The editor's save file. Only `clips` is read, other keys are dropped.
 */
export const SaveFileSchema = z.object({
  clips: z.array(ClipSchema),
});

export type Clip = z.infer<typeof ClipSchema>;
export type SaveFile = z.infer<typeof SaveFileSchema>;

export interface CommandOptions {
  outputPath: string;
  ffmpegPath?: string;
  overwrite?: boolean;
}

export interface RenderOptions {
  saveFilePath: string;
  videoPath: string;
  outputPath: string;
  ffmpegPath: string;
  ffprobePath: string;
  overwrite: boolean;
  dryRun: boolean;
  skipProbe: boolean;
}
