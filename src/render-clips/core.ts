import * as fs from "fs";
import { ensureParentDirectory } from "../common/paths";
import { InputError } from "../common/errors";
import { buildRenderCommand, FfmpegCommand, formatCommand } from "./filter";
import {
  checkClipsWithinDuration,
  loadSaveFile,
  probeDuration,
  runFfmpeg,
  validateClips,
} from "./utils";
import { RenderOptions } from "./types";

/**
 * Trim every clip of a save file out of the source video and concatenate
 * them into one output file.
 */
export async function renderClips(options: RenderOptions): Promise<FfmpegCommand> {
  console.log(`Loading save file: ${options.saveFilePath}`);
  const saveFile = loadSaveFile(options.saveFilePath);
  validateClips(saveFile.clips);

  if (!fs.existsSync(options.videoPath)) {
    throw new InputError(`Video file not found: ${options.videoPath}`);
  }

  if (!options.skipProbe) {
    const duration = await probeDuration(options.videoPath, options.ffprobePath);
    if (duration === undefined) {
      console.warn(`Warning: ffprobe reported no duration for ${options.videoPath}, skipping range check`);
    } else {
      checkClipsWithinDuration(saveFile.clips, duration);
    }
  }

  const command = buildRenderCommand(saveFile, options.videoPath, {
    outputPath: options.outputPath,
    ffmpegPath: options.ffmpegPath,
    overwrite: options.overwrite,
  });

  console.log(`Rendering ${saveFile.clips.length} clips to ${options.outputPath}`);
  console.log('FFmpeg command:', formatCommand(command));

  if (options.dryRun) {
    console.log('Dry run, ffmpeg not started');
    return command;
  }

  ensureParentDirectory(options.outputPath);
  runFfmpeg(command);
  console.log(`Video rendered successfully: ${options.outputPath}`);

  return command;
}
