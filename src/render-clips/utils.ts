import { spawnSync } from "child_process";
import ffmpeg from "fluent-ffmpeg";
import * as fs from "fs";
import { CommandError, InputError, SchemaError } from "../common/errors";
import { FfmpegCommand } from "./filter";
import { Clip, SaveFile, SaveFileSchema } from "./types";

/**
 * Read and parse a save file. Fails on a missing file, invalid JSON, or
 * clips without numeric start/end.
 */
export function loadSaveFile(saveFilePath: string): SaveFile {
  if (!fs.existsSync(saveFilePath)) {
    throw new InputError(`Save file not found: ${saveFilePath}`);
  }

  let content: string;
  try {
    content = fs.readFileSync(saveFilePath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputError(`Could not read save file ${saveFilePath}: ${reason}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputError(`Save file is invalid JSON: ${saveFilePath}: ${reason}`);
  }

  const result = SaveFileSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new SchemaError(`Invalid save file ${saveFilePath}: ${issues}`);
  }
  return result.data;
}

/**
 * Reject clip lists ffmpeg can't render: no clips at all, negative starts,
 * or ranges that don't move forward.
 */
export function validateClips(clips: Clip[]): void {
  if (clips.length === 0) {
    throw new SchemaError("Save file contains no clips");
  }

  clips.forEach((clip, index) => {
    if (clip.start < 0) {
      throw new SchemaError(`Clip ${index} starts before 0: start=${clip.start}`);
    }
    if (clip.end <= clip.start) {
      throw new SchemaError(
        `Clip ${index} ends before it starts: start=${clip.start} end=${clip.end}`
      );
    }
  });
}

/**
 * Duration of a media file in seconds, or undefined if ffprobe doesn't report one
 */
export function probeDuration(
  videoPath: string,
  ffprobePath?: string
): Promise<number | undefined> {
  if (ffprobePath) {
    ffmpeg.setFfprobePath(ffprobePath);
  }

  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(videoPath, (err, data) => {
      if (err) {
        const reason = err instanceof Error ? err.message : String(err);
        reject(new InputError(`ffprobe failed on ${videoPath}: ${reason}`));
        return;
      }
      resolve(data.format.duration);
    });
  });
}

/**
 * Fail if any clip ends past the end of the source video
 */
export function checkClipsWithinDuration(clips: Clip[], duration: number): void {
  clips.forEach((clip, index) => {
    if (clip.end > duration) {
      throw new InputError(
        `Clip ${index} ends at ${clip.end}s, past the end of the video (${duration}s)`
      );
    }
  });
}

/**
 * Run ffmpeg and wait for it. stdio is inherited so its progress output goes
 * straight to the terminal.
 */
export function runFfmpeg(command: FfmpegCommand): void {
  const result = spawnSync(command.executable, command.args, { stdio: "inherit" });

  if (result.error) {
    throw new CommandError(
      `Failed to start ${command.executable}: ${result.error.message}`
    );
  }
  if (result.status !== 0) {
    const exitCode = result.status ?? 1;
    const reason = result.signal ? `was killed by ${result.signal}` : `exited with code ${exitCode}`;
    throw new CommandError(`${command.executable} ${reason}`, exitCode);
  }
}
