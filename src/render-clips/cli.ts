#!/usr/bin/env node
import { Command } from "commander";
import { CliTimer } from "../common/timer";
import { FLAGS } from "../common/flags";
import { loadConfig } from "../common/config";
import { CommandError } from "../common/errors";
import { renderClips } from "./core";

interface CliOptions {
  saveFilePath: string;
  videoPath: string;
  output?: string;
  ffmpegPath?: string;
  ffprobePath?: string;
  overwrite: boolean;
  dryRun: boolean;
  skipProbe: boolean;
}

export function createProgram(): Command {
  return new Command()
    .name("render-clips")
    .description("Trim the clips of a save file out of a video and join them into one file")
    .requiredOption(FLAGS.saveFile.flag, FLAGS.saveFile.description)
    .requiredOption(FLAGS.video.flag, FLAGS.video.description)
    .option(FLAGS.output.flag, FLAGS.output.description)
    .option(FLAGS.ffmpegPath.flag, FLAGS.ffmpegPath.description)
    .option(FLAGS.ffprobePath.flag, FLAGS.ffprobePath.description)
    .option(FLAGS.overwrite.flag, FLAGS.overwrite.description, false)
    .option(FLAGS.dryRun.flag, FLAGS.dryRun.description, false)
    .option(FLAGS.skipProbe.flag, FLAGS.skipProbe.description, false)
    .action(async (options: CliOptions) => {
      try {
        const config = loadConfig();
        await renderClips({
          saveFilePath: options.saveFilePath,
          videoPath: options.videoPath,
          outputPath: options.output ?? config.outputPath,
          ffmpegPath: options.ffmpegPath ?? config.ffmpegPath,
          ffprobePath: options.ffprobePath ?? config.ffprobePath,
          overwrite: options.overwrite,
          dryRun: options.dryRun,
          skipProbe: options.skipProbe,
        });
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : 'Unknown error');
        process.exitCode = error instanceof CommandError ? error.exitCode : 1;
      }
    });
}

async function main() {
  const timer = new CliTimer();
  timer.start();

  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : 'Unknown error');
    process.exitCode = 1;
  } finally {
    timer.stop();
  }
}

if (require.main === module) {
  void main();
}
