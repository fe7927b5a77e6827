import { BuilderStateError } from "../common/errors";
import { CommandOptions, SaveFile } from "./types";

export interface FfmpegCommand {
  executable: string;
  args: readonly string[];
  filterGraph: string;
}

type BuilderState = "building" | "finished";

/**
 * Builds a `-filter_complex` graph that trims each segment out of input 0
 * and concatenates them, in the order they were added, into [outv][outa].
 *
 * Single use: once `finish` has returned the command, the builder rejects
 * further calls.
 */
export class FilterGraphBuilder {
  private segmentIndex = 0;
  private fragments: string[] = [];
  private state: BuilderState = "building";

  constructor(
    private readonly inputPath: string,
    private readonly executable: string = "ffmpeg"
  ) {}

  get segmentCount(): number {
    return this.segmentIndex;
  }

  addSegment(start: number, end: number): void {
    this.assertBuilding("addSegment");

    const i = this.segmentIndex;
    this.fragments.push(
      `[0:v]trim=start=${start}:end=${end},setpts=PTS-STARTPTS[${i}v];`,
      `[0:a]atrim=start=${start}:end=${end},asetpts=PTS-STARTPTS[${i}a];`
    );
    this.segmentIndex++;
  }

  finish(outputPath: string, overwrite = false): FfmpegCommand {
    this.assertBuilding("finish");
    this.state = "finished";

    for (let i = 0; i < this.segmentIndex; i++) {
      this.fragments.push(`[${i}v][${i}a]`);
    }
    this.fragments.push(`concat=n=${this.segmentIndex}:v=1:a=1[outv][outa]`);

    const filterGraph = this.fragments.join("");
    const args = [
      ...(overwrite ? ["-y"] : []),
      "-i", this.inputPath,
      "-filter_complex", filterGraph,
      "-map", "[outv]",
      "-map", "[outa]",
      outputPath,
    ];

    return { executable: this.executable, args, filterGraph };
  }

  private assertBuilding(operation: string): void {
    if (this.state !== "building") {
      throw new BuilderStateError(
        `Cannot call ${operation}() after the filter graph was finished`
      );
    }
  }
}

/**
 * Build the ffmpeg command that renders every clip of a save file, in order
 */
export function buildRenderCommand(
  saveFile: SaveFile,
  videoPath: string,
  options: CommandOptions
): FfmpegCommand {
  const builder = new FilterGraphBuilder(videoPath, options.ffmpegPath);
  for (const clip of saveFile.clips) {
    builder.addSegment(clip.start, clip.end);
  }
  return builder.finish(options.outputPath, options.overwrite);
}

/**
 * Full command line for logging; arguments with spaces or shell
 * metacharacters are single-quoted.
 */
export function formatCommand(command: FfmpegCommand): string {
  return [command.executable, ...command.args]
    .map((arg) => (/^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, "'\\''")}'`))
    .join(" ");
}
