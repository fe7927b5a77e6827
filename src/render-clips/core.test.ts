import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CommandError, InputError, SchemaError } from "../common/errors";
import { renderClips } from "./core";
import { RenderOptions } from "./types";

const { spawnSync, ffprobe, setFfprobePath } = vi.hoisted(() => ({
  spawnSync: vi.fn(),
  ffprobe: vi.fn(),
  setFfprobePath: vi.fn(),
}));

vi.mock("child_process", () => ({ spawnSync }));
vi.mock("fluent-ffmpeg", () => ({ default: { ffprobe, setFfprobePath } }));

function probeReturns(duration: number | undefined) {
  ffprobe.mockImplementation((_file: string, callback: (err: unknown, data: unknown) => void) => {
    callback(null, { format: { duration }, streams: [] });
  });
}

describe("renderClips", () => {
  let dir: string;
  let options: RenderOptions;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "render-clips-"));
    fs.writeFileSync(path.join(dir, "in.mp4"), "not really a video");
    fs.writeFileSync(
      path.join(dir, "save.json"),
      JSON.stringify({ clips: [{ start: 0, end: 1 }, { start: 5, end: 8 }] })
    );

    options = {
      saveFilePath: path.join(dir, "save.json"),
      videoPath: path.join(dir, "in.mp4"),
      outputPath: path.join(dir, "renders", "out.mkv"),
      ffmpegPath: "ffmpeg",
      ffprobePath: "ffprobe",
      overwrite: false,
      dryRun: false,
      skipProbe: false,
    };

    spawnSync.mockReset();
    ffprobe.mockReset();
    spawnSync.mockReturnValue({ status: 0, signal: null });
    probeReturns(60);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("runs ffmpeg with the generated command", async () => {
    const command = await renderClips(options);

    expect(spawnSync).toHaveBeenCalledTimes(1);
    expect(spawnSync).toHaveBeenCalledWith("ffmpeg", command.args, { stdio: "inherit" });
    expect(command.args).toEqual([
      "-i", options.videoPath,
      "-filter_complex",
      "[0:v]trim=start=0:end=1,setpts=PTS-STARTPTS[0v];" +
        "[0:a]atrim=start=0:end=1,asetpts=PTS-STARTPTS[0a];" +
        "[0:v]trim=start=5:end=8,setpts=PTS-STARTPTS[1v];" +
        "[0:a]atrim=start=5:end=8,asetpts=PTS-STARTPTS[1a];" +
        "[0v][0a][1v][1a]concat=n=2:v=1:a=1[outv][outa]",
      "-map", "[outv]",
      "-map", "[outa]",
      options.outputPath,
    ]);
    expect(fs.existsSync(path.join(dir, "renders"))).toBe(true);
  });

  it("builds the command without running it on a dry run", async () => {
    const command = await renderClips({ ...options, dryRun: true, overwrite: true });

    expect(command.args[0]).toBe("-y");
    expect(spawnSync).not.toHaveBeenCalled();
  });

  it("fails before spawning anything when clips are missing", async () => {
    fs.writeFileSync(options.saveFilePath, JSON.stringify({ word_timestamp_map: {} }));

    await expect(renderClips(options)).rejects.toThrow(SchemaError);
    expect(ffprobe).not.toHaveBeenCalled();
    expect(spawnSync).not.toHaveBeenCalled();
  });

  it("rejects an empty clip list", async () => {
    fs.writeFileSync(options.saveFilePath, JSON.stringify({ clips: [] }));

    await expect(renderClips(options)).rejects.toThrow("Save file contains no clips");
    expect(spawnSync).not.toHaveBeenCalled();
  });

  it("fails when the video doesn't exist", async () => {
    const videoPath = path.join(dir, "missing.mp4");

    await expect(renderClips({ ...options, videoPath })).rejects.toThrow(
      new InputError(`Video file not found: ${videoPath}`)
    );
    expect(spawnSync).not.toHaveBeenCalled();
  });

  it("rejects clips past the end of the video", async () => {
    probeReturns(6.5);

    await expect(renderClips(options)).rejects.toThrow(
      "Clip 1 ends at 8s, past the end of the video (6.5s)"
    );
    expect(spawnSync).not.toHaveBeenCalled();
  });

  it("skips the range check when probing is disabled", async () => {
    probeReturns(6.5);

    await renderClips({ ...options, skipProbe: true });

    expect(ffprobe).not.toHaveBeenCalled();
    expect(spawnSync).toHaveBeenCalledTimes(1);
  });

  it("renders when ffprobe reports no duration", async () => {
    probeReturns(undefined);

    await renderClips(options);

    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(spawnSync).toHaveBeenCalledTimes(1);
  });

  it("propagates ffmpeg failures", async () => {
    spawnSync.mockReturnValue({ status: 2, signal: null });

    await expect(renderClips(options)).rejects.toThrow(new CommandError("ffmpeg exited with code 2", 2));
  });
});
