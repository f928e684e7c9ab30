import { describe, it, expect, vi, beforeEach } from "vitest";
import { promises } from "fs";
import os from "os";
import path from "path";
import { generateClip, GenerationStep } from "../generate.js";
import { createClipSettings } from "../clipSettings.js";
import { cutClipArgs, reencodeClipArgs } from "../commands.js";
import { execFfmpeg, hasVideoStream, renderCaptionFrame } from "../ffmpeg.js";
import { ClipSettingsInput, VideoFormat } from "../types/clip.js";

vi.mock("../ffmpeg.js", () => ({
  execFfmpeg: vi.fn(),
  hasVideoStream: vi.fn(),
  renderCaptionFrame: vi.fn(),
  getDimensions: vi.fn(),
}));

const WIDTH = 8;
const HEIGHT = 10;

let workDir: string;

function inputFor(overrides: Partial<ClipSettingsInput> = {}): ClipSettingsInput {
  return {
    inputPath: "/videos/source.mkv",
    clipPath: path.join(workDir, "clip.mp4"),
    outputPath: path.join(workDir, "out", "output.gif"),
    outputFormat: VideoFormat.GIF,
    start: 10000,
    end: 14000,
    width: WIDTH,
    height: HEIGHT,
    ...overrides,
  };
}

// Every ffmpeg run writes its last argument, the output file
function renderedArgs(call: number): string[] {
  return vi.mocked(execFfmpeg).mock.calls[call][0];
}

function filterGraph(args: string[]): string {
  return args[args.indexOf("-filter_complex") + 1];
}

beforeEach(async () => {
  workDir = await promises.mkdtemp(path.join(os.tmpdir(), "sub2clip-generate-"));

  vi.mocked(execFfmpeg).mockReset();
  vi.mocked(execFfmpeg).mockImplementation(async (args: string[]) => {
    await promises.writeFile(args[args.length - 1], Buffer.alloc(2048));
    return "";
  });
  vi.mocked(hasVideoStream).mockReset();
  vi.mocked(hasVideoStream).mockResolvedValue(true);
  vi.mocked(renderCaptionFrame).mockReset();
});

describe("generateClip", () => {
  it("cuts the range and renders it", async () => {
    const settings = await createClipSettings(inputFor());

    const result = await generateClip(settings, [{ start: 11000, end: 12000, lines: ["Hi"], delay: 0 }]);

    expect(execFfmpeg).toHaveBeenCalledTimes(2);
    expect(renderedArgs(0)).toEqual(cutClipArgs(settings));
    expect(filterGraph(renderedArgs(1))).toMatch(/^fps=20,scale=8:10:flags=lanczos,subtitles='.*sub\.ass',split/);
    expect(renderedArgs(1).at(-1)).toBe(settings.outputPath);
    expect(result).toEqual({
      outputPath: settings.outputPath,
      mp4CopyPath: undefined,
      sizeBytes: 2048,
      width: WIDTH,
      height: HEIGHT,
      durationMs: 4000,
    });
  });

  it("re-encodes when the stream copy has no video", async () => {
    vi.mocked(hasVideoStream).mockResolvedValue(false);
    const settings = await createClipSettings(inputFor());

    await generateClip(settings);

    expect(execFfmpeg).toHaveBeenCalledTimes(3);
    expect(renderedArgs(1)).toEqual(reencodeClipArgs(settings));
  });

  it("pads the clip by the measured caption height", async () => {
    const frame = Buffer.alloc(WIDTH * HEIGHT * 4);
    for (let row = 2; row <= 5; row++) {
      frame.set([255, 255, 255, 255], row * WIDTH * 4);
    }
    vi.mocked(renderCaptionFrame).mockResolvedValue(frame);
    const settings = await createClipSettings(inputFor());

    const result = await generateClip(settings, [], { start: 10000, end: 14000, lines: ["Top"], delay: 0 });

    // four painted rows plus the default vertical margin on both sides
    expect(result.height).toBe(HEIGHT + 24);
    expect(filterGraph(renderedArgs(1))).toContain("pad=iw:(ih+24):0:24");
    expect(renderCaptionFrame).toHaveBeenCalledWith(expect.stringMatching(/^subtitles='.*caption\.ass',format=rgba$/), WIDTH, HEIGHT);
  });

  it("measures the caption with the fonts the final render uses", async () => {
    const frame = Buffer.alloc(WIDTH * HEIGHT * 4);
    frame.set([255, 255, 255, 255], 3 * WIDTH * 4);
    vi.mocked(renderCaptionFrame).mockResolvedValue(frame);
    const settings = await createClipSettings(inputFor({ fontsDir: "/fonts" }));

    await generateClip(settings, [], { start: 10000, end: 14000, lines: ["Top"], delay: 0 });

    expect(renderCaptionFrame).toHaveBeenCalledWith(
      expect.stringMatching(/^subtitles='.*caption\.ass':fontsdir='\/fonts',format=rgba$/),
      WIDTH,
      HEIGHT
    );
    expect(filterGraph(renderedArgs(1))).toMatch(/subtitles='.*sub\.ass':fontsdir='\/fonts'/);
  });

  it("adds no padding when the caption renders nothing", async () => {
    vi.mocked(renderCaptionFrame).mockResolvedValue(Buffer.alloc(WIDTH * HEIGHT * 4));
    const settings = await createClipSettings(inputFor());

    const result = await generateClip(settings, [], { start: 10000, end: 14000, lines: [" "], delay: 0 });

    expect(result.height).toBe(HEIGHT);
    expect(filterGraph(renderedArgs(1))).not.toContain("pad=");
  });

  it("renders an MP4 copy and reports every step", async () => {
    const settings = await createClipSettings(inputFor({ mp4Copy: true }));
    const steps: GenerationStep[] = [];

    const result = await generateClip(settings, [], undefined, step => { steps.push(step); });

    const copyPath = path.join(workDir, "out", "output.mp4");
    expect(result.mp4CopyPath).toBe(copyPath);
    expect(renderedArgs(2).at(-1)).toBe(copyPath);
    expect(renderedArgs(2)).toContain("libx264");
    expect(filterGraph(renderedArgs(2))).not.toContain("palettegen");
    expect(steps).toEqual(["cut", "prepare", "render", "mp4_copy", "done"]);
  });

  it("doubles the duration of boomerang clips", async () => {
    const settings = await createClipSettings(inputFor({ boomerang: true }));

    const result = await generateClip(settings);

    expect(result.durationMs).toBe(8000);
    expect(filterGraph(renderedArgs(1)).startsWith("[0]reverse[r];[0][r]concat=n=2:v=1:a=0,fps=20")).toBe(true);
  });
});
