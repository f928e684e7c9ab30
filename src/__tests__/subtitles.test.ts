import { describe, it, expect, vi, beforeEach } from "vitest";
import { promises } from "fs";
import {
  checkSubtitleTrack,
  extractSubtitles,
  extractSubtitlesByLanguage,
  findSubtitleTrack,
  formatSubtitleLabel,
  normalizeText,
  resolveTimeRange,
  searchSubtitles,
  subtitleStreamLanguage,
  subtitlesInRange,
} from "../subtitles.js";
import { extractSubtitleStream, probeStreams } from "../ffmpeg.js";
import { SubtitleStreamNotFoundError, TimeRangeError } from "../types/errors.js";
import type { ProbeStream, Subtitle } from "../types/subtitles.js";

vi.mock("../ffmpeg.js", () => ({
  extractSubtitleStream: vi.fn(),
  probeStreams: vi.fn(),
}));

const subs: Subtitle[] = [
  { start: 1000, end: 2000, lines: ["Hello there"], delay: 0 },
  { start: 2500, end: 4000, lines: ["Café au lait"], delay: 0 },
  { start: 4500, end: 6000, lines: ["See you tomorrow"], delay: 0 },
  { start: 7000, end: 9000, lines: ["Two", "lines"], delay: 0 },
];

const streams: ProbeStream[] = [
  { index: 0, codec_type: "video" },
  { index: 1, codec_type: "audio" },
  { index: 2, codec_type: "subtitle", tags: { language: "eng", title: "English SDH" } },
  { index: 3, codec_type: "subtitle", tags: { language: "spa" } },
  { index: 4, codec_type: "subtitle", tags: { language: "eng" } },
];

describe("normalizeText", () => {
  it("drops combining marks", () => {
    expect(normalizeText("Crème Brûlée")).toBe("Creme Brulee");
  });
});

describe("searchSubtitles", () => {
  it("matches case and accent insensitively", () => {
    expect(searchSubtitles(subs, "CAFE")).toEqual([{ index: 1, subtitle: subs[1] }]);
  });

  it("matches across the lines of a subtitle", () => {
    expect(searchSubtitles(subs, "two lines").map(match => match.index)).toEqual([3]);
  });

  it("lists every subtitle for a blank query", () => {
    expect(searchSubtitles(subs, "  ").map(match => match.index)).toEqual([0, 1, 2, 3]);
  });

  it("returns nothing when no subtitle matches", () => {
    expect(searchSubtitles(subs, "nowhere")).toEqual([]);
  });
});

describe("formatSubtitleLabel", () => {
  it("shows whole seconds and the joined text", () => {
    expect(formatSubtitleLabel(subs[3])).toBe("[7s - 9s] Two lines");
  });
});

describe("resolveTimeRange", () => {
  it("uses the selected subtitle's timing", () => {
    expect(resolveTimeRange(subs, { index: 1 })).toEqual({
      index: 1,
      start: 2500,
      end: 4000,
      subtitles: [subs[1]],
    });
  });

  it("chains following subtitles with count", () => {
    const range = resolveTimeRange(subs, { index: 1, count: 2 });
    expect(range.start).toBe(2500);
    expect(range.end).toBe(6000);
    expect(range.subtitles).toHaveLength(2);
  });

  it("stops chaining at the end of the track", () => {
    const range = resolveTimeRange(subs, { index: 3, count: 5 });
    expect(range).toEqual({ index: 3, start: 7000, end: 9000, subtitles: [subs[3]] });
  });

  it("selects the first match of a query and carries the delay on it", () => {
    const range = resolveTimeRange(subs, { query: "tomorrow", delay: -500 });
    expect(range.index).toBe(2);
    expect(range.start).toBe(4000);
    expect(range.end).toBe(6000);
    expect(range.subtitles[0].delay).toBe(-500);
  });

  it("clamps a shifted start at zero", () => {
    expect(resolveTimeRange(subs, { index: 0, delay: -5000 }).start).toBe(0);
  });

  it("rejects bad selections", () => {
    expect(() => resolveTimeRange(subs, { index: 4 })).toThrow(TimeRangeError);
    expect(() => resolveTimeRange(subs, { query: "nowhere" })).toThrow(TimeRangeError);
    expect(() => resolveTimeRange(subs, { index: 0, count: 0 })).toThrow(TimeRangeError);
    expect(() => resolveTimeRange(subs, { index: 0, delay: 1000 })).toThrow(TimeRangeError);
  });
});

describe("subtitlesInRange", () => {
  it("keeps subtitles overlapping the range", () => {
    expect(subtitlesInRange(subs, 2000, 5000)).toEqual([subs[1], subs[2]]);
  });
});

describe("findSubtitleTrack", () => {
  it("skips closed caption streams by default", () => {
    expect(findSubtitleTrack(streams, ["eng"])).toBe(2);
  });

  it("accepts closed caption streams when asked", () => {
    expect(findSubtitleTrack(streams, ["eng"], true)).toBe(0);
  });

  it("tries languages in order", () => {
    expect(findSubtitleTrack(streams, ["fre", "spa", "eng"])).toBe(1);
  });

  it("throws when no language matches", () => {
    expect(() => findSubtitleTrack(streams, ["ger"], false, "/videos/a.mkv")).toThrow(SubtitleStreamNotFoundError);
  });

  it("throws when the video has no subtitle streams", () => {
    expect(() => findSubtitleTrack(streams.slice(0, 2), ["eng"])).toThrow("No subtitle streams found");
  });
});

describe("checkSubtitleTrack", () => {
  it("accepts existing subtitle streams", () => {
    expect(() => checkSubtitleTrack(streams, 2)).not.toThrow();
  });

  it("rejects a track past the last subtitle stream", () => {
    expect(() => checkSubtitleTrack(streams, 3, "/videos/a.mkv"))
      .toThrow("Subtitle track 3 does not exist, /videos/a.mkv has 3 subtitle stream(s)");
    expect(() => checkSubtitleTrack(streams.slice(0, 2), 0)).toThrow(SubtitleStreamNotFoundError);
  });
});

describe("subtitleStreamLanguage", () => {
  it("reads the language tag of the Nth subtitle stream", () => {
    expect(subtitleStreamLanguage(streams, 1)).toBe("spa");
    expect(subtitleStreamLanguage(streams, 5)).toBe("unknown");
  });
});

describe("extractSubtitles", () => {
  const srt = "1\n00:00:01,000 --> 00:00:02,000\nFirst\n\n2\n00:00:03,000 --> 00:00:04,000\nSecond\n";

  beforeEach(() => {
    vi.mocked(extractSubtitleStream).mockReset();
    vi.mocked(probeStreams).mockReset();
  });

  it("parses the stream ffmpeg wrote", async () => {
    vi.mocked(extractSubtitleStream).mockImplementation(async (_input: string, output: string) => {
      await promises.writeFile(output, srt, "utf-8");
    });

    const result = await extractSubtitles("/videos/a.mkv", 1);

    expect(result).toEqual([
      { start: 1000, end: 2000, lines: ["First"], delay: 0 },
      { start: 3000, end: 4000, lines: ["Second"], delay: 0 },
    ]);
    expect(extractSubtitleStream).toHaveBeenCalledWith("/videos/a.mkv", expect.stringMatching(/subs\.srt$/), 1);
  });

  it("throws when ffmpeg wrote nothing", async () => {
    vi.mocked(extractSubtitleStream).mockResolvedValue(undefined);

    await expect(extractSubtitles("/videos/a.mkv", 3)).rejects.toThrow(SubtitleStreamNotFoundError);
  });

  it("picks the stream by language", async () => {
    vi.mocked(probeStreams).mockResolvedValue(streams);
    vi.mocked(extractSubtitleStream).mockImplementation(async (_input: string, output: string) => {
      await promises.writeFile(output, srt, "utf-8");
    });

    const result = await extractSubtitlesByLanguage("/videos/a.mkv", ["eng"]);

    expect(result.track).toBe(2);
    expect(result.language).toBe("eng");
    expect(result.subtitles).toHaveLength(2);
    expect(extractSubtitleStream).toHaveBeenCalledWith("/videos/a.mkv", expect.any(String), 2);
  });
});
