import path from "path";
import { extractSubtitleStream, probeStreams } from "./ffmpeg.js";
import { fileExists, readFile, withTempDir } from "./fs.js";
import { parseSrt } from "./srt.js";
import { logger } from "./logger.js";
import { SubtitleStreamNotFoundError, TimeRangeError } from "./types/errors.js";
import {
  ProbeStream,
  Subtitle,
  SubtitleMatch,
  SubtitleSelector,
  TimeRange
} from "./types/subtitles.js";

const log = logger.child({ component: 'subtitles' });

const CLOSED_CAPTION_MARKERS = ['sdh', 'cc', 'hearing impaired'];

export function compareSubtitles(a: Subtitle, b: Subtitle): number {
  return a.start - b.start || a.end - b.end;
}

export function subtitleText(sub: Subtitle): string {
  return sub.lines.join(' ');
}

// "[12s - 15s] text", the same label the track listing shows
export function formatSubtitleLabel(sub: Subtitle): string {
  return `[${Math.floor(sub.start / 1000)}s - ${Math.floor(sub.end / 1000)}s] ${subtitleText(sub)}`;
}

// Decompose and drop combining marks so "café" matches "cafe"
export function normalizeText(text: string): string {
  return text.normalize('NFD').replace(/\p{Mn}/gu, '');
}

/**
 * Case and accent insensitive substring search. An empty query lists every subtitle.
 */
export function searchSubtitles(subtitles: Subtitle[], query: string): SubtitleMatch[] {
  const needle = normalizeText(query.trim()).toLowerCase();

  const matches: SubtitleMatch[] = [];
  subtitles.forEach((subtitle, index) => {
    if (needle === '' || normalizeText(subtitleText(subtitle)).toLowerCase().includes(needle)) {
      matches.push({ index, subtitle });
    }
  });
  return matches;
}

/**
 * Resolves a selected subtitle (by index or first search hit) to a clip range.
 * `count` chains the following subtitles into the range; `delay` shifts the start.
 */
export function resolveTimeRange(subtitles: Subtitle[], selector: SubtitleSelector): TimeRange {
  const count = selector.count ?? 1;
  const delay = selector.delay ?? 0;

  if (!Number.isInteger(count) || count < 1) {
    throw new TimeRangeError(`Subtitle count must be a positive integer, got ${count}`);
  }

  let index: number;
  if (selector.index !== undefined) {
    index = selector.index;
    if (!Number.isInteger(index) || index < 0 || index >= subtitles.length) {
      throw new TimeRangeError(`Subtitle index ${index} is out of range (track has ${subtitles.length} subtitles)`);
    }
  } else if (selector.query !== undefined) {
    const [firstMatch] = searchSubtitles(subtitles, selector.query);
    if (!firstMatch) {
      throw new TimeRangeError(`No subtitle matches '${selector.query}'`);
    }
    index = firstMatch.index;
  } else {
    throw new TimeRangeError('Either a subtitle index or a search query is required');
  }

  const selected = subtitles.slice(index, index + count);
  const first = selected[0];
  const last = selected[selected.length - 1];

  const start = Math.max(0, first.start + delay);
  const end = last.end;

  if (start >= end) {
    throw new TimeRangeError(`Delay of ${delay}ms moves the start (${start}ms) past the end (${end}ms)`);
  }

  return {
    index,
    start,
    end,
    subtitles: [Object.freeze({ ...first, delay: first.delay + delay }), ...selected.slice(1)],
  };
}

// Subtitles overlapping [start, end)
export function subtitlesInRange(subtitles: Subtitle[], start: number, end: number): Subtitle[] {
  return subtitles.filter(sub => sub.start < end && sub.end > start);
}

/**
 * Picks a subtitle stream by language, trying `languages` left to right.
 * Returns its position among the subtitle streams, i.e. the N in `0:s:N`.
 */
export function findSubtitleTrack(
  streams: ProbeStream[],
  languages: string[],
  includeCc: boolean = false,
  videoPath: string = ''
): number {
  const subtitleStreams = streams.filter(stream => stream.codec_type === 'subtitle');

  if (subtitleStreams.length === 0) {
    throw new SubtitleStreamNotFoundError(`No subtitle streams found for ${videoPath}`, videoPath);
  }

  for (const language of languages) {
    const position = subtitleStreams.findIndex(stream => {
      const tags = stream.tags ?? {};
      if ((tags.language ?? '') !== language) return false;

      const title = (tags.title ?? '').toLowerCase();
      return includeCc || !CLOSED_CAPTION_MARKERS.some(marker => title.includes(marker));
    });

    if (position >= 0) {
      return position;
    }
  }

  throw new SubtitleStreamNotFoundError(
    `No subtitle stream exists for any of the requested languages: ${languages.join(',')}`,
    videoPath
  );
}

// Throws unless the video has a subtitle stream `0:s:<track>`
export function checkSubtitleTrack(streams: ProbeStream[], track: number, videoPath: string = ''): void {
  const count = streams.filter(stream => stream.codec_type === 'subtitle').length;
  if (track >= count) {
    throw new SubtitleStreamNotFoundError(
      count === 0
        ? `No subtitle streams found for ${videoPath}`
        : `Subtitle track ${track} does not exist, ${videoPath} has ${count} subtitle stream(s)`,
      videoPath
    );
  }
}

export function subtitleStreamLanguage(streams: ProbeStream[], track: number): string {
  const stream = streams.filter(s => s.codec_type === 'subtitle')[track];
  return stream?.tags?.language ?? 'unknown';
}

/**
 * Dumps subtitle stream `0:s:<track>` to SubRip with ffmpeg and parses it.
 */
export async function extractSubtitles(videoPath: string, track: number = 0): Promise<Subtitle[]> {
  return withTempDir(async (tmp) => {
    const output = path.join(tmp, 'subs.srt');
    await extractSubtitleStream(videoPath, output, track);

    if (!(await fileExists(output))) {
      throw new SubtitleStreamNotFoundError(
        `Could not extract subtitles from video ${videoPath} at sub track ${track}`,
        videoPath
      );
    }

    const subtitles = parseSrt(await readFile(output));
    log.info('Extracted subtitles', { videoPath, track, count: subtitles.length });
    return subtitles;
  });
}

export async function extractSubtitlesByLanguage(
  videoPath: string,
  languages: string[],
  includeCc: boolean = false
): Promise<{ track: number, language: string, subtitles: Subtitle[] }> {
  const streams = await probeStreams(videoPath);
  const track = findSubtitleTrack(streams, languages, includeCc, videoPath);
  const subtitles = await extractSubtitles(videoPath, track);

  return { track, language: subtitleStreamLanguage(streams, track), subtitles };
}
