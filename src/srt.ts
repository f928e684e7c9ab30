import { Subtitle } from "./types/subtitles.js";

const TIMING_PATTERN = /^(\d+):(\d{2}):(\d{2})[,.](\d{1,3})\s*-->\s*(\d+):(\d{2}):(\d{2})[,.](\d{1,3})/;

// "HH:MM:SS,mmm" split into its parts; fractions shorter than 3 digits are tenths/hundredths
function partsToMs(hours: string, minutes: string, seconds: string, fraction: string): number {
  return Number(hours) * 3600000
    + Number(minutes) * 60000
    + Number(seconds) * 1000
    + Number(fraction.padEnd(3, '0'));
}

// Strip HTML-like tags (<i>, <font color=...>) and ASS override blocks ({\an8})
export function stripMarkup(line: string): string {
  return line
    .replace(/<[^>]*>/g, '')
    .replace(/\{\\[^}]*\}/g, '')
    .trim();
}

export function formatSrtTime(ms: number): string {
  const total = Math.max(0, Math.round(ms));
  const hours = Math.floor(total / 3600000);
  const minutes = Math.floor((total % 3600000) / 60000);
  const seconds = Math.floor((total % 60000) / 1000);
  const millis = total % 1000;

  return `${hours.toString().padStart(2, '0')}:${minutes.toString().padStart(2, '0')}:${seconds.toString().padStart(2, '0')},${millis.toString().padStart(3, '0')}`;
}

/**
 * Parses SubRip content into subtitles ordered by start, then end.
 * Cues without a timing line, without text, or ending before they start are dropped.
 */
export function parseSrt(content: string): Subtitle[] {
  const blocks = content
    .replace(/^\uFEFF/, '')
    .replace(/\r\n?/g, '\n')
    .trim()
    .split(/\n\s*\n/);

  const subtitles: Subtitle[] = [];

  for (const block of blocks) {
    const lines = block.split('\n');
    const timingIndex = lines.findIndex(line => line.includes('-->'));
    if (timingIndex < 0) continue;

    const match = lines[timingIndex].trim().match(TIMING_PATTERN);
    if (!match) continue;

    const start = partsToMs(match[1], match[2], match[3], match[4]);
    const end = partsToMs(match[5], match[6], match[7], match[8]);
    if (end <= start) continue;

    const textLines = lines
      .slice(timingIndex + 1)
      .map(stripMarkup)
      .filter(line => line !== '');

    if (textLines.length === 0) continue;

    subtitles.push(Object.freeze({ start, end, lines: textLines, delay: 0 }));
  }

  // Array.prototype.sort is stable, equal timings keep file order
  return subtitles.sort((a, b) => a.start - b.start || a.end - b.end);
}

export function toSrt(subtitles: Subtitle[]): string {
  return subtitles
    .map((sub, index) => `${index + 1}\n${formatSrtTime(sub.start)} --> ${formatSrtTime(sub.end)}\n${sub.lines.join('\n')}\n`)
    .join('\n');
}
