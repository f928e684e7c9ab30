import { Subtitle } from "./types/subtitles.js";
import { TextStyle } from "./types/clip.js";
import { compareSubtitles } from "./subtitles.js";

// Advanced SubStation Alpha documents for the ffmpeg `subtitles` filter.
// Field order follows http://www.tcax.org/docs/ass-specs.htm

export const ASS_STYLE_FORMAT =
  "Format: Name,Fontname,Fontsize,PrimaryColour,SecondaryColour," +
  "OutlineColour,BackColour,Bold,Italic,Underline,StrikeOut," +
  "ScaleX,ScaleY,Spacing,Angle,BorderStyle,Outline,Shadow," +
  "Alignment,MarginL,MarginR,MarginV,Encoding";

export const ASS_EVENT_FORMAT = "Format: Layer,Start,End,Style,Name,MarginL,MarginR,MarginV,Effect,Text";

export function outlineWidth(style: TextStyle): number {
  return style.outlineWidth ?? Math.floor(style.fontSize / 20);
}

export function buildAssStyle(style: TextStyle): string {
  return [
    `Style: ${style.name}`,
    style.font,
    style.fontSize,
    style.fontColor,
    "&H00000000",
    style.outlineColor,
    "&H00000000",
    style.bold ? 1 : 0,
    style.italic ? 1 : 0,
    0,
    0,
    100,
    100,
    0,
    0,
    1,
    outlineWidth(style),
    style.shadow,
    style.alignment,
    style.marginL,
    style.marginR,
    style.marginV,
    1,
  ].join(",");
}

/**
 * Milliseconds to `H:MM:SS.cc`. ASS timing has centisecond precision.
 */
export function msToAssTiming(ms: number): string {
  let cs = Math.max(0, Math.round(ms / 10));

  const hh = Math.floor(cs / 360000);
  cs %= 360000;

  const mm = Math.floor(cs / 6000);
  cs %= 6000;

  const ss = Math.floor(cs / 100);
  cs %= 100;

  return `${hh}:${String(mm).padStart(2, "0")}:${String(ss).padStart(2, "0")}.${String(cs).padStart(2, "0")}`;
}

// ASS treats "\N" as a hard line break; newlines and braces in text would break the event line
function escapeAssText(line: string): string {
  return line.replace(/[\r\n]+/g, " ").replace(/[{}]/g, "");
}

export function buildAssEvents(subtitles: Subtitle[], clipStart: number, style: TextStyle): string[] {
  return [...subtitles].sort(compareSubtitles).map(sub => {
    const start = msToAssTiming(sub.start + sub.delay - clipStart);
    const end = msToAssTiming(sub.end - clipStart);
    const text = sub.lines.map(escapeAssText).join("\\N");

    return `Dialogue: 0,${start},${end},${style.name},,${style.marginL},${style.marginR},${style.marginV},,${text}`;
  });
}

export interface AssDocumentOptions {
  width: number;
  height: number;
  clipStart: number;
  padding?: number;
  subtitleStyle: TextStyle;
  captionStyle: TextStyle;
  subtitles: Subtitle[];
  caption?: Subtitle;
}

export function buildAssDocument(options: AssDocumentOptions): string {
  const { width, height, clipStart, padding = 0, subtitleStyle, captionStyle, subtitles, caption } = options;

  const styles = [buildAssStyle(subtitleStyle)];
  const events = buildAssEvents(subtitles, clipStart, subtitleStyle);

  if (caption) {
    styles.push(buildAssStyle(captionStyle));
    events.push(...buildAssEvents([caption], clipStart, captionStyle));
  }

  return [
    "[Script Info]",
    "ScriptType: v4.00+",
    `PlayResX: ${width}`,
    `PlayResY: ${height + padding}`,
    "",
    "[V4+ Styles]",
    ASS_STYLE_FORMAT,
    ...styles,
    "",
    "[Events]",
    ASS_EVENT_FORMAT,
    ...events,
    "",
  ].join("\n");
}

// A lone caption shown for five seconds, rendered once to measure its height
export function buildCaptionAss(style: TextStyle, lines: string[], width: number, height: number): string {
  const text = lines.map(escapeAssText).join("\\N");

  return [
    "[Script Info]",
    "ScriptType: v4.00+",
    `PlayResX: ${width}`,
    `PlayResY: ${height}`,
    "",
    "[V4+ Styles]",
    ASS_STYLE_FORMAT,
    buildAssStyle(style),
    "",
    "[Events]",
    ASS_EVENT_FORMAT,
    `Dialogue: 0,0:00:00.00,0:00:05.00,${style.name},,${style.marginL},${style.marginR},${style.marginV},,${text}`,
    "",
  ].join("\n");
}
