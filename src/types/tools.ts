import z from "zod";
import { TextStyleSchema, VideoFormat } from "./clip.js";

// Enums

export enum ToolName {
  EXTRACT_SUBTITLES = "extract_subtitles",
  GET_SUBTITLES = "get_subtitles",
  SEARCH_SUBTITLES = "search_subtitles",
  RESOLVE_TIME_RANGE = "resolve_time_range",
  GENERATE_CLIP = "generate_clip",
}

// Tool input schemas

export const ToolExtractSubtitlesInputSchema = z.object({
  videoPath: z.string().min(1).describe("Path of a video file with embedded subtitles"),
  track: z.number().int().nonnegative().optional().describe("Subtitle stream to extract (0:s:N), defaults to 0"),
  languages: z.array(z.string().min(2)).optional().describe("ISO 639 language codes in order of preference, used instead of track"),
  includeCc: z.boolean().default(false).describe("Allow streams marked as SDH, CC or hearing impaired"),
});

export const ToolGetSubtitlesInputSchema = z.object({
  trackId: z.string().min(1).describe("Subtitle track ID returned by extract_subtitles"),
  format: z.enum(["json", "srt"]).default("json").describe("json for structured records, srt for SubRip text"),
});

export const ToolSearchSubtitlesInputSchema = z.object({
  trackId: z.string().min(1).describe("Subtitle track ID returned by extract_subtitles"),
  query: z.string().default("").describe("Text to search for, case and accent insensitive. Empty lists every subtitle"),
  limit: z.number().int().positive().max(500).default(50).describe("Maximum number of matches to return"),
});

const SelectorFields = {
  index: z.number().int().nonnegative().optional().describe("Index of the subtitle in the track"),
  query: z.string().min(1).optional().describe("Use the first subtitle matching this text"),
  count: z.number().int().positive().default(1).describe("Number of consecutive subtitles to chain into the range"),
  delay: z.number().int().default(0).describe("Milliseconds added to the start of the range"),
};

export const ToolResolveTimeRangeInputSchema = z.object({
  trackId: z.string().min(1).describe("Subtitle track ID returned by extract_subtitles"),
  ...SelectorFields,
});

export const ToolGenerateClipInputSchema = z.object({
  videoPath: z.string().min(1).describe("Source video"),
  format: z.nativeEnum(VideoFormat).default(VideoFormat.GIF).describe("Output format"),
  outputPath: z.string().min(1).optional().describe("Output file, defaults to <OUTPUT_FOLDER>/output.<format>"),
  clipPath: z.string().min(1).optional().describe("Intermediate MP4, defaults to <OUTPUT_FOLDER>/clip.mp4"),
  start: z.number().int().nonnegative().optional().describe("Clip start in milliseconds, when not using trackId"),
  end: z.number().int().nonnegative().optional().describe("Clip end in milliseconds, when not using trackId"),
  trackId: z.string().min(1).optional().describe("Subtitle track to take the range (and burned-in subtitles) from"),
  ...SelectorFields,
  burnSubtitles: z.boolean().default(false).describe("Render the track's subtitles within the range onto the clip"),
  caption: z.string().optional().describe("Text shown above the clip for its whole duration, '\\n' separates lines"),
  fps: z.number().int().min(1).max(60).default(20),
  resolution: z.number().int().positive().optional().describe("Short edge in pixels, defaults to 320 when width/height are not set"),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  crop: z.boolean().default(false).describe("Crop to a square"),
  boomerang: z.boolean().default(false).describe("Play forward then backward"),
  hdGif: z.boolean().default(false).describe("Full palette GIF"),
  mp4Copy: z.boolean().default(false).describe("Also write an MP4 with the same burned-in text"),
  crf: z.number().int().min(0).max(51).default(18),
  preset: z.string().default("fast"),
  subtitleStyle: TextStyleSchema.partial().optional(),
  captionStyle: TextStyleSchema.partial().optional(),
  fontsDir: z.string().optional().describe("Directory with font files for the burned-in text"),
});

// Tool output schemas

export const ToolExtractSubtitlesOutputSchema = z.object({
  track_id: z.string(),
  video_path: z.string(),
  stream: z.number().int(),
  language: z.string(),
  subtitles_count: z.number().int(),
  next_action: z.object({
    tool: z.literal(ToolName.SEARCH_SUBTITLES),
    parameters: z.object({ trackId: z.string() })
  })
});

export const SubtitleMatchOutputSchema = z.object({
  index: z.number().int(),
  start: z.number().int(),
  end: z.number().int(),
  lines: z.array(z.string()),
  label: z.string(),
});

export const ToolSearchSubtitlesOutputSchema = z.object({
  track_id: z.string(),
  query: z.string(),
  total_matches: z.number().int(),
  matches: z.array(SubtitleMatchOutputSchema),
});

export const ToolResolveTimeRangeOutputSchema = z.object({
  track_id: z.string(),
  start: z.number().int(),
  end: z.number().int(),
  duration: z.number().int(),
  subtitles: z.array(SubtitleMatchOutputSchema.omit({ index: true, label: true }).extend({ delay: z.number().int() })),
});

export const ToolGenerateClipOutputSchema = z.object({
  output_path: z.string(),
  mp4_copy_path: z.string().optional(),
  size_bytes: z.number().int(),
  width: z.number().int(),
  height: z.number().int(),
  start: z.number().int(),
  end: z.number().int(),
  duration: z.number().int(),
});

// Types
// structuredContent needs an index signature, so these stay type aliases

export type ToolExtractSubtitlesOutput = z.infer<typeof ToolExtractSubtitlesOutputSchema>;
export type ToolSearchSubtitlesOutput = z.infer<typeof ToolSearchSubtitlesOutputSchema>;
export type ToolResolveTimeRangeOutput = z.infer<typeof ToolResolveTimeRangeOutputSchema>;
export type ToolGenerateClipOutput = z.infer<typeof ToolGenerateClipOutputSchema>;
