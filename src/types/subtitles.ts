import { z } from "zod";

// Data structure schemas

export const SubtitleSchema = z.object({
  start: z.number().int().nonnegative().describe("Start time in milliseconds"),
  end: z.number().int().nonnegative().describe("End time in milliseconds"),
  lines: z.array(z.string()).describe("Lines of text, top to bottom"),
  delay: z.number().int().default(0).describe("Delay added to the start time when rendered, in milliseconds"),
});

export const SubtitleTrackSchema = z.object({
  track_id: z.string().describe("Stored subtitle track ID"),
  video_path: z.string().describe("Absolute path of the source video"),
  stream: z.number().int().nonnegative().describe("Subtitle stream index (0:s:N)"),
  language: z.string().describe("Language tag of the stream, 'unknown' when untagged"),
  extracted_at: z.string().describe("ISO datetime when the track was extracted"),
  subtitles: z.array(SubtitleSchema).describe("Subtitles in chronological order"),
});

export interface Subtitle extends z.infer<typeof SubtitleSchema> { }
export interface SubtitleTrack extends z.infer<typeof SubtitleTrackSchema> { }

export interface SubtitleMatch {
  index: number;
  subtitle: Subtitle;
}

export interface TimeRange {
  // Track index of the first record in the range
  index: number;
  start: number;
  end: number;
  subtitles: Subtitle[];
}

// Either a record index or a text query, optionally chaining the following records
export type SubtitleSelector = ({ index: number; query?: undefined } | { query: string; index?: undefined }) & {
  count?: number;
  delay?: number;
};

// Subset of ffprobe -show_streams JSON output
export const ProbeStreamSchema = z.object({
  index: z.number().int(),
  codec_type: z.string().optional(),
  codec_name: z.string().optional(),
  width: z.number().int().optional(),
  height: z.number().int().optional(),
  tags: z.record(z.string()).optional(),
});

export const ProbeOutputSchema = z.object({
  streams: z.array(ProbeStreamSchema).default([]),
});

export type ProbeStream = z.infer<typeof ProbeStreamSchema>;
