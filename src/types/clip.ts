import { z } from "zod";

// Enums

export enum VideoFormat {
  GIF = "gif",
  WEBP = "webp",
  MP4 = "mp4",
}

// Data structure schemas

/**
 * Maps onto an ASS `Style:` line. Defaults suit regular bottom-centred subtitles.
 * Colours use the ASS `&HAABBGGRR` notation.
 */
export const TextStyleSchema = z.object({
  name: z.string().regex(/^[^,]+$/, "Style name cannot contain commas").default("subtitle_style"),
  font: z.string().regex(/^[^,]+$/, "Font name cannot contain commas").default("Arial"),
  fontSize: z.number().int().positive().default(20),
  fontColor: z.string().default("&H00FFFFFF"),
  outlineWidth: z.number().int().nonnegative().optional().describe("Defaults to fontSize / 20"),
  outlineColor: z.string().default("&H00000000"),
  bold: z.boolean().default(false),
  italic: z.boolean().default(false),
  shadow: z.number().int().nonnegative().default(0),
  alignment: z.number().int().min(1).max(9).default(2).describe("Numpad position, 2 = bottom centre"),
  marginL: z.number().int().nonnegative().default(0),
  marginR: z.number().int().nonnegative().default(0),
  marginV: z.number().int().nonnegative().default(10),
});

export const ClipSettingsInputSchema = z.object({
  inputPath: z.string().describe("Source video"),
  clipPath: z.string().describe("Intermediate MP4 cut from the source"),
  outputPath: z.string().describe("Generated clip, its extension must match outputFormat"),
  outputFormat: z.nativeEnum(VideoFormat),
  start: z.number().int().nonnegative().describe("Clip start in milliseconds"),
  end: z.number().int().nonnegative().describe("Clip end in milliseconds"),
  fps: z.number().int().min(1).max(60).default(20),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  resolution: z.number().int().positive().optional().describe("Short edge in pixels, the other edge keeps the aspect ratio"),
  subtitleStyle: TextStyleSchema.partial().optional(),
  captionStyle: TextStyleSchema.partial().optional(),
  crop: z.boolean().default(false).describe("Crop the clip to a square"),
  boomerang: z.boolean().default(false).describe("Append the reversed clip"),
  hdGif: z.boolean().default(false).describe("Full palette GIF, much larger files"),
  mp4Copy: z.boolean().default(false).describe("Also render an MP4 with the same burned-in text"),
  crf: z.number().int().min(0).max(51).default(18),
  preset: z.string().default("fast"),
  fontsDir: z.string().optional().describe("Directory with font files for the subtitles filter"),
});

// Types

export interface TextStyle extends z.infer<typeof TextStyleSchema> { }
export type ClipSettingsInput = z.input<typeof ClipSettingsInputSchema>;

export interface ClipSettings {
  readonly inputPath: string;
  readonly clipPath: string;
  readonly outputPath: string;
  readonly outputFormat: VideoFormat;
  readonly start: number;
  readonly end: number;
  readonly fps: number;
  readonly width: number;
  readonly height: number;
  readonly subtitleStyle: TextStyle;
  readonly captionStyle: TextStyle;
  readonly crop: boolean;
  readonly boomerang: boolean;
  readonly hdGif: boolean;
  readonly mp4Copy: boolean;
  readonly crf: number;
  readonly preset: string;
  readonly fontsDir?: string;
}

export interface Dimensions {
  width: number;
  height: number;
}

export interface GenerationResult {
  outputPath: string;
  mp4CopyPath?: string;
  sizeBytes: number;
  width: number;
  height: number;
  durationMs: number;
}
