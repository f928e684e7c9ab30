import path from "path";
import { getDimensions } from "./ffmpeg.js";
import { escapeFilterPath } from "./commands.js";
import { ClipSettingsError } from "./types/errors.js";
import {
  ClipSettings,
  ClipSettingsInput,
  ClipSettingsInputSchema,
  Dimensions,
  TextStyle,
  TextStyleSchema,
  VideoFormat
} from "./types/clip.js";
import { Subtitle } from "./types/subtitles.js";

export type DimensionsProbe = (inputPath: string) => Promise<Dimensions>;

const CAPTION_STYLE_DEFAULTS = {
  name: "caption_style",
  alignment: 7,
  marginL: 15,
  marginR: 0,
  marginV: 10,
};

function even(value: number): number {
  return 2 * Math.round(value / 2);
}

/**
 * Scales the source so its short edge equals `resolution`, keeping the
 * aspect ratio with an even long edge (most encoders reject odd sizes).
 */
export function scaleToShortEdge(source: Dimensions, resolution: number): Dimensions {
  if (source.width >= source.height) {
    return { width: even(source.width * resolution / source.height), height: resolution };
  }
  return { width: resolution, height: even(source.height * resolution / source.width) };
}

/**
 * Validates clip settings and fills in derived values: output dimensions
 * (probing the source when only a resolution is given) and text styles.
 */
export async function createClipSettings(
  input: ClipSettingsInput,
  probe: DimensionsProbe = getDimensions
): Promise<ClipSettings> {
  const parsed = ClipSettingsInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ClipSettingsError(`${issue.path.join('.')}: ${issue.message}`, issue.path.join('.'));
  }
  const values = parsed.data;

  for (const field of ['inputPath', 'clipPath', 'outputPath'] as const) {
    if (values[field].trim() === '') {
      throw new ClipSettingsError(`${field} cannot be empty`, field);
    }
  }

  if (values.start >= values.end) {
    throw new ClipSettingsError("Clip start time cannot be after end time", 'start');
  }

  const widthSet = values.width !== undefined;
  const heightSet = values.height !== undefined;

  let dimensions: Dimensions;
  if (values.resolution !== undefined) {
    if (widthSet || heightSet) {
      throw new ClipSettingsError("Either set resolution OR width+height, not both", 'resolution');
    }
    dimensions = values.crop
      ? { width: values.resolution, height: values.resolution }
      : scaleToShortEdge(await probe(values.inputPath), values.resolution);
  } else if (values.width !== undefined && values.height !== undefined) {
    if (values.crop && values.width !== values.height) {
      throw new ClipSettingsError("Crop was set to true, but width doesn't match height", 'crop');
    }
    dimensions = { width: values.width, height: values.height };
  } else {
    throw new ClipSettingsError("You must set either resolution OR both width and height", 'resolution');
  }

  const extension = path.extname(values.outputPath).slice(1).toLowerCase();
  if (extension !== values.outputFormat) {
    throw new ClipSettingsError(
      `Output filename has filetype '${extension}', but the output format is '${values.outputFormat}'`,
      'outputPath'
    );
  }

  // ffmpeg refuses to write the file it is reading
  const inputs = [path.resolve(values.inputPath), path.resolve(values.clipPath)];
  if (inputs[0] === inputs[1]) {
    throw new ClipSettingsError("The intermediate clip cannot overwrite the input video", 'clipPath');
  }
  if (inputs.includes(path.resolve(values.outputPath))) {
    throw new ClipSettingsError("Output path cannot be the input video or the intermediate clip", 'outputPath');
  }
  if (values.mp4Copy && values.outputFormat !== VideoFormat.MP4 && inputs.includes(path.resolve(mp4CopyPath(values.outputPath)))) {
    throw new ClipSettingsError(
      `The MP4 copy would be written to ${mp4CopyPath(values.outputPath)}, which is the input video or the intermediate clip`,
      'mp4Copy'
    );
  }

  const subtitleStyle: TextStyle = TextStyleSchema.parse(values.subtitleStyle ?? {});
  const captionStyle: TextStyle = TextStyleSchema.parse({
    ...CAPTION_STYLE_DEFAULTS,
    fontSize: subtitleStyle.fontSize,
    ...values.captionStyle,
  });

  return {
    inputPath: values.inputPath,
    clipPath: values.clipPath,
    outputPath: values.outputPath,
    outputFormat: values.outputFormat,
    start: values.start,
    end: values.end,
    fps: values.fps,
    width: dimensions.width,
    height: dimensions.height,
    subtitleStyle,
    captionStyle,
    crop: values.crop,
    boomerang: values.boomerang,
    hdGif: values.hdGif,
    mp4Copy: values.mp4Copy,
    crf: values.crf,
    preset: values.preset,
    fontsDir: values.fontsDir,
  };
}

// The MP4 copy sits beside the output with the same name
export function mp4CopyPath(outputPath: string): string {
  const parsed = path.parse(outputPath);
  return path.join(parsed.dir, `${parsed.name}.mp4`);
}

export function durationMs(settings: Pick<ClipSettings, 'start' | 'end'>): number {
  return settings.end - settings.start;
}

/**
 * For boomerang clips the reversed half replays every subtitle mirrored in
 * time, and the caption stays up for both halves.
 */
export function mirrorForBoomerang(
  settings: ClipSettings,
  subtitles: Subtitle[],
  caption?: Subtitle
): { subtitles: Subtitle[], caption?: Subtitle } {
  const duration = durationMs(settings);

  const reversed = subtitles.map(sub => {
    const relStart = sub.start - settings.start;
    const relEnd = sub.end - settings.start;
    return Object.freeze({
      start: settings.start + 2 * duration - relEnd,
      end: settings.start + 2 * duration - relStart,
      lines: sub.lines,
      delay: sub.delay,
    });
  });

  return {
    subtitles: [...subtitles, ...reversed],
    caption: caption && Object.freeze({ ...caption, end: settings.start + 2 * duration }),
  };
}

// `subtitles` filter for an ASS file, looking up fonts in fontsDir first
export function subtitlesFilter(assPath: string, fontsDir?: string): string {
  const fonts = fontsDir ? `:fontsdir=${escapeFilterPath(fontsDir)}` : '';
  return `subtitles=${escapeFilterPath(assPath)}${fonts}`;
}

export interface FilterChainOptions {
  assPath?: string;
  captionPadding?: number;
  format?: VideoFormat;
}

export function buildFilterChain(settings: ClipSettings, options: FilterChainOptions = {}): string[] {
  const { assPath, captionPadding = 0, format = settings.outputFormat } = options;
  const filters: string[] = [];

  if (settings.boomerang) {
    filters.push("[0]reverse[r];[0][r]concat=n=2:v=1:a=0");
  }

  filters.push(`fps=${settings.fps}`);

  if (settings.crop) {
    filters.push("crop=in_h:in_h");
  }

  filters.push(`scale=${settings.width}:${settings.height}:flags=lanczos`);

  if (captionPadding > 0) {
    filters.push(`pad=iw:(ih+${captionPadding}):0:${captionPadding}`);
  }

  if (assPath) {
    filters.push(subtitlesFilter(assPath, settings.fontsDir));
  }

  if (format === VideoFormat.GIF) {
    filters.push(settings.hdGif
      ? "split[s0][s1];[s0]palettegen[p];[s1][p]paletteuse"
      : "split[s0][s1];[s0]palettegen=max_colors=32[p];[s1][p]paletteuse=dither=bayer");
  }

  return filters;
}

/**
 * Height in rows of whatever was drawn over the flat background of an RGBA
 * frame. The top-left pixel is taken as the background colour.
 */
export function measureCaptionHeight(rgba: Buffer, width: number, height: number): number {
  if (rgba.length < width * height * 4) {
    throw new RangeError(`Frame buffer holds ${rgba.length} bytes, expected ${width * height * 4}`);
  }

  const [bgR, bgG, bgB] = [rgba[0], rgba[1], rgba[2]];
  let top = -1;
  let bottom = -1;

  for (let y = 0; y < height; y++) {
    const rowOffset = y * width * 4;
    for (let x = 0; x < width; x++) {
      const offset = rowOffset + x * 4;
      if (rgba[offset] !== bgR || rgba[offset + 1] !== bgG || rgba[offset + 2] !== bgB) {
        if (top < 0) top = y;
        bottom = y;
        break;
      }
    }
  }

  return top < 0 ? 0 : bottom - top + 1;
}
