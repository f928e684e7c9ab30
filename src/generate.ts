import path from "path";
import { execFfmpeg, hasVideoStream, renderCaptionFrame } from "./ffmpeg.js";
import { fileSize, mkdir, withTempDir, writeFile } from "./fs.js";
import { buildAssDocument, buildCaptionAss } from "./ass.js";
import { cutClipArgs, reencodeClipArgs, renderArgs } from "./commands.js";
import {
  buildFilterChain,
  durationMs,
  measureCaptionHeight,
  mirrorForBoomerang,
  mp4CopyPath,
  subtitlesFilter
} from "./clipSettings.js";
import { logger } from "./logger.js";
import { ClipSettings, GenerationResult, VideoFormat } from "./types/clip.js";
import { Subtitle } from "./types/subtitles.js";

const log = logger.child({ component: 'generate' });

export type GenerationStep = 'cut' | 'prepare' | 'render' | 'mp4_copy' | 'done';

export type ProgressCallback = (step: GenerationStep, message: string) => Promise<void> | void;

/**
 * Cuts [start, end) out of the source with a stream copy. A copy that starts
 * between keyframes can come out without video; then the range is re-encoded.
 */
export async function createClip(settings: ClipSettings): Promise<void> {
  await mkdir(path.dirname(settings.clipPath));
  await execFfmpeg(cutClipArgs(settings));

  if (!(await hasVideoStream(settings.clipPath))) {
    log.warn('Stream copy produced no video stream, re-encoding', { clipPath: settings.clipPath });
    await execFfmpeg(reencodeClipArgs(settings));
  }
}

/**
 * Pixels to add above the clip so the caption does not cover the picture:
 * the caption's rendered height plus its vertical margin on both sides.
 */
export async function measureCaptionPadding(settings: ClipSettings, caption: Subtitle, tmp: string): Promise<number> {
  const style = settings.captionStyle;
  const assPath = path.join(tmp, 'caption.ass');
  await writeFile(assPath, buildCaptionAss(style, caption.lines, settings.width, settings.height));

  const frame = await renderCaptionFrame(
    `${subtitlesFilter(assPath, settings.fontsDir)},format=rgba`,
    settings.width,
    settings.height
  );

  const measured = measureCaptionHeight(frame, settings.width, settings.height);
  return measured === 0 ? 0 : measured + style.marginV * 2;
}

/**
 * Generates the clip: cut the range into the intermediate clip, then render
 * it with fps, crop, scale, caption padding, burned-in text and palette.
 * `caption` stays on screen above the picture for the whole clip.
 */
export async function generateClip(
  settings: ClipSettings,
  subtitles: Subtitle[] = [],
  caption?: Subtitle,
  onProgress: ProgressCallback = () => { }
): Promise<GenerationResult> {
  await onProgress('cut', `Cutting ${durationMs(settings)}ms from ${settings.inputPath}`);
  await createClip(settings);

  return withTempDir(async (tmp) => {
    await onProgress('prepare', 'Preparing subtitles and caption');

    const text = settings.boomerang
      ? mirrorForBoomerang(settings, subtitles, caption)
      : { subtitles, caption };

    const captionPadding = text.caption ? await measureCaptionPadding(settings, text.caption, tmp) : 0;

    const assPath = path.join(tmp, 'sub.ass');
    await writeFile(assPath, buildAssDocument({
      width: settings.width,
      height: settings.height,
      clipStart: settings.start,
      padding: captionPadding,
      subtitleStyle: settings.subtitleStyle,
      captionStyle: settings.captionStyle,
      subtitles: text.subtitles,
      caption: text.caption,
    }));

    await mkdir(path.dirname(settings.outputPath));

    await onProgress('render', `Rendering ${settings.outputFormat.toUpperCase()} to ${settings.outputPath}`);
    const filters = buildFilterChain(settings, { assPath, captionPadding }).join(',');
    await execFfmpeg(renderArgs(settings.clipPath, settings.outputPath, filters, settings.outputFormat, settings));

    let copyPath: string | undefined;
    if (settings.mp4Copy && settings.outputFormat !== VideoFormat.MP4) {
      copyPath = mp4CopyPath(settings.outputPath);
      await onProgress('mp4_copy', `Rendering MP4 copy to ${copyPath}`);
      const copyFilters = buildFilterChain(settings, { assPath, captionPadding, format: VideoFormat.MP4 }).join(',');
      await execFfmpeg(renderArgs(settings.clipPath, copyPath, copyFilters, VideoFormat.MP4, settings));
    }

    const sizeBytes = await fileSize(settings.outputPath);
    log.info('Clip generated', { outputPath: settings.outputPath, sizeBytes, mp4CopyPath: copyPath });
    await onProgress('done', `Generated ${settings.outputPath}`);

    return {
      outputPath: settings.outputPath,
      mp4CopyPath: copyPath,
      sizeBytes,
      width: settings.width,
      height: settings.height + captionPadding,
      durationMs: durationMs(settings) * (settings.boomerang ? 2 : 1),
    };
  });
}
