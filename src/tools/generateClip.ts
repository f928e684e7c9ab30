import path from 'path';
import { defineTool } from '../utils/toolDefinition.js';
import { ToolGenerateClipInputSchema, ToolGenerateClipOutput, ToolName } from '../types/tools.js';
import { createClipSettings } from '../clipSettings.js';
import { generateClip, GenerationStep } from '../generate.js';
import { readTrackFile } from '../io.js';
import { resolveTimeRange, subtitlesInRange } from '../subtitles.js';
import { OUTPUT_FOLDER } from '../config.js';
import { formatMegabytes } from '../util.js';
import { Subtitle, TimeRange } from '../types/subtitles.js';
import { TimeRangeError } from '../types/errors.js';
import { toSelector } from './resolveTimeRange.js';

const STEPS: GenerationStep[] = ['cut', 'prepare', 'render', 'mp4_copy', 'done'];

// The delayed first record of a resolved range replaces its undelayed original
function applyRangeDelay(subtitles: Subtitle[], range: TimeRange): Subtitle[] {
  const [delayed] = range.subtitles;
  return subtitles.map((sub, index) => index === range.index && delayed ? delayed : sub);
}

export const generateClipTool = defineTool({
  name: ToolName.GENERATE_CLIP,
  description: "Cut a clip out of a video and render it as GIF, WEBP or MP4, optionally with burned-in subtitles and a caption above the picture. The range is either start/end in milliseconds or a subtitle of a stored track (index or query, with count and delay)",
  inputSchema: ToolGenerateClipInputSchema,
  handler: async (input, { progress }) => {
    const track = input.trackId ? await readTrackFile(input.trackId) : undefined;

    let start: number;
    let end: number;
    let range: TimeRange | undefined;
    if (input.start !== undefined && input.end !== undefined) {
      start = input.start;
      end = input.end;
    } else if (track) {
      range = resolveTimeRange(track.subtitles, toSelector(input));
      start = range.start;
      end = range.end;
    } else {
      throw new TimeRangeError('Set start and end, or a trackId with a subtitle index or query');
    }

    let subtitles: Subtitle[] = [];
    if (input.burnSubtitles) {
      if (!track) {
        throw new TimeRangeError('burnSubtitles needs a trackId to take the subtitles from');
      }
      const source = range ? applyRangeDelay(track.subtitles, range) : track.subtitles;
      subtitles = subtitlesInRange(source, start, end);
    }

    const sizeSet = input.width !== undefined || input.height !== undefined;
    const settings = await createClipSettings({
      inputPath: path.resolve(input.videoPath),
      clipPath: path.resolve(input.clipPath ?? path.join(OUTPUT_FOLDER, 'clip.mp4')),
      outputPath: path.resolve(input.outputPath ?? path.join(OUTPUT_FOLDER, `output.${input.format}`)),
      outputFormat: input.format,
      start,
      end,
      fps: input.fps,
      resolution: input.resolution ?? (sizeSet ? undefined : 320),
      width: input.width,
      height: input.height,
      subtitleStyle: input.subtitleStyle,
      captionStyle: input.captionStyle,
      crop: input.crop,
      boomerang: input.boomerang,
      hdGif: input.hdGif,
      mp4Copy: input.mp4Copy,
      crf: input.crf,
      preset: input.preset,
      fontsDir: input.fontsDir,
    });

    const caption: Subtitle | undefined = input.caption
      ? { start, end, lines: input.caption.split('\n'), delay: 0 }
      : undefined;

    const result = await generateClip(settings, subtitles, caption, (step, message) =>
      progress(STEPS.indexOf(step) + 1, STEPS.length, message)
    );

    const output: ToolGenerateClipOutput = {
      output_path: result.outputPath,
      ...(result.mp4CopyPath ? { mp4_copy_path: result.mp4CopyPath } : {}),
      size_bytes: result.sizeBytes,
      width: result.width,
      height: result.height,
      start,
      end,
      duration: result.durationMs,
    };

    const copyNote = result.mp4CopyPath ? `\nMP4 copy: ${result.mp4CopyPath}` : '';

    return {
      content: [{
        type: 'text' as const,
        text: `Generated ${result.outputPath} (${formatMegabytes(result.sizeBytes)}, ${result.width}x${result.height}, ${result.durationMs}ms).${copyNote}`
      }],
      structuredContent: output
    };
  },
});

export default generateClipTool;
