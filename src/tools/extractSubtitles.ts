import path from 'path';
import { defineTool } from '../utils/toolDefinition.js';
import { ToolExtractSubtitlesInputSchema, ToolExtractSubtitlesOutput, ToolName } from '../types/tools.js';
import { Subtitle, SubtitleTrack } from '../types/subtitles.js';
import {
  checkSubtitleTrack,
  extractSubtitles,
  extractSubtitlesByLanguage,
  subtitleStreamLanguage
} from '../subtitles.js';
import { probeStreams } from '../ffmpeg.js';
import { trackIdFor, writeTrackFile } from '../io.js';
import { notifyTracksChanged } from '../resources.js';

// Stream picked by index, checked against the streams ffprobe reports
async function extractByIndex(videoPath: string, track: number): Promise<{ track: number, language: string, subtitles: Subtitle[] }> {
  const streams = await probeStreams(videoPath);
  checkSubtitleTrack(streams, track, videoPath);
  const subtitles = await extractSubtitles(videoPath, track);
  return { track, language: subtitleStreamLanguage(streams, track), subtitles };
}

export const extractSubtitlesTool = defineTool({
  name: ToolName.EXTRACT_SUBTITLES,
  description: "Extract an embedded subtitle stream from a video with ffmpeg and save it as a searchable subtitle track. Pick the stream by index or by preferred languages",
  inputSchema: ToolExtractSubtitlesInputSchema,
  handler: async (input, { server, progress }) => {
    const videoPath = path.resolve(input.videoPath);

    await progress(0, 3, `Extracting subtitles from ${videoPath}...`);
    const { track: stream, language, subtitles } = input.languages && input.languages.length > 0
      ? await extractSubtitlesByLanguage(videoPath, input.languages, input.includeCc)
      : await extractByIndex(videoPath, input.track ?? 0);

    await progress(1, 3, `Found ${subtitles.length} subtitles in stream ${stream} (${language})`);

    await progress(2, 3, "Saving subtitle track...");
    const track: SubtitleTrack = {
      track_id: trackIdFor(videoPath, stream),
      video_path: videoPath,
      stream,
      language,
      extracted_at: new Date().toISOString(),
      subtitles,
    };
    const filepath = await writeTrackFile(track);
    await notifyTracksChanged(server);

    await progress(3, 3, `Subtitle track saved to ${filepath}`);

    const result: ToolExtractSubtitlesOutput = {
      track_id: track.track_id,
      video_path: videoPath,
      stream,
      language,
      subtitles_count: subtitles.length,
      next_action: {
        tool: ToolName.SEARCH_SUBTITLES,
        parameters: { trackId: track.track_id }
      }
    };

    return {
      content: [{
        type: 'text' as const,
        text: `Extracted ${subtitles.length} subtitles from stream ${stream} (${language}) of ${path.basename(videoPath)}.\n\nTo find a line, use the search_subtitles tool with trackId: "${track.track_id}"`
      }],
      structuredContent: result
    };
  },
});

export default extractSubtitlesTool;
