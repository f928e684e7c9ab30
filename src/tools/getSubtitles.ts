import { defineTool } from '../utils/toolDefinition.js';
import { ToolGetSubtitlesInputSchema, ToolName } from '../types/tools.js';
import { readTrackFile } from '../io.js';
import { toSrt } from '../srt.js';

export const getSubtitlesTool = defineTool({
  name: ToolName.GET_SUBTITLES,
  description: "Get a stored subtitle track by track ID, as structured records or as SubRip text",
  inputSchema: ToolGetSubtitlesInputSchema,
  handler: async ({ trackId, format }) => {
    const track = await readTrackFile(trackId);

    if (format === 'srt') {
      return {
        content: [{
          type: 'text' as const,
          text: toSrt(track.subtitles)
        }]
      };
    }

    return {
      content: [{
        type: 'text' as const,
        text: `Found subtitle track "${track.track_id}" for ${track.video_path} (stream ${track.stream}, ${track.language}). Contains ${track.subtitles.length} subtitles.`
      }],
      structuredContent: { ...track }
    };
  },
});

export default getSubtitlesTool;
