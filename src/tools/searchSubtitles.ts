import { defineTool } from '../utils/toolDefinition.js';
import { ToolName, ToolSearchSubtitlesInputSchema, ToolSearchSubtitlesOutput } from '../types/tools.js';
import { readTrackFile } from '../io.js';
import { formatSubtitleLabel, searchSubtitles } from '../subtitles.js';

export const searchSubtitlesTool = defineTool({
  name: ToolName.SEARCH_SUBTITLES,
  description: "Search a subtitle track for a line of text (case and accent insensitive). Returns each match with its index and timing, to be used with resolve_time_range or generate_clip",
  inputSchema: ToolSearchSubtitlesInputSchema,
  handler: async ({ trackId, query, limit }) => {
    const track = await readTrackFile(trackId);
    const matches = searchSubtitles(track.subtitles, query);

    const result: ToolSearchSubtitlesOutput = {
      track_id: track.track_id,
      query,
      total_matches: matches.length,
      matches: matches.slice(0, limit).map(({ index, subtitle }) => ({
        index,
        start: subtitle.start,
        end: subtitle.end,
        lines: subtitle.lines,
        label: formatSubtitleLabel(subtitle),
      })),
    };

    const listing = result.matches.map(match => `#${match.index} ${match.label}`).join('\n');
    const truncated = matches.length > limit ? `\n(showing ${limit} of ${matches.length})` : '';

    return {
      content: [{
        type: 'text' as const,
        text: matches.length === 0
          ? `No subtitles match "${query}".`
          : `Found ${matches.length} matching subtitles:\n${listing}${truncated}`
      }],
      structuredContent: result
    };
  },
});

export default searchSubtitlesTool;
