import { defineTool } from '../utils/toolDefinition.js';
import { ToolName, ToolResolveTimeRangeInputSchema, ToolResolveTimeRangeOutput } from '../types/tools.js';
import { readTrackFile } from '../io.js';
import { resolveTimeRange } from '../subtitles.js';
import { SubtitleSelector } from '../types/subtitles.js';
import { TimeRangeError } from '../types/errors.js';

// Tool inputs carry index and query as independent optionals; an index wins over a query
export function toSelector(input: { index?: number, query?: string, count?: number, delay?: number }): SubtitleSelector {
  const { count, delay } = input;
  if (input.index !== undefined) {
    return { index: input.index, count, delay };
  }
  if (input.query !== undefined) {
    return { query: input.query, count, delay };
  }
  throw new TimeRangeError('Either a subtitle index or a search query is required');
}

export const resolveTimeRangeTool = defineTool({
  name: ToolName.RESOLVE_TIME_RANGE,
  description: "Turn a subtitle (by index or first match of a query) into a clip start/end in milliseconds. count chains following subtitles, delay shifts the start",
  inputSchema: ToolResolveTimeRangeInputSchema,
  handler: async (input) => {
    const track = await readTrackFile(input.trackId);
    const range = resolveTimeRange(track.subtitles, toSelector(input));

    const result: ToolResolveTimeRangeOutput = {
      track_id: track.track_id,
      start: range.start,
      end: range.end,
      duration: range.end - range.start,
      subtitles: range.subtitles.map(sub => ({
        start: sub.start,
        end: sub.end,
        lines: sub.lines,
        delay: sub.delay,
      })),
    };

    return {
      content: [{
        type: 'text' as const,
        text: `Clip range ${range.start}ms - ${range.end}ms (${result.duration}ms) covering ${range.subtitles.length} subtitle(s).`
      }],
      structuredContent: result
    };
  },
});

export default resolveTimeRangeTool;
