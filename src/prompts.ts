import { GetPromptRequestSchema, ListPromptsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { z } from 'zod';
import { ToolName } from './types/tools.js';
import { logger } from './logger.js';

const log = logger.child({ component: 'prompts' });

export const CLIP_FROM_QUOTE = 'clip_from_quote';

const ClipFromQuoteArgsSchema = z.object({
  videoPath: z.string().min(1),
  quote: z.string().min(1),
  format: z.string().optional(),
});

export function clipFromQuoteText(videoPath: string, quote: string, format: string = 'gif'): string {
  return [
    `Make a ${format} clip of the moment where "${quote}" is said in ${videoPath}.`,
    `1. Call ${ToolName.EXTRACT_SUBTITLES} with videoPath "${videoPath}" to get a trackId.`,
    `2. Call ${ToolName.SEARCH_SUBTITLES} with that trackId and the quote to find the subtitle index.`,
    `3. Call ${ToolName.GENERATE_CLIP} with the videoPath, trackId, index, format "${format}" and burnSubtitles true.`,
    `If several subtitles match, pick the one whose text fits the quote best and chain following lines with count.`,
  ].join('\n');
}

export default function registerPrompts(server: Server) {
  log.debug('Registering prompts');

  // List prompts handler
  server.setRequestHandler(ListPromptsRequestSchema, async () => {
    return {
      prompts: [
        {
          name: CLIP_FROM_QUOTE,
          description: "Find a quote in a video's subtitles and turn it into a clip",
          arguments: [
            { name: 'videoPath', description: 'Video with embedded subtitles', required: true },
            { name: 'quote', description: 'Line of dialogue to clip', required: true },
            { name: 'format', description: 'gif, webp or mp4 (default gif)', required: false },
          ],
        },
      ],
    };
  });

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    if (request.params.name !== CLIP_FROM_QUOTE) {
      throw new Error(`Unknown prompt: ${request.params.name}`);
    }

    const { videoPath, quote, format } = ClipFromQuoteArgsSchema.parse(request.params.arguments ?? {});

    return {
      description: `Clip "${quote}" from ${videoPath}`,
      messages: [
        {
          role: 'user' as const,
          content: {
            type: 'text' as const,
            text: clipFromQuoteText(videoPath, quote, format),
          },
        },
      ],
    };
  });
}
