import {
  Resource,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ReadResourceRequestSchema
} from "@modelcontextprotocol/sdk/types.js";
import path from "path";
import { zodToJsonSchema } from "zod-to-json-schema";
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { readTrackFile, listTrackFiles, trackFileExists } from "./io.js";
import { SUBTITLES_FOLDER } from "./config.js";
import { SubtitleTrackSchema } from "./types/subtitles.js";
import { decodeCursor, encodeCursor } from "./util.js";
import { logger } from "./logger.js";

const log = logger.child({ component: 'resources' });

export const PAGE_SIZE = 10;

export function trackUri(trackId: string): string {
  return `file://${path.resolve(SUBTITLES_FOLDER, `${trackId}.json`)}`;
}

// Track ID of a file:// URI inside the subtitles folder, undefined for anything else
export function trackIdFromUri(uri: string): string | undefined {
  if (!uri.startsWith('file://')) return undefined;

  const filePath = path.resolve(uri.slice('file://'.length));
  const folder = path.resolve(SUBTITLES_FOLDER);
  if (path.dirname(filePath) !== folder || !filePath.endsWith('.json')) return undefined;

  return path.basename(filePath, '.json');
}

// Stored subtitle tracks as resources; unreadable files are logged and left out
export async function loadTrackResources(): Promise<Resource[]> {
  const jsonFiles = await listTrackFiles();
  const resources: Resource[] = [];

  for (const file of jsonFiles) {
    const trackId = path.basename(file, '.json');
    try {
      const track = await readTrackFile(trackId);
      resources.push({
        uri: trackUri(trackId),
        name: `${path.basename(track.video_path)} - Subtitles (${track.language})`,
        description: `Subtitle stream ${track.stream} of ${track.video_path}, ${track.subtitles.length} subtitles (${track.track_id})`,
        mimeType: "application/json",
      });
    } catch (error) {
      log.warn('Skipping unreadable subtitle track', { file, errorMessage: error instanceof Error ? error.message : String(error) });
    }
  }

  return resources;
}

export async function notifyTracksChanged(server: Server): Promise<void> {
  try {
    await server.sendResourceListChanged();
  } catch (error) {
    log.warn('Could not send resource list change', { errorMessage: error instanceof Error ? error.message : String(error) });
  }
}

export default function registerResources(server: Server) {

  // List resources handler
  server.setRequestHandler(ListResourcesRequestSchema, async (request) => {
    const tracks = await loadTrackResources();

    const startIndex = decodeCursor(request.params?.cursor);
    const endIndex = Math.min(startIndex + PAGE_SIZE, tracks.length);

    return {
      resources: tracks.slice(startIndex, endIndex),
      nextCursor: endIndex < tracks.length ? encodeCursor(endIndex) : undefined,
    };
  });

  // List resource templates handler
  server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => {
    return {
      resourceTemplates: [
        {
          uriTemplate: `file://${path.resolve(SUBTITLES_FOLDER)}/{track_id}.json`,
          name: "Subtitle Track",
          description: "JSON file with the subtitles extracted from one stream of a video",
          mimeType: "application/json",
          schema: zodToJsonSchema(SubtitleTrackSchema),
        },
      ],
    };
  });

  // Read resource handler
  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;

    const trackId = trackIdFromUri(uri);
    if (trackId === undefined || !(await trackFileExists(trackId))) {
      throw new Error(`Resource not found: ${uri}`);
    }

    const track = await readTrackFile(trackId);
    return {
      contents: [
        {
          uri,
          mimeType: 'application/json',
          text: JSON.stringify(track, null, 2),
        },
      ],
    };
  });
}
