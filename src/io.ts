import { createHash } from "crypto";
import path from "path";
import { SUBTITLES_FOLDER } from "./config.js";
import { fileExists, readDir, readJSON, writeJSON } from "./fs.js";
import { SubtitlesNotFoundError } from "./types/errors.js";
import { SubtitleTrack, SubtitleTrackSchema } from "./types/subtitles.js";
import { ensureFolder } from "./util.js";
import { normalizeText } from "./subtitles.js";
import { logger } from "./logger.js";

const log = logger.child({ component: 'io' });

/**
 * Track IDs are the video file name made filesystem and URI safe, a short hash
 * of the resolved path (same names in other folders get other IDs) and the
 * subtitle stream: "/videos/Holiday Trip (2019).mkv", stream 0 -> "holiday-trip-2019-01e772.s0".
 */
export function trackIdFor(videoPath: string, stream: number): string {
  const resolved = path.resolve(videoPath);
  const slug = normalizeText(path.parse(resolved).name)
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  const hash = createHash('sha1').update(resolved).digest('hex').slice(0, 6);

  return `${slug || 'video'}-${hash}.s${stream}`;
}

export function trackFilePath(trackId: string): string {
  // IDs come from clients, never let one escape the folder
  return path.join(SUBTITLES_FOLDER, `${path.basename(trackId)}.json`);
}

export async function writeTrackFile(track: SubtitleTrack): Promise<string> {
  await ensureFolder(SUBTITLES_FOLDER);

  const filepath = trackFilePath(track.track_id);
  await writeJSON(filepath, track, SubtitleTrackSchema);

  log.info('Subtitle track saved', { trackId: track.track_id, filepath });
  return filepath;
}

export async function readTrackFile(trackId: string): Promise<SubtitleTrack> {
  const filepath = trackFilePath(trackId);

  if (!(await fileExists(filepath))) {
    throw new SubtitlesNotFoundError(trackId);
  }

  return readJSON(filepath, SubtitleTrackSchema);
}

export async function trackFileExists(trackId: string): Promise<boolean> {
  return fileExists(trackFilePath(trackId));
}

export async function listTrackFiles(): Promise<string[]> {
  await ensureFolder(SUBTITLES_FOLDER);
  const files = await readDir(SUBTITLES_FOLDER);
  return files.filter(file => file.endsWith('.json')).sort();
}
