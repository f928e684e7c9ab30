import { z } from 'zod';

export const ConfigSchema = z.object({
  SUBTITLES_FOLDER: z.string().min(1).default('./subtitles'),
  OUTPUT_FOLDER: z.string().min(1).default('./output'),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),
  FFMPEG_TIMEOUT_MS: z.coerce.number().int().positive().default(300000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface Config extends z.infer<typeof ConfigSchema> { }

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

const config = loadConfig();

export const SUBTITLES_FOLDER = config.SUBTITLES_FOLDER;
export const OUTPUT_FOLDER = config.OUTPUT_FOLDER;
export const FFMPEG_PATH = config.FFMPEG_PATH;
export const FFPROBE_PATH = config.FFPROBE_PATH;
export const FFMPEG_TIMEOUT_MS = config.FFMPEG_TIMEOUT_MS;
export const LOG_LEVEL = config.LOG_LEVEL;
