import { execFile } from "child_process";
import { promisify } from "util";
import { FFMPEG_PATH, FFPROBE_PATH, FFMPEG_TIMEOUT_MS } from "./config.js";
import { ExecError, FfmpegError } from "./types/errors.js";
import { Dimensions } from "./types/clip.js";
import { ProbeOutputSchema, ProbeStream } from "./types/subtitles.js";
import {
  captionFrameArgs,
  extractSubtitleArgs,
  formatCommand,
  probeDimensionsArgs,
  probeStreamsArgs
} from "./commands.js";
import { logger, withTiming } from "./logger.js";

const execFileAsync = promisify(execFile);
const log = logger.child({ component: 'ffmpeg' });

// Raw frames and verbose stderr can exceed the 1MB default
const MAX_BUFFER = 256 * 1024 * 1024;

function toText(value: string | Buffer | undefined): string {
  if (value === undefined) return '';
  return typeof value === 'string' ? value : value.toString('utf-8');
}

// Simple wrapper that throws FfmpegError with exit code and the full command
async function exec(command: string, args: string[], timeout: number): Promise<Buffer> {
  const commandLine = formatCommand(command, args);
  log.debug('Running command', { command: commandLine });

  try {
    const { stdout } = await withTiming(log, command, () =>
      execFileAsync(command, args, { timeout, maxBuffer: MAX_BUFFER, encoding: 'buffer' })
    );
    return stdout;
  } catch (error) {
    const execError = error as ExecError;
    const exitCode = execError.code ?? (execError.killed ? 'timeout' : 'unknown');
    const stderr = toText(execError.stderr);

    if (exitCode === 'ENOENT') {
      throw new FfmpegError(`${command} is not installed or not found in PATH`, exitCode, stderr, commandLine);
    }

    throw new FfmpegError(`${command} exited with code ${exitCode}`, exitCode, stderr, commandLine);
  }
}

export async function execFfmpeg(args: string[], timeout: number = FFMPEG_TIMEOUT_MS): Promise<string> {
  return toText(await exec(FFMPEG_PATH, args, timeout));
}

export async function execFfmpegBinary(args: string[], timeout: number = FFMPEG_TIMEOUT_MS): Promise<Buffer> {
  return exec(FFMPEG_PATH, args, timeout);
}

export async function execFfprobe(args: string[], timeout: number = 30000): Promise<string> {
  return toText(await exec(FFPROBE_PATH, args, timeout));
}

export async function probeStreams(input: string): Promise<ProbeStream[]> {
  const stdout = await execFfprobe(probeStreamsArgs(input));

  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    throw new FfmpegError(`ffprobe returned invalid JSON for ${input}`, 'invalid_output', '', formatCommand(FFPROBE_PATH, probeStreamsArgs(input)));
  }

  const result = ProbeOutputSchema.safeParse(json);
  if (!result.success) {
    throw new FfmpegError(`Unexpected ffprobe output for ${input}: ${result.error.message}`, 'invalid_output');
  }
  return result.data.streams;
}

export async function hasVideoStream(input: string): Promise<boolean> {
  const streams = await probeStreams(input);
  return streams.some(stream => stream.codec_type === 'video');
}

export async function getDimensions(input: string): Promise<Dimensions> {
  const stdout = await execFfprobe(probeDimensionsArgs(input));
  const [width, height] = stdout.trim().split(/\r?\n/)[0].split(',').map(Number);

  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new FfmpegError(`Could not read video dimensions of ${input}: '${stdout.trim()}'`, 'invalid_output');
  }
  return { width, height };
}

export async function extractSubtitleStream(input: string, output: string, track: number): Promise<void> {
  await execFfmpeg(extractSubtitleArgs(input, output, track));
}

export async function renderCaptionFrame(filters: string, width: number, height: number): Promise<Buffer> {
  return execFfmpegBinary(captionFrameArgs(filters, width, height), 60000);
}
