import { ZodError } from 'zod';

// Interface for execFile error with proper typing
export interface ExecError extends Error {
  code?: string | number;
  killed?: boolean;
  signal?: string;
  stderr?: string | Buffer;
  stdout?: string | Buffer;
}

// Interface for Node.js file system errors
export interface FSError extends Error {
  code?: string;
  errno?: number;
  path?: string;
}

// Simple error class for file system operations
export class FileSystemError extends Error {
  public readonly path: string;
  public readonly operation: string;
  public readonly code?: string;

  constructor(message: string, operation: string, filePath: string, code?: string) {
    super(message);
    this.name = 'FileSystemError';
    this.operation = operation;
    this.path = filePath;
    this.code = code;
  }

  toJSON(): string {
    return JSON.stringify({
      error: 'file_system_error',
      operation: this.operation,
      path: this.path,
      code: this.code,
      message: this.message
    }, null, 2);
  }
}

// Wraps a failed ffmpeg/ffprobe run, keeping the command so it can be pasted into a shell
export class FfmpegError extends Error {
  public readonly exitCode: number | string;
  public readonly stderr: string;
  public readonly command: string;

  constructor(message: string, exitCode: number | string, stderr: string = '', command: string = '') {
    super(message);
    this.name = 'FfmpegError';
    this.exitCode = exitCode;
    this.stderr = stderr;
    this.command = command;
  }

  toJSON(): string {
    return JSON.stringify({
      error: 'ffmpeg_execution_failed',
      exit_code: this.exitCode,
      message: this.message,
      command: this.command,
      stderr: lastLines(this.stderr, 20)
    }, null, 2);
  }
}

export class SubtitlesNotFoundError extends Error {
  public readonly trackId: string;

  constructor(trackId: string) {
    super(`No subtitles found for track ID: ${trackId}`);
    this.name = 'SubtitlesNotFoundError';
    this.trackId = trackId;
  }

  toJSON(): string {
    return JSON.stringify({
      error: 'subtitles_not_found',
      track_id: this.trackId,
      message: this.message,
      suggested_action: 'Use extract_subtitles tool to extract the subtitles of this video first'
    }, null, 2);
  }
}

export class SubtitleStreamNotFoundError extends Error {
  public readonly videoPath: string;

  constructor(message: string, videoPath: string) {
    super(message);
    this.name = 'SubtitleStreamNotFoundError';
    this.videoPath = videoPath;
  }

  toJSON(): string {
    return JSON.stringify({
      error: 'subtitle_stream_not_found',
      video_path: this.videoPath,
      message: this.message,
      suggested_action: 'Check the available subtitle streams with ffprobe or pick another track'
    }, null, 2);
  }
}

export class ClipSettingsError extends Error {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'ClipSettingsError';
    this.field = field;
  }

  toJSON(): string {
    return JSON.stringify({
      error: 'invalid_clip_settings',
      field: this.field,
      message: this.message
    }, null, 2);
  }
}

export class TimeRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeRangeError';
  }

  toJSON(): string {
    return JSON.stringify({
      error: 'invalid_time_range',
      message: this.message,
      suggested_action: 'Use search_subtitles to find a valid subtitle index'
    }, null, 2);
  }
}

function lastLines(text: string, count: number): string {
  return text.trim().split('\n').slice(-count).join('\n');
}

type StructuredError =
  | FfmpegError
  | FileSystemError
  | SubtitlesNotFoundError
  | SubtitleStreamNotFoundError
  | ClipSettingsError
  | TimeRangeError;

function isStructuredError(error: unknown): error is StructuredError {
  return error instanceof FfmpegError
    || error instanceof FileSystemError
    || error instanceof SubtitlesNotFoundError
    || error instanceof SubtitleStreamNotFoundError
    || error instanceof ClipSettingsError
    || error instanceof TimeRangeError;
}

export function describeError(error: unknown): string {
  if (isStructuredError(error)) {
    return error.toJSON();
  }

  if (error instanceof ZodError) {
    return JSON.stringify({
      error: 'invalid_arguments',
      message: error.issues.map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`).join('; ')
    }, null, 2);
  }

  const errorMessage = error instanceof Error ? error.message : 'Unknown error occurred';
  return JSON.stringify({ error: 'unknown', message: errorMessage }, null, 2);
}

// Handle any error and convert to proper MCP error format
export function handleError(error: unknown): never {
  throw new Error(describeError(error));
}
