import { ClipSettings, VideoFormat } from "./types/clip.js";

// Argument lists for ffmpeg/ffprobe. Kept free of I/O so they can be inspected and tested.

export function msToSeconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}

export function probeStreamsArgs(input: string): string[] {
  return [
    '-v', 'error',
    '-print_format', 'json',
    '-show_streams',
    input
  ];
}

export function probeDimensionsArgs(input: string): string[] {
  return [
    '-v', 'error',
    '-select_streams', 'v:0',
    '-show_entries', 'stream=width,height',
    '-of', 'csv=p=0',
    input
  ];
}

export function extractSubtitleArgs(input: string, output: string, track: number): string[] {
  return [
    '-hide_banner',
    '-y',
    '-i', input,
    '-map', `0:s:${track}`,
    '-an',
    '-vn',
    output
  ];
}

export function cutClipArgs(settings: ClipSettings): string[] {
  return [
    '-hide_banner',
    '-y',
    '-ss', msToSeconds(settings.start),
    '-t', msToSeconds(settings.end - settings.start),
    '-i', settings.inputPath,
    '-c', 'copy',
    settings.clipPath
  ];
}

// Used when a stream copy cut produced no video stream (cut fell between keyframes)
export function reencodeClipArgs(settings: ClipSettings): string[] {
  return [
    '-hide_banner',
    '-y',
    '-ss', msToSeconds(settings.start),
    '-t', msToSeconds(settings.end - settings.start),
    '-i', settings.inputPath,
    '-c:v', 'libx265',
    '-crf', String(settings.crf),
    '-preset', settings.preset,
    settings.clipPath
  ];
}

export function renderArgs(
  input: string,
  output: string,
  filters: string,
  format: VideoFormat,
  encoding: { crf: number, preset: string }
): string[] {
  const args = [
    '-hide_banner',
    '-y',
    '-i', input,
    '-filter_complex', filters,
    '-an'
  ];

  switch (format) {
    case VideoFormat.GIF:
      args.push('-loop', '0');
      break;
    case VideoFormat.WEBP:
      args.push('-c:v', 'libwebp', '-loop', '0');
      break;
    case VideoFormat.MP4:
      args.push(
        '-c:v', 'libx264',
        '-pix_fmt', 'yuv420p',
        '-crf', String(encoding.crf),
        '-preset', encoding.preset,
        '-movflags', '+faststart'
      );
      break;
  }

  args.push(output);
  return args;
}

// One frame of the caption on a flat magenta background, written to stdout as raw RGBA
export function captionFrameArgs(filters: string, width: number, height: number): string[] {
  return [
    '-hide_banner',
    '-f', 'lavfi',
    '-i', `color=0xFF00FF:size=${width}x${height}:duration=1`,
    '-vf', filters,
    '-frames:v', '1',
    '-f', 'rawvideo',
    '-pix_fmt', 'rgba',
    '-'
  ];
}

/**
 * Joins a command line for logs and error messages, quoting the filter graph
 * and any argument with spaces so it can be pasted into a shell.
 */
export function formatCommand(command: string, args: string[]): string {
  const quoted = args.map((arg, i) => {
    const previous = args[i - 1];
    if (previous === '-filter_complex' || previous === '-vf' || /\s/.test(arg)) {
      return `"${arg.replace(/"/g, '\\"')}"`;
    }
    return arg;
  });
  return [command, ...quoted].join(' ');
}

/**
 * Escapes a path used as an option value inside a filter graph.
 * Backslashes become forward slashes, colons are escaped and the value is quoted.
 */
export function escapeFilterPath(filePath: string): string {
  const escaped = filePath
    .replace(/\\/g, '/')
    .replace(/'/g, "'\\''")
    .replace(/:/g, '\\:');
  return `'${escaped}'`;
}
