import { mkdir } from './fs.js';

// Ensure a working folder exists
export async function ensureFolder(folder: string): Promise<void> {
  await mkdir(folder, true);
}

export function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(2)}MB`;
}

// Opaque pagination cursors: base64 of the next offset
export function encodeCursor(offset: number): string {
  return Buffer.from(offset.toString(), 'utf-8').toString('base64');
}

export function decodeCursor(cursor: string | undefined): number {
  if (!cursor) return 0;
  const offset = parseInt(Buffer.from(cursor, 'base64').toString('utf-8'), 10);
  return Number.isNaN(offset) || offset < 0 ? 0 : offset;
}
