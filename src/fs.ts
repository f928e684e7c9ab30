import { promises } from 'fs';
import os from 'os';
import path from 'path';
import { FSError, FileSystemError } from './types/errors.js';
import { z } from 'zod';

// Simple wrapper that throws FileSystemError
async function execFS<T>(operation: string, filePath: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    const fsError = error as FSError;
    throw new FileSystemError(
      fsError.message || `Failed to ${operation}`,
      operation,
      filePath,
      fsError.code
    );
  }
}

// Generic file system operations
export async function readFile(filePath: string): Promise<string> {
  return execFS('read', filePath, () => promises.readFile(filePath, 'utf-8'));
}

export async function writeFile(filePath: string, content: string): Promise<void> {
  return execFS('write', filePath, () => promises.writeFile(filePath, content, 'utf-8'));
}

// JSON file operations with optional schema validation
export async function readJSON<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const content = await readFile(filePath);

  let jsonData: unknown;
  try {
    jsonData = JSON.parse(content);
  } catch (parseError) {
    throw new FileSystemError(
      `Invalid JSON in file: ${parseError instanceof Error ? parseError.message : 'Unknown parse error'}`,
      'parse',
      filePath
    );
  }

  const result = schema.safeParse(jsonData);
  if (!result.success) {
    throw new FileSystemError(
      `JSON validation failed: ${result.error.message}`,
      'validate',
      filePath
    );
  }
  return result.data;
}

export async function writeJSON<T>(filePath: string, data: T, schema?: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<void> {
  if (schema) {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new FileSystemError(
        `Data validation failed: ${result.error.message}`,
        'validate',
        filePath
      );
    }
  }

  const content = JSON.stringify(data, null, 2);
  return writeFile(filePath, content);
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await promises.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function fileSize(filePath: string): Promise<number> {
  const stats = await execFS('stat', filePath, () => promises.stat(filePath));
  return stats.size;
}

export async function readDir(dirPath: string): Promise<string[]> {
  return execFS('readdir', dirPath, () => promises.readdir(dirPath));
}

export async function mkdir(dirPath: string, recursive: boolean = true): Promise<void> {
  return execFS('mkdir', dirPath, async () => {
    await promises.mkdir(dirPath, { recursive });
  });
}

export async function makeTempDir(prefix: string = 'sub2clip-'): Promise<string> {
  const base = path.join(os.tmpdir(), prefix);
  return execFS('mkdtemp', base, () => promises.mkdtemp(base));
}

export async function removeDir(dirPath: string): Promise<void> {
  return execFS('rm', dirPath, () => promises.rm(dirPath, { recursive: true, force: true }));
}

/**
 * Creates a temp directory, hands it to `fn` and removes it afterwards,
 * whether `fn` resolved or threw.
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await makeTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
