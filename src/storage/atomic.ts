/**
 * Atomic File Operations
 *
 * JSON reads for CLI input files and temp-file + rename writes for
 * filter results, so a crashed run never leaves a half-written file.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Error raised when an input file is missing.
 */
export class FileNotFoundError extends Error {
  constructor(public readonly filePath: string) {
    super(`File not found: ${filePath}`);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Check if an error is a FileNotFoundError
 */
export function isFileNotFoundError(error: unknown): error is FileNotFoundError {
  return error instanceof FileNotFoundError;
}

/**
 * Read and parse a JSON file.
 *
 * The result is `unknown`; validate it with a schema before use.
 *
 * @throws FileNotFoundError if the file does not exist
 * @throws Error if the JSON is invalid
 */
export async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new FileNotFoundError(filePath);
    }
    throw error;
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new Error(`Invalid JSON in file: ${filePath}`, { cause: error });
  }
}

/**
 * Write data to a JSON file atomically using temp file + rename.
 *
 * @example
 * ```typescript
 * await atomicWriteJson('/path/to/result.json', { stats, commentsByVideo });
 * ```
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  const tempPath = `${filePath}.tmp.${Date.now()}`;
  const json = JSON.stringify(data, null, 2);

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, json, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.unlink(tempPath).catch(() => undefined);
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, {
      cause: error,
    });
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}
