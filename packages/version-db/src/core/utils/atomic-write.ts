/**
 * Atomic Write Utilities
 *
 * Writes registry files with the write-to-temp-then-rename pattern so that a
 * reader sees either the previous file or the complete new one, never a
 * partial write.
 *
 * **Pattern:**
 * 1. Write to a temporary file beside the target (PID + timestamp suffix)
 * 2. Rename the temporary file over the target (atomic on POSIX)
 * 3. Remove the temporary file if either step fails
 */

import { writeFile, rename, unlink, mkdir } from 'fs/promises';
import { dirname } from 'path';

/**
 * Temporary path used while writing `filePath`
 */
export function tempPathFor(filePath: string): string {
  return `${filePath}.${process.pid}.${Date.now()}.tmp`;
}

/**
 * Atomically write string data to file
 *
 * Parent directories are created first, so a version history file for a
 * port with no `x-` directory yet can be written directly.
 *
 * @throws Error if write or rename fails
 *
 * @example
 * ```typescript
 * await atomicWriteFile('/catalog/versions/z-/zlib.json', text);
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = tempPathFor(filePath);

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      if (!isNotFound(cleanupError)) {
        throw new AggregateError([error, cleanupError], `Failed to write ${filePath}`);
      }
    });
    throw error;
  }
}

/**
 * Atomically write JSON data to file
 *
 * Output is indented and ends with a newline, matching the files the
 * catalog checks in.
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  const json = `${JSON.stringify(data, null, space)}\n`;
  await atomicWriteFile(filePath, json, 'utf-8');
}

/**
 * True for a Node filesystem error with code ENOENT
 */
export function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
