/**
 * Atomic Write Utilities
 *
 * Result files are written to a temporary sibling and renamed into place, so a
 * reader sees either the previous file or the complete new one.
 *
 * Temp names carry PID and timestamp to keep concurrent runs apart.
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Atomically write string data to file
 *
 * @throws Error if write or rename fails
 *
 * @example
 * ```typescript
 * await atomicWriteFile('/tmp/out/index-records.ndjson', formatNdjson(records) + '\n');
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    // The temp file may never have been created
    await unlink(tempPath).catch(() => undefined);
    throw error;
  }
}

/**
 * Atomically write JSON data to file
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, space) + '\n');
}
