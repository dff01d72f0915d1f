/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename, so a crash mid-write leaves either the old
 * data file or the new one, never a truncated mix.
 */

import { mkdir, rename, unlink, writeFile } from 'fs/promises';
import { dirname } from 'path';

/**
 * Atomically write string data to file
 *
 * @param filePath - Target file path
 * @param data - String data to write
 * @param encoding - File encoding (default: 'utf-8')
 * @throws Error if write or rename fails
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keeps concurrent writers off each other's temp file
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch(() => {
      /* temp file may never have been created */
    });
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
  await atomicWriteFile(filePath, JSON.stringify(data, null, space) + '\n', 'utf-8');
}
