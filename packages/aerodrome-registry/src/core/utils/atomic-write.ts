/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename so the staging and production artifacts are
 * either the old content or the new content, never a partial file.
 * Rename is atomic on POSIX when source and target share a filesystem.
 *
 * **Pattern:**
 * 1. Write to a temporary sibling file (PID + timestamp in the name)
 * 2. Rename the temp file onto the target
 * 3. Remove the temp file if anything failed
 */

import { writeFile, rename, unlink, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Atomically write string or byte data to file
 *
 * @example
 * ```typescript
 * const bytes = await readFile(backupPath);
 * await atomicWriteFile(productionPath, bytes);
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string | Uint8Array,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    if (typeof data === 'string') {
      await writeFile(tempPath, data, encoding);
    } else {
      await writeFile(tempPath, data);
    }
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch(() => {
      /* temp file may never have been created */
    });
    throw error;
  }
}

/**
 * Atomically write JSON data to file (pretty-printed, trailing newline)
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  const json = JSON.stringify(data, null, space) + '\n';
  await atomicWriteFile(filePath, json, 'utf-8');
}
