/**
 * Production backups
 *
 * Byte-for-byte copies of the production artifact named
 * `aerodromes_backup_YYYYMMDD_HHMMSS.json` (local time). A second backup in
 * the same second gets `_1`, `_2`, ... so nothing is ever overwritten.
 * Backups are made read-only once written.
 *
 * @module release/backups
 */

import { chmod, mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { isErrnoException } from '../core/errors.js';
import { formatBackupStamp } from '../core/utils/timestamps.js';

export const BACKUP_PREFIX = 'aerodromes_backup_';

const BACKUP_PATTERN = /^aerodromes_backup_(\d{8}_\d{6})(?:_(\d+))?\.json$/;
const READ_ONLY_MODE = 0o444;

export interface BackupEntry {
  readonly fileName: string;
  readonly path: string;
  /** YYYYMMDD_HHMMSS */
  readonly stamp: string;
  /** Same-second collision counter, 0 for the first backup */
  readonly sequence: number;
}

export function parseBackupName(dir: string, fileName: string): BackupEntry | null {
  const match = BACKUP_PATTERN.exec(fileName);
  if (!match) return null;

  return {
    fileName,
    path: join(dir, fileName),
    stamp: match[1],
    sequence: match[2] ? Number.parseInt(match[2], 10) : 0,
  };
}

function backupFileName(stamp: string, sequence: number): string {
  return sequence === 0
    ? `${BACKUP_PREFIX}${stamp}.json`
    : `${BACKUP_PREFIX}${stamp}_${sequence}.json`;
}

/**
 * List backups, newest first. A missing directory has no backups.
 */
export async function listBackups(dir: string): Promise<BackupEntry[]> {
  let fileNames: string[];
  try {
    fileNames = await readdir(dir);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  return fileNames
    .map((fileName) => parseBackupName(dir, fileName))
    .filter((entry): entry is BackupEntry => entry !== null)
    .sort((a, b) => {
      if (a.stamp !== b.stamp) return a.stamp < b.stamp ? 1 : -1;
      return b.sequence - a.sequence;
    });
}

/**
 * Copy `sourcePath` into `dir` under a fresh backup name.
 *
 * @returns the backup path, or null when there is nothing to back up
 */
export async function createBackup(
  sourcePath: string,
  dir: string,
  now: Date
): Promise<string | null> {
  let bytes: Buffer;
  try {
    bytes = await readFile(sourcePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  await mkdir(dir, { recursive: true });
  const stamp = formatBackupStamp(now);

  for (let sequence = 0; ; sequence++) {
    const backupPath = join(dir, backupFileName(stamp, sequence));
    try {
      // 'wx' fails on an existing file instead of replacing it
      await writeFile(backupPath, bytes, { flag: 'wx' });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') continue;
      throw error;
    }
    await chmod(backupPath, READ_ONLY_MODE);
    return backupPath;
  }
}
