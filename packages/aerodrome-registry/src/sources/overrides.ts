/**
 * Override document loader
 *
 * Reads every `*.json` file in the overrides directory (file-name order).
 * Each file must hold a JSON array of override objects. Broken files and
 * badly typed elements are skipped with a warning; a missing directory
 * simply means there are no overrides.
 *
 * The icao itself is checked later by reconciliation, which owns the
 * "missing icao" diagnostic.
 *
 * @module sources/overrides
 */

import { readdir, readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { z } from 'zod';
import { SourceUnavailableError, isErrnoException } from '../core/errors.js';
import type { OverrideCandidate } from '../core/types.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';

const optionalText = z.string().nullish().transform((value) => value ?? undefined);

/**
 * Shape of one element of an override file
 */
export const OverrideElementSchema = z.object({
  icao: optionalText,
  name: optionalText,
  country: optionalText,
  timezone: optionalText,
});

export interface OverrideLoadResult {
  readonly overrides: readonly OverrideCandidate[];
  readonly files: number;
  readonly skippedFiles: number;
  readonly skippedElements: number;
}

/**
 * Parse the elements of one override file
 */
export function parseOverrideElements(
  elements: readonly unknown[],
  source: string,
  logger: Logger = defaultLogger
): { overrides: OverrideCandidate[]; skipped: number } {
  const overrides: OverrideCandidate[] = [];
  let skipped = 0;

  elements.forEach((element, index) => {
    const parsed = OverrideElementSchema.safeParse(element);
    if (!parsed.success) {
      skipped++;
      logger.warn('Skipping malformed override element', {
        source,
        index,
        error: parsed.error.issues.map((issue) => issue.message).join('; '),
      });
      return;
    }
    overrides.push({ ...parsed.data, source });
  });

  return { overrides, skipped };
}

async function listOverrideFiles(dir: string, logger: Logger): Promise<string[] | null> {
  try {
    const entries = await readdir(dir);
    return entries.filter((entry) => entry.endsWith('.json')).sort();
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      logger.info('No overrides directory found', { dir });
      return null;
    }
    throw new SourceUnavailableError(dir, error);
  }
}

/**
 * Load all override files from a directory
 */
export async function loadOverrides(
  dir: string,
  logger: Logger = defaultLogger
): Promise<OverrideLoadResult> {
  const fileNames = await listOverrideFiles(dir, logger);
  if (!fileNames) {
    return { overrides: [], files: 0, skippedFiles: 0, skippedElements: 0 };
  }

  const overrides: OverrideCandidate[] = [];
  let skippedFiles = 0;
  let skippedElements = 0;

  for (const fileName of fileNames) {
    const filePath = join(dir, fileName);
    let content: unknown;

    try {
      content = JSON.parse(await readFile(filePath, 'utf-8'));
    } catch (error) {
      skippedFiles++;
      logger.warn('Error loading override file', {
        file: fileName,
        error: error instanceof Error ? error.message : String(error),
      });
      continue;
    }

    if (!Array.isArray(content)) {
      skippedFiles++;
      logger.warn('Skipping override file: expected JSON array', { file: fileName });
      continue;
    }

    const parsed = parseOverrideElements(content, basename(filePath), logger);
    overrides.push(...parsed.overrides);
    skippedElements += parsed.skipped;
    logger.info(`Loaded ${parsed.overrides.length} overrides`, { file: fileName });
  }

  return { overrides, files: fileNames.length, skippedFiles, skippedElements };
}
