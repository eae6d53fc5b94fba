/**
 * Read a registry artifact from disk and validate it strictly
 *
 * @module validation/registry-file
 */

import { readFile } from 'node:fs/promises';
import { isErrnoException } from '../core/errors.js';
import type { RegistryDocument, ValidationIssue } from '../core/types.js';
import type { RegistryValidator } from './registry-validator.js';

export type LoadedRegistry =
  | { readonly status: 'ok'; readonly document: RegistryDocument }
  | { readonly status: 'missing' }
  | { readonly status: 'invalid'; readonly issues: readonly ValidationIssue[] };

export async function loadRegistryFile(
  filePath: string,
  validator: RegistryValidator
): Promise<LoadedRegistry> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return { status: 'missing' };
    }
    throw error;
  }

  const result = validator.parseDocument(text);
  return result.valid
    ? { status: 'ok', document: result.document }
    : { status: 'invalid', issues: result.issues };
}
