/**
 * Validate Command
 *
 * Checks a registry document (production by default) in strict mode, or
 * sample mode with --sample.
 *
 * USAGE:
 *   aerodrome-registry validate [file] [--sample]
 *
 * @module cli/commands/validate
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { RegistryValidator } from '../../validation/registry-validator.js';
import { resolvePath } from '../lib/config.js';
import { EXIT_CODES, type CommandContext, type ExitCode } from '../lib/context.js';
import { formatJson, printError, printOutput, printSuccess } from '../lib/output.js';

export interface ValidateCommandOptions {
  readonly file?: string;
  readonly sample?: boolean;
}

export async function validateCommand(
  ctx: CommandContext,
  options: ValidateCommandOptions = {}
): Promise<ExitCode> {
  const { config, cwd } = ctx;
  const filePath = options.file ? resolve(cwd, options.file) : resolvePath(config, 'production', cwd);
  const mode = options.sample ? 'sample' : 'strict';

  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    printError(`Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }

  const validator = await RegistryValidator.fromFile(resolvePath(config, 'schema', cwd));
  const result = validator.validateText(text, mode);

  if (config.json) {
    printOutput(
      formatJson({
        file: filePath,
        mode,
        valid: result.valid,
        issues: result.issues,
        summary: result.summary ?? null,
      })
    );
  } else if (result.valid) {
    printSuccess(`${filePath} passed ${mode} validation`);
    if (result.summary) {
      printOutput(
        [
          `Registry contains ${result.summary.totalCount} aerodromes`,
          `Last updated: ${result.summary.lastUpdated}`,
          `Version: ${result.summary.version}`,
        ].join('\n')
      );
    }
  } else {
    printError(`${filePath} failed ${mode} validation with ${result.issues.length} issue(s)`);
    for (const issue of result.issues) {
      printOutput(`  - [${issue.code}] ${issue.message}`);
    }
  }

  return result.valid ? EXIT_CODES.SUCCESS : EXIT_CODES.DATA_INTEGRITY_ERROR;
}
