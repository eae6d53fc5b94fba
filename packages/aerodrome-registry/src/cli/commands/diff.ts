/**
 * Diff Command
 *
 * Shows what a release would change: staging compared against production.
 *
 * USAGE:
 *   aerodrome-registry diff        (alias: compare)
 *
 * @module cli/commands/diff
 */

import { diffRegistries, formatDiffReport } from '../../diff/diff-reporter.js';
import { loadRegistryFile } from '../../validation/registry-file.js';
import { RegistryValidator } from '../../validation/registry-validator.js';
import { resolvePath } from '../lib/config.js';
import { EXIT_CODES, type CommandContext, type ExitCode } from '../lib/context.js';
import { formatJson, printError, printOutput } from '../lib/output.js';

export async function diffCommand(ctx: CommandContext): Promise<ExitCode> {
  const { config, cwd } = ctx;
  const stagingPath = resolvePath(config, 'staging', cwd);
  const productionPath = resolvePath(config, 'production', cwd);

  const validator = await RegistryValidator.fromFile(resolvePath(config, 'schema', cwd));

  const staging = await loadRegistryFile(stagingPath, validator);
  if (staging.status === 'missing') {
    printError(`No staging data found at ${stagingPath}. Run sync first.`);
    return EXIT_CODES.ERRORS;
  }
  if (staging.status === 'invalid') {
    printError(`Staging file is not a valid registry: ${staging.issues[0]?.message ?? 'unknown'}`);
    return EXIT_CODES.ERRORS;
  }

  const production = await loadRegistryFile(productionPath, validator);
  if (production.status === 'invalid') {
    printError(
      `Production file is not a valid registry: ${production.issues[0]?.message ?? 'unknown'}`
    );
    return EXIT_CODES.ERRORS;
  }

  const report = diffRegistries(
    production.status === 'ok' ? production.document : null,
    staging.document,
    config.diff
  );

  if (config.json) {
    printOutput(formatJson(report));
  } else {
    printOutput(`Production: ${productionPath}\nStaging: ${stagingPath}\n`);
    printOutput(formatDiffReport(report, { previewLimit: config.diff.previewLimit }));
  }

  return EXIT_CODES.SUCCESS;
}
