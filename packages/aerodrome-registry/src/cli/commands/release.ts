/**
 * Release Command
 *
 * Promotes the staging artifact to production after validation and
 * operator confirmation. The previous production file is backed up first.
 *
 * USAGE:
 *   aerodrome-registry release [--force]
 *
 * EXIT CODES:
 *   0 released, 5 staging failed validation, 10 cancelled, 2 any other failure
 *
 * @module cli/commands/release
 */

import { ReleaseController, type ConfirmFn, type PromoteResult } from '../../release/release-controller.js';
import { RegistryValidator } from '../../validation/registry-validator.js';
import { resolvePath } from '../lib/config.js';
import { EXIT_CODES, type CommandContext, type ExitCode } from '../lib/context.js';
import { formatJson, printError, printOutput, printSuccess, printWarning } from '../lib/output.js';
import { PromptSession } from '../lib/prompt.js';

export interface ReleaseCommandOptions {
  readonly force?: boolean;
}

export interface ReleaseCommandDeps {
  readonly confirm?: ConfirmFn;
  readonly now?: () => Date;
  /** Answers confirm/choose when no function is given; closed when the command ends */
  readonly prompts?: PromptSession;
}

/**
 * Build the controller the release and rollback commands share
 */
export async function createReleaseController(
  ctx: CommandContext,
  deps: ReleaseCommandDeps = {}
): Promise<ReleaseController> {
  const { config, logger, cwd } = ctx;
  return new ReleaseController({
    paths: {
      staging: resolvePath(config, 'staging', cwd),
      production: resolvePath(config, 'production', cwd),
      backups: resolvePath(config, 'backups', cwd),
    },
    validator: await RegistryValidator.fromFile(resolvePath(config, 'schema', cwd)),
    confirm: deps.confirm,
    now: deps.now,
    logger,
  });
}

export async function releaseCommand(
  ctx: CommandContext,
  options: ReleaseCommandOptions = {},
  deps: ReleaseCommandDeps = {}
): Promise<ExitCode> {
  const prompts = deps.prompts ?? new PromptSession();
  const controller = await createReleaseController(ctx, {
    now: deps.now,
    confirm:
      deps.confirm ??
      (async (message) => {
        printWarning('This will replace the current production registry.');
        return prompts.confirm(message);
      }),
  });

  let result: PromoteResult;
  try {
    result = await controller.promote({ force: options.force });
  } finally {
    prompts.close();
  }

  if (ctx.config.json) {
    printOutput(
      formatJson(
        result.ok
          ? {
              success: true,
              totalCount: result.released.total_count,
              releasedAt: result.released.released_at,
              backupPath: result.backupPath,
            }
          : { success: false, code: result.error.code, error: result.error.message }
      )
    );
  }

  if (result.ok) {
    if (!ctx.config.json) {
      printSuccess(`Released ${result.released.total_count} aerodromes to production`);
      printOutput(`Release timestamp: ${result.released.released_at ?? ''}`);
      if (result.backupPath) {
        printOutput(`Production backup created: ${result.backupPath}`);
      }
    }
    return EXIT_CODES.SUCCESS;
  }

  const { error } = result;
  switch (error.code) {
    case 'SOURCE_MISSING':
      printError(`${error.message}. Run sync first to generate staging data.`);
      return EXIT_CODES.ERRORS;
    case 'VALIDATION_FAILED':
      printError(error.getSummary());
      return EXIT_CODES.DATA_INTEGRITY_ERROR;
    case 'RELEASE_CANCELLED':
      printWarning(error.message);
      return EXIT_CODES.USER_CANCELLED;
    case 'RELEASE_FAILED':
      printError(error.message);
      if (error.backupPath) {
        printOutput(`Previous production preserved at: ${error.backupPath}`);
      }
      return EXIT_CODES.ERRORS;
  }
}
