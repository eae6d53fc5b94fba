/**
 * Release Rollback Command
 *
 * Restores production from one of the five most recent backups.
 *
 * USAGE:
 *   aerodrome-registry release rollback [--backup <n>] [--force]
 *
 * OPTIONS:
 *   --backup <n>   Pick backup n (1 = newest) instead of prompting
 *   --force        Skip the confirmation
 *
 * @module cli/commands/rollback
 */

import type { ChooseFn, ConfirmFn, RollbackResult } from '../../release/release-controller.js';
import { EXIT_CODES, type CommandContext, type ExitCode } from '../lib/context.js';
import { formatJson, printError, printOutput, printSuccess, printWarning } from '../lib/output.js';
import { PromptSession } from '../lib/prompt.js';
import { createReleaseController } from './release.js';

export interface RollbackCommandOptions {
  readonly backup?: string;
  readonly force?: boolean;
}

export interface RollbackCommandDeps {
  readonly choose?: ChooseFn;
  readonly confirm?: ConfirmFn;
  /** Answers confirm/choose when no function is given; closed when the command ends */
  readonly prompts?: PromptSession;
}

export async function rollbackCommand(
  ctx: CommandContext,
  options: RollbackCommandOptions = {},
  deps: RollbackCommandDeps = {}
): Promise<ExitCode> {
  const prompts = deps.prompts ?? new PromptSession();
  const controller = await createReleaseController(ctx, {
    confirm: deps.confirm ?? prompts.confirm,
  });

  const { backup } = options;
  const choose: ChooseFn =
    backup !== undefined ? async () => backup : (deps.choose ?? prompts.choose);

  let result: RollbackResult;
  try {
    result = await controller.rollback({ choose, force: options.force });
  } finally {
    prompts.close();
  }

  if (ctx.config.json) {
    printOutput(
      formatJson(
        result.ok
          ? { success: true, restored: result.restored.fileName }
          : { success: false, code: result.error.code, error: result.error.message }
      )
    );
  }

  if (result.ok) {
    if (!ctx.config.json) {
      printSuccess(`Rolled back to ${result.restored.fileName}`);
    }
    return EXIT_CODES.SUCCESS;
  }

  const { error } = result;
  switch (error.code) {
    case 'ROLLBACK_CANCELLED':
      printWarning(error.message);
      return EXIT_CODES.USER_CANCELLED;
    case 'ROLLBACK_NO_BACKUPS':
    case 'ROLLBACK_INVALID_SELECTION':
    case 'ROLLBACK_FAILED':
      printError(error.message);
      return EXIT_CODES.ERRORS;
  }
}
