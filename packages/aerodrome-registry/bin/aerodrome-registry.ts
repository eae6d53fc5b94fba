#!/usr/bin/env tsx
/**
 * Aerodrome Registry CLI Entry Point
 *
 * sync → diff → release, with rollback and standalone validation.
 *
 * @module aerodrome-registry-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadConfig, parseTimeoutOption, validateConfig } from '../src/cli/lib/config.js';
import { EXIT_CODES, type CommandContext } from '../src/cli/lib/context.js';
import { createCLILogger } from '../src/cli/lib/logger.js';
import { diffCommand } from '../src/cli/commands/diff.js';
import { releaseCommand } from '../src/cli/commands/release.js';
import { rollbackCommand } from '../src/cli/commands/rollback.js';
import { syncCommand } from '../src/cli/commands/sync.js';
import { validateCommand } from '../src/cli/commands/validate.js';

export { EXIT_CODES, type ExitCode } from '../src/cli/lib/context.js';

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext extends CommandContext {
  readonly startTime: number;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

interface GlobalOptions {
  verbose?: boolean;
  json?: boolean;
  config?: string;
  timeout?: number;
}

async function initializeContext(options: GlobalOptions): Promise<GlobalContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      timeoutMs: options.timeout,
    },
  });
  validateConfig(config);

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger, cwd: process.cwd(), startTime };
  return globalContext;
}

/**
 * Run a command with start/end logging and exit with its code
 */
async function run(name: string, command: (ctx: GlobalContext) => Promise<number>): Promise<void> {
  const ctx = getGlobalContext();
  ctx.logger.commandStart(name);
  const exitCode = await command(ctx);
  ctx.logger.commandEnd(exitCode === EXIT_CODES.SUCCESS, { exit_code: exitCode });
  if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('aerodrome-registry')
    .description('Build, review, release and roll back the aerodrome registry')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .aerodromerc)')
    .option('--timeout <ms>', 'Source download timeout in milliseconds', parseTimeoutOption)
    .hook('preAction', async (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      try {
        await initializeContext(options);
      } catch (error) {
        console.error(
          `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  program
    .command('sync')
    .description('Fetch sources, apply overrides and write the staging registry')
    .action(async () => {
      await run('sync', (ctx) => syncCommand(ctx));
    });

  program
    .command('diff')
    .alias('compare')
    .description('Compare staging against production')
    .action(async () => {
      await run('diff', (ctx) => diffCommand(ctx));
    });

  const release = program
    .command('release')
    .description('Promote staging to production')
    .option('--force', 'Skip the confirmation prompt')
    .action(async (options: { force?: boolean }) => {
      await run('release', (ctx) => releaseCommand(ctx, { force: options.force }));
    });

  release
    .command('rollback')
    .description('Restore production from a backup')
    .option('--backup <n>', 'Backup number to restore (1 = newest)')
    .option('--force', 'Skip the confirmation prompt')
    .action(async (options: { backup?: string; force?: boolean }) => {
      // `--force` after `rollback` is still parsed by the parent command
      const force = options.force ?? release.opts<{ force?: boolean }>().force;
      await run('release rollback', (ctx) =>
        rollbackCommand(ctx, { backup: options.backup, force })
      );
    });

  program
    .command('validate [file]')
    .description('Validate a registry document (default: production)')
    .option('--sample', 'Check record fields on the first record only')
    .action(async (file: string | undefined, options: { sample?: boolean }) => {
      await run('validate', (ctx) => validateCommand(ctx, { file, sample: options.sample }));
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: error instanceof Error ? error.message : String(error),
        duration_ms: Date.now() - globalContext.startTime,
      });
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
