/**
 * Sync Command
 *
 * Fetches both source feeds, applies overrides and writes the staging
 * artifact. Production is not touched.
 *
 * USAGE:
 *   aerodrome-registry sync
 *
 * EXIT CODES:
 *   0 success, 4 a source could not be retrieved, 2 any other failure
 *
 * @module cli/commands/sync
 */

import { SourceUnavailableError } from '../../core/errors.js';
import { SourceClient, type FetchText } from '../../core/source-client.js';
import { runSync, type SyncResult } from '../../sync/sync-service.js';
import { resolvePath } from '../lib/config.js';
import { EXIT_CODES, type CommandContext, type ExitCode } from '../lib/context.js';
import { formatJson, printError, printOutput, printSuccess, printWarning } from '../lib/output.js';

export interface SyncCommandDeps {
  /** Replaces the HTTP client, e.g. in tests */
  readonly fetchText?: FetchText;
  readonly now?: () => Date;
}

function printSummary(result: SyncResult): void {
  const { stats, sources } = result;

  printSuccess('Sync completed');
  printOutput(
    [
      `Total aerodromes: ${result.document.total_count}`,
      `Timezone matched from secondary feed: ${stats.matched}`,
      `Timezone from country fallback: ${stats.fallback} (${stats.unresolved} defaulted to UTC)`,
      `Existing aerodromes overridden: ${stats.overridden}`,
      `New aerodromes from overrides: ${stats.overrides}`,
      `Primary rows rejected: ${sources.primaryRejected} of ${sources.primaryRows}`,
      `Secondary lines rejected: ${sources.secondaryRejected} of ${sources.secondaryLines}`,
      `Registry saved to: ${result.stagingPath}`,
    ].join('\n')
  );

  const skipped =
    stats.skippedOverrides + sources.overrideElementsSkipped + sources.overrideFilesSkipped;
  if (skipped > 0) {
    printWarning(`${skipped} override file(s) or entries were skipped, see log for details`);
  }
}

export async function syncCommand(
  ctx: CommandContext,
  deps: SyncCommandDeps = {}
): Promise<ExitCode> {
  const { config, logger, cwd } = ctx;

  const client = new SourceClient({ timeoutMs: config.sources.timeoutMs }, logger);
  const fetchText: FetchText = deps.fetchText ?? ((url) => client.fetchText(url));

  try {
    const result = await runSync({
      paths: {
        staging: resolvePath(config, 'staging', cwd),
        overrides: resolvePath(config, 'overrides', cwd),
        versionFile: resolvePath(config, 'versionFile', cwd),
        countryTimezones: resolvePath(config, 'countryTimezones', cwd),
      },
      primaryUrl: config.sources.primaryUrl,
      secondaryUrl: config.sources.secondaryUrl,
      fetchText,
      now: deps.now,
      logger,
    });

    if (config.json) {
      printOutput(
        formatJson({
          success: true,
          stagingPath: result.stagingPath,
          totalCount: result.document.total_count,
          stats: result.stats,
          sources: result.sources,
          skippedOverrides: result.skippedOverrides,
        })
      );
    } else {
      printSummary(result);
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    printError(`Sync failed: ${message}`);
    return error instanceof SourceUnavailableError ? EXIT_CODES.NETWORK_ERROR : EXIT_CODES.ERRORS;
  }
}
