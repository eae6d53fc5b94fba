/**
 * Shared CLI context and exit codes
 *
 * @module cli/lib/context
 */

import type { CLIConfig } from './config.js';
import type { CLILogger } from './logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  DATA_INTEGRITY_ERROR: 5,
  USER_CANCELLED: 10,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Command Context
// ============================================================================

/**
 * What every command receives from the entry point
 */
export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  /** Base directory for relative paths when no config file was found */
  readonly cwd: string;
}
