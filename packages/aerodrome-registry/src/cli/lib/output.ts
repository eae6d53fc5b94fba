/**
 * Output Formatting for CLI Commands
 *
 * Consistent result printing across commands: plain text for people,
 * JSON when `--json` is set.
 *
 * @module cli/lib/output
 */

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Print output to console
 */
export function printOutput(output: string): void {
  console.log(output);
}

/**
 * Print error to stderr
 */
export function printError(message: string): void {
  console.error(`Error: ${message}`);
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(`Success: ${message}`);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.warn(`Warning: ${message}`);
}
