/**
 * @strata/cli - configuration checks for Strata applications
 */

export { createCli } from './cli.js';
export { ConfigCheckCommand } from './cmd/config-check.js';
export { formatSuccess, formatFailure, redactSecret, summarizeError, REDACTED } from './format.js';
export type { ErrorSummary } from './format.js';
