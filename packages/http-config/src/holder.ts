/**
 * Process-wide HTTP configuration, set once at startup and read-only after.
 */

import type { HttpConfiguration } from './types.js';

let current: HttpConfiguration | undefined;

/**
 * @throws Error when a configuration has already been installed
 */
export function initHttpConfiguration(configuration: HttpConfiguration): HttpConfiguration {
  if (current !== undefined) {
    throw new Error('HTTP configuration is already initialised');
  }
  current = configuration;
  return configuration;
}

/**
 * @throws Error before initHttpConfiguration has run
 */
export function getHttpConfiguration(): HttpConfiguration {
  if (current === undefined) {
    throw new Error('HTTP configuration has not been initialised');
  }
  return current;
}

export function isHttpConfigurationInitialised(): boolean {
  return current !== undefined;
}

/** Drop the installed configuration (tests and hot restarts) */
export function resetHttpConfiguration(): void {
  current = undefined;
}
