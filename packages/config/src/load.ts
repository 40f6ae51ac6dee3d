/**
 * Layer assembly: overrides, environment variables, the application file and
 * reference defaults, in that order of precedence.
 */

import { readFileSync } from 'fs';
import { Configuration, isConfigTree } from './configuration.js';
import type { Environment } from './environment.js';
import { PRIMARY_CONFIG_RESOURCE } from './environment.js';
import { ConfigError, ConfigErrorKinds } from './errors.js';
import type { ConfigLogger } from './logger.js';

/** Environment variable name -> configuration key */
export type EnvBindings = Readonly<Record<string, string>>;

export interface LoadConfigurationOptions {
  environment: Environment;
  /** Highest-precedence values, typically from code or tests */
  overrides?: object;
  env?: Record<string, string | undefined>;
  envBindings?: EnvBindings;
  /** Lowest-precedence values shipped with the library */
  reference?: object;
  logger?: ConfigLogger;
}

/**
 * Layer built from bound environment variables. Unset variables contribute
 * nothing; set-but-empty ones are kept.
 */
export function fromEnv(env: Record<string, string | undefined>, bindings: EnvBindings): Record<string, string> {
  const layer: Record<string, string> = {};
  for (const [variable, key] of Object.entries(bindings)) {
    const value = env[variable];
    if (value !== undefined) {
      layer[key] = value;
    }
  }
  return layer;
}

/**
 * Read a JSON configuration resource.
 *
 * @throws ConfigError when the file cannot be read or is not a JSON object
 */
export function readConfigResource(location: URL): object {
  let content: string;
  try {
    content = readFileSync(location, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      ConfigErrorKinds.BAD_VALUE,
      undefined,
      `Failed to read ${location.href}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(
      ConfigErrorKinds.BAD_VALUE,
      undefined,
      `Failed to parse ${location.href}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  if (!isConfigTree(parsed)) {
    throw new ConfigError(ConfigErrorKinds.BAD_VALUE, undefined, `${location.href} must contain a JSON object`);
  }
  return parsed;
}

export function loadConfiguration(options: LoadConfigurationOptions): Configuration {
  const layers: object[] = [];

  if (options.overrides) {
    layers.push(options.overrides);
  }
  if (options.env && options.envBindings) {
    layers.push(fromEnv(options.env, options.envBindings));
  }

  const application = options.environment.resource(PRIMARY_CONFIG_RESOURCE);
  if (application) {
    layers.push(readConfigResource(application));
  }

  if (options.reference) {
    layers.push(options.reference);
  }

  return Configuration.fromLayers(layers, { logger: options.logger });
}
