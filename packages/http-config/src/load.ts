import {
  ConfigError,
  createEnvironment,
  loadConfiguration,
  modeFromNodeEnv,
  type ConfigLogger,
  type Environment,
  type Mode,
} from '@strata/config';
import { logger as defaultLogger } from './logger.js';
import { HTTP_ENV_BINDINGS, loadReferenceDefaults } from './reference.js';
import { resolveHttpConfiguration, type ResolveResult } from './resolver.js';

export interface LoadHttpConfigurationOptions {
  /** Application root; conf/application.json is read from here */
  rootPath?: string;
  /** Defaults to the mode derived from NODE_ENV */
  mode?: Mode;
  /** Defaults to process.env */
  env?: Record<string, string | undefined>;
  overrides?: object;
  logger?: ConfigLogger;
}

export interface LoadedHttpConfiguration {
  environment: Environment;
  result: ResolveResult;
}

/**
 * Assemble the layered configuration for an application root and resolve
 * it. A broken application file is reported like any other configuration
 * error.
 */
export function loadHttpConfiguration(options: LoadHttpConfigurationOptions = {}): LoadedHttpConfiguration {
  const env = options.env ?? process.env;
  const logger = options.logger ?? defaultLogger;
  const environment = createEnvironment({
    rootPath: options.rootPath,
    mode: options.mode ?? modeFromNodeEnv(env.NODE_ENV),
  });

  try {
    const config = loadConfiguration({
      environment,
      overrides: options.overrides,
      env,
      envBindings: HTTP_ENV_BINDINGS,
      reference: loadReferenceDefaults(),
      logger,
    });
    return { environment, result: resolveHttpConfiguration(config, environment, { logger }) };
  } catch (err) {
    if (err instanceof ConfigError) {
      return { environment, result: { ok: false, error: err } };
    }
    throw err;
  }
}
