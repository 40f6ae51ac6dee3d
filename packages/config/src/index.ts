/**
 * @strata/config
 *
 * Typed, layered key/value configuration with deprecated-key fallback,
 * plus the environment descriptor (mode and resource lookup).
 *
 * @packageDocumentation
 */

// Accessor
export { Configuration, toTree, isConfigTree } from './configuration.js';
export type { ConfigTree, ConfigValue, ConfigurationOptions } from './configuration.js';

// Loaders
export { ConfigLoaders, parseDuration, parseMemorySize, parseQuantity } from './loaders.js';
export type { ConfigLoader } from './loaders.js';

// Environment
export {
  createEnvironment,
  modeFromNodeEnv,
  isMode,
  MODES,
  PRIMARY_CONFIG_RESOURCE,
} from './environment.js';
export type { Environment, EnvironmentOptions, Mode } from './environment.js';

// Layers
export { loadConfiguration, fromEnv, readConfigResource } from './load.js';
export type { LoadConfigurationOptions, EnvBindings } from './load.js';

// Errors
export { ConfigError, ConfigErrorKinds } from './errors.js';
export type { ConfigErrorKind } from './errors.js';

// Logging
export { logger } from './logger.js';
export type { ConfigLogger } from './logger.js';
