/**
 * @strata/http-config
 *
 * HTTP-layer settings for the framework: context path, body parser limits,
 * cookies, session, flash, JWT signing parameters and file MIME types, with
 * validation of the application secret.
 *
 * @example
 * ```typescript
 * import { loadHttpConfiguration, initHttpConfiguration } from '@strata/http-config';
 *
 * const { result } = loadHttpConfiguration({ rootPath: process.cwd() });
 * if (!result.ok) {
 *   console.error(result.error.message);
 *   process.exit(1);
 * }
 * initHttpConfiguration(result.value);
 * ```
 *
 * @packageDocumentation
 */

// Types
export { SameSite } from './types.js';
export type {
  HttpConfiguration,
  SecretConfiguration,
  JwtConfiguration,
  SessionConfiguration,
  FlashConfiguration,
  ParserConfiguration,
  ActionCompositionConfiguration,
  CookiesConfiguration,
  FileMimeTypesConfiguration,
} from './types.js';

// Defaults
export {
  HTTP_DEFAULTS,
  defaultHttpConfiguration,
  defaultSecretConfiguration,
  defaultJwtConfiguration,
  defaultSessionConfiguration,
  defaultFlashConfiguration,
  defaultParserConfiguration,
  defaultActionCompositionConfiguration,
  defaultCookiesConfiguration,
  defaultFileMimeTypesConfiguration,
} from './defaults.js';

// Resolution
export { fromConfiguration, resolveHttpConfiguration } from './resolver.js';
export type { ResolveOptions, ResolveResult } from './resolver.js';
export { loadHttpConfiguration } from './load.js';
export type { LoadHttpConfigurationOptions, LoadedHttpConfiguration } from './load.js';
export { loadReferenceDefaults, HTTP_ENV_BINDINGS } from './reference.js';

// Parsing helpers
export { parseSameSite, readSameSite } from './same-site.js';
export { parseFileMimeTypes } from './mime-types.js';
export { SECRET_SENTINEL, SECRET_KEY, isUnsetSecret, deriveDevSecret, resolveSecret } from './secret.js';
export {
  SIGNATURE_ALGORITHM_MIN_KEY_BITS,
  lookupSignatureAlgorithm,
  minKeyLengthBits,
  secretBits,
  checkSecretStrength,
  parseJwtConfiguration,
} from './jwt.js';
export type { SignatureAlgorithm } from './jwt.js';

// Lifecycle
export {
  initHttpConfiguration,
  getHttpConfiguration,
  isHttpConfigurationInitialised,
  resetHttpConfiguration,
} from './holder.js';

// Errors
export { HttpConfigErrorKinds, WeakSecretError } from './errors.js';
export type { HttpConfigErrorKind } from './errors.js';

// Logging
export { logger } from './logger.js';
