/**
 * Application secret resolution
 *
 * - An unset secret (absent, blank or the "changeme" sentinel) aborts
 *   startup in production.
 * - In dev and test, an unset secret is replaced by one derived from the
 *   location of the application configuration file. It stays stable across
 *   restarts and differs between applications, so two apps served from the
 *   same host do not accept each other's session cookies. It is not secret
 *   in any cryptographic sense.
 * - Anything else is used verbatim.
 *
 * @packageDocumentation
 */

import { createHash } from 'crypto';
import {
  ConfigError,
  ConfigLoaders,
  PRIMARY_CONFIG_RESOURCE,
  type ConfigLogger,
  type Configuration,
  type Environment,
} from '@strata/config';
import { HttpConfigErrorKinds } from './errors.js';
import type { SecretConfiguration } from './types.js';

export const SECRET_SENTINEL = 'changeme';

export const SECRET_KEY = 'http.secret.key';

/** Seed used when no application configuration file can be located */
const FALLBACK_SEED = 'she sells sea shells on the sea shore';

/** Appended to the seed for the second half of a derived secret */
const SEED_SUFFIX = 'the shells she sells are sea-shells';

function md5(value: string): string {
  return createHash('md5').update(value, 'utf8').digest('hex');
}

export function isUnsetSecret(value: string | undefined): boolean {
  return value === undefined || value === SECRET_SENTINEL || value.trim() === '';
}

/**
 * Derive the dev/test secret for an application configuration location.
 *
 * Two hex md5 digests, 64 ASCII bytes in total, enough for HS512.
 */
export function deriveDevSecret(location: URL | undefined): string {
  const seed = location ? location.toString() : FALLBACK_SEED;
  return md5(seed) + md5(seed + SEED_SUFFIX);
}

export function resolveSecret(
  config: Configuration,
  environment: Environment,
  logger: ConfigLogger
): SecretConfiguration {
  const configured = config.getOptional(SECRET_KEY, ConfigLoaders.string);
  let secret: string;

  if (configured !== undefined && !isUnsetSecret(configured)) {
    secret = configured;
  } else if (environment.mode === 'prod') {
    throw new ConfigError(
      HttpConfigErrorKinds.MISSING_SECRET,
      'http.secret',
      'The application secret has not been set, and we are in prod mode. Your application is not secure. ' +
        `Set ${SECRET_KEY} or the APPLICATION_SECRET environment variable.`
    );
  } else {
    const location = environment.resource(PRIMARY_CONFIG_RESOURCE);
    secret = deriveDevSecret(location);
    logger.debug(
      { location: location?.href ?? 'unknown location', mode: environment.mode },
      'Generated dev mode secret'
    );
  }

  const provider = config.getOptionalDeprecated('http.secret.provider', ConfigLoaders.string, 'crypto.provider');
  return provider === undefined ? { secret } : { secret, provider };
}
