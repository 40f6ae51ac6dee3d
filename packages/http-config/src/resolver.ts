/**
 * HTTP configuration resolver
 *
 * Reads every `http.*` setting from a layered configuration, validates
 * paths, the secret and its strength per JWT section, and returns a
 * deep-frozen snapshot.
 *
 * @packageDocumentation
 */

import {
  ConfigError,
  ConfigLoaders,
  type ConfigLogger,
  type Configuration,
  type Environment,
} from '@strata/config';
import { forbiddenKey, invalidPath } from './errors.js';
import { parseJwtConfiguration } from './jwt.js';
import { logger as defaultLogger } from './logger.js';
import { parseFileMimeTypes } from './mime-types.js';
import { readSameSite } from './same-site.js';
import { resolveSecret } from './secret.js';
import type { FlashConfiguration, HttpConfiguration, SessionConfiguration } from './types.js';

export interface ResolveOptions {
  logger?: ConfigLogger;
}

export type ResolveResult = { ok: true; value: HttpConfiguration } | { ok: false; error: ConfigError };

/** Removed key and the setting that replaced it */
const FORBIDDEN_KEYS: Readonly<Record<string, string>> = {
  mimetype: 'http.fileMimeTypes',
};

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

function readPath(config: Configuration, key: string, ...legacyKeys: string[]): string {
  const path = config.getDeprecated(key, ConfigLoaders.string, ...legacyKeys);
  if (!path.startsWith('/')) {
    throw invalidPath(key);
  }
  return path;
}

/**
 * Build the HTTP configuration.
 *
 * @throws ConfigError on any invalid or insecure setting
 */
export function fromConfiguration(
  config: Configuration,
  environment: Environment,
  options: ResolveOptions = {}
): HttpConfiguration {
  const logger = options.logger ?? defaultLogger;

  for (const [key, replacement] of Object.entries(FORBIDDEN_KEYS)) {
    if (config.has(key)) {
      throw forbiddenKey(key, replacement);
    }
  }

  const context = readPath(config, 'http.context', 'application.context');
  const sessionPath = readPath(config, 'http.session.path');
  const flashPath = readPath(config, 'http.flash.path');

  const secret = resolveSecret(config, environment, logger);

  const maxAgeMs = config.getOptionalDeprecated('http.session.maxAge', ConfigLoaders.duration, 'session.maxAge');
  const sessionDomain = config.getOptionalDeprecated('http.session.domain', ConfigLoaders.string, 'session.domain');
  const sessionSameSite = readSameSite(config, 'http.session.sameSite', logger);
  const session: SessionConfiguration = {
    cookieName: config.getDeprecated('http.session.cookieName', ConfigLoaders.string, 'session.cookieName'),
    secure: config.getDeprecated('http.session.secure', ConfigLoaders.boolean, 'session.secure'),
    ...(maxAgeMs === undefined ? {} : { maxAgeMs }),
    httpOnly: config.getDeprecated('http.session.httpOnly', ConfigLoaders.boolean, 'session.httpOnly'),
    ...(sessionDomain === undefined ? {} : { domain: sessionDomain }),
    path: sessionPath,
    ...(sessionSameSite === undefined ? {} : { sameSite: sessionSameSite }),
    partitioned: config.getDeprecated('http.session.partitioned', ConfigLoaders.boolean, 'session.partitioned'),
    jwt: parseJwtConfiguration(config, secret, 'http.session.jwt'),
  };

  const flashDomain = config.getOptional('http.flash.domain', ConfigLoaders.string);
  const flashSameSite = readSameSite(config, 'http.flash.sameSite', logger);
  const flash: FlashConfiguration = {
    cookieName: config.getDeprecated('http.flash.cookieName', ConfigLoaders.string, 'flash.cookieName'),
    secure: config.get('http.flash.secure', ConfigLoaders.boolean),
    httpOnly: config.get('http.flash.httpOnly', ConfigLoaders.boolean),
    ...(flashDomain === undefined ? {} : { domain: flashDomain }),
    path: flashPath,
    ...(flashSameSite === undefined ? {} : { sameSite: flashSameSite }),
    partitioned: config.get('http.flash.partitioned', ConfigLoaders.boolean),
    jwt: parseJwtConfiguration(config, secret, 'http.flash.jwt'),
  };

  return deepFreeze({
    context,
    parser: {
      maxMemoryBuffer: config.getDeprecated(
        'http.parser.maxMemoryBuffer',
        ConfigLoaders.memorySize,
        'parsers.text.maxLength'
      ),
      maxDiskBuffer: config.get('http.parser.maxDiskBuffer', ConfigLoaders.memorySize),
      allowEmptyFiles: config.get('http.parser.allowEmptyFiles', ConfigLoaders.boolean),
    },
    actionComposition: {
      controllerAnnotationsFirst: config.get(
        'http.actionComposition.controllerAnnotationsFirst',
        ConfigLoaders.boolean
      ),
      executeActionCreatorActionFirst: config.get(
        'http.actionComposition.executeActionCreatorActionFirst',
        ConfigLoaders.boolean
      ),
      includeWebSocketActions: config.get('http.actionComposition.includeWebSocketActions', ConfigLoaders.boolean),
    },
    cookies: {
      strict: config.get('http.cookies.strict', ConfigLoaders.boolean),
    },
    session,
    flash,
    fileMimeTypes: {
      mimeTypes: parseFileMimeTypes(config.getOptional('http.fileMimeTypes', ConfigLoaders.string) ?? ''),
    },
    secret,
  });
}

/**
 * Resolve without throwing. Only configuration errors become a failed
 * result; the caller decides how to abort startup.
 */
export function resolveHttpConfiguration(
  config: Configuration,
  environment: Environment,
  options: ResolveOptions = {}
): ResolveResult {
  try {
    return { ok: true, value: fromConfiguration(config, environment, options) };
  } catch (err) {
    if (err instanceof ConfigError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
