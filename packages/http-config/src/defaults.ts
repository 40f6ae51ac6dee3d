/**
 * Default-construction functions. These mirror resources/reference.json
 * and are what a caller gets without reading any configuration.
 *
 * Keep both in step: the resolver test "matches the default-construction
 * functions" fails when they drift apart.
 */

import { SECRET_SENTINEL } from './secret.js';
import {
  SameSite,
  type ActionCompositionConfiguration,
  type CookiesConfiguration,
  type FileMimeTypesConfiguration,
  type FlashConfiguration,
  type HttpConfiguration,
  type JwtConfiguration,
  type ParserConfiguration,
  type SecretConfiguration,
  type SessionConfiguration,
} from './types.js';

export const HTTP_DEFAULTS = {
  context: '/',
  sessionCookieName: 'STRATA_SESSION',
  flashCookieName: 'STRATA_FLASH',
  maxMemoryBuffer: 100 * 1024,
  maxDiskBuffer: 10 * 1024 * 1024,
  clockSkewMs: 30_000,
} as const;

export function defaultJwtConfiguration(): JwtConfiguration {
  return {
    signatureAlgorithm: 'HS256',
    clockSkewMs: HTTP_DEFAULTS.clockSkewMs,
    dataClaim: 'data',
  };
}

export function defaultSecretConfiguration(): SecretConfiguration {
  return { secret: SECRET_SENTINEL };
}

export function defaultSessionConfiguration(): SessionConfiguration {
  return {
    cookieName: HTTP_DEFAULTS.sessionCookieName,
    secure: false,
    httpOnly: true,
    path: '/',
    sameSite: SameSite.LAX,
    partitioned: false,
    jwt: defaultJwtConfiguration(),
  };
}

export function defaultFlashConfiguration(): FlashConfiguration {
  return {
    cookieName: HTTP_DEFAULTS.flashCookieName,
    secure: false,
    httpOnly: true,
    path: '/',
    sameSite: SameSite.LAX,
    partitioned: false,
    jwt: defaultJwtConfiguration(),
  };
}

export function defaultParserConfiguration(): ParserConfiguration {
  return {
    maxMemoryBuffer: HTTP_DEFAULTS.maxMemoryBuffer,
    maxDiskBuffer: HTTP_DEFAULTS.maxDiskBuffer,
    allowEmptyFiles: false,
  };
}

export function defaultActionCompositionConfiguration(): ActionCompositionConfiguration {
  return {
    controllerAnnotationsFirst: false,
    executeActionCreatorActionFirst: false,
    includeWebSocketActions: false,
  };
}

export function defaultCookiesConfiguration(): CookiesConfiguration {
  return { strict: true };
}

export function defaultFileMimeTypesConfiguration(): FileMimeTypesConfiguration {
  return { mimeTypes: {} };
}

export function defaultHttpConfiguration(): HttpConfiguration {
  return {
    context: HTTP_DEFAULTS.context,
    parser: defaultParserConfiguration(),
    actionComposition: defaultActionCompositionConfiguration(),
    cookies: defaultCookiesConfiguration(),
    session: defaultSessionConfiguration(),
    flash: defaultFlashConfiguration(),
    fileMimeTypes: defaultFileMimeTypesConfiguration(),
    secret: defaultSecretConfiguration(),
  };
}
