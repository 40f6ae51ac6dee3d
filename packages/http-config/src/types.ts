/**
 * HTTP configuration types
 *
 * Every aggregate is readonly. A resolved {@link HttpConfiguration} is also
 * deep-frozen at runtime.
 */

import type { SignatureAlgorithm } from './jwt.js';

export const SameSite = {
  STRICT: 'Strict',
  LAX: 'Lax',
  NONE: 'None',
} as const;

export type SameSite = (typeof SameSite)[keyof typeof SameSite];

/**
 * The application secret.
 */
export interface SecretConfiguration {
  readonly secret: string;
  /** Crypto provider name; the platform default when absent */
  readonly provider?: string;
}

export interface JwtConfiguration {
  readonly signatureAlgorithm: SignatureAlgorithm;
  /** JWT lifetime; tokens never expire when absent */
  readonly expiresAfterMs?: number;
  /** Tolerance applied to exp/nbf checks */
  readonly clockSkewMs: number;
  /** Claim holding the user data map */
  readonly dataClaim: string;
}

interface CookieSettings {
  readonly cookieName: string;
  readonly secure: boolean;
  readonly httpOnly: boolean;
  readonly domain?: string;
  /** Always starts with "/" */
  readonly path: string;
  /** Attribute omitted when absent */
  readonly sameSite?: SameSite;
  readonly partitioned: boolean;
  readonly jwt: JwtConfiguration;
}

export interface SessionConfiguration extends CookieSettings {
  /** Session cookie lifetime; a browser-session cookie when absent */
  readonly maxAgeMs?: number;
}

export type FlashConfiguration = CookieSettings;

/**
 * Body parser limits.
 */
export interface ParserConfiguration {
  /** Largest request body buffered in memory, in bytes */
  readonly maxMemoryBuffer: number;
  /** Largest request body buffered on disk, in bytes */
  readonly maxDiskBuffer: number;
  /** Accept file uploads with an empty filename or empty content */
  readonly allowEmptyFiles: boolean;
}

export interface ActionCompositionConfiguration {
  /** Run controller-level annotations before action-level ones */
  readonly controllerAnnotationsFirst: boolean;
  /** Run the action creator's action before composed actions */
  readonly executeActionCreatorActionFirst: boolean;
  readonly includeWebSocketActions: boolean;
}

export interface CookiesConfiguration {
  /** Discard the whole Cookie header when a single cookie is invalid */
  readonly strict: boolean;
}

export interface FileMimeTypesConfiguration {
  /** Extension (without dot) -> content type */
  readonly mimeTypes: Readonly<Record<string, string>>;
}

export interface HttpConfiguration {
  readonly context: string;
  readonly parser: ParserConfiguration;
  readonly actionComposition: ActionCompositionConfiguration;
  readonly cookies: CookiesConfiguration;
  readonly session: SessionConfiguration;
  readonly flash: FlashConfiguration;
  readonly fileMimeTypes: FileMimeTypesConfiguration;
  readonly secret: SecretConfiguration;
}
