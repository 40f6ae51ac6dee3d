/**
 * JWT signing parameters and secret strength checks.
 */

import { Buffer } from 'buffer';
import { ConfigError, ConfigLoaders, type Configuration } from '@strata/config';
import { HttpConfigErrorKinds, WeakSecretError } from './errors.js';
import { SECRET_KEY } from './secret.js';
import type { JwtConfiguration, SecretConfiguration } from './types.js';

/**
 * Minimum key length in bits per JWS algorithm (RFC 7518 section 3).
 */
export const SIGNATURE_ALGORITHM_MIN_KEY_BITS = {
  HS256: 256,
  HS384: 384,
  HS512: 512,
  RS256: 2048,
  RS384: 2048,
  RS512: 2048,
  ES256: 256,
  ES384: 384,
  ES512: 521,
  PS256: 2048,
  PS384: 2048,
  PS512: 2048,
} as const satisfies Record<string, number>;

export type SignatureAlgorithm = keyof typeof SIGNATURE_ALGORITHM_MIN_KEY_BITS;

function isSignatureAlgorithm(name: string): name is SignatureAlgorithm {
  return Object.prototype.hasOwnProperty.call(SIGNATURE_ALGORITHM_MIN_KEY_BITS, name);
}

/**
 * Canonical algorithm for a configured name, matched case-insensitively.
 */
export function lookupSignatureAlgorithm(name: string): SignatureAlgorithm | undefined {
  const canonical = name.trim().toUpperCase();
  return isSignatureAlgorithm(canonical) ? canonical : undefined;
}

export function minKeyLengthBits(algorithm: SignatureAlgorithm): number {
  return SIGNATURE_ALGORITHM_MIN_KEY_BITS[algorithm];
}

/** UTF-8 byte length of the secret, in bits */
export function secretBits(secret: string): number {
  return Buffer.byteLength(secret, 'utf8') * 8;
}

/**
 * @throws WeakSecretError when the secret is shorter than the algorithm needs
 */
export function checkSecretStrength(
  algorithm: SignatureAlgorithm,
  secret: SecretConfiguration,
  algorithmKey: string
): void {
  const required = minKeyLengthBits(algorithm);
  const actual = secretBits(secret.secret);
  if (actual < required) {
    throw new WeakSecretError(SECRET_KEY, algorithm, required, actual, algorithmKey);
  }
}

function readSignatureAlgorithm(config: Configuration, secret: SecretConfiguration, parent: string): SignatureAlgorithm {
  const key = `${parent}.signatureAlgorithm`;
  const name = config.get(key, ConfigLoaders.string);
  const algorithm = lookupSignatureAlgorithm(name);
  if (algorithm === undefined) {
    const known = Object.keys(SIGNATURE_ALGORITHM_MIN_KEY_BITS).join(', ');
    throw new ConfigError(
      HttpConfigErrorKinds.INVALID_ALGORITHM,
      key,
      `"${name}" is not a supported signature algorithm (${known})`
    );
  }
  checkSecretStrength(algorithm, secret, key);
  return algorithm;
}

/**
 * Read the JWT block under `parent` (e.g. "http.session.jwt").
 */
export function parseJwtConfiguration(
  config: Configuration,
  secret: SecretConfiguration,
  parent: string
): JwtConfiguration {
  const signatureAlgorithm = readSignatureAlgorithm(config, secret, parent);
  const expiresAfterMs = config.getOptional(`${parent}.expiresAfter`, ConfigLoaders.duration);
  const jwt: JwtConfiguration = {
    signatureAlgorithm,
    clockSkewMs: config.get(`${parent}.clockSkew`, ConfigLoaders.duration),
    dataClaim: config.get(`${parent}.dataClaim`, ConfigLoaders.string),
  };
  return expiresAfterMs === undefined ? jwt : { ...jwt, expiresAfterMs };
}
