import { ConfigError } from '@strata/config';

/**
 * HTTP configuration error kinds. All are fatal at startup.
 */
export const HttpConfigErrorKinds = {
  /** A path setting does not start with "/" */
  INVALID_PATH: 'InvalidPath',
  /** Unset or sentinel secret in production */
  MISSING_SECRET: 'MissingSecret',
  /** Secret shorter than the signature algorithm's minimum key length */
  WEAK_SECRET: 'WeakSecret',
  /** A removed key is still present */
  FORBIDDEN_KEY: 'ForbiddenKey',
  /** Unknown JWT signature algorithm name */
  INVALID_ALGORITHM: 'InvalidAlgorithm',
} as const;

export type HttpConfigErrorKind = (typeof HttpConfigErrorKinds)[keyof typeof HttpConfigErrorKinds];

export class WeakSecretError extends ConfigError {
  readonly algorithm: string;
  /** Minimum key length in bits */
  readonly required: number;
  /** Secret length in bits */
  readonly actual: number;

  constructor(key: string, algorithm: string, required: number, actual: number, algorithmKey: string) {
    super(
      HttpConfigErrorKinds.WEAK_SECRET,
      key,
      `The application secret is too short for algorithm ${algorithm} defined at ${algorithmKey}. ` +
        `Current application secret bits: ${actual}, minimal required bits for algorithm ${algorithm}: ${required}.`
    );
    this.name = 'WeakSecretError';
    this.algorithm = algorithm;
    this.required = required;
    this.actual = actual;
  }
}

export function invalidPath(key: string): ConfigError {
  return new ConfigError(HttpConfigErrorKinds.INVALID_PATH, key, 'must start with a /');
}

export function forbiddenKey(key: string, replacement: string): ConfigError {
  return new ConfigError(HttpConfigErrorKinds.FORBIDDEN_KEY, key, `${key} replaced by ${replacement}`);
}
