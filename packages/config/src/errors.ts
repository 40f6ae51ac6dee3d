/**
 * Configuration error kinds.
 *
 * Packages layered on top of the accessor add their own kinds; every kind
 * surfaces through the same {@link ConfigError} class.
 */

export const ConfigErrorKinds = {
  /** Required key is absent (or null) in every layer */
  MISSING: 'Missing',
  /** Key is present but its value does not fit the loader */
  BAD_VALUE: 'BadValue',
} as const;

export type ConfigErrorKind = (typeof ConfigErrorKinds)[keyof typeof ConfigErrorKinds];

/**
 * Fatal configuration error. Startup must not continue past one of these.
 */
export class ConfigError extends Error {
  readonly kind: string;
  /** Offending configuration key, when the error is attached to one */
  readonly key: string | undefined;

  constructor(kind: string, key: string | undefined, message: string, options?: { cause?: unknown }) {
    super(key ? `${key}: ${message}` : message, options);
    this.name = 'ConfigError';
    this.kind = kind;
    this.key = key;
  }
}
