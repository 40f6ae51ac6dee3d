/**
 * Value loaders
 *
 * A loader is a zod schema that turns a raw configuration value into a typed
 * one. Strings are accepted wherever a scalar is expected, since values bound
 * from environment variables always arrive as strings.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

export type ConfigLoader<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const TRUE_VALUES = new Set(['true', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', 'no', 'off']);

/**
 * Milliseconds per duration unit
 */
const DURATION_UNITS: Record<string, number> = {
  ns: 1e-6,
  nano: 1e-6,
  nanos: 1e-6,
  nanosecond: 1e-6,
  nanoseconds: 1e-6,
  us: 1e-3,
  micro: 1e-3,
  micros: 1e-3,
  microsecond: 1e-3,
  microseconds: 1e-3,
  '': 1,
  ms: 1,
  milli: 1,
  millis: 1,
  millisecond: 1,
  milliseconds: 1,
  s: 1000,
  second: 1000,
  seconds: 1000,
  m: 60_000,
  minute: 60_000,
  minutes: 60_000,
  h: 3_600_000,
  hour: 3_600_000,
  hours: 3_600_000,
  d: 86_400_000,
  day: 86_400_000,
  days: 86_400_000,
};

/**
 * Bytes per memory size unit. Single letters and the `i` forms are binary,
 * two-letter SI forms are decimal.
 */
const MEMORY_UNITS: Record<string, number> = {
  '': 1,
  B: 1,
  b: 1,
  byte: 1,
  bytes: 1,
  K: 1024,
  k: 1024,
  Ki: 1024,
  KiB: 1024,
  kibibyte: 1024,
  kibibytes: 1024,
  kB: 1000,
  KB: 1000,
  kilobyte: 1000,
  kilobytes: 1000,
  M: 1024 ** 2,
  m: 1024 ** 2,
  Mi: 1024 ** 2,
  MiB: 1024 ** 2,
  mebibyte: 1024 ** 2,
  mebibytes: 1024 ** 2,
  MB: 1000 ** 2,
  megabyte: 1000 ** 2,
  megabytes: 1000 ** 2,
  G: 1024 ** 3,
  g: 1024 ** 3,
  Gi: 1024 ** 3,
  GiB: 1024 ** 3,
  gibibyte: 1024 ** 3,
  gibibytes: 1024 ** 3,
  GB: 1000 ** 3,
  gigabyte: 1000 ** 3,
  gigabytes: 1000 ** 3,
};

const QUANTITY_PATTERN = /^(\d+(?:\.\d+)?)\s*([A-Za-z]*)$/;

/**
 * Parse "<number><unit>" against a unit table.
 *
 * @returns the scaled value, or undefined for an unknown unit or bad shape
 */
export function parseQuantity(value: string, units: Record<string, number>): number | undefined {
  const match = QUANTITY_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const [, amount, unit = ''] = match;
  if (amount === undefined || !Object.prototype.hasOwnProperty.call(units, unit)) {
    return undefined;
  }
  return Math.round(Number(amount) * (units[unit] ?? 1));
}

/** Duration in milliseconds, e.g. "30 seconds" or "100ms" */
export function parseDuration(value: string): number | undefined {
  return parseQuantity(value, DURATION_UNITS);
}

/** Memory size in bytes, e.g. "100k" or "10MB" */
export function parseMemorySize(value: string): number | undefined {
  return parseQuantity(value, MEMORY_UNITS);
}

const scalar = z.union([z.string(), z.number(), z.boolean()]);

const string: ConfigLoader<string> = scalar.transform((value) => String(value));

const boolean: ConfigLoader<boolean> = z.union([z.boolean(), z.string()]).transform((value, ctx) => {
  if (typeof value === 'boolean') {
    return value;
  }
  const lower = value.trim().toLowerCase();
  if (TRUE_VALUES.has(lower)) {
    return true;
  }
  if (FALSE_VALUES.has(lower)) {
    return false;
  }
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
  return z.NEVER;
});

const number: ConfigLoader<number> = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const parsed = typeof value === 'number' ? value : Number(value.trim());
  if (typeof value === 'string' && value.trim() === '') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a number, got an empty string' });
    return z.NEVER;
  }
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a number, got "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

function quantity(label: string, parse: (value: string) => number | undefined): ConfigLoader<number> {
  return z.union([z.number(), z.string()]).transform((value, ctx) => {
    const parsed = typeof value === 'number' ? value : parse(value);
    if (parsed === undefined || !Number.isFinite(parsed) || parsed < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a ${label}, got "${value}"` });
      return z.NEVER;
    }
    return parsed;
  });
}

/**
 * Built-in loaders. Any other zod schema works as a loader too.
 */
export const ConfigLoaders = {
  string,
  boolean,
  number,
  /** Milliseconds. Plain numbers are taken as milliseconds. */
  duration: quantity('duration', parseDuration),
  /** Bytes. Plain numbers are taken as bytes. */
  memorySize: quantity('memory size', parseMemorySize),
} as const;
