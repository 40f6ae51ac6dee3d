import { ConfigLoaders, type ConfigLogger, type Configuration } from '@strata/config';
import { SameSite } from './types.js';

const SAME_SITE_VALUES: readonly SameSite[] = Object.values(SameSite);

/**
 * Case-insensitive match against Strict, Lax and None.
 */
export function parseSameSite(value: string): SameSite | undefined {
  const lower = value.trim().toLowerCase();
  return SAME_SITE_VALUES.find((candidate) => candidate.toLowerCase() === lower);
}

/**
 * Read an optional SameSite setting. An unrecognised value is logged and
 * treated as absent rather than failing startup.
 */
export function readSameSite(config: Configuration, key: string, logger: ConfigLogger): SameSite | undefined {
  const value = config.getOptional(key, ConfigLoaders.string);
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const result = parseSameSite(value);
  if (result === undefined) {
    logger.warn(
      { key, value },
      `Assuming ${key} = null, since "${value}" is not a valid SameSite value (${SAME_SITE_VALUES.join(', ')})`
    );
  }
  return result;
}
