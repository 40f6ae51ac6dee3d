import { vi } from 'vitest';
import { Configuration, ConfigError, type Environment, type Mode } from '@strata/config';
import { loadReferenceDefaults } from '../src/reference.js';

export const APP_CONF_URL = new URL('file:///srv/shop/conf/application.json');

export function createLogger() {
  return { debug: vi.fn(), warn: vi.fn() };
}

/**
 * Environment whose application.json lives at APP_CONF_URL.
 */
export function createTestEnvironment(mode: Mode, location: URL | undefined = APP_CONF_URL): Environment {
  return {
    rootPath: '/srv/shop',
    mode,
    resource: (name: string) => (name === 'application.json' ? location : undefined),
  };
}

/** Overrides on top of the shipped reference defaults */
export function configWith(overrides: object, logger = createLogger()): Configuration {
  return Configuration.fromLayers([overrides, loadReferenceDefaults()], { logger });
}

export function getConfigError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigError) {
      return e;
    }
    throw e;
  }
  throw new Error('Expected ConfigError to be thrown');
}
