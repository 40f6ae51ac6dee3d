import { describe, it, expect, afterEach } from 'vitest';
import { defaultHttpConfiguration } from '../src/defaults.js';
import {
  getHttpConfiguration,
  initHttpConfiguration,
  isHttpConfigurationInitialised,
  resetHttpConfiguration,
} from '../src/holder.js';

describe('HTTP configuration holder', () => {
  afterEach(() => {
    resetHttpConfiguration();
  });

  it('refuses reads before initialisation', () => {
    expect(isHttpConfigurationInitialised()).toBe(false);
    expect(() => getHttpConfiguration()).toThrow('HTTP configuration has not been initialised');
  });

  it('returns the installed configuration', () => {
    const configuration = defaultHttpConfiguration();

    initHttpConfiguration(configuration);

    expect(getHttpConfiguration()).toBe(configuration);
    expect(isHttpConfigurationInitialised()).toBe(true);
  });

  it('refuses a second initialisation', () => {
    initHttpConfiguration(defaultHttpConfiguration());

    expect(() => initHttpConfiguration(defaultHttpConfiguration())).toThrow(
      'HTTP configuration is already initialised'
    );
  });
});
