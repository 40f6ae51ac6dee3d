import { describe, it, expect } from 'vitest';
import { Configuration, ConfigErrorKinds, type Environment } from '@strata/config';
import { defaultHttpConfiguration } from '../src/defaults.js';
import { HttpConfigErrorKinds, WeakSecretError } from '../src/errors.js';
import { fromConfiguration, resolveHttpConfiguration } from '../src/resolver.js';
import { deriveDevSecret } from '../src/secret.js';
import { SameSite } from '../src/types.js';
import { APP_CONF_URL, configWith, createLogger, createTestEnvironment, getConfigError } from './helpers.js';

const STRONG_SECRET = 'test-secret-'.repeat(6); // 72 bytes

function resolveWith(overrides: object, mode: 'dev' | 'test' | 'prod' = 'dev') {
  const logger = createLogger();
  const result = resolveHttpConfiguration(configWith(overrides, logger), createTestEnvironment(mode), { logger });
  return { result, logger };
}

function resolved(overrides: object, mode: 'dev' | 'test' | 'prod' = 'dev') {
  const { result } = resolveWith(overrides, mode);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function failure(overrides: object, mode: 'dev' | 'test' | 'prod' = 'dev') {
  const { result } = resolveWith(overrides, mode);
  if (result.ok) {
    throw new Error('Expected resolution to fail');
  }
  return result.error;
}

describe('resolveHttpConfiguration', () => {
  describe('Defaults', () => {
    it('matches the default-construction functions', () => {
      const value = resolved({});
      const defaults = defaultHttpConfiguration();

      expect({ ...value, secret: defaults.secret, fileMimeTypes: defaults.fileMimeTypes }).toEqual(defaults);
    });

    it('derives the dev secret from the application file location', () => {
      expect(resolved({}).secret).toEqual({ secret: deriveDevSecret(APP_CONF_URL) });
    });

    it('loads the shipped MIME table', () => {
      const { mimeTypes } = resolved({}).fileMimeTypes;

      expect(mimeTypes.html).toBe('text/html');
      expect(mimeTypes.json).toBe('application/json');
      expect(mimeTypes.woff2).toBe('font/woff2');
    });

    it('returns a frozen snapshot', () => {
      const value = resolved({});

      expect(Object.isFrozen(value)).toBe(true);
      expect(Object.isFrozen(value.session.jwt)).toBe(true);
      expect(Object.isFrozen(value.fileMimeTypes.mimeTypes)).toBe(true);
    });
  });

  describe('Paths', () => {
    it.each(['/', '/app', '/a/b/'])('accepts %j everywhere', (path) => {
      const value = resolved({ 'http.context': path, 'http.session.path': path, 'http.flash.path': path });

      expect(value.context).toBe(path);
      expect(value.session.path).toBe(path);
      expect(value.flash.path).toBe(path);
    });

    const keys = ['http.context', 'http.session.path', 'http.flash.path'];
    const invalid = ['', 'app', 'http://example.com/'];

    const cases: Array<[string, string]> = keys.flatMap((key) => invalid.map((path): [string, string] => [key, path]));

    it.each(cases)(
      'rejects %s = %j',
      (key, path) => {
        const error = failure({ [key]: path });

        expect(error.kind).toBe(HttpConfigErrorKinds.INVALID_PATH);
        expect(error.key).toBe(key);
        expect(error.message).toBe(`${key}: must start with a /`);
      }
    );

    it('reads the legacy context key', () => {
      expect(resolved({ 'application.context': '/legacy' }).context).toBe('/legacy');
    });

    it('prefers the new context key over the legacy one', () => {
      expect(resolved({ 'application.context': '/legacy', 'http.context': '/current' }).context).toBe('/current');
    });

    it('validates a legacy context too', () => {
      expect(failure({ 'application.context': 'legacy' }).key).toBe('http.context');
    });
  });

  describe('Secret', () => {
    it.each([{}, { 'http.secret.key': 'changeme' }, { 'http.secret.key': '  ' }, { 'http.secret.key': null }])(
      'refuses %j in prod',
      (overrides) => {
        expect(failure(overrides, 'prod').kind).toBe(HttpConfigErrorKinds.MISSING_SECRET);
      }
    );

    it.each(['dev', 'test'] as const)('never refuses an unset secret in %s', (mode) => {
      expect(resolved({ 'http.secret.key': 'changeme' }, mode).secret.secret).toBe(deriveDevSecret(APP_CONF_URL));
    });

    it('accepts a strong secret in prod', () => {
      expect(resolved({ 'http.secret.key': STRONG_SECRET }, 'prod').secret).toEqual({ secret: STRONG_SECRET });
    });

    it('rejects a secret too short for HS256', () => {
      const error = failure({ 'http.secret.key': 'short-secret' }, 'prod');

      expect(error).toBeInstanceOf(WeakSecretError);
      if (error instanceof WeakSecretError) {
        expect(error.kind).toBe(HttpConfigErrorKinds.WEAK_SECRET);
        expect(error.algorithm).toBe('HS256');
        expect(error.required).toBe(256);
        expect(error.actual).toBe(96);
      }
    });

    it('accepts exactly 32 bytes for HS256', () => {
      expect(resolved({ 'http.secret.key': 'k'.repeat(32) }, 'prod').session.jwt.signatureAlgorithm).toBe('HS256');
    });

    it('checks the flash algorithm separately', () => {
      const error = failure(
        { 'http.secret.key': 'k'.repeat(40), 'http.flash.jwt.signatureAlgorithm': 'HS512' },
        'prod'
      );

      expect(error).toBeInstanceOf(WeakSecretError);
      expect(error.message).toBe(
        'http.secret.key: The application secret is too short for algorithm HS512 defined at ' +
          'http.flash.jwt.signatureAlgorithm. Current application secret bits: 320, ' +
          'minimal required bits for algorithm HS512: 512.'
      );
    });

    it('lets a derived dev secret sign with HS512', () => {
      const value = resolved({
        'http.session.jwt.signatureAlgorithm': 'HS512',
        'http.flash.jwt.signatureAlgorithm': 'HS512',
      });

      expect(value.session.jwt.signatureAlgorithm).toBe('HS512');
      expect(value.flash.jwt.signatureAlgorithm).toBe('HS512');
    });

    it('rejects an unknown signature algorithm', () => {
      const error = failure({ 'http.session.jwt.signatureAlgorithm': 'HS1024' });

      expect(error.kind).toBe(HttpConfigErrorKinds.INVALID_ALGORITHM);
      expect(error.key).toBe('http.session.jwt.signatureAlgorithm');
    });
  });

  describe('Forbidden keys', () => {
    it('rejects mimetype', () => {
      const error = failure({ mimetype: 'txt=text/plain' });

      expect(error.kind).toBe(HttpConfigErrorKinds.FORBIDDEN_KEY);
      expect(error.key).toBe('mimetype');
      expect(error.message).toBe('mimetype: mimetype replaced by http.fileMimeTypes');
    });

    it('rejects mimetype before looking at the secret', () => {
      expect(failure({ mimetype: {} }, 'prod').kind).toBe(HttpConfigErrorKinds.FORBIDDEN_KEY);
    });

    it('rejects mimetype ahead of an invalid context', () => {
      const error = failure({ mimetype: 'x', 'http.context': 'api' });

      expect(error.kind).toBe(HttpConfigErrorKinds.FORBIDDEN_KEY);
      expect(error.key).toBe('mimetype');
    });

    it('rejects mimetype ahead of an invalid cookie path in prod', () => {
      expect(failure({ mimetype: 'x', 'http.session.path': 'nope' }, 'prod').kind).toBe(
        HttpConfigErrorKinds.FORBIDDEN_KEY
      );
      expect(failure({ mimetype: 'x', 'http.flash.path': 'nope' }, 'prod').kind).toBe(
        HttpConfigErrorKinds.FORBIDDEN_KEY
      );
    });

    it('rejects mimetype alongside the replacement setting', () => {
      const error = failure({ mimetype: 'x', 'http.fileMimeTypes': 'txt=text/plain' });
      expect(error.kind).toBe(HttpConfigErrorKinds.FORBIDDEN_KEY);
    });
  });

  describe('Cookies', () => {
    it('reads session and flash settings', () => {
      const value = resolved({
        'http.session': {
          cookieName: 'APP_SESSION',
          secure: 'true',
          maxAge: '1h',
          domain: 'example.com',
          sameSite: 'strict',
          partitioned: true,
        },
        'http.flash': { cookieName: 'APP_FLASH', httpOnly: false, sameSite: 'none' },
      });

      expect(value.session).toMatchObject({
        cookieName: 'APP_SESSION',
        secure: true,
        maxAgeMs: 3_600_000,
        domain: 'example.com',
        sameSite: SameSite.STRICT,
        partitioned: true,
      });
      expect(value.flash).toMatchObject({ cookieName: 'APP_FLASH', httpOnly: false, sameSite: SameSite.NONE });
    });

    it('reads legacy session keys', () => {
      const value = resolved({ 'session.cookieName': 'LEGACY_SESSION', 'session.maxAge': '30 minutes' });

      expect(value.session.cookieName).toBe('LEGACY_SESSION');
      expect(value.session.maxAgeMs).toBe(1_800_000);
    });

    it('drops an unrecognised SameSite value with a warning', () => {
      const { result, logger } = resolveWith({ 'http.session.sameSite': 'sideways' });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect('sameSite' in result.value.session).toBe(false);
        expect(result.value.flash.sameSite).toBe(SameSite.LAX);
      }
      expect(logger.warn).toHaveBeenCalledWith(
        { key: 'http.session.sameSite', value: 'sideways' },
        'Assuming http.session.sameSite = null, since "sideways" is not a valid SameSite value (Strict, Lax, None)'
      );
    });

    it('leaves SameSite unset when configured as null', () => {
      const { result, logger } = resolveWith({ 'http.flash.sameSite': null });

      expect(result.ok && result.value.flash.sameSite).toBeUndefined();
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('reads cookie strictness', () => {
      expect(resolved({ 'http.cookies.strict': false }).cookies).toEqual({ strict: false });
    });
  });

  describe('Parser and action composition', () => {
    it('reads memory sizes', () => {
      const value = resolved({ 'http.parser.maxDiskBuffer': '1MB', 'http.parser.allowEmptyFiles': 'yes' });

      expect(value.parser).toEqual({ maxMemoryBuffer: 102_400, maxDiskBuffer: 1_000_000, allowEmptyFiles: true });
    });

    it('reads the legacy text length limit', () => {
      expect(resolved({ 'parsers.text.maxLength': '64k' }).parser.maxMemoryBuffer).toBe(65_536);
    });

    it('reads action composition flags', () => {
      const value = resolved({ 'http.actionComposition': { controllerAnnotationsFirst: true } });

      expect(value.actionComposition).toEqual({
        controllerAnnotationsFirst: true,
        executeActionCreatorActionFirst: false,
        includeWebSocketActions: false,
      });
    });

    it('reports a malformed flag against its key', () => {
      const error = failure({ 'http.cookies.strict': 'sometimes' });

      expect(error.kind).toBe(ConfigErrorKinds.BAD_VALUE);
      expect(error.key).toBe('http.cookies.strict');
    });
  });

  describe('MIME types', () => {
    it('parses the configured table', () => {
      const value = resolved({ 'http.fileMimeTypes': 'txt=text/plain\n#comment\n\nbad-line\nhtml=text/html' });

      expect(value.fileMimeTypes.mimeTypes).toEqual({ txt: 'text/plain', html: 'text/html' });
    });
  });

  describe('Errors', () => {
    it('throws from fromConfiguration', () => {
      const error = getConfigError(() =>
        fromConfiguration(configWith({ 'http.context': 'app' }), createTestEnvironment('dev'), {
          logger: createLogger(),
        })
      );
      expect(error.kind).toBe(HttpConfigErrorKinds.INVALID_PATH);
    });

    it('propagates errors that are not configuration errors', () => {
      const environment: Environment = {
        rootPath: '/srv/shop',
        mode: 'dev',
        resource: () => {
          throw new Error('disk unavailable');
        },
      };

      expect(() =>
        resolveHttpConfiguration(configWith({}), environment, { logger: createLogger() })
      ).toThrow('disk unavailable');
    });

    it('reports a missing required key', () => {
      const config = Configuration.from({ 'http.secret.key': STRONG_SECRET }, { logger: createLogger() });
      const result = resolveHttpConfiguration(config, createTestEnvironment('prod'), { logger: createLogger() });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(ConfigErrorKinds.MISSING);
        expect(result.error.key).toBe('http.context');
      }
    });
  });
});
