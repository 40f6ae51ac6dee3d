/**
 * Layered configuration accessor
 *
 * A configuration is an ordered list of layers; the first layer that defines
 * a key wins. Keys are dot-separated paths into nested objects, and dotted
 * keys inside a layer are expanded into nested objects when it is built.
 *
 * @packageDocumentation
 */

import { ConfigError, ConfigErrorKinds } from './errors.js';
import type { ConfigLoader } from './loaders.js';
import { logger as defaultLogger, type ConfigLogger } from './logger.js';

export type ConfigValue = string | number | boolean | null | ConfigValue[] | ConfigTree;

export interface ConfigTree {
  [key: string]: ConfigValue;
}

export interface ConfigurationOptions {
  logger?: ConfigLogger;
}

export function isConfigTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeTrees(base: ConfigTree, override: ConfigTree): ConfigTree {
  const merged: ConfigTree = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = merged[key];
    merged[key] = isConfigTree(existing) && isConfigTree(value) ? mergeTrees(existing, value) : value;
  }
  return merged;
}

/** Keys that would re-parent a layer object instead of naming a setting */
const UNSAFE_SEGMENTS = new Set(['__proto__', 'constructor', 'prototype']);

function hasOwn(tree: ConfigTree, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(tree, key);
}

function insert(tree: ConfigTree, segments: string[], value: ConfigValue): void {
  const [head, ...rest] = segments;
  if (head === undefined || UNSAFE_SEGMENTS.has(head)) {
    return;
  }
  if (rest.length === 0) {
    const existing = tree[head];
    tree[head] = isConfigTree(existing) && isConfigTree(value) ? mergeTrees(existing, value) : value;
    return;
  }
  let child = tree[head];
  if (!isConfigTree(child)) {
    child = {};
    tree[head] = child;
  }
  insert(child, rest, value);
}

function toValue(value: unknown, where: string): ConfigValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ConfigError(ConfigErrorKinds.BAD_VALUE, where, 'numbers must be finite');
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => toValue(item, `${where}[${index}]`));
  }
  if (isConfigTree(value)) {
    return toTree(value, where);
  }
  throw new ConfigError(ConfigErrorKinds.BAD_VALUE, where, `unsupported value of type ${typeof value}`);
}

/**
 * Build a layer from plain data, expanding dotted keys.
 */
export function toTree(values: object, where = ''): ConfigTree {
  const tree: ConfigTree = {};
  for (const [key, raw] of Object.entries(values)) {
    const path = where ? `${where}.${key}` : key;
    const segments = key.split('.').filter((segment) => segment.length > 0);
    insert(tree, segments, toValue(raw, path));
  }
  return tree;
}

function lookup(tree: ConfigTree, path: string): ConfigValue | undefined {
  let node: ConfigValue | undefined = tree;
  for (const segment of path.split('.')) {
    if (!isConfigTree(node) || !hasOwn(node, segment)) {
      return undefined;
    }
    node = node[segment];
  }
  // null marks a key as explicitly unset
  return node === null ? undefined : node;
}

export class Configuration {
  private readonly layers: readonly ConfigTree[];
  private readonly logger: ConfigLogger;

  constructor(layers: readonly ConfigTree[], options: ConfigurationOptions = {}) {
    this.layers = layers;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Single-layer configuration from plain data.
   *
   * @example
   * ```typescript
   * const config = Configuration.from({ 'http.context': '/api' });
   * config.get('http.context', ConfigLoaders.string); // '/api'
   * ```
   */
  static from(values: object, options: ConfigurationOptions = {}): Configuration {
    return new Configuration([toTree(values)], options);
  }

  /** Layers in precedence order, highest first */
  static fromLayers(layers: readonly object[], options: ConfigurationOptions = {}): Configuration {
    return new Configuration(
      layers.map((layer) => toTree(layer)),
      options
    );
  }

  static empty(options: ConfigurationOptions = {}): Configuration {
    return new Configuration([], options);
  }

  /** Another configuration consulted after this one */
  withFallback(other: Configuration): Configuration {
    return new Configuration([...this.layers, ...other.layers], { logger: this.logger });
  }

  has(path: string): boolean {
    return this.layerOf(path) !== -1;
  }

  get<T>(path: string, loader: ConfigLoader<T>): T {
    const raw = this.raw(path);
    if (raw === undefined) {
      throw new ConfigError(ConfigErrorKinds.MISSING, path, 'no configuration setting found');
    }
    return this.load(path, raw, loader);
  }

  getOptional<T>(path: string, loader: ConfigLoader<T>): T | undefined {
    const raw = this.raw(path);
    return raw === undefined ? undefined : this.load(path, raw, loader);
  }

  /**
   * Read a key that replaced one or more legacy keys.
   *
   * A legacy key only wins when it is set at a higher-precedence layer than
   * the new key, so an application's legacy setting still beats a reference
   * default. Legacy keys are reported, never rejected.
   */
  getDeprecated<T>(path: string, loader: ConfigLoader<T>, ...legacyPaths: string[]): T {
    return this.get(this.pickDeprecated(path, legacyPaths), loader);
  }

  getOptionalDeprecated<T>(path: string, loader: ConfigLoader<T>, ...legacyPaths: string[]): T | undefined {
    return this.getOptional(this.pickDeprecated(path, legacyPaths), loader);
  }

  reportError(path: string, message: string, cause?: unknown): ConfigError {
    return new ConfigError(ConfigErrorKinds.BAD_VALUE, path, message, { cause });
  }

  globalError(message: string, cause?: unknown): ConfigError {
    return new ConfigError(ConfigErrorKinds.BAD_VALUE, undefined, message, { cause });
  }

  private pickDeprecated(path: string, legacyPaths: string[]): string {
    const current = this.layerOf(path);
    for (const legacy of legacyPaths) {
      const layer = this.layerOf(legacy);
      if (layer === -1) {
        continue;
      }
      const used = current === -1 || layer < current;
      this.logger.warn(
        { key: legacy, replacement: path, used },
        used
          ? `${legacy} is deprecated, use ${path} instead`
          : `${legacy} is deprecated and ignored since ${path} is set`
      );
      if (used) {
        return legacy;
      }
    }
    return path;
  }

  private layerOf(path: string): number {
    return this.layers.findIndex((layer) => lookup(layer, path) !== undefined);
  }

  private raw(path: string): ConfigValue | undefined {
    for (const layer of this.layers) {
      const value = lookup(layer, path);
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  }

  private load<T>(path: string, raw: ConfigValue, loader: ConfigLoader<T>): T {
    const result = loader.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((i) => i.message).join('; ');
      throw new ConfigError(ConfigErrorKinds.BAD_VALUE, path, issues, { cause: result.error });
    }
    return result.data;
  }
}
