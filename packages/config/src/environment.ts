import { existsSync, statSync } from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';

export type Mode = 'dev' | 'test' | 'prod';

export const MODES: readonly Mode[] = ['dev', 'test', 'prod'];

/** Name of the primary application configuration resource */
export const PRIMARY_CONFIG_RESOURCE = 'application.json';

/**
 * Where the application runs and how to find its resources.
 */
export interface Environment {
  readonly rootPath: string;
  readonly mode: Mode;
  /** Location of a named resource, if it exists */
  resource(name: string): URL | undefined;
}

export interface EnvironmentOptions {
  rootPath?: string;
  mode?: Mode;
  /** Directory under rootPath that holds resources (default "conf") */
  resourceDir?: string;
}

export function isMode(value: string): value is Mode {
  return MODES.some((mode) => mode === value);
}

/**
 * Map NODE_ENV onto a mode. Anything unrecognised runs as dev.
 */
export function modeFromNodeEnv(nodeEnv: string | undefined): Mode {
  switch (nodeEnv?.trim().toLowerCase()) {
    case 'production':
    case 'prod':
      return 'prod';
    case 'test':
      return 'test';
    default:
      return 'dev';
  }
}

export function createEnvironment(options: EnvironmentOptions = {}): Environment {
  const rootPath = path.resolve(options.rootPath ?? process.cwd());
  const resourceRoot = path.join(rootPath, options.resourceDir ?? 'conf');

  return {
    rootPath,
    mode: options.mode ?? 'dev',
    resource(name: string): URL | undefined {
      const file = path.resolve(resourceRoot, name.replace(/^\/+/, ''));
      // Names may not climb out of the resource directory
      if (path.relative(resourceRoot, file).startsWith('..')) {
        return undefined;
      }
      if (!existsSync(file) || !statSync(file).isFile()) {
        return undefined;
      }
      return pathToFileURL(file);
    },
  };
}
