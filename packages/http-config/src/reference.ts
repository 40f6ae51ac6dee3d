/**
 * Reference defaults shipped with the package: resources/reference.json plus
 * the MIME table in resources/mime-types.txt.
 */

import { readFileSync } from 'fs';
import { isConfigTree, type EnvBindings } from '@strata/config';

const RESOURCES = new URL('../resources/', import.meta.url);

/** Environment variables that feed configuration keys */
export const HTTP_ENV_BINDINGS: EnvBindings = {
  APPLICATION_SECRET: 'http.secret.key',
};

let cached: Record<string, unknown> | undefined;

function readResource(name: string): string {
  return readFileSync(new URL(name, RESOURCES), 'utf-8');
}

export function loadReferenceDefaults(): Record<string, unknown> {
  if (cached) {
    return cached;
  }
  const parsed: unknown = JSON.parse(readResource('reference.json'));
  if (!isConfigTree(parsed)) {
    throw new Error('reference.json must contain a JSON object');
  }
  cached = { ...parsed, 'http.fileMimeTypes': readResource('mime-types.txt') };
  return cached;
}
