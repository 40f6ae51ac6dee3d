/**
 * Output formatting for the config commands
 */

import type { ChalkInstance } from 'chalk';
import { ConfigError } from '@strata/config';
import { WeakSecretError, secretBits, type HttpConfiguration } from '@strata/http-config';

export const REDACTED = '[REDACTED]';

export function redactSecret(configuration: HttpConfiguration): HttpConfiguration {
  return { ...configuration, secret: { ...configuration.secret, secret: REDACTED } };
}

export interface ErrorSummary {
  kind: string;
  key?: string;
  message: string;
  algorithm?: string;
  required?: number;
  actual?: number;
}

export function summarizeError(error: ConfigError): ErrorSummary {
  const summary: ErrorSummary = { kind: error.kind, message: error.message };
  if (error.key !== undefined) {
    summary.key = error.key;
  }
  if (error instanceof WeakSecretError) {
    summary.algorithm = error.algorithm;
    summary.required = error.required;
    summary.actual = error.actual;
  }
  return summary;
}

function cookieLine(cookie: HttpConfiguration['session'] | HttpConfiguration['flash']): string {
  const parts = [cookie.cookieName, `path=${cookie.path}`];
  if (cookie.domain !== undefined) {
    parts.push(`domain=${cookie.domain}`);
  }
  parts.push(`sameSite=${cookie.sameSite ?? 'unset'}`, `jwt=${cookie.jwt.signatureAlgorithm}`);
  if (cookie.secure) {
    parts.push('secure');
  }
  return parts.join(' ');
}

export function formatSuccess(configuration: HttpConfiguration, mode: string, color: ChalkInstance): string {
  return [
    `${color.green('OK')} HTTP configuration is valid (mode: ${mode})`,
    `  context         ${configuration.context}`,
    `  session cookie  ${cookieLine(configuration.session)}`,
    `  flash cookie    ${cookieLine(configuration.flash)}`,
    `  secret          ${REDACTED} (${secretBits(configuration.secret.secret)} bits)`,
    `  mime types      ${Object.keys(configuration.fileMimeTypes.mimeTypes).length} entries`,
  ].join('\n');
}

export function formatFailure(error: ConfigError, mode: string, color: ChalkInstance): string {
  return `${color.red('FAILED')} Invalid HTTP configuration (mode: ${mode}) [${error.kind}] ${error.message}`;
}
