/**
 * Parse the extension to content type table.
 *
 * One `extension=type` entry per line. Lines are trimmed; blank lines,
 * `#` comments and lines without `=` are skipped. A later entry for the same
 * extension replaces an earlier one.
 *
 * @example
 * ```typescript
 * parseFileMimeTypes('txt=text/plain\n# markup\nhtml=text/html');
 * // { txt: 'text/plain', html: 'text/html' }
 * ```
 */
export function parseFileMimeTypes(text: string): Record<string, string> {
  const entries = new Map<string, string>();

  for (const raw of text.split('\n')) {
    const line = raw.trim();
    if (line === '' || line.startsWith('#')) {
      continue;
    }

    const separator = line.indexOf('=');
    if (separator === -1) {
      continue;
    }

    const extension = line.slice(0, separator).trim();
    if (extension === '') {
      continue;
    }
    entries.set(extension, line.slice(separator + 1).trim());
  }

  return Object.fromEntries(entries);
}
