const MODULE_SUFFIX = 'module';

/**
 * Reduce a module identity or dependency identifier to a comparison key:
 * last path segment, no `.ts`/`.js` extension, lower-case alphanumerics only,
 * trailing `module` dropped.
 *
 * `SharedModule`, `@app/shared` and `./shared/shared.module` all become `shared`.
 */
export function normalizeIdentifier(identifier: string): string {
  let value = identifier.trim().replace(/\\/g, '/').replace(/\/+$/, '');

  const slash = value.lastIndexOf('/');
  if (slash >= 0) {
    value = value.slice(slash + 1);
  }

  value = value.replace(/\.(ts|js)$/i, '').toLowerCase().replace(/[^a-z0-9]/g, '');

  if (value.endsWith(MODULE_SUFFIX) && value.length > MODULE_SUFFIX.length) {
    value = value.slice(0, -MODULE_SUFFIX.length);
  }

  return value;
}
