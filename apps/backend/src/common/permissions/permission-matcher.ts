import { permissionWildcards } from '../constants/app.constants';

/**
 * True when `granted` covers `required`: an exact code, the global `*`, or a
 * `<prefix>.*` grant covering `<prefix>.<anything>`. A null or blank
 * requirement is always satisfied.
 */
export function hasPermission(
  required: string | null | undefined,
  granted: ReadonlySet<string>,
): boolean {
  if (required === null || required === undefined) return true;
  const code = required.trim();
  if (code.length === 0) return true;
  if (granted.has(code) || granted.has(permissionWildcards.ALL)) return true;

  for (
    let dot = code.lastIndexOf('.');
    dot > 0;
    dot = code.lastIndexOf('.', dot - 1)
  ) {
    if (granted.has(code.slice(0, dot) + permissionWildcards.PREFIX_SUFFIX)) {
      return true;
    }
  }
  return false;
}

/** Required codes not covered by the granted set. */
export const missingPermissions = (
  required: readonly string[],
  granted: ReadonlySet<string>,
): string[] => required.filter((code) => !hasPermission(code, granted));
