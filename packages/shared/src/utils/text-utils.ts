/** True for null, undefined, and strings with no visible characters */
export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === '';
}

/** Comparison key used to flag near-miss names: case and outer whitespace ignored */
export function looseKey(name: string): string {
  return name.trim().toLowerCase();
}

/** Ordinal (code unit) string order, independent of locale */
export function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Make a name safe to use as a single file name */
export function sanitizeFileName(name: string): string {
  return name.replace(/[\\/:*?"<>|]/g, '_').trim() || 'unnamed';
}
