/**
 * Converts an organization name into a filename-safe slug.
 *
 * Distinct names can normalize to the same slug ("Acme, Inc." and
 * "ACME Inc"); such organizations share one cached icon.
 */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}
