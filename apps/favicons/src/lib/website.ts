export type NormalizedWebsite = {
  /** Scheme and host with a trailing slash, e.g. `https://example.org/`. */
  siteRoot: string;
  /** Host as it appears in the URL, port included. */
  host: string;
};

/**
 * Normalize a website field from the organization list. Returns null for
 * empty values and for values without a usable hostname.
 */
export function normalizeWebsite(website: string): NormalizedWebsite | null {
  const trimmed = website.trim();
  if (trimmed === "") {
    return null;
  }

  const withScheme = /^https?:\/\//i.test(trimmed)
    ? trimmed
    : "https://" + trimmed;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    return null;
  }

  if (url.hostname === "") {
    return null;
  }

  return {
    siteRoot: `${url.protocol}//${url.host}/`,
    host: url.host,
  };
}
