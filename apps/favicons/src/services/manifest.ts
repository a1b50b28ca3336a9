import { renderFaviconCell } from "../lib/favicon-cell";
import type { FaviconResult } from "../scraper/favicons";

export type FaviconManifestEntry = {
  filename: string | null;
  /** Icon cell markup for the organization card. */
  html: string;
};

export type FaviconManifest = Record<string, FaviconManifestEntry>;

/**
 * Key resolution results by organization name, pairing each filename
 * with its rendered icon cell. `faviconPath` is where the page finds the
 * favicon directory.
 */
export function buildFaviconManifest(
  results: FaviconResult[],
  faviconPath: string,
): FaviconManifest {
  const manifest: FaviconManifest = {};
  for (const { organization, filename } of results) {
    manifest[organization.name] = {
      filename,
      html: renderFaviconCell(filename, { faviconPath }),
    };
  }
  return manifest;
}
