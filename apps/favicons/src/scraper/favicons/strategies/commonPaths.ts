import type { FaviconMeta } from "..";
import { downloadFirst } from "../lib/attempts";

// Conventional icon locations, most common first.
export const COMMON_FAVICON_PATHS = [
  "/favicon.ico",
  "/favicon.png",
  "/apple-touch-icon.png",
  "/apple-touch-icon-precomposed.png",
  "/favicon-32x32.png",
  "/favicon-16x16.png",
  "/icon.png",
  "/logo.png",
  "/images/favicon.ico",
  "/images/favicon.png",
  "/img/favicon.ico",
  "/img/favicon.png",
  "/assets/favicon.ico",
  "/assets/favicon.png",
  "/static/favicon.ico",
  "/static/favicon.png",
  "/public/favicon.ico",
  "/public/favicon.png",
] as const;

export async function tryCommonPaths(
  meta: FaviconMeta,
): Promise<string | null> {
  meta.logger.info("Probing common favicon paths");

  return await downloadFirst(
    meta,
    COMMON_FAVICON_PATHS.map(
      pathname => new URL(pathname, meta.website.siteRoot).href,
    ),
  );
}
