import { mkdir, stat } from "node:fs/promises";
import path from "node:path";

export const ICON_EXTENSIONS = [
  "png",
  "jpg",
  "jpeg",
  "ico",
  "svg",
  "webp",
  "gif",
] as const;

export type IconExtension = (typeof ICON_EXTENSIONS)[number];

export function isIconExtension(value: string): value is IconExtension {
  return (ICON_EXTENSIONS as readonly string[]).includes(value);
}

export async function ensureCacheDir(cacheDir: string): Promise<void> {
  await mkdir(cacheDir, { recursive: true });
}

/**
 * Look for a previously saved icon for the slug under any whitelisted
 * extension. Returns the filename relative to the cache directory.
 */
export async function findCachedIcon(
  cacheDir: string,
  slug: string,
): Promise<string | null> {
  for (const extension of ICON_EXTENSIONS) {
    const filename = `${slug}.${extension}`;
    try {
      const stats = await stat(path.join(cacheDir, filename));
      if (stats.isFile()) {
        return filename;
      }
    } catch {
      // missing or unreadable: not a hit
    }
  }

  return null;
}
