import { randomUUID } from "node:crypto";
import { rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { FaviconMeta } from "..";
import {
  FaviconError,
  IconHttpStatusError,
  IconRequestError,
  IconTooLargeError,
  IconTooSmallError,
  IconWriteError,
} from "../error";
import { IconExtension, isIconExtension } from "./cache";
import { FetchedResource, fetchResource } from "./fetch";

export type PersistResult =
  | {
      success: true;
      filename: string;
      url: string;
      bytes: number;
    }
  | {
      success: false;
      error: FaviconError;
    };

const mimeSubtypeExtensions = new Map<string, IconExtension>([
  ["png", "png"],
  ["apng", "png"],
  ["jpeg", "jpg"],
  ["jpg", "jpg"],
  ["pjpeg", "jpg"],
  ["gif", "gif"],
  ["webp", "webp"],
  ["svg+xml", "svg"],
  ["svg", "svg"],
  ["x-icon", "ico"],
  ["vnd.microsoft.icon", "ico"],
  ["ico", "ico"],
]);

export const DEFAULT_ICON_EXTENSION: IconExtension = "ico";

export function extensionFromContentType(
  contentType: string | undefined,
): IconExtension | undefined {
  if (!contentType) {
    return undefined;
  }

  const mimeType = contentType.split(";")[0].trim().toLowerCase();
  const slash = mimeType.indexOf("/");
  if (slash === -1) {
    return undefined;
  }

  return mimeSubtypeExtensions.get(mimeType.slice(slash + 1));
}

export function extensionFromUrl(url: string): IconExtension | undefined {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return undefined;
  }

  const extension = path.posix.extname(pathname).slice(1).toLowerCase();
  return isIconExtension(extension) ? extension : undefined;
}

/**
 * Pick the file extension for a downloaded icon: the response's MIME
 * subtype first, then the request URL's extension, then `ico`.
 */
export function inferIconExtension(
  contentType: string | undefined,
  url: string,
): IconExtension {
  return (
    extensionFromContentType(contentType) ??
    extensionFromUrl(url) ??
    DEFAULT_ICON_EXTENSION
  );
}

export async function writeFileAtomic(
  filePath: string,
  data: Buffer,
): Promise<void> {
  const tempPath = `${filePath}.${randomUUID()}.tmp`;
  try {
    await writeFile(tempPath, data);
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Download a candidate icon and save it as `<slug>.<ext>` in the cache
 * directory. Every failure is returned as a value so the caller can move
 * on to the next candidate.
 */
export async function fetchAndPersist(
  meta: FaviconMeta,
  url: string,
): Promise<PersistResult> {
  const logger = meta.logger.child({ method: "fetchAndPersist", url });

  let resource: FetchedResource;
  try {
    resource = await fetchResource(meta, url, {
      timeoutMs: meta.options.downloadTimeoutMs,
      maxBytes: meta.options.maxBytes,
    });
  } catch (error) {
    const failure =
      error instanceof IconRequestError || error instanceof IconHttpStatusError
        ? error
        : new IconRequestError(url, error);
    logger.debug("Icon download failed", { error: failure });
    return { success: false, error: failure };
  }

  if (resource.truncated) {
    const error = new IconTooLargeError(url, meta.options.maxBytes);
    logger.debug("Icon rejected", { error });
    return { success: false, error };
  }

  if (resource.body.length < meta.options.minBytes) {
    const error = new IconTooSmallError(
      url,
      resource.body.length,
      meta.options.minBytes,
    );
    logger.debug("Icon rejected", { error });
    return { success: false, error };
  }

  const extension = inferIconExtension(resource.contentType, url);
  const filename = `${meta.slug}.${extension}`;
  const filePath = path.join(meta.options.cacheDir, filename);

  try {
    await writeFileAtomic(filePath, resource.body);
  } catch (cause) {
    const error = new IconWriteError(filePath, cause);
    logger.warn("Failed to save icon", { error });
    return { success: false, error };
  }

  logger.info(`Saved ${filename}`, {
    bytes: resource.body.length,
    contentType: resource.contentType,
  });

  return {
    success: true,
    filename,
    url,
    bytes: resource.body.length,
  };
}
