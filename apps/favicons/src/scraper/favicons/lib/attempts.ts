import { setTimeout as sleep } from "node:timers/promises";
import type { FaviconMeta } from "..";
import { fetchAndPersist } from "./persist";

/**
 * Try each URL in order and stop at the first one that downloads and
 * saves. A fixed delay separates consecutive attempts to go easy on the
 * remote host.
 */
export async function downloadFirst(
  meta: FaviconMeta,
  urls: string[],
): Promise<string | null> {
  for (let i = 0; i < urls.length; i++) {
    if (i > 0 && meta.options.politenessDelayMs > 0) {
      await sleep(meta.options.politenessDelayMs);
    }

    meta.logger.debug(`Trying ${urls[i]}`, { attempt: i + 1 });
    const result = await fetchAndPersist(meta, urls[i]);
    if (result.success) {
      return result.filename;
    }
  }

  return null;
}
