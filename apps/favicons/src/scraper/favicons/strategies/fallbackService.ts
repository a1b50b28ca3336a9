import type { FaviconMeta } from "..";
import { downloadFirst } from "../lib/attempts";

export function buildFallbackServiceUrl(
  serviceUrl: string,
  host: string,
  size: number,
): string {
  const url = new URL(serviceUrl);
  url.searchParams.set("domain", host);
  url.searchParams.set("sz", String(size));
  return url.href;
}

export async function tryFallbackService(
  meta: FaviconMeta,
): Promise<string | null> {
  meta.logger.info("Trying favicon service");

  return await downloadFirst(meta, [
    buildFallbackServiceUrl(
      meta.options.serviceUrl,
      meta.website.host,
      meta.options.serviceSize,
    ),
  ]);
}
