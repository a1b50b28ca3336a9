import type { FaviconMeta } from "..";
import { SiteRootFetchError } from "../error";
import {
  extractIconCandidates,
  rankIconCandidates,
  selectIconLinkExtractor,
} from "../extractors";
import { downloadFirst } from "../lib/attempts";
import { fetchResource } from "../lib/fetch";

async function fetchSiteRootHtml(meta: FaviconMeta): Promise<string | null> {
  const { siteRoot } = meta.website;

  try {
    const resource = await fetchResource(meta, siteRoot, {
      timeoutMs: meta.options.htmlTimeoutMs,
      maxBytes: meta.options.htmlMaxBytes,
    });
    return resource.body.toString("utf8");
  } catch (error) {
    meta.logger.warn("Could not fetch HTML", {
      error: new SiteRootFetchError(
        siteRoot,
        error instanceof Error ? error.message : String(error),
      ),
    });
    return null;
  }
}

export async function tryHtmlDiscovery(
  meta: FaviconMeta,
): Promise<string | null> {
  meta.logger.info(`Fetching HTML from ${meta.website.siteRoot}...`);

  const html = await fetchSiteRootHtml(meta);
  if (html === null) {
    return null;
  }

  const extractor = selectIconLinkExtractor(meta.options.iconLinkParser);
  const candidates = rankIconCandidates(
    extractIconCandidates(html, meta.website.siteRoot, extractor),
  );

  meta.logger.debug("Extracted icon links", {
    parser: extractor.name,
    candidates: candidates.length,
  });

  if (candidates.length === 0) {
    return null;
  }

  return await downloadFirst(
    meta,
    candidates
      .slice(0, meta.options.maxHtmlCandidates)
      .map(candidate => candidate.url),
  );
}
