import type { AxiosInstance } from "axios";
import { Logger } from "winston";
import { config } from "../../config";
import { logger as _logger } from "../../lib/logger";
import { slugify } from "../../lib/slug";
import { NormalizedWebsite, normalizeWebsite } from "../../lib/website";
import type { IconLinkParser } from "./extractors";
import { ensureCacheDir, findCachedIcon } from "./lib/cache";
import { createFaviconHttpClient } from "./lib/fetch";
import { runStrategyChain, Strategy, strategyOrder } from "./strategies";

export type OrganizationRef = {
  name: string;
  /** May be empty; such organizations never get an icon. */
  websiteURL: string;
};

export type FaviconOptions = {
  /** Directory holding `<slug>.<ext>` files. Created when missing. */
  cacheDir: string;
  /** Ignore cached icons and run the whole strategy chain again. */
  forceRefetch?: boolean;
  http?: AxiosInstance;
  logger?: Logger;
  strategies?: readonly Strategy[];

  htmlTimeoutMs?: number;
  downloadTimeoutMs?: number;
  htmlMaxBytes?: number;
  maxHtmlCandidates?: number;
  minBytes?: number;
  maxBytes?: number;
  politenessDelayMs?: number;
  serviceUrl?: string;
  serviceSize?: number;
  iconLinkParser?: IconLinkParser;
};

export type ResolvedFaviconOptions = Required<
  Omit<FaviconOptions, "http" | "logger">
>;

// The meta object carries everything a strategy needs for one
// organization. Strategies treat it as immutable, apart from swapping in
// a child logger.
export type FaviconMeta = {
  organization: OrganizationRef;
  slug: string;
  website: NormalizedWebsite;
  options: ResolvedFaviconOptions;
  http: AxiosInstance;
  logger: Logger;
};

export type FaviconSource = "cache" | "network" | "missing" | "skipped";

export type FaviconOutcome =
  | { filename: string; source: "cache" | "network" }
  | { filename: null; source: "missing" | "skipped" };

function resolveOptions(options: FaviconOptions): ResolvedFaviconOptions {
  return {
    cacheDir: options.cacheDir,
    forceRefetch: options.forceRefetch ?? false,
    strategies: options.strategies ?? strategyOrder,
    htmlTimeoutMs: options.htmlTimeoutMs ?? config.FAVICON_HTML_TIMEOUT_MS,
    downloadTimeoutMs:
      options.downloadTimeoutMs ?? config.FAVICON_DOWNLOAD_TIMEOUT_MS,
    htmlMaxBytes: options.htmlMaxBytes ?? config.FAVICON_HTML_MAX_BYTES,
    maxHtmlCandidates:
      options.maxHtmlCandidates ?? config.FAVICON_MAX_HTML_CANDIDATES,
    minBytes: options.minBytes ?? config.FAVICON_MIN_BYTES,
    maxBytes: options.maxBytes ?? config.FAVICON_MAX_BYTES,
    politenessDelayMs:
      options.politenessDelayMs ?? config.FAVICON_POLITENESS_DELAY_MS,
    serviceUrl: options.serviceUrl ?? config.FAVICON_SERVICE_URL,
    serviceSize: options.serviceSize ?? config.FAVICON_SERVICE_SIZE,
    iconLinkParser: options.iconLinkParser ?? config.ICON_LINK_PARSER,
  };
}

export async function resolveFaviconOutcome(
  organization: OrganizationRef,
  options: FaviconOptions,
): Promise<FaviconOutcome> {
  const baseLogger = (options.logger ?? _logger).child({
    module: "favicons",
    organization: organization.name,
  });

  const website = normalizeWebsite(organization.websiteURL);
  if (website === null) {
    if (organization.websiteURL.trim() !== "") {
      baseLogger.warn("Skipping organization with an unusable website", {
        website: organization.websiteURL,
      });
    }
    return { filename: null, source: "skipped" };
  }

  const slug = slugify(organization.name);
  if (slug === "") {
    baseLogger.warn("Skipping organization whose name has no slug");
    return { filename: null, source: "skipped" };
  }

  const resolved = resolveOptions(options);
  const logger = baseLogger.child({ slug, website: website.host });

  try {
    await ensureCacheDir(resolved.cacheDir);

    if (!resolved.forceRefetch) {
      const cached = await findCachedIcon(resolved.cacheDir, slug);
      if (cached !== null) {
        logger.info(`Using cached favicon ${cached}`);
        return { filename: cached, source: "cache" };
      }
    }

    const meta: FaviconMeta = {
      organization,
      slug,
      website,
      options: resolved,
      http: options.http ?? createFaviconHttpClient(),
      logger,
    };

    logger.info(`Fetching favicon for ${organization.name} (${website.host})...`);

    const filename = await runStrategyChain(meta, resolved.strategies);
    if (filename === null) {
      logger.warn(`Could not fetch favicon for ${organization.name}`);
      return { filename: null, source: "missing" };
    }

    return { filename, source: "network" };
  } catch (error) {
    logger.error("Unexpected error while resolving favicon", { error });
    return { filename: null, source: "missing" };
  }
}

/**
 * Resolve the icon for one organization. Returns the filename relative to
 * `options.cacheDir`, or null when the organization ends up without one.
 */
export async function resolveFavicon(
  organization: OrganizationRef,
  options: FaviconOptions,
): Promise<string | null> {
  const outcome = await resolveFaviconOutcome(organization, options);
  return outcome.filename;
}

export type FaviconResult = {
  organization: OrganizationRef;
  filename: string | null;
  source: FaviconSource;
};

export type FaviconSummary = { [S in FaviconSource]: number };

/**
 * Resolve icons for a list of organizations, one at a time. A slug is
 * resolved at most once per call, so organizations that share a slug
 * share the first result even when refetching.
 */
export async function resolveFavicons(
  organizations: OrganizationRef[],
  options: FaviconOptions,
): Promise<{ results: FaviconResult[]; summary: FaviconSummary }> {
  const http = options.http ?? createFaviconHttpClient();
  const resolvedSlugs = new Map<string, string | null>();
  const results: FaviconResult[] = [];
  const summary: FaviconSummary = {
    cache: 0,
    network: 0,
    missing: 0,
    skipped: 0,
  };

  for (const organization of organizations) {
    const slug = slugify(organization.name);
    const hasWebsite = normalizeWebsite(organization.websiteURL) !== null;
    const previous = hasWebsite ? resolvedSlugs.get(slug) : undefined;

    let result: FaviconResult;
    if (previous !== undefined) {
      result = {
        organization,
        filename: previous,
        source: previous === null ? "missing" : "cache",
      };
    } else {
      const outcome = await resolveFaviconOutcome(organization, {
        ...options,
        http,
      });
      if (outcome.source !== "skipped") {
        resolvedSlugs.set(slug, outcome.filename);
      }
      result = { organization, ...outcome };
    }

    summary[result.source]++;
    results.push(result);
  }

  return { results, summary };
}
