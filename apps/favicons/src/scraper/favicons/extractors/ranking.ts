export type IconCandidate = {
  url: string;
  relPriority: number;
  sizeScore: number;
};

export type IconLinkAttributes = {
  rel?: string;
  href?: string;
  sizes?: string;
};

export const TOUCH_ICON_PRIORITY = 2;
export const GENERIC_ICON_PRIORITY = 1;

// Links without a declared size are treated as "any size": scored above
// small explicit sizes like 16x16 and below touch-icon sizes like 180x180.
export const UNDECLARED_SIZE_SCORE = 48;

export function isIconRel(rel: string | undefined): boolean {
  return rel !== undefined && rel.toLowerCase().includes("icon");
}

export function getRelPriority(rel: string): number {
  return rel.toLowerCase().includes("touch-icon")
    ? TOUCH_ICON_PRIORITY
    : GENERIC_ICON_PRIORITY;
}

/**
 * Score a `sizes` attribute by its largest declared width.
 * @example getSizeScore("16x16 32x32") // 32
 */
export function getSizeScore(sizes: string | undefined): number {
  const normalized = (sizes ?? "").trim().toLowerCase();
  if (normalized === "" || normalized === "any") {
    return UNDECLARED_SIZE_SCORE;
  }

  let score = 0;
  for (const token of normalized.split(/\s+/)) {
    const match = token.match(/^(\d+)x/);
    if (match) {
      score = Math.max(score, parseInt(match[1], 10));
    }
  }
  return score;
}

function resolveHref(href: string, baseUrl: string): string | null {
  try {
    const url = new URL(href, baseUrl);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return null;
    }
    return url.href;
  } catch {
    return null;
  }
}

/**
 * Turn the attributes of one `<link>` element into a candidate, or null
 * when it is not an icon link or has no usable href.
 */
export function toIconCandidate(
  attributes: IconLinkAttributes,
  baseUrl: string,
): IconCandidate | null {
  const { rel, sizes } = attributes;
  if (rel === undefined || !isIconRel(rel)) {
    return null;
  }

  const href = attributes.href?.trim();
  if (!href) {
    return null;
  }

  const url = resolveHref(href, baseUrl);
  if (url === null) {
    return null;
  }

  return {
    url,
    relPriority: getRelPriority(rel),
    sizeScore: getSizeScore(sizes),
  };
}

/**
 * Order candidates by relation priority, then size score, both descending.
 * Equal candidates keep document order; repeated URLs keep their first,
 * best-ranked occurrence.
 */
export function rankIconCandidates(
  candidates: IconCandidate[],
): IconCandidate[] {
  const ranked = [...candidates].sort(
    (a, b) => b.relPriority - a.relPriority || b.sizeScore - a.sizeScore,
  );

  const seen = new Set<string>();
  return ranked.filter(candidate => {
    if (seen.has(candidate.url)) {
      return false;
    }
    seen.add(candidate.url);
    return true;
  });
}
