import { config } from "../../../config";
import { cheerioExtractor } from "./cheerio";
import { markupExtractor } from "./markup";
import type { IconCandidate } from "./ranking";

export type { IconCandidate } from "./ranking";
export { rankIconCandidates } from "./ranking";

export type IconLinkParser = "cheerio" | "markup";

export interface IconLinkExtractor {
  name: IconLinkParser;
  /**
   * Collect icon candidates from `<link>` elements in document order.
   * Must not throw on malformed markup.
   */
  extract(html: string, baseUrl: string): IconCandidate[];
}

const extractors: { [P in IconLinkParser]: IconLinkExtractor } = {
  cheerio: cheerioExtractor,
  markup: markupExtractor,
};

export function selectIconLinkExtractor(
  parser: IconLinkParser = config.ICON_LINK_PARSER,
): IconLinkExtractor {
  return extractors[parser];
}

export function extractIconCandidates(
  html: string,
  baseUrl: string,
  extractor: IconLinkExtractor = selectIconLinkExtractor(),
): IconCandidate[] {
  return extractor.extract(html, baseUrl);
}
