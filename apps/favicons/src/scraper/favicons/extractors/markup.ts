import type { IconLinkExtractor } from ".";
import { IconCandidate, toIconCandidate } from "./ranking";

const COMMENT_REGEX = /<!--[\s\S]*?-->/g;
const LINK_TAG_REGEX = /<link\b[^>]*>/gi;
const ATTRIBUTE_REGEX =
  /([^\s"'<>\/=]+)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'=<>`]+))/g;

function decodeAttributeValue(value: string): string {
  return value
    .replace(/&quot;/gi, '"')
    .replace(/&#0*39;/g, "'")
    .replace(/&lt;/gi, "<")
    .replace(/&gt;/gi, ">")
    .replace(/&amp;/gi, "&");
}

/**
 * Read the attributes of a single tag. Names are lower-cased and the
 * first occurrence of a repeated attribute wins.
 */
export function parseTagAttributes(tag: string): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const match of tag.matchAll(ATTRIBUTE_REGEX)) {
    const name = match[1].toLowerCase();
    if (attributes.has(name)) {
      continue;
    }
    const value = match[2] ?? match[3] ?? match[4] ?? "";
    attributes.set(name, decodeAttributeValue(value));
  }
  return attributes;
}

// Pattern-matching extractor: reads rel/href/sizes from every <link> tag
// regardless of attribute order. Does not build a DOM.
export const markupExtractor: IconLinkExtractor = {
  name: "markup",
  extract(html: string, baseUrl: string): IconCandidate[] {
    const candidates: IconCandidate[] = [];
    const source = html.replace(COMMENT_REGEX, "");

    for (const [tag] of source.matchAll(LINK_TAG_REGEX)) {
      const attributes = parseTagAttributes(tag.slice("<link".length));
      const candidate = toIconCandidate(
        {
          rel: attributes.get("rel"),
          href: attributes.get("href"),
          sizes: attributes.get("sizes"),
        },
        baseUrl,
      );
      if (candidate) {
        candidates.push(candidate);
      }
    }

    return candidates;
  },
};
