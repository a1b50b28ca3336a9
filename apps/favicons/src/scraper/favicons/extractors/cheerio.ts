import * as cheerio from "cheerio";
import type { IconLinkExtractor } from ".";
import { IconCandidate, toIconCandidate } from "./ranking";

export const cheerioExtractor: IconLinkExtractor = {
  name: "cheerio",
  extract(html: string, baseUrl: string): IconCandidate[] {
    const $ = cheerio.load(html);
    const candidates: IconCandidate[] = [];

    $("link").each((_, el) => {
      const link = $(el);
      const candidate = toIconCandidate(
        {
          rel: link.attr("rel"),
          href: link.attr("href"),
          sizes: link.attr("sizes"),
        },
        baseUrl,
      );
      if (candidate) {
        candidates.push(candidate);
      }
    });

    return candidates;
  },
};
