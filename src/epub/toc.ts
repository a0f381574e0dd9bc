// pattern: Functional Core
import * as cheerio from "cheerio";
import { smartShortenTitle } from "./titles";

export type TocRewrite = {
  readonly xml: string;
  readonly changed: number;
};

/**
 * Shortens every `navLabel > text` entry of an NCX table of contents.
 */
export function shortenNcxTitles(ncxXml: string, maxLen: number): TocRewrite {
  const $ = cheerio.load(ncxXml, { xml: true });
  let changed = 0;

  $("navLabel > text").each((_, el) => {
    const node = $(el);
    const original = node.text();
    if (!original) {
      return;
    }
    const shortened = smartShortenTitle(original, maxLen);
    if (shortened !== original) {
      node.text(shortened);
      changed += 1;
    }
  });

  return { xml: $.xml(), changed };
}

/**
 * Shortens the text of every link in an EPUB 3 navigation document. Links
 * that wrap other markup are left alone.
 */
export function shortenNavTitles(navXhtml: string, maxLen: number): TocRewrite {
  const $ = cheerio.load(navXhtml, { xml: true });
  let changed = 0;

  $("a").each((_, el) => {
    const node = $(el);
    if (node.children().length > 0) {
      return;
    }
    const original = node.text();
    if (!original) {
      return;
    }
    const shortened = smartShortenTitle(original, maxLen);
    if (shortened !== original) {
      node.text(shortened);
      changed += 1;
    }
  });

  return { xml: $.xml(), changed };
}
