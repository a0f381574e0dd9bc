// pattern: Imperative Shell
import { readFileSync, unlinkSync, writeFileSync } from "node:fs";
import { basename, extname } from "node:path";
import * as cheerio from "cheerio";
import type { Logger } from "pino";
import { listFilesRecursive } from "./files";
import { removeManifestItems } from "./opf";
import type { OpfDocument } from "./opf";

const IMAGE_EXTENSIONS = new Set([".jpg", ".jpeg", ".png", ".gif", ".svg", ".webp"]);
const MARKUP_EXTENSIONS = new Set([".html", ".xhtml"]);

function mentionsCover(value: string): boolean {
  return value.toLowerCase().includes("cover");
}

/**
 * Removes non-cover `<img>` tags from an (X)HTML document, then any
 * `<figure>` or image-wrapper `<div>` the removal left empty.
 */
export function stripImageMarkup(markup: string): string {
  const $ = cheerio.load(markup, { xml: true });

  $("img").each((_, el) => {
    const src = $(el).attr("src") ?? "";
    if (!mentionsCover(src)) {
      $(el).remove();
    }
  });

  for (const selector of ["figure", "div[class*='img']"]) {
    $(selector)
      .filter((_, el) => $(el).children().length === 0 && $(el).text().trim() === "")
      .remove();
  }

  return $.xml();
}

/**
 * Deletes image files (covers excepted) below `rootDir`, drops their manifest
 * entries and scrubs `<img>` tags from content documents. Returns the number
 * of files deleted.
 */
export function stripImages(
  rootDir: string,
  opf: OpfDocument,
  logger: Logger,
): number {
  const files = listFilesRecursive(rootDir);
  let removed = 0;

  for (const file of files) {
    if (!IMAGE_EXTENSIONS.has(extname(file).toLowerCase())) {
      continue;
    }
    if (mentionsCover(basename(file))) {
      continue;
    }
    try {
      unlinkSync(file);
      removed += 1;
      logger.debug({ file: basename(file) }, "image removed");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ file, error: message }, "failed to remove image");
    }
  }

  const manifestRemoved = removeManifestItems(
    opf,
    (item) => item.mediaType.startsWith("image/") && !mentionsCover(item.href),
  );
  logger.debug({ manifestRemoved }, "image manifest items removed");

  for (const file of files) {
    if (!MARKUP_EXTENSIONS.has(extname(file).toLowerCase())) {
      continue;
    }
    try {
      const markup = readFileSync(file, "utf-8");
      writeFileSync(file, stripImageMarkup(markup), "utf-8");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ file, error: message }, "failed to strip image tags");
    }
  }

  return removed;
}
