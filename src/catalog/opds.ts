// pattern: Functional Core
import { createHash } from "node:crypto";
import type { BookFile } from "../archive/books";
import { formatTitle } from "../archive/books";
import type { SourcesConfig } from "../config/schema";
import { toIsoSeconds } from "../lib/time";
import { escapeXml } from "./xml";

export const OPDS_ACQUISITION_TYPE =
  "application/atom+xml;profile=opds-catalog;kind=acquisition";

export type CatalogBook = Pick<BookFile, "filename" | "sizeBytes" | "modifiedAt">;

export function catalogSubtitle(count: number): string {
  if (count === 0) {
    return "No issues available";
  }
  if (count === 1) {
    return "1 issue available";
  }
  return `${count} issues available (rolling weekly archive)`;
}

export function bookId(filename: string): string {
  return `urn:uuid:${createHash("md5").update(filename).digest("hex")}`;
}

export function bookUrl(config: SourcesConfig, filename: string): string {
  return `${config.baseUrl}${config.paths.books}/${filename}`;
}

export function catalogUrl(config: SourcesConfig): string {
  return `${config.baseUrl}${config.paths.catalog}`;
}

function renderEntry(book: CatalogBook, config: SourcesConfig): string {
  const { catalog } = config;
  const url = escapeXml(bookUrl(config, book.filename));
  const categories = catalog.categories.map(
    (c) =>
      `    <category term="${escapeXml(c.term)}" label="${escapeXml(c.label)}"/>`,
  );

  return [
    "  <entry>",
    `    <title>${escapeXml(formatTitle(book.filename, catalog.entryTitle))}</title>`,
    `    <id>${bookId(book.filename)}</id>`,
    `    <updated>${toIsoSeconds(book.modifiedAt)}</updated>`,
    "    <author>",
    `      <name>${escapeXml(catalog.entryAuthor)}</name>`,
    "    </author>",
    `    <dc:publisher>${escapeXml(catalog.publisher)}</dc:publisher>`,
    ...categories,
    `    <summary>${escapeXml(catalog.summary)}</summary>`,
    `    <content type="text">${escapeXml(catalog.content)}</content>`,
    `    <link href="${url}" rel="http://opds-spec.org/acquisition" type="application/epub+zip" length="${book.sizeBytes}"/>`,
    `    <link href="${url}" rel="http://opds-spec.org/acquisition/open-access" type="application/epub+zip"/>`,
    "  </entry>",
  ].join("\n");
}

/**
 * Renders the OPDS 1.2 acquisition feed for the archived issues, newest
 * first in the order given.
 */
export function generateOpdsCatalog(
  books: ReadonlyArray<CatalogBook>,
  config: SourcesConfig,
  now: Date,
): string {
  const { catalog } = config;
  const self = escapeXml(catalogUrl(config));

  const author = [
    "  <author>",
    `    <name>${escapeXml(catalog.authorName)}</name>`,
    ...(catalog.authorUri ? [`    <uri>${escapeXml(catalog.authorUri)}</uri>`] : []),
    "  </author>",
  ];

  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<feed xmlns="http://www.w3.org/2005/Atom"',
    '      xmlns:dc="http://purl.org/dc/terms/"',
    '      xmlns:opds="http://opds-spec.org/2010/catalog">',
    `  <id>${escapeXml(catalog.id)}</id>`,
    `  <title>${escapeXml(catalog.title)}</title>`,
    `  <subtitle>${escapeXml(catalogSubtitle(books.length))}</subtitle>`,
    ...(catalog.icon ? [`  <icon>${escapeXml(catalog.icon)}</icon>`] : []),
    `  <updated>${toIsoSeconds(now)}</updated>`,
    ...author,
    `  <link href="${self}" rel="self" type="${OPDS_ACQUISITION_TYPE}"/>`,
    `  <link href="${self}" rel="start" type="${OPDS_ACQUISITION_TYPE}"/>`,
    ...books.map((book) => renderEntry(book, config)),
    "</feed>",
  ];

  return `${lines.join("\n")}\n`;
}
