// pattern: Imperative Shell
import { existsSync, readdirSync, statSync } from "node:fs";
import { basename, extname, join } from "node:path";
import type { Logger } from "pino";

export type BookFile = {
  readonly filename: string;
  readonly path: string;
  readonly date: string | null;
  readonly sizeBytes: number;
  readonly modifiedAt: Date;
};

const DATE_PATTERN = /(\d{4})-(\d{2})-(\d{2})/;
const UNDATED = "0000-00-00";

const MONTHS = [
  "Jan", "Feb", "Mar", "Apr", "May", "Jun",
  "Jul", "Aug", "Sep", "Oct", "Nov", "Dec",
] as const;

export function extractDate(filename: string): string | null {
  const match = DATE_PATTERN.exec(filename);
  return match ? match[0] : null;
}

/**
 * Display title for an archived issue: `Bloomberg_2026-01-31.epub` with the
 * label "Daily Briefing" becomes "Daily Briefing - Jan 31".
 */
export function formatTitle(filename: string, label: string): string {
  const match = DATE_PATTERN.exec(filename);
  const month = match ? MONTHS[Number(match[2]) - 1] : undefined;
  if (match && month) {
    return `${label} - ${month} ${Number(match[3])}`;
  }
  return basename(filename, extname(filename)).replaceAll("_", " ");
}

export function filenamePrefix(sourceName: string): string {
  return sourceName.replaceAll(" ", "_").replaceAll("/", "-");
}

export function outputFilename(sourceName: string, date: Date): string {
  return `${filenamePrefix(sourceName)}_${date.toISOString().slice(0, 10)}.epub`;
}

/**
 * Newest issue first; undated files sink to the bottom and ties fall back
 * to reverse filename order.
 */
export function compareBooks(
  a: Pick<BookFile, "filename" | "date">,
  b: Pick<BookFile, "filename" | "date">,
): number {
  const byDate = (b.date ?? UNDATED).localeCompare(a.date ?? UNDATED);
  if (byDate !== 0) {
    return byDate;
  }
  if (a.filename === b.filename) {
    return 0;
  }
  return a.filename < b.filename ? 1 : -1;
}

export function listBooks(
  dir: string,
  logger: Logger,
  prefix?: string,
): Array<BookFile> {
  if (!existsSync(dir)) {
    logger.warn({ dir }, "books directory does not exist");
    return [];
  }

  const books = readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(".epub"))
    .filter((entry) => !prefix || entry.name.startsWith(`${prefix}_`))
    .map((entry) => {
      const path = join(dir, entry.name);
      const stat = statSync(path);
      return {
        filename: entry.name,
        path,
        date: extractDate(entry.name),
        sizeBytes: stat.size,
        modifiedAt: stat.mtime,
      };
    })
    .sort(compareBooks);

  logger.debug({ dir, count: books.length }, "books listed");
  return books;
}
