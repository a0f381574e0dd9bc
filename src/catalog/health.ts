// pattern: Functional Core
import { z } from "zod";
import type { BookFile } from "../archive/books";
import { formatTitle } from "../archive/books";
import type { SourcesConfig } from "../config/schema";
import { toIsoSeconds } from "../lib/time";
import { catalogUrl } from "./opds";

export const healthBookSchema = z.object({
  filename: z.string(),
  date: z.string().nullable(),
  size_bytes: z.number().int().nonnegative(),
  title: z.string(),
});

export const healthReportSchema = z.object({
  status: z.enum(["ok", "empty"]),
  last_update: z.string(),
  book_count: z.number().int().nonnegative(),
  oldest_book: z.string().nullable(),
  newest_book: z.string().nullable(),
  total_size_bytes: z.number().int().nonnegative(),
  total_size_mb: z.number().nonnegative(),
  opds_url: z.string(),
  books: z.array(healthBookSchema),
});

export type HealthBook = z.infer<typeof healthBookSchema>;
export type HealthReport = z.infer<typeof healthReportSchema>;

export function buildHealthReport(
  books: ReadonlyArray<Pick<BookFile, "filename" | "date" | "sizeBytes">>,
  config: SourcesConfig,
  now: Date,
): HealthReport {
  const totalSize = books.reduce((sum, b) => sum + b.sizeBytes, 0);
  const dates = books
    .map((b) => b.date)
    .filter((d): d is string => d !== null)
    .sort();

  return {
    status: books.length > 0 ? "ok" : "empty",
    last_update: toIsoSeconds(now),
    book_count: books.length,
    oldest_book: dates[0] ?? null,
    newest_book: dates.at(-1) ?? null,
    total_size_bytes: totalSize,
    total_size_mb: Math.round((totalSize / 1024 / 1024) * 100) / 100,
    opds_url: catalogUrl(config),
    books: books.map((b) => ({
      filename: b.filename,
      date: b.date,
      size_bytes: b.sizeBytes,
      title: formatTitle(b.filename, config.catalog.entryTitle),
    })),
  };
}
