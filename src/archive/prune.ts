// pattern: Imperative Shell
import { unlinkSync } from "node:fs";
import type { Logger } from "pino";
import { listBooks } from "./books";

export const DEFAULT_KEEP = 7;

/**
 * Deletes every archived issue beyond the newest `keep`, optionally limited to
 * one source's filename prefix. Returns the filenames removed.
 */
export function pruneArchive(
  dir: string,
  keep: number,
  logger: Logger,
  prefix?: string,
): Array<string> {
  const books = listBooks(dir, logger, prefix);

  if (books.length <= keep) {
    logger.info({ dir, count: books.length, keep }, "archive within retention, nothing to prune");
    return [];
  }

  const removed: Array<string> = [];
  for (const book of books.slice(keep)) {
    try {
      unlinkSync(book.path);
      removed.push(book.filename);
      logger.info({ filename: book.filename }, "old issue deleted");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ filename: book.filename, error: message }, "failed to delete old issue");
    }
  }

  logger.info({ dir, removed: removed.length, kept: keep }, "archive pruned");
  return removed;
}
