// pattern: Imperative Shell
import { join, resolve } from "node:path";
import { pruneArchive } from "../archive/prune";
import { publishCatalog } from "../catalog/publish";
import { processEpub } from "../epub";
import { processOptionsFor, runScheduledBuilds, runSourceBuild } from "../pipeline/build";
import type { PipelineDeps } from "../pipeline/build";
import { createGutenbergClient, createGutenbergSource } from "../sources/gutenberg";
import type { CliCommand } from "./args";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function downloadGutenbergBook(deps: PipelineDeps, bookId: number): Promise<number> {
  const { config, logger, rootDir } = deps;
  const entry = Object.entries(config.sources).find(([, s]) => s.type === "gutenberg");
  if (!entry) {
    logger.error("no gutenberg source is configured");
    return 1;
  }
  const [sourceId, sourceConfig] = entry;

  const source = createGutenbergSource({
    sourceId,
    config: sourceConfig,
    booksDir: join(rootDir, config.paths.books),
    client:
      deps.gutenberg ??
      createGutenbergClient({
        rateLimit: sourceConfig.rateLimit ?? config.defaultRateLimit,
        logger,
      }),
    logger,
  });

  const book = await source.getBook(bookId);
  if (!book) {
    logger.error({ bookId }, "gutenberg book not found");
    return 1;
  }

  const result = await source.downloadBook(book);
  if (!result.success) {
    logger.error({ bookId, error: result.error }, "gutenberg download failed");
    return 1;
  }

  publishCatalog(rootDir, config, logger);
  logger.info({ bookId, path: result.epubPath }, "gutenberg book archived");
  return 0;
}

/**
 * Runs one CLI command against the publish root.
 *
 * @returns The process exit code.
 */
export async function runCliCommand(command: CliCommand, deps: PipelineDeps): Promise<number> {
  const { config, logger, rootDir } = deps;

  try {
    switch (command.name) {
      case "process-epub": {
        const result = await processEpub(
          resolve(command.input),
          resolve(command.output),
          processOptionsFor(deps, null, []),
          logger,
        );
        logger.info(
          {
            outputPath: result.outputPath,
            sizeBytes: result.sizeBytes,
            articleCount: result.articleCount,
          },
          "epub processed",
        );
        return 0;
      }

      case "cleanup": {
        const removed = pruneArchive(join(rootDir, config.paths.books), command.keep, logger);
        logger.info({ removed: removed.length, keep: command.keep }, "cleanup complete");
        return 0;
      }

      case "generate-opds": {
        const { health } = publishCatalog(rootDir, config, logger);
        logger.info({ books: health.book_count }, "catalog regenerated");
        return 0;
      }

      case "build": {
        const build = await runSourceBuild(deps, command.sourceId);
        return build.status === "failed" ? 1 : 0;
      }

      case "build-all": {
        const outcomes = await runScheduledBuilds(deps);
        const failed = outcomes.filter((o) => !o.success || o.build.status === "failed");
        return failed.length > 0 ? 1 : 0;
      }

      case "gutenberg":
        return await downloadGutenbergBook(deps, command.bookId);
    }
  } catch (err) {
    logger.error({ command: command.name, error: errorMessage(err) }, "command failed");
    return 1;
  }
}
