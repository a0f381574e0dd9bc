// pattern: Imperative Shell
import { join } from "node:path";
import type { Logger } from "pino";
import type { SourcesConfig } from "../config/schema";
import { getSource } from "../config/select";
import type { ExecFileFn } from "./command";
import { createGutenbergClient, createGutenbergSource } from "./gutenberg";
import type { GutenbergClient } from "./gutenberg";
import { createRecipeSource } from "./recipe";
import type { ContentSource } from "./types";

export type SourceDeps = {
  readonly config: SourcesConfig;
  /** Directory the configured relative paths resolve against. */
  readonly rootDir: string;
  readonly ebookConvert: string;
  readonly logger: Logger;
  readonly exec?: ExecFileFn;
  readonly gutenberg?: GutenbergClient;
};

/**
 * Instantiates the fetcher for a configured source. Unknown ids and types
 * without a fetcher yield null.
 */
export function createSource(sourceId: string, deps: SourceDeps): ContentSource | null {
  const { config, rootDir, logger } = deps;
  const source = getSource(config, sourceId);
  if (!source) {
    logger.warn({ sourceId }, "unknown source");
    return null;
  }

  const booksDir = join(rootDir, config.paths.books);

  switch (source.type) {
    case "calibre_recipe":
      return createRecipeSource({
        sourceId,
        config: source,
        recipesDir: join(rootDir, config.paths.recipes),
        workDir: join(rootDir, config.paths.work),
        booksDir,
        ebookConvert: deps.ebookConvert,
        logger,
        ...(deps.exec ? { exec: deps.exec } : {}),
      });
    case "gutenberg":
      return createGutenbergSource({
        sourceId,
        config: source,
        booksDir,
        client:
          deps.gutenberg ??
          createGutenbergClient({
            rateLimit: source.rateLimit ?? config.defaultRateLimit,
            logger,
          }),
        logger,
      });
    case "custom":
      logger.warn({ sourceId }, "custom sources have no fetcher");
      return null;
  }
}

export type { ContentSource, FetchResult, BookMetadata, SourceValidation } from "./types";
export type { ExecFileFn } from "./command";
export { runCommand } from "./command";
export type { GutenbergClient, GutenbergBook, GutenbergSource } from "./gutenberg";
export { createGutenbergClient, createGutenbergSource } from "./gutenberg";
export { createRecipeSource } from "./recipe";
