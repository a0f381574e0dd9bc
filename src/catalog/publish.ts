// pattern: Imperative Shell
import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import type { Logger } from "pino";
import { listBooks } from "../archive/books";
import type { SourcesConfig } from "../config/schema";
import { buildHealthReport } from "./health";
import type { HealthReport } from "./health";
import { generateOpdsCatalog } from "./opds";

export type PublishedCatalog = {
  readonly catalogPath: string;
  readonly healthPath: string;
  readonly catalog: string;
  readonly health: HealthReport;
};

function writeFile(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, "utf-8");
}

/**
 * Regenerates `opds.xml` and `health.json` under `rootDir` from the books
 * currently on disk.
 */
export function publishCatalog(
  rootDir: string,
  config: SourcesConfig,
  logger: Logger,
  now: Date = new Date(),
): PublishedCatalog {
  const books = listBooks(join(rootDir, config.paths.books), logger);

  const catalogPath = join(rootDir, config.paths.catalog);
  const catalog = generateOpdsCatalog(books, config, now);
  writeFile(catalogPath, catalog);
  logger.info({ catalogPath, entries: books.length }, "opds catalog written");

  const healthPath = join(rootDir, config.paths.health);
  const health = buildHealthReport(books, config, now);
  writeFile(healthPath, `${JSON.stringify(health, null, 2)}\n`);
  logger.info({ healthPath, status: health.status }, "health report written");

  return { catalogPath, healthPath, catalog, health };
}
