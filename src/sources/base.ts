// pattern: Functional Core
import { existsSync } from "node:fs";
import { join } from "node:path";
import { outputFilename } from "../archive/books";
import type { SourceConfig } from "../config/schema";
import type { SkipDecision } from "./types";

export function sourceOutputFilename(config: SourceConfig, date: Date): string {
  return outputFilename(config.name, date);
}

export function skipIfArchived(
  config: SourceConfig,
  booksDir: string,
  date: Date,
): SkipDecision {
  const filename = sourceOutputFilename(config, date);
  if (existsSync(join(booksDir, filename))) {
    return { skip: true, reason: `File already exists: ${filename}` };
  }
  return { skip: false };
}
