// pattern: Imperative Shell
import { existsSync, mkdirSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import type { Logger } from "pino";
import type { SourceConfig } from "../config/schema";
import { runCommand } from "./command";
import type { ExecFileFn } from "./command";
import { skipIfArchived, sourceOutputFilename } from "./base";
import type { ContentSource, FetchResult } from "./types";

export const TOOLKIT_TIMEOUT_MS = 30 * 60 * 1000;
export const OUTPUT_PROFILE = "generic_eink";

export type RecipeSourceOptions = {
  readonly sourceId: string;
  readonly config: SourceConfig;
  readonly recipesDir: string;
  readonly workDir: string;
  readonly booksDir: string;
  readonly ebookConvert: string;
  readonly logger: Logger;
  readonly exec?: ExecFileFn;
};

export function resolveRecipePath(recipe: string, recipesDir: string): string {
  return isAbsolute(recipe) ? recipe : join(recipesDir, recipe);
}

/**
 * Argument list for the e-book toolkit: recipe, output, then options.
 */
export function buildConvertArgs(
  config: SourceConfig,
  recipePath: string,
  outputPath: string,
): Array<string> {
  const args = [recipePath, outputPath, `--output-profile=${OUTPUT_PROFILE}`];
  if (config.sections.length > 0) {
    args.push(`--recipe-specific-option=sections:${config.sections.join(",")}`);
  }
  if (config.authorOverride) {
    args.push(`--authors=${config.authorOverride}`);
  }
  if (config.publisherOverride) {
    args.push(`--publisher=${config.publisherOverride}`);
  }
  return args;
}

/**
 * A news source rendered by running a Calibre recipe through `ebook-convert`.
 */
export function createRecipeSource(options: RecipeSourceOptions): ContentSource {
  const { sourceId, config, logger } = options;
  const exec = options.exec ?? runCommand;
  const log = logger.child({ sourceId });

  const recipePath = (): string | null =>
    config.recipe ? resolveRecipePath(config.recipe, options.recipesDir) : null;

  return {
    sourceId,
    sourceType: "calibre_recipe",
    config,

    outputFilename: (date) => sourceOutputFilename(config, date),

    shouldSkip: (date) => skipIfArchived(config, options.booksDir, date),

    async validate() {
      const path = recipePath();
      if (!path) {
        return { valid: false, error: `Source '${sourceId}' has no recipe configured` };
      }
      if (!existsSync(path)) {
        return { valid: false, error: `Recipe file not found: ${path}` };
      }
      return { valid: true };
    },

    async fetch(date): Promise<FetchResult> {
      const startedAt = Date.now();
      const path = recipePath();
      if (!path) {
        return {
          success: false,
          error: `Source '${sourceId}' has no recipe configured`,
          durationMs: 0,
        };
      }

      mkdirSync(options.workDir, { recursive: true });
      const rawPath = join(options.workDir, sourceOutputFilename(config, date));
      const args = buildConvertArgs(config, path, rawPath);

      log.info({ recipe: path, sections: config.sections }, "running ebook toolkit");
      log.debug({ command: options.ebookConvert, args }, "toolkit command");

      try {
        await exec(options.ebookConvert, args, { timeout: TOOLKIT_TIMEOUT_MS });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.error({ error: message }, "ebook toolkit failed");
        return { success: false, error: message, durationMs: Date.now() - startedAt };
      }

      if (!existsSync(rawPath)) {
        return {
          success: false,
          error: `Toolkit produced no output at ${rawPath}`,
          durationMs: Date.now() - startedAt,
        };
      }

      const durationMs = Date.now() - startedAt;
      log.info({ rawPath, durationMs }, "raw epub fetched");

      return {
        success: true,
        epubPath: rawPath,
        title: `${config.name} ${date.toISOString().slice(0, 10)}`,
        author: config.authorOverride ?? config.name,
        durationMs,
        articleCount: 0,
      };
    },
  };
}
