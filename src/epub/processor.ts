// pattern: Imperative Shell
import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  statSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { Logger } from "pino";
import { createDiagnostics, DIAGNOSTICS_FILENAME } from "./diagnostics";
import type { BuildInfo } from "./diagnostics";
import { findFileBreadthFirst } from "./files";
import { stripImages } from "./images";
import {
  addManifestItem,
  hasSpine,
  parseOpf,
  removeSpineItems,
  serializeOpf,
  spineIdrefs,
} from "./opf";
import { buildStylesheet } from "./stylesheet";
import { DEFAULT_MAX_TITLE_LENGTH } from "./titles";
import { shortenNavTitles, shortenNcxTitles } from "./toc";
import type { TocRewrite } from "./toc";
import { validateInput, validateOutputPath } from "./validate";
import { extractEpub, packageEpub } from "./zip";

export const DEFAULT_SKIP_PAGES: ReadonlyArray<number> = [0, 1];

export type ProcessOptions = {
  /** Spine positions to drop; defaults to the cover and the section index. */
  readonly skipPages?: ReadonlyArray<number>;
  readonly stripImages?: boolean;
  /** CSS file that replaces `stylesheet.css`; null keeps the toolkit's. */
  readonly themePath?: string | null;
  readonly fontSizeAdjust?: number;
  readonly maxTitleLength?: number;
  readonly sections?: ReadonlyArray<string>;
  readonly build?: BuildInfo;
  readonly workRoot?: string;
};

export type ProcessResult = {
  readonly outputPath: string;
  readonly sizeBytes: number;
  readonly rawSizeBytes: number;
  readonly articleCount: number;
  readonly imagesRemoved: number;
  readonly durationMs: number;
};

const LOCAL_BUILD: BuildInfo = {
  workflowRunId: "local",
  gitSha: "unknown",
  debug: false,
};

function rewriteToc(
  path: string,
  rewrite: (xml: string) => TocRewrite,
  logger: Logger,
): void {
  if (!existsSync(path)) {
    return;
  }
  try {
    const result = rewrite(readFileSync(path, "utf-8"));
    writeFileSync(path, result.xml, "utf-8");
    logger.info({ path, changed: result.changed }, "toc titles shortened");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ path, error: message }, "failed to process toc, continuing without changes");
  }
}

function applyTheme(
  opfDir: string,
  themePath: string | null | undefined,
  fontSizeAdjust: number,
  logger: Logger,
): void {
  if (!themePath) {
    return;
  }
  if (!existsSync(themePath)) {
    logger.warn({ themePath }, "theme css not found, keeping original stylesheet");
    return;
  }
  const css = buildStylesheet(readFileSync(themePath, "utf-8"), fontSizeAdjust);
  writeFileSync(join(opfDir, "stylesheet.css"), css, "utf-8");
  logger.debug({ bytes: css.length }, "stylesheet replaced");
}

/**
 * Post-processes a toolkit-produced EPUB for e-ink reading and writes the
 * result to `outputPath`.
 */
export async function processEpub(
  inputPath: string,
  outputPath: string,
  options: ProcessOptions,
  logger: Logger,
): Promise<ProcessResult> {
  const startedAt = Date.now();
  const { sizeBytes: rawSizeBytes } = validateInput(inputPath, logger);
  validateOutputPath(outputPath, logger);

  const workRoot = options.workRoot ?? tmpdir();
  mkdirSync(workRoot, { recursive: true });
  const workDir = mkdtempSync(join(workRoot, "epub-"));
  logger.info({ inputPath, outputPath }, "processing epub");

  try {
    try {
      extractEpub(inputPath, workDir);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ inputPath, rawSizeBytes, error: message }, "failed to extract epub");
      throw err;
    }

    const opfPath = findFileBreadthFirst(workDir, (name) => name.endsWith(".opf"));
    if (!opfPath) {
      throw new Error("No .opf file found in EPUB");
    }
    const opfDir = dirname(opfPath);
    const opf = parseOpf(readFileSync(opfPath, "utf-8"));

    if (!hasSpine(opf)) {
      throw new Error("Invalid EPUB: no spine element");
    }

    const spineCount = spineIdrefs(opf).length;
    const articleCount = Math.max(0, spineCount - 2);
    const removed = removeSpineItems(opf, options.skipPages ?? DEFAULT_SKIP_PAGES);
    logger.info({ spineCount, removed }, "spine pages skipped");

    let imagesRemoved = 0;
    if (options.stripImages ?? true) {
      imagesRemoved = stripImages(workDir, opf, logger);
      logger.info({ imagesRemoved }, "images stripped");
    }

    applyTheme(opfDir, options.themePath, options.fontSizeAdjust ?? 1, logger);

    const maxLen = options.maxTitleLength ?? DEFAULT_MAX_TITLE_LENGTH;
    rewriteToc(join(opfDir, "toc.ncx"), (xml) => shortenNcxTitles(xml, maxLen), logger);
    rewriteToc(join(opfDir, "nav.xhtml"), (xml) => shortenNavTitles(xml, maxLen), logger);

    const diagnostics = createDiagnostics({
      inputPath,
      outputPath,
      rawSizeBytes,
      startedAt,
      now: new Date(),
      build: options.build ?? LOCAL_BUILD,
      sections: options.sections ?? [],
      articleCount,
      imagesRemoved,
    });
    writeFileSync(
      join(opfDir, DIAGNOSTICS_FILENAME),
      JSON.stringify(diagnostics, null, 2),
      "utf-8",
    );
    addManifestItem(opf, {
      id: "diagnostics",
      href: DIAGNOSTICS_FILENAME,
      mediaType: "application/json",
    });

    writeFileSync(opfPath, serializeOpf(opf), "utf-8");

    const entries = await packageEpub(workDir, outputPath);
    const sizeBytes = statSync(outputPath).size;
    const durationMs = Date.now() - startedAt;

    logger.info(
      { outputPath, entries, sizeBytes, articleCount, imagesRemoved, durationMs },
      "epub written",
    );

    return {
      outputPath,
      sizeBytes,
      rawSizeBytes,
      articleCount,
      imagesRemoved,
      durationMs,
    };
  } finally {
    rmSync(workDir, { recursive: true, force: true });
  }
}
