// pattern: Imperative Shell
import { rmSync } from "node:fs";
import { join } from "node:path";
import type { Logger } from "pino";
import pLimit from "p-limit";
import type { AppDatabase } from "../db";
import { builds } from "../db/schema";
import type { BuildRecord, NewBuildRecord } from "../db/schema";
import type { AppEnv } from "../config/env";
import type { DeviceProfile, SourcesConfig } from "../config/schema";
import { getScheduledSources, resolveDeviceProfile } from "../config/select";
import { filenamePrefix } from "../archive/books";
import { pruneArchive } from "../archive/prune";
import { publishCatalog } from "../catalog/publish";
import { processEpub, DEFAULT_SKIP_PAGES } from "../epub";
import type { ProcessOptions, ProcessResult } from "../epub";
import { createSource } from "../sources";
import type { ExecFileFn, GutenbergClient } from "../sources";

export type PipelineDeps = {
  readonly db: AppDatabase;
  readonly config: SourcesConfig;
  readonly env: AppEnv;
  readonly logger: Logger;
  /** Root that `paths.*` in the sources document resolve against. */
  readonly rootDir: string;
  readonly exec?: ExecFileFn;
  readonly gutenberg?: GutenbergClient;
};

export type ScheduledBuildOutcome =
  | { readonly sourceId: string; readonly success: true; readonly build: BuildRecord }
  | { readonly sourceId: string; readonly success: false; readonly error: string };

function recordBuild(db: AppDatabase, values: NewBuildRecord): BuildRecord {
  return db.insert(builds).values(values).returning().get();
}

type ProcessOutcome =
  | { readonly success: true; readonly result: ProcessResult }
  | { readonly success: false; readonly error: string };

async function processRawEpub(
  rawPath: string,
  outputPath: string,
  options: ProcessOptions,
  logger: Logger,
): Promise<ProcessOutcome> {
  try {
    const result = await processEpub(rawPath, outputPath, options, logger);
    return { success: true, result };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: message };
  } finally {
    rmSync(rawPath, { force: true });
  }
}

/**
 * Post-processing options for a source's device profile. Without a profile
 * the e-ink defaults apply: cover and section index skipped, images stripped.
 */
export function processOptionsFor(
  deps: Pick<PipelineDeps, "config" | "env" | "rootDir">,
  profile: DeviceProfile | null,
  sections: ReadonlyArray<string>,
): ProcessOptions {
  const { config, env, rootDir } = deps;
  const theme = profile?.cssTheme ?? "default";
  return {
    skipPages: profile?.skipPages ?? DEFAULT_SKIP_PAGES,
    stripImages: profile?.stripImages ?? true,
    themePath: join(rootDir, config.paths.themes, `${theme}.css`),
    fontSizeAdjust: profile?.fontSizeAdjust ?? 1,
    maxTitleLength: config.pipeline.maxTitleLength,
    sections,
    build: {
      workflowRunId: env.build.workflowRunId,
      gitSha: env.build.gitSha,
      debug: env.debug,
    },
    workRoot: join(rootDir, config.paths.work),
  };
}

/**
 * Runs one source end to end: fetch, post-process into the archive, record
 * the build, prune old issues and republish the catalog.
 */
export async function runSourceBuild(
  deps: PipelineDeps,
  sourceId: string,
  date: Date = new Date(),
): Promise<BuildRecord> {
  const { db, config, env, rootDir } = deps;
  const logger = deps.logger.child({ sourceId });
  const startedAt = new Date();

  const source = createSource(sourceId, {
    config,
    rootDir,
    ebookConvert: env.ebookConvert,
    logger,
    ...(deps.exec ? { exec: deps.exec } : {}),
    ...(deps.gutenberg ? { gutenberg: deps.gutenberg } : {}),
  });
  if (!source) {
    throw new Error(`Source '${sourceId}' is unknown or has no fetcher`);
  }

  const filename = source.outputFilename(date);
  const base = {
    sourceId,
    filename,
    workflowRunId: env.build.workflowRunId,
    startedAt,
  };

  const skip = source.shouldSkip(date);
  if (skip.skip) {
    logger.info({ reason: skip.reason }, "build skipped");
    return recordBuild(db, {
      ...base,
      status: "skipped",
      error: skip.reason,
      finishedAt: new Date(),
    });
  }

  const fetched = await source.fetch(date);
  if (!fetched.success) {
    logger.error({ error: fetched.error }, "fetch failed");
    return recordBuild(db, {
      ...base,
      status: "failed",
      error: fetched.error,
      durationMs: Date.now() - startedAt.getTime(),
      finishedAt: new Date(),
    });
  }

  const booksDir = join(rootDir, config.paths.books);
  const profile = resolveDeviceProfile(config, source.config);
  const outcome = await processRawEpub(
    fetched.epubPath,
    join(booksDir, filename),
    processOptionsFor(deps, profile, source.config.sections),
    logger,
  );
  if (!outcome.success) {
    logger.error({ error: outcome.error }, "post-processing failed");
    return recordBuild(db, {
      ...base,
      status: "failed",
      error: outcome.error,
      durationMs: Date.now() - startedAt.getTime(),
      finishedAt: new Date(),
    });
  }
  const processed = outcome.result;

  const record = recordBuild(db, {
    ...base,
    status: "success",
    rawSizeBytes: processed.rawSizeBytes,
    sizeBytes: processed.sizeBytes,
    articleCount: processed.articleCount,
    durationMs: Date.now() - startedAt.getTime(),
    finishedAt: new Date(),
  });

  try {
    pruneArchive(
      booksDir,
      source.config.retentionDays,
      logger,
      filenamePrefix(source.config.name),
    );
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ error: message }, "archive cleanup failed");
  }

  try {
    publishCatalog(rootDir, config, logger);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ error: message }, "catalog regeneration failed");
  }

  logger.info({ filename, sizeBytes: processed.sizeBytes }, "build complete");
  return record;
}

/**
 * Builds every enabled scheduled source, bounded by
 * `pipeline.maxConcurrency`. A source that throws does not stop the others.
 */
export async function runScheduledBuilds(
  deps: PipelineDeps,
  date: Date = new Date(),
): Promise<Array<ScheduledBuildOutcome>> {
  const limit = pLimit(deps.config.pipeline.maxConcurrency);
  const sources = getScheduledSources(deps.config);

  const outcomes = await Promise.all(
    sources.map(({ id }) =>
      limit(async (): Promise<ScheduledBuildOutcome> => {
        try {
          const build = await runSourceBuild(deps, id, date);
          return { sourceId: id, success: true, build };
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          deps.logger.error({ sourceId: id, error: message }, "scheduled build crashed");
          return { sourceId: id, success: false, error: message };
        }
      }),
    ),
  );

  deps.logger.info({ sources: outcomes.length }, "scheduled build cycle complete");
  return outcomes;
}
