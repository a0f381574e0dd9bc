import pino from "pino";
import { resolve } from "node:path";
import { createDatabase } from "../db";
import type { AppDatabase } from "../db";
import { applyMigrations } from "../db/migrate";
import { builds } from "../db/schema";
import type { GitHubUser } from "../db/schema";
import { sourcesConfigSchema } from "../config/schema";
import type { SourcesConfig, SourcesConfigInput } from "../config/schema";
import { loadEnv } from "../config/env";
import type { AppEnv } from "../config/env";
import { createCallerFactory } from "../api/trpc";
import { appRouter } from "../api/router";
import type { AppContext } from "../api/context";
import { createGitHubClient } from "../github/client";
import { createGutenbergClient } from "../sources/gutenberg";
import type { AuthSession } from "../auth/session";

/**
 * Creates an in-memory SQLite test database with all migrations applied.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  applyMigrations(db, resolve("./drizzle"));
  return db;
}

/**
 * Seeds a build record with optional field overrides.
 * @returns The ID of the inserted build.
 */
export function seedTestBuild(
  db: AppDatabase,
  overrides?: Partial<typeof builds.$inferInsert>,
): number {
  const result = db
    .insert(builds)
    .values({
      sourceId: "bloomberg",
      filename: "Bloomberg_2026-01-31.epub",
      status: "success",
      rawSizeBytes: 200_000,
      sizeBytes: 150_000,
      articleCount: 12,
      durationMs: 1200,
      startedAt: new Date("2026-01-31T06:00:00Z"),
      finishedAt: new Date("2026-01-31T06:00:01Z"),
      ...overrides,
    })
    .returning({ id: builds.id })
    .get();

  return result.id;
}

/**
 * A sources document with one scheduled recipe source and one on-demand
 * Gutenberg source. Top-level keys in `overrides` replace the defaults.
 */
export function createTestConfig(overrides?: SourcesConfigInput): SourcesConfig {
  return sourcesConfigSchema.parse({
    baseUrl: "https://press.example.com/",
    sources: {
      bloomberg: {
        name: "Bloomberg",
        type: "calibre_recipe",
        recipe: "bloomberg.recipe",
        schedule: "0 6 * * *",
        sections: ["ai", "technology"],
        deviceProfiles: {
          crosspoint: { skipPages: [0, 1], stripImages: true },
        },
      },
      gutenberg: {
        name: "Project Gutenberg",
        type: "gutenberg",
        mode: "on_demand",
        rateLimit: { requestsPerSecond: 10, cacheHours: 12 },
      },
    },
    ...overrides,
  });
}

export function createTestEnv(overrides?: NodeJS.ProcessEnv): AppEnv {
  return loadEnv({
    GITHUB_CLIENT_ID: "test-client-id",
    GITHUB_CLIENT_SECRET: "test-secret",
    GITHUB_REPO_OWNER: "press-owner",
    GITHUB_REPO_NAME: "press-repo",
    GITHUB_BRANCH: "main",
    APP_URL: "https://dashboard.example.com",
    PUBLISH_ROOT: "/srv/press",
    ...overrides,
  });
}

export const TEST_USER: GitHubUser = {
  id: 1001,
  login: "octo-reader",
  name: "Octo Reader",
  avatar_url: "https://avatars.example.com/u/1001",
  email: "reader@example.com",
};

export const TEST_SESSION: AuthSession = {
  user: TEST_USER,
  accessToken: "test-token",
  expiresAt: new Date("2026-02-07T06:00:00Z"),
};

export type TestCallerOptions = {
  readonly config?: SourcesConfig;
  readonly env?: AppEnv;
  readonly session?: AuthSession | null;
};

/**
 * Creates a fully-typed tRPC caller for testing router procedures directly.
 * Network clients are real; tests stub `fetch`.
 */
export function createTestCaller(db: AppDatabase, options: TestCallerOptions = {}) {
  const createCaller = createCallerFactory(appRouter);
  const env = options.env ?? createTestEnv();
  const logger = pino({ level: "silent" });
  const config = options.config ?? createTestConfig();

  const context: AppContext = {
    db,
    config,
    env,
    logger,
    session: options.session ?? null,
    github: createGitHubClient({
      owner: env.github.owner,
      repo: env.github.repo,
      branch: env.github.branch,
    }),
    gutenberg: createGutenbergClient({
      rateLimit: { requestsPerSecond: 10, cacheHours: 24 },
      logger,
      sleep: async () => {},
    }),
  };

  return createCaller(context);
}
