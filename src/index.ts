import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadEnv } from "./config/env";
import type { AppEnv } from "./config/env";
import { loadSourcesConfig, resolveConfigPath, withBaseUrl } from "./config";
import type { SourcesConfig } from "./config/schema";
import { createDatabase } from "./db";
import { applyMigrations } from "./db/migrate";
import { purgeExpiredSessions } from "./auth/session";
import { createGitHubOAuth, fetchGitHubUser } from "./auth/oauth";
import { createGitHubClient } from "./github/client";
import { createGutenbergClient } from "./sources/gutenberg";
import { createBuildSchedulers } from "./scheduler";
import { createApiServer } from "./api/server";
import { registerShutdownHandlers } from "./lifecycle";

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("daily-press starting");

  let env: AppEnv;
  let config: SourcesConfig;
  try {
    env = loadEnv();
    const configPath = resolveConfigPath(env.configPath);
    config = withBaseUrl(loadSourcesConfig(configPath, logger), env.opdsBaseUrl);
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    { sources: Object.keys(config.sources).length, baseUrl: config.baseUrl },
    "config loaded",
  );

  const { db, close: closeDb } = createDatabase(resolve(env.databaseUrl));

  const applied = applyMigrations(db, resolve("./drizzle"));
  logger.info({ applied }, "database migrations applied");

  const purged = purgeExpiredSessions(db);
  if (purged > 0) {
    logger.info({ purged }, "expired sessions removed");
  }

  if (!env.github.clientId || !env.github.clientSecret) {
    logger.warn("GITHUB_CLIENT_ID or GITHUB_CLIENT_SECRET not set, dashboard sign-in will fail");
  }

  const rateLimit =
    Object.values(config.sources).find((s) => s.type === "gutenberg")?.rateLimit ??
    config.defaultRateLimit;
  const gutenberg = createGutenbergClient({ rateLimit, logger });
  const github = createGitHubClient({
    owner: env.github.owner,
    repo: env.github.repo,
    branch: env.github.branch,
  });

  const schedulers = createBuildSchedulers({
    db,
    config,
    env,
    logger,
    rootDir: resolve(env.publishRoot),
    gutenberg,
  });
  logger.info({ count: schedulers.length }, "build schedulers started");

  const app = createApiServer({
    db,
    config,
    env,
    logger,
    github,
    gutenberg,
    oauth: createGitHubOAuth(env),
    fetchUser: fetchGitHubUser,
  });
  const server = app.listen(env.port, () => {
    logger.info({ port: env.port }, "api server listening");
  });

  registerShutdownHandlers({
    schedulers,
    closeServer: () => {
      server.close();
    },
    closeDb,
    logger,
  });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
