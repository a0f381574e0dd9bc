import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadEnv } from "./config/env";
import { loadSourcesConfig, resolveConfigPath, withBaseUrl } from "./config";
import { createDatabase } from "./db";
import { applyMigrations } from "./db/migrate";
import { parseCliArgs, USAGE } from "./cli/args";
import { runCliCommand } from "./cli/commands";

async function main(): Promise<number> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.success) {
    console.error(`${parsed.error}\n\n${USAGE}`);
    return 1;
  }

  const logger = createLogger();
  const env = loadEnv();
  const config = withBaseUrl(
    loadSourcesConfig(resolveConfigPath(env.configPath), logger),
    env.opdsBaseUrl,
  );

  const { db, close } = createDatabase(resolve(env.databaseUrl));
  try {
    applyMigrations(db, resolve("./drizzle"));
    return await runCliCommand(parsed.command, {
      db,
      config,
      env,
      logger,
      rootDir: resolve(env.publishRoot),
    });
  } finally {
    close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("fatal error:", err);
    process.exit(1);
  });
