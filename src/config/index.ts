import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { parse, stringify } from "yaml";
import type { Logger } from "pino";
import { sourcesConfigSchema } from "./schema";
import type { SourcesConfig, SourcesConfigInput } from "./schema";

export type ConfigParseResult =
  | { readonly success: true; readonly data: SourcesConfig }
  | { readonly success: false; readonly issues: ReadonlyArray<string> };

/**
 * Picks the sources document location: an explicit path wins, otherwise the
 * first existing candidate under `cwd`, otherwise the primary candidate.
 */
export function resolveConfigPath(
  explicitPath: string | undefined,
  cwd: string = process.cwd(),
): string {
  if (explicitPath) {
    return explicitPath;
  }

  const candidates = [
    join(cwd, "config", "sources.yaml"),
    join(cwd, "sources.yaml"),
  ];

  return candidates.find((p) => existsSync(p)) ?? join(cwd, "config", "sources.yaml");
}

export function parseSourcesConfig(raw: unknown): ConfigParseResult {
  const result = sourcesConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map(
        (i) => `${i.path.join(".")}: ${i.message}`,
      ),
    };
  }
  return { success: true, data: result.data };
}

export function defaultSourcesConfig(): SourcesConfig {
  return sourcesConfigSchema.parse({});
}

export function loadSourcesConfig(
  configPath: string,
  logger: Logger,
): SourcesConfig {
  if (!existsSync(configPath)) {
    logger.warn({ configPath }, "config file not found, using defaults");
    return defaultSourcesConfig();
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }

  if (parsed === null || parsed === undefined) {
    logger.warn({ configPath }, "config file is empty, using defaults");
    return defaultSourcesConfig();
  }

  const result = parseSourcesConfig(parsed);
  if (!result.success) {
    const issues = result.issues.map((i) => `  - ${i}`).join("\n");
    throw new Error(`invalid configuration in ${configPath}:\n${issues}`);
  }

  logger.info(
    { configPath, sourceCount: Object.keys(result.data.sources).length },
    "sources config loaded",
  );
  for (const [sourceId, source] of Object.entries(result.data.sources)) {
    logger.debug(
      { sourceId, name: source.name, type: source.type, enabled: source.enabled },
      "source registered",
    );
  }

  return result.data;
}

export function serializeSourcesConfig(
  config: SourcesConfig | SourcesConfigInput,
): string {
  return stringify(config, { indent: 2, lineWidth: 0 });
}

export function saveSourcesConfig(
  config: SourcesConfig,
  configPath: string,
  logger: Logger,
): void {
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, serializeSourcesConfig(config), "utf-8");
  logger.info({ configPath }, "sources config saved");
}

/**
 * Applies a deployment-level base URL override (e.g. `OPDS_BASE_URL`).
 */
export function withBaseUrl(
  config: SourcesConfig,
  baseUrl: string | undefined,
): SourcesConfig {
  if (!baseUrl) {
    return config;
  }
  return {
    ...config,
    baseUrl: baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`,
  };
}

export {
  getSource,
  getEnabledSources,
  getScheduledSources,
  getOnDemandSources,
  resolveDeviceProfile,
} from "./select";
export type { SourceEntry } from "./select";
export type {
  SourcesConfig,
  SourcesConfigInput,
  SourceConfig,
  SourceType,
  ScheduleMode,
  RateLimitConfig,
  DeviceProfile,
} from "./schema";
