// pattern: Functional Core
import { z } from "zod";
import { isDebugEnabled } from "../logger";

const envSchema = z.object({
  LOG_LEVEL: z.string().min(1).optional(),
  PRESS_DEBUG: z.string().optional(),
  CONFIG_PATH: z.string().min(1).optional(),
  DATABASE_URL: z.string().min(1).default("./data/daily-press.db"),
  PORT: z.coerce.number().int().positive().default(3000),
  APP_URL: z.string().url().default("http://localhost:3000"),
  PUBLISH_ROOT: z.string().min(1).default("."),
  GITHUB_CLIENT_ID: z.string().default(""),
  GITHUB_CLIENT_SECRET: z.string().default(""),
  ALLOWED_GITHUB_USERS: z.string().default(""),
  GITHUB_REPO_OWNER: z.string().min(1).default("daily-press"),
  GITHUB_REPO_NAME: z.string().min(1).default("daily-press"),
  GITHUB_BRANCH: z.string().min(1).default("master"),
  SOURCES_REPO_PATH: z.string().min(1).default("config/sources.yaml"),
  WORKFLOW_RUN_ID: z.string().min(1).default("local"),
  GIT_SHA: z.string().min(1).default("unknown"),
  OPDS_BASE_URL: z.string().url().optional(),
  EBOOK_CONVERT: z.string().min(1).default("ebook-convert"),
  NODE_ENV: z.string().default("development"),
});

/**
 * Process-level settings: secrets, deployment coordinates and CI metadata.
 * Everything describing *what* to build lives in the sources document instead.
 */
export type AppEnv = Readonly<{
  logLevel: string | undefined;
  debug: boolean;
  configPath: string | undefined;
  databaseUrl: string;
  port: number;
  appUrl: string;
  publishRoot: string;
  github: Readonly<{
    clientId: string;
    clientSecret: string;
    owner: string;
    repo: string;
    branch: string;
    sourcesPath: string;
  }>;
  allowedUsers: ReadonlyArray<string>;
  build: Readonly<{ workflowRunId: string; gitSha: string }>;
  opdsBaseUrl: string | undefined;
  ebookConvert: string;
  production: boolean;
}>;

export function loadEnv(env: NodeJS.ProcessEnv = process.env): AppEnv {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid environment:\n${issues}`);
  }

  const e = result.data;
  return {
    logLevel: e.LOG_LEVEL,
    debug: isDebugEnabled(e.PRESS_DEBUG),
    configPath: e.CONFIG_PATH,
    databaseUrl: e.DATABASE_URL,
    port: e.PORT,
    appUrl: e.APP_URL.replace(/\/+$/, ""),
    publishRoot: e.PUBLISH_ROOT,
    github: {
      clientId: e.GITHUB_CLIENT_ID,
      clientSecret: e.GITHUB_CLIENT_SECRET,
      owner: e.GITHUB_REPO_OWNER,
      repo: e.GITHUB_REPO_NAME,
      branch: e.GITHUB_BRANCH,
      sourcesPath: e.SOURCES_REPO_PATH,
    },
    allowedUsers: e.ALLOWED_GITHUB_USERS.split(",")
      .map((u) => u.trim())
      .filter(Boolean),
    build: { workflowRunId: e.WORKFLOW_RUN_ID, gitSha: e.GIT_SHA },
    opdsBaseUrl: e.OPDS_BASE_URL,
    ebookConvert: e.EBOOK_CONVERT,
    production: e.NODE_ENV === "production",
  };
}
