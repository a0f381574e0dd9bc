// pattern: Functional Core
import type { Logger } from "pino";
import type { AppDatabase } from "../db";
import type { AppEnv } from "../config/env";
import type { SourcesConfig } from "../config/schema";
import type { AuthSession } from "../auth/session";
import type { GitHubClient } from "../github/client";
import type { GutenbergClient } from "../sources/gutenberg";

/**
 * tRPC context passed to all procedures. Everything but `session` is shared
 * by every request; `session` is resolved from the request's cookie.
 */
export type AppContext = {
  readonly db: AppDatabase;
  readonly config: SourcesConfig;
  readonly env: AppEnv;
  readonly logger: Logger;
  readonly session: AuthSession | null;
  readonly github: GitHubClient;
  readonly gutenberg: GutenbergClient;
};
