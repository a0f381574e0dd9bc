// pattern: Imperative Shell
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { router, publicProcedure } from "../trpc";
import type { AppContext } from "../context";
import { healthReportSchema } from "../../catalog/health";
import type { HealthReport } from "../../catalog/health";

export type HealthError = {
  readonly status: "error";
  readonly error: string;
  readonly book_count: 0;
  readonly books: [];
};

export function healthReportUrl(ctx: Pick<AppContext, "config">): string {
  return `${ctx.config.baseUrl}${ctx.config.paths.health}`;
}

/**
 * Reads the health report this service publishes under its publish root,
 * or, with `remote`, the copy served from the catalog's base URL.
 */
export async function loadHealthReport(
  ctx: Pick<AppContext, "config" | "env" | "github">,
  remote: boolean,
): Promise<HealthReport> {
  if (remote) {
    return ctx.github.fetchHealthStatus(healthReportUrl(ctx));
  }
  const path = join(ctx.env.publishRoot, ctx.config.paths.health);
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return healthReportSchema.parse(raw);
}

export const healthRouter = router({
  get: publicProcedure
    .input(z.object({ remote: z.boolean().default(false) }).default({}))
    .query(async ({ ctx, input }): Promise<HealthReport | HealthError> => {
      try {
        return await loadHealthReport(ctx, input.remote);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        ctx.logger.error({ error: message, remote: input.remote }, "failed to load health status");
        return {
          status: "error",
          error: "Failed to fetch health status",
          book_count: 0,
          books: [],
        };
      }
    }),
});
