// pattern: Imperative Shell
import { router, protectedProcedure } from "../trpc";
import { errorMessage, toTRPCError } from "../errors";
import { formatBytes, formatRelativeTime } from "../format";
import { loadHealthReport } from "./health";
import type { HealthReport } from "../../catalog/health";

export const RECENT_RUN_LIMIT = 5;

export type OverviewStats = {
  readonly bookCount: number;
  readonly newestBook: string | null;
  readonly oldestBook: string | null;
  readonly lastUpdate: string;
  readonly lastUpdateRelative: string;
  readonly totalSize: string;
  readonly totalSizeBytes: number;
  readonly opdsUrl: string;
};

export function toOverviewStats(health: HealthReport, now: Date): OverviewStats {
  return {
    bookCount: health.book_count,
    newestBook: health.newest_book,
    oldestBook: health.oldest_book,
    lastUpdate: health.last_update,
    lastUpdateRelative: formatRelativeTime(new Date(health.last_update), now),
    totalSize: formatBytes(health.total_size_bytes),
    totalSizeBytes: health.total_size_bytes,
    opdsUrl: health.opds_url,
  };
}

export const dashboardRouter = router({
  overview: protectedProcedure.query(async ({ ctx }) => {
    let stats: OverviewStats | null = null;
    try {
      stats = toOverviewStats(await loadHealthReport(ctx, false), new Date());
    } catch (err) {
      ctx.logger.warn({ error: errorMessage(err) }, "health status unavailable for overview");
    }

    try {
      const recentRuns = await ctx.github.getWorkflowRuns(
        ctx.session.accessToken,
        undefined,
        RECENT_RUN_LIMIT,
      );
      return { stats, recentRuns };
    } catch (err) {
      ctx.logger.error({ error: errorMessage(err) }, "failed to get recent runs");
      throw toTRPCError(err, "Failed to get workflow runs");
    }
  }),
});
