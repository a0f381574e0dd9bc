// pattern: Imperative Shell
import { desc, sql } from "drizzle-orm";
import { router, publicProcedure } from "../trpc";
import { builds } from "../../db/schema";
import {
  getEnabledSources,
  getOnDemandSources,
  getScheduledSources,
} from "../../config/select";

export const systemRouter = router({
  status: publicProcedure.query(({ ctx }) => {
    const buildCount =
      ctx.db
        .select({ count: sql<number>`count(*)` })
        .from(builds)
        .get()?.count ?? 0;

    const lastBuild =
      ctx.db
        .select()
        .from(builds)
        .orderBy(desc(builds.startedAt), desc(builds.id))
        .get() ?? null;

    const scheduled = getScheduledSources(ctx.config);

    return {
      sourceCount: Object.keys(ctx.config.sources).length,
      enabledSourceCount: getEnabledSources(ctx.config).length,
      onDemandSourceCount: getOnDemandSources(ctx.config).length,
      schedules: scheduled.map(({ id, source }) => ({
        sourceId: id,
        schedule: source.schedule ?? null,
      })),
      buildCount,
      lastBuild,
      deviceProfile: ctx.config.pipeline.deviceProfile,
      catalogUrl: `${ctx.config.baseUrl}${ctx.config.paths.catalog}`,
    };
  }),
});
