// pattern: Imperative Shell
import { z } from "zod";
import { desc, eq } from "drizzle-orm";
import { router, publicProcedure } from "../trpc";
import { builds } from "../../db/schema";

function bySource(sourceId: string | undefined) {
  return sourceId === undefined ? undefined : eq(builds.sourceId, sourceId);
}

/**
 * Pipeline build history, newest first.
 */
export const buildsRouter = router({
  list: publicProcedure
    .input(
      z
        .object({
          sourceId: z.string().min(1).optional(),
          limit: z.number().int().min(1).max(100).default(20),
          offset: z.number().int().nonnegative().default(0),
        })
        .default({}),
    )
    .query(({ ctx, input }) => {
      return ctx.db
        .select()
        .from(builds)
        .where(bySource(input.sourceId))
        .orderBy(desc(builds.startedAt), desc(builds.id))
        .limit(input.limit)
        .offset(input.offset)
        .all();
    }),

  latest: publicProcedure
    .input(z.object({ sourceId: z.string().min(1).optional() }).default({}))
    .query(({ ctx, input }) => {
      return (
        ctx.db
          .select()
          .from(builds)
          .where(bySource(input.sourceId))
          .orderBy(desc(builds.startedAt), desc(builds.id))
          .get() ?? null
      );
    }),
});
