// pattern: Imperative Shell
import { z } from "zod";
import { router, protectedProcedure } from "../trpc";
import { errorMessage, toTRPCError } from "../errors";

const workflowIdSchema = z.union([z.number().int().positive(), z.string().min(1)]);

/**
 * GitHub Actions runs of the build workflow, read and dispatched with the
 * signed-in user's token.
 */
export const workflowsRouter = router({
  list: protectedProcedure.query(async ({ ctx }) => {
    try {
      return await ctx.github.listWorkflows(ctx.session.accessToken);
    } catch (err) {
      ctx.logger.error({ error: errorMessage(err) }, "failed to list workflows");
      throw toTRPCError(err, "Failed to list workflows");
    }
  }),

  runs: protectedProcedure
    .input(
      z
        .object({
          workflowId: workflowIdSchema.optional(),
          limit: z.number().int().min(1).max(100).default(10),
        })
        .default({}),
    )
    .query(async ({ ctx, input }) => {
      try {
        return await ctx.github.getWorkflowRuns(
          ctx.session.accessToken,
          input.workflowId,
          input.limit,
        );
      } catch (err) {
        ctx.logger.error({ error: errorMessage(err) }, "failed to get workflow runs");
        throw toTRPCError(err, "Failed to get workflow runs");
      }
    }),

  trigger: protectedProcedure
    .input(
      z.object({
        workflowId: workflowIdSchema,
        ref: z.string().min(1).optional(),
        inputs: z.record(z.string(), z.string()).default({}),
      }),
    )
    .mutation(async ({ ctx, input }) => {
      try {
        await ctx.github.triggerWorkflow(
          ctx.session.accessToken,
          input.workflowId,
          input.ref ?? ctx.env.github.branch,
          input.inputs,
        );
      } catch (err) {
        ctx.logger.error(
          { error: errorMessage(err), workflowId: input.workflowId },
          "failed to trigger workflow",
        );
        throw toTRPCError(err, "Failed to trigger workflow");
      }

      ctx.logger.info(
        { workflowId: input.workflowId, user: ctx.session.user.login },
        "workflow triggered",
      );
      return {
        success: true,
        message: `Workflow ${input.workflowId} triggered successfully`,
      };
    }),
});
