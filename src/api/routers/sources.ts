// pattern: Imperative Shell
import { z } from "zod";
import { parse } from "yaml";
import { TRPCError } from "@trpc/server";
import { router, protectedProcedure } from "../trpc";
import { errorMessage, toTRPCError } from "../errors";
import { parseSourcesConfig, serializeSourcesConfig } from "../../config";

export const DEFAULT_COMMIT_MESSAGE = "Update sources configuration";

/**
 * The sources document as committed in the GitHub repository. Reads return
 * the document as written; writes are validated and committed in canonical
 * form.
 */
export const sourcesRouter = router({
  get: protectedProcedure.query(async ({ ctx }) => {
    const path = ctx.env.github.sourcesPath;
    try {
      const { content, sha } = await ctx.github.getFileContent(ctx.session.accessToken, path);
      const config: unknown = parse(content);
      return { config, sha };
    } catch (err) {
      ctx.logger.error({ error: errorMessage(err), path }, "failed to get sources config");
      throw toTRPCError(err, "Failed to get sources configuration");
    }
  }),

  update: protectedProcedure
    .input(
      z.object({
        config: z.unknown(),
        sha: z.string().min(1).optional(),
        message: z.string().min(1).default(DEFAULT_COMMIT_MESSAGE),
      }),
    )
    .mutation(async ({ ctx, input }) => {
      const parsed = parseSourcesConfig(input.config);
      if (!parsed.success) {
        throw new TRPCError({
          code: "BAD_REQUEST",
          message: `Invalid sources configuration:\n${parsed.issues.map((i) => `  - ${i}`).join("\n")}`,
        });
      }

      const path = ctx.env.github.sourcesPath;
      try {
        await ctx.github.updateFile(
          ctx.session.accessToken,
          path,
          serializeSourcesConfig(parsed.data),
          input.message,
          input.sha,
        );
      } catch (err) {
        ctx.logger.error({ error: errorMessage(err), path }, "failed to update sources config");
        throw toTRPCError(err, "Failed to update sources configuration");
      }

      ctx.logger.info(
        { path, user: ctx.session.user.login, sources: Object.keys(parsed.data.sources).length },
        "sources config committed",
      );
      return { success: true, message: "Configuration updated successfully" };
    }),
});
