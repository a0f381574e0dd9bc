import { initTRPC, TRPCError } from "@trpc/server";
import { ZodError } from "zod";
import type { AppContext } from "./context";

const t = initTRPC.context<AppContext>().create({
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        zodError: error.cause instanceof ZodError ? error.cause.flatten() : null,
      },
    };
  },
});

/**
 * tRPC router factory for creating nested route definitions.
 */
export const router = t.router;

/**
 * Procedures anyone may call: catalog health, build history, Gutenberg lookups.
 */
export const publicProcedure = t.procedure;

const requireSession = t.middleware(({ ctx, next }) => {
  if (!ctx.session) {
    throw new TRPCError({
      code: "UNAUTHORIZED",
      message: "You must be signed in with GitHub to access this resource",
    });
  }

  return next({ ctx: { ...ctx, session: ctx.session } });
});

/**
 * Procedures that act on GitHub with the signed-in user's token. The
 * session is non-null in the handler.
 */
export const protectedProcedure = t.procedure.use(requireSession);

/**
 * tRPC caller factory for calling procedures directly without HTTP transport.
 */
export const createCallerFactory = t.createCallerFactory;
