// pattern: Imperative Shell
import { router } from "./trpc";
import { systemRouter } from "./routers/system";
import { healthRouter } from "./routers/health";
import { sessionRouter } from "./routers/session";
import { workflowsRouter } from "./routers/workflows";
import { sourcesRouter } from "./routers/sources";
import { gutenbergRouter } from "./routers/gutenberg";
import { buildsRouter } from "./routers/builds";
import { dashboardRouter } from "./routers/dashboard";

/**
 * Root tRPC router combining all domain-specific sub-routers.
 */
export const appRouter = router({
  system: systemRouter,
  health: healthRouter,
  session: sessionRouter,
  workflows: workflowsRouter,
  sources: sourcesRouter,
  gutenberg: gutenbergRouter,
  builds: buildsRouter,
  dashboard: dashboardRouter,
});

/**
 * Inferred type of the root tRPC router.
 * Used for type-safe client code generation and caller factory typing.
 */
export type AppRouter = typeof appRouter;
