// pattern: Imperative Shell
import { join, resolve } from "node:path";
import express from "express";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import { appRouter } from "./router";
import { createAuthRoutes } from "./auth-routes";
import type { AuthDeps } from "./auth-routes";
import type { AppContext } from "./context";
import { parseCookies, SESSION_COOKIE, validateSession } from "../auth/session";
import type { AuthSession } from "../auth/session";
import { OPDS_ACQUISITION_TYPE } from "../catalog/opds";

export type ServerDeps = Omit<AppContext, "session"> & Pick<AuthDeps, "oauth" | "fetchUser">;

const EPUB_TYPE = "application/epub+zip";

function sessionFromCookie(
  deps: Pick<ServerDeps, "db">,
  cookieHeader: string | undefined,
): AuthSession | null {
  const token = parseCookies(cookieHeader)[SESSION_COOKIE];
  return token ? validateSession(deps.db, token) : null;
}

/**
 * Creates the HTTP service: the published catalog files, GitHub sign-in
 * and the dashboard's tRPC API at `/api/trpc`. A `/health` endpoint is
 * included for container health checks.
 *
 * @returns Configured Express app instance (not started; caller decides port)
 */
export function createApiServer(deps: ServerDeps): express.Express {
  const app = express();
  const { config, env } = deps;
  const publishRoot = resolve(env.publishRoot);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get(`/${config.paths.catalog}`, (_req, res, next) => {
    res.type(OPDS_ACQUISITION_TYPE);
    res.sendFile(join(publishRoot, config.paths.catalog), (err) => {
      if (err) next(err);
    });
  });

  app.get(`/${config.paths.health}`, (_req, res, next) => {
    res.sendFile(join(publishRoot, config.paths.health), (err) => {
      if (err) next(err);
    });
  });

  app.use(
    `/${config.paths.books}`,
    express.static(join(publishRoot, config.paths.books), {
      index: false,
      setHeaders: (res, path) => {
        if (path.endsWith(".epub")) res.setHeader("Content-Type", EPUB_TYPE);
      },
    }),
  );

  app.use(
    "/api/auth",
    createAuthRoutes({
      db: deps.db,
      env,
      logger: deps.logger,
      oauth: deps.oauth,
      fetchUser: deps.fetchUser,
    }),
  );

  app.use(
    "/api/trpc",
    createExpressMiddleware({
      router: appRouter,
      createContext: ({ req }): AppContext => ({
        db: deps.db,
        config,
        env,
        logger: deps.logger,
        github: deps.github,
        gutenberg: deps.gutenberg,
        session: sessionFromCookie(deps, req.headers.cookie),
      }),
      onError: ({ path, error }) => {
        if (error.code === "INTERNAL_SERVER_ERROR") {
          deps.logger.error({ path, error: error.message }, "trpc request failed");
        }
      },
    }),
  );

  return app;
}
