// pattern: Imperative Shell
import express from "express";
import type { Logger } from "pino";
import type { AppDatabase } from "../db";
import type { AppEnv } from "../config/env";
import type { GitHubUser } from "../db/schema";
import { generateState, isUserAuthorized } from "../auth/oauth";
import type { OAuthClient } from "../auth/oauth";
import {
  cookieOptions,
  createSession,
  deleteSession,
  OAUTH_STATE_COOKIE,
  OAUTH_STATE_MAX_AGE_MS,
  parseCookies,
  SESSION_COOKIE,
  SESSION_DURATION_MS,
} from "../auth/session";
import { errorMessage } from "./errors";

export type LoginError = "oauth_error" | "no_code" | "invalid_state" | "unauthorized" | "auth_failed";

export type AuthDeps = {
  readonly db: AppDatabase;
  readonly env: AppEnv;
  readonly logger: Logger;
  readonly oauth: OAuthClient;
  readonly fetchUser: (accessToken: string) => Promise<GitHubUser>;
};

export type CallbackParams = {
  readonly code: string | undefined;
  readonly state: string | undefined;
  readonly error: string | undefined;
  readonly storedState: string | undefined;
};

export type CallbackOutcome =
  | { readonly success: true; readonly token: string; readonly user: GitHubUser }
  | { readonly success: false; readonly error: LoginError };

export function loginErrorPath(error: LoginError): string {
  return `/login?error=${error}`;
}

/**
 * Completes the authorization-code flow: checks the provider's answer and
 * the CSRF state, exchanges the code, applies the allow-list and opens a
 * session.
 */
export async function handleOAuthCallback(
  params: CallbackParams,
  deps: AuthDeps,
): Promise<CallbackOutcome> {
  const { logger } = deps;

  if (params.error) {
    logger.warn({ error: params.error }, "oauth provider returned an error");
    return { success: false, error: "oauth_error" };
  }
  if (!params.code) {
    return { success: false, error: "no_code" };
  }
  if (!params.storedState || params.storedState !== params.state) {
    logger.warn("oauth state mismatch");
    return { success: false, error: "invalid_state" };
  }

  try {
    const accessToken = await deps.oauth.exchangeCode(params.code);
    const user = await deps.fetchUser(accessToken);

    if (!isUserAuthorized(user, deps.env.allowedUsers)) {
      logger.warn({ login: user.login }, "unauthorized login attempt");
      return { success: false, error: "unauthorized" };
    }

    const { token } = createSession(deps.db, user, accessToken);
    logger.info({ login: user.login }, "user signed in");
    return { success: true, token, user };
  } catch (err) {
    logger.error({ error: errorMessage(err) }, "oauth callback failed");
    return { success: false, error: "auth_failed" };
  }
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * GitHub sign-in under `/api/auth`: login, callback and logout.
 */
export function createAuthRoutes(deps: AuthDeps): express.Router {
  const routes = express.Router();
  const secure = deps.env.production;

  routes.get("/login", (_req, res) => {
    const state = generateState();
    res.cookie(OAUTH_STATE_COOKIE, state, cookieOptions(OAUTH_STATE_MAX_AGE_MS, secure));
    res.redirect(deps.oauth.createAuthorizationUrl(state).toString());
  });

  routes.get("/callback", (req, res, next) => {
    const cookies = parseCookies(req.headers.cookie);
    res.clearCookie(OAUTH_STATE_COOKIE, { path: "/" });

    handleOAuthCallback(
      {
        code: queryString(req.query["code"]),
        state: queryString(req.query["state"]),
        error: queryString(req.query["error"]),
        storedState: cookies[OAUTH_STATE_COOKIE],
      },
      deps,
    )
      .then((outcome) => {
        if (!outcome.success) {
          res.redirect(loginErrorPath(outcome.error));
          return;
        }
        res.cookie(SESSION_COOKIE, outcome.token, cookieOptions(SESSION_DURATION_MS, secure));
        res.redirect("/dashboard");
      })
      .catch(next);
  });

  const logout = (req: express.Request, res: express.Response) => {
    const token = parseCookies(req.headers.cookie)[SESSION_COOKIE];
    if (token) {
      deleteSession(deps.db, token);
    }
    res.clearCookie(SESSION_COOKIE, { path: "/" });
  };

  routes.get("/logout", (req, res) => {
    logout(req, res);
    res.redirect("/");
  });

  routes.post("/logout", (req, res) => {
    logout(req, res);
    res.json({ success: true });
  });

  return routes;
}
