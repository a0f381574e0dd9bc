// pattern: Imperative Shell
import { GitHub, generateState } from "arctic";
import { z } from "zod";
import type { AppEnv } from "../config/env";
import type { GitHubUser } from "../db/schema";

export { generateState };

/**
 * read:user and user:email identify the user; repo and workflow let the
 * dashboard edit the sources file and dispatch builds on their behalf.
 */
export const GITHUB_SCOPES = ["read:user", "user:email", "repo", "workflow"];

export const GITHUB_USER_URL = "https://api.github.com/user";

const githubUserSchema = z.object({
  id: z.number().int(),
  login: z.string(),
  name: z.string().nullable().default(null),
  avatar_url: z.string(),
  email: z.string().nullable().default(null),
});

export type OAuthClient = {
  createAuthorizationUrl(state: string): URL;
  /** Exchanges an authorization code for an access token. */
  exchangeCode(code: string): Promise<string>;
};

export function callbackUrl(env: Pick<AppEnv, "appUrl">): string {
  return `${env.appUrl}/api/auth/callback`;
}

export function createGitHubOAuth(env: Pick<AppEnv, "appUrl" | "github">): OAuthClient {
  const github = new GitHub(env.github.clientId, env.github.clientSecret, callbackUrl(env));

  return {
    createAuthorizationUrl: (state) => github.createAuthorizationURL(state, GITHUB_SCOPES),
    async exchangeCode(code) {
      const tokens = await github.validateAuthorizationCode(code);
      return tokens.accessToken();
    },
  };
}

export async function fetchGitHubUser(accessToken: string): Promise<GitHubUser> {
  const response = await fetch(GITHUB_USER_URL, {
    headers: {
      Authorization: `Bearer ${accessToken}`,
      Accept: "application/json",
    },
  });

  if (!response.ok) {
    throw new Error("Failed to fetch GitHub user");
  }

  return githubUserSchema.parse(await response.json());
}

/**
 * Logins are compared case-insensitively. An empty allow-list admits every
 * GitHub user.
 */
export function isUserAuthorized(
  user: Pick<GitHubUser, "login">,
  allowedUsers: ReadonlyArray<string>,
): boolean {
  if (allowedUsers.length === 0) return true;
  const login = user.login.toLowerCase();
  return allowedUsers.some((allowed) => allowed.toLowerCase() === login);
}
