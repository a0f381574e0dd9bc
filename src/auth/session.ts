// pattern: Imperative Shell
import { createHash, randomBytes } from "node:crypto";
import { eq, lt } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { sessions } from "../db/schema";
import type { GitHubUser } from "../db/schema";

export const SESSION_COOKIE = "session";
export const OAUTH_STATE_COOKIE = "oauth_state";

export const SESSION_DURATION_MS = 7 * 24 * 60 * 60 * 1000;
export const OAUTH_STATE_MAX_AGE_MS = 10 * 60 * 1000;

export type AuthSession = {
  readonly user: GitHubUser;
  readonly accessToken: string;
  readonly expiresAt: Date;
};

export type CookieOptions = {
  readonly httpOnly: true;
  readonly secure: boolean;
  readonly sameSite: "lax";
  readonly maxAge: number;
  readonly path: "/";
};

/**
 * Options for a cookie readable only by the server. `maxAge` is in
 * milliseconds, as Express takes it.
 */
export function cookieOptions(maxAge: number, production: boolean): CookieOptions {
  return { httpOnly: true, secure: production, sameSite: "lax", maxAge, path: "/" };
}

export function hashToken(token: string): string {
  return createHash("sha256").update(token).digest("hex");
}

/**
 * Stores a new session and returns the raw token for the cookie. Only the
 * token's SHA-256 hash is persisted.
 */
export function createSession(
  db: AppDatabase,
  user: GitHubUser,
  accessToken: string,
  now: Date = new Date(),
): { token: string; expiresAt: Date } {
  const token = randomBytes(32).toString("base64url");
  const expiresAt = new Date(now.getTime() + SESSION_DURATION_MS);

  db.insert(sessions)
    .values({ tokenHash: hashToken(token), user, accessToken, expiresAt, createdAt: now })
    .run();

  return { token, expiresAt };
}

/**
 * Looks up the session for a cookie token. An expired session is deleted
 * and treated as absent.
 */
export function validateSession(
  db: AppDatabase,
  token: string,
  now: Date = new Date(),
): AuthSession | null {
  const tokenHash = hashToken(token);
  const row = db.select().from(sessions).where(eq(sessions.tokenHash, tokenHash)).get();
  if (!row) return null;

  if (row.expiresAt.getTime() <= now.getTime()) {
    db.delete(sessions).where(eq(sessions.id, row.id)).run();
    return null;
  }

  return { user: row.user, accessToken: row.accessToken, expiresAt: row.expiresAt };
}

export function deleteSession(db: AppDatabase, token: string): void {
  db.delete(sessions).where(eq(sessions.tokenHash, hashToken(token))).run();
}

/**
 * @returns Number of expired sessions removed.
 */
export function purgeExpiredSessions(db: AppDatabase, now: Date = new Date()): number {
  return db.delete(sessions).where(lt(sessions.expiresAt, now)).run().changes;
}

export function parseCookies(header: string | undefined): Record<string, string> {
  const cookies: Record<string, string> = {};
  if (!header) return cookies;

  for (const part of header.split(";")) {
    const index = part.indexOf("=");
    if (index === -1) continue;
    const name = part.slice(0, index).trim();
    const raw = part.slice(index + 1).trim();
    if (!name || Object.hasOwn(cookies, name)) continue;
    cookies[name] = safeDecode(raw);
  }
  return cookies;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
