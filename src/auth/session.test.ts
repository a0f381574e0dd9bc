import { describe, it, expect, beforeEach } from "vitest";
import type { AppDatabase } from "../db";
import { sessions } from "../db/schema";
import { createTestDatabase, TEST_USER } from "../test-utils/db";
import {
  cookieOptions,
  createSession,
  deleteSession,
  hashToken,
  parseCookies,
  purgeExpiredSessions,
  SESSION_DURATION_MS,
  validateSession,
} from "./session";

describe("sessions", () => {
  let db: AppDatabase;
  const now = new Date("2026-01-31T06:00:00Z");

  beforeEach(() => {
    db = createTestDatabase();
  });

  it("should store only the token hash", () => {
    const { token, expiresAt } = createSession(db, TEST_USER, "gho_test", now);

    const [row] = db.select().from(sessions).all();
    expect(token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(row?.tokenHash).toBe(hashToken(token));
    expect(row?.tokenHash).not.toBe(token);
    expect(expiresAt.getTime()).toBe(now.getTime() + SESSION_DURATION_MS);
  });

  it("should validate a live session", () => {
    const { token } = createSession(db, TEST_USER, "gho_test", now);

    const session = validateSession(db, token, new Date("2026-02-01T06:00:00Z"));

    expect(session?.user).toEqual(TEST_USER);
    expect(session?.accessToken).toBe("gho_test");
  });

  it("should return null for an unknown token", () => {
    expect(validateSession(db, "not-a-session", now)).toBeNull();
  });

  it("should delete an expired session on lookup", () => {
    const { token } = createSession(db, TEST_USER, "gho_test", now);

    const session = validateSession(db, token, new Date("2026-02-08T06:00:00Z"));

    expect(session).toBeNull();
    expect(db.select().from(sessions).all()).toHaveLength(0);
  });

  it("should delete a session by token", () => {
    const { token } = createSession(db, TEST_USER, "gho_test", now);

    deleteSession(db, token);

    expect(validateSession(db, token, now)).toBeNull();
  });

  it("should purge only expired sessions", () => {
    createSession(db, TEST_USER, "gho_old", new Date("2026-01-01T00:00:00Z"));
    createSession(db, TEST_USER, "gho_new", now);

    expect(purgeExpiredSessions(db, new Date("2026-01-20T00:00:00Z"))).toBe(1);
    expect(db.select().from(sessions).all().map((s) => s.accessToken)).toEqual(["gho_new"]);
  });
});

describe("parseCookies", () => {
  it("should parse and decode cookie pairs", () => {
    expect(parseCookies("session=abc123; oauth_state=x%3Dy;theme = dark")).toEqual({
      session: "abc123",
      oauth_state: "x=y",
      theme: "dark",
    });
  });

  it("should keep the first value of a repeated name", () => {
    expect(parseCookies("session=first; session=second")).toEqual({ session: "first" });
  });

  it("should ignore fragments without a value and malformed escapes", () => {
    expect(parseCookies("flag; bad=%E0%A4%A")).toEqual({ bad: "%E0%A4%A" });
  });

  it("should return an empty object without a header", () => {
    expect(parseCookies(undefined)).toEqual({});
  });
});

describe("cookieOptions", () => {
  it("should mark cookies secure in production only", () => {
    expect(cookieOptions(600_000, true)).toEqual({
      httpOnly: true,
      secure: true,
      sameSite: "lax",
      maxAge: 600_000,
      path: "/",
    });
    expect(cookieOptions(600_000, false).secure).toBe(false);
  });
});
