import { describe, it, expect, vi, beforeEach } from "vitest";
import pino from "pino";
import { handleOAuthCallback, loginErrorPath } from "./auth-routes";
import type { AuthDeps, CallbackParams } from "./auth-routes";
import type { AppDatabase } from "../db";
import type { GitHubUser } from "../db/schema";
import { validateSession } from "../auth/session";
import { createTestDatabase, createTestEnv, TEST_USER } from "../test-utils/db";

describe("handleOAuthCallback", () => {
  let db: AppDatabase;
  const exchangeCode = vi.fn<(code: string) => Promise<string>>();
  const fetchUser = vi.fn<(token: string) => Promise<GitHubUser>>();

  const valid: CallbackParams = {
    code: "code-1",
    state: "state-1",
    error: undefined,
    storedState: "state-1",
  };

  function deps(allowed = ""): AuthDeps {
    return {
      db,
      env: createTestEnv({ ALLOWED_GITHUB_USERS: allowed }),
      logger: pino({ level: "silent" }),
      oauth: {
        createAuthorizationUrl: (state) => new URL(`https://github.example.com/authorize?state=${state}`),
        exchangeCode,
      },
      fetchUser,
    };
  }

  beforeEach(() => {
    vi.clearAllMocks();
    db = createTestDatabase();
    exchangeCode.mockResolvedValue("gho_test");
    fetchUser.mockResolvedValue(TEST_USER);
  });

  it("should open a session for an allowed user", async () => {
    const outcome = await handleOAuthCallback(valid, deps("octo-reader"));

    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.user).toEqual(TEST_USER);
    expect(exchangeCode).toHaveBeenCalledWith("code-1");
    expect(fetchUser).toHaveBeenCalledWith("gho_test");
    expect(validateSession(db, outcome.token)?.accessToken).toBe("gho_test");
  });

  it("should report a provider error", async () => {
    expect(await handleOAuthCallback({ ...valid, error: "access_denied" }, deps())).toEqual({
      success: false,
      error: "oauth_error",
    });
  });

  it("should require a code", async () => {
    expect(await handleOAuthCallback({ ...valid, code: undefined }, deps())).toEqual({
      success: false,
      error: "no_code",
    });
  });

  it("should reject a missing or mismatched state", async () => {
    expect(await handleOAuthCallback({ ...valid, storedState: undefined }, deps())).toEqual({
      success: false,
      error: "invalid_state",
    });
    expect(await handleOAuthCallback({ ...valid, state: "forged" }, deps())).toEqual({
      success: false,
      error: "invalid_state",
    });
    expect(exchangeCode).not.toHaveBeenCalled();
  });

  it("should refuse users outside the allow-list", async () => {
    expect(await handleOAuthCallback(valid, deps("someone-else"))).toEqual({
      success: false,
      error: "unauthorized",
    });
  });

  it("should report a failed exchange as auth_failed", async () => {
    exchangeCode.mockRejectedValue(new Error("bad_verification_code"));

    expect(await handleOAuthCallback(valid, deps())).toEqual({
      success: false,
      error: "auth_failed",
    });
  });
});

describe("loginErrorPath", () => {
  it("should point back at the login page", () => {
    expect(loginErrorPath("invalid_state")).toBe("/login?error=invalid_state");
  });
});
