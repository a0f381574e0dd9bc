import { afterEach, describe, it, expect, vi } from "vitest";
import {
  callbackUrl,
  createGitHubOAuth,
  fetchGitHubUser,
  GITHUB_USER_URL,
  isUserAuthorized,
} from "./oauth";
import { createTestEnv, TEST_USER } from "../test-utils/db";

describe("createGitHubOAuth", () => {
  it("should build an authorization url with the callback and scopes", () => {
    const env = createTestEnv();

    const url = createGitHubOAuth(env).createAuthorizationUrl("state-123");

    expect(url.origin + url.pathname).toBe("https://github.com/login/oauth/authorize");
    expect(url.searchParams.get("client_id")).toBe("test-client-id");
    expect(url.searchParams.get("state")).toBe("state-123");
    expect(url.searchParams.get("scope")).toBe("read:user user:email repo workflow");
    expect(url.searchParams.get("redirect_uri")).toBe(
      "https://dashboard.example.com/api/auth/callback",
    );
  });

  it("should derive the callback from the app url", () => {
    expect(callbackUrl({ appUrl: "http://localhost:3000" })).toBe(
      "http://localhost:3000/api/auth/callback",
    );
  });
});

describe("fetchGitHubUser", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should return the authenticated user", async () => {
    const fetchMock = vi.fn().mockResolvedValue({
      ok: true,
      status: 200,
      json: vi.fn().mockResolvedValue({ ...TEST_USER, followers: 3 }),
    });
    vi.stubGlobal("fetch", fetchMock);

    const user = await fetchGitHubUser("gho_test");

    expect(user).toEqual(TEST_USER);
    expect(fetchMock).toHaveBeenCalledWith(GITHUB_USER_URL, {
      headers: { Authorization: "Bearer gho_test", Accept: "application/json" },
    });
  });

  it("should default missing name and email to null", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue({
        ok: true,
        status: 200,
        json: vi.fn().mockResolvedValue({ id: 5, login: "quiet", avatar_url: "https://a.example.com/5" }),
      }),
    );

    await expect(fetchGitHubUser("gho_test")).resolves.toEqual({
      id: 5,
      login: "quiet",
      name: null,
      avatar_url: "https://a.example.com/5",
      email: null,
    });
  });

  it("should throw on a failed response", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue({ ok: false, status: 401 }));

    await expect(fetchGitHubUser("gho_test")).rejects.toThrow("Failed to fetch GitHub user");
  });
});

describe("isUserAuthorized", () => {
  it("should admit everyone when the allow-list is empty", () => {
    expect(isUserAuthorized(TEST_USER, [])).toBe(true);
  });

  it("should match logins case-insensitively", () => {
    expect(isUserAuthorized(TEST_USER, ["someone", "Octo-Reader"])).toBe(true);
  });

  it("should reject users not on the list", () => {
    expect(isUserAuthorized(TEST_USER, ["someone"])).toBe(false);
  });
});
