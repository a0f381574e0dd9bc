import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { once } from "node:events";
import type { Server } from "node:http";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { createApiServer } from "./server";
import type { AppDatabase } from "../db";
import { createSession, validateSession } from "../auth/session";
import { publishCatalog } from "../catalog/publish";
import { createGitHubClient } from "../github/client";
import { createGutenbergClient } from "../sources/gutenberg";
import { createTestConfig, createTestDatabase, createTestEnv, TEST_USER } from "../test-utils/db";

const logger = pino({ level: "silent" });

describe("createApiServer", () => {
  let root: string;
  let db: AppDatabase;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    root = mkdtempSync(join(tmpdir(), "server-"));
    mkdirSync(join(root, "books"));
    writeFileSync(join(root, "books", "Bloomberg_2026-01-31.epub"), "epub");
    db = createTestDatabase();

    const config = createTestConfig();
    publishCatalog(root, config, logger);

    const app = createApiServer({
      db,
      config,
      env: createTestEnv({ PUBLISH_ROOT: root }),
      logger,
      github: createGitHubClient({ owner: "press-owner", repo: "press-repo", branch: "main" }),
      gutenberg: createGutenbergClient({
        rateLimit: { requestsPerSecond: 10, cacheHours: 24 },
        logger,
      }),
      oauth: {
        createAuthorizationUrl: (state) =>
          new URL(`https://github.example.com/authorize?state=${state}`),
        exchangeCode: async () => "gho_test",
      },
      fetchUser: async () => TEST_USER,
    });

    server = app.listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("server did not bind a tcp port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.close();
    await once(server, "close");
    rmSync(root, { recursive: true, force: true });
  });

  it("should answer the container health check", async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  it("should serve the catalog with the opds media type", async () => {
    const res = await fetch(`${baseUrl}/opds.xml`);

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toContain("profile=opds-catalog;kind=acquisition");
    expect(await res.text()).toContain("<subtitle>1 issue available</subtitle>");
  });

  it("should serve the published health report", async () => {
    const res = await fetch(`${baseUrl}/health.json`);

    expect(await res.json()).toMatchObject({ status: "ok", book_count: 1 });
  });

  it("should serve archived issues as epub", async () => {
    const res = await fetch(`${baseUrl}/books/Bloomberg_2026-01-31.epub`);

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("application/epub+zip");
    expect(await res.text()).toBe("epub");
  });

  it("should redirect sign-in to github with a state cookie", async () => {
    const res = await fetch(`${baseUrl}/api/auth/login`, { redirect: "manual" });

    expect(res.status).toBe(302);
    expect(res.headers.get("location")).toMatch(/^https:\/\/github\.example\.com\/authorize\?state=/);
    expect(res.headers.get("set-cookie")).toMatch(/^oauth_state=/);
  });

  it("should resolve the session cookie for api calls", async () => {
    const { token } = createSession(db, TEST_USER, "gho_test");

    const signedIn = await fetch(`${baseUrl}/api/trpc/session.me`, {
      headers: { cookie: `session=${token}` },
    });
    const anonymous = await fetch(`${baseUrl}/api/trpc/session.me`);

    expect(await signedIn.json()).toMatchObject({ result: { data: { login: "octo-reader" } } });
    expect(await anonymous.json()).toEqual({ result: { data: null } });
  });

  it("should reject protected procedures without a session", async () => {
    const res = await fetch(`${baseUrl}/api/trpc/workflows.list`);

    expect(res.status).toBe(401);
  });

  it("should end the session on logout", async () => {
    const { token } = createSession(db, TEST_USER, "gho_test");

    const res = await fetch(`${baseUrl}/api/auth/logout`, {
      method: "POST",
      headers: { cookie: `session=${token}` },
    });

    expect(await res.json()).toEqual({ success: true });
    expect(validateSession(db, token)).toBeNull();
  });
});
