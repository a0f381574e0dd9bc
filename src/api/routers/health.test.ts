import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createTestCaller, createTestDatabase, createTestEnv } from "../../test-utils/db";
import type { HealthReport } from "../../catalog/health";

const report: HealthReport = {
  status: "ok",
  last_update: "2026-01-31T06:05:00+00:00",
  book_count: 1,
  oldest_book: "2026-01-31",
  newest_book: "2026-01-31",
  total_size_bytes: 2048,
  total_size_mb: 0,
  opds_url: "https://press.example.com/opds.xml",
  books: [
    {
      filename: "Bloomberg_2026-01-31.epub",
      date: "2026-01-31",
      size_bytes: 2048,
      title: "Daily Briefing - January 31, 2026",
    },
  ],
};

describe("health router", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "health-router-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    vi.unstubAllGlobals();
  });

  function caller() {
    return createTestCaller(createTestDatabase(), {
      env: createTestEnv({ PUBLISH_ROOT: root }),
    });
  }

  it("should read the locally published report", async () => {
    writeFileSync(join(root, "health.json"), JSON.stringify(report));

    expect(await caller().health.get()).toEqual(report);
  });

  it("should return an error shape when the report is missing", async () => {
    expect(await caller().health.get()).toEqual({
      status: "error",
      error: "Failed to fetch health status",
      book_count: 0,
      books: [],
    });
  });

  it("should fetch the report from the catalog base url when asked", async () => {
    const fetchMock = vi.fn().mockResolvedValue({
      ok: true,
      status: 200,
      json: vi.fn().mockResolvedValue(report),
    });
    vi.stubGlobal("fetch", fetchMock);

    expect(await caller().health.get({ remote: true })).toEqual(report);
    expect(fetchMock).toHaveBeenCalledWith("https://press.example.com/health.json");
  });
});
