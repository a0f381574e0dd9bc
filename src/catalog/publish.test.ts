import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { publishCatalog } from "./publish";
import { createTestConfig } from "../test-utils/db";

const logger = pino({ level: "silent" });

describe("publishCatalog", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "publish-"));
    mkdirSync(join(root, "books"));
    writeFileSync(join(root, "books", "Bloomberg_2026-01-30.epub"), "x".repeat(100));
    writeFileSync(join(root, "books", "Bloomberg_2026-01-31.epub"), "x".repeat(200));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("should write the catalog and the health report", () => {
    const now = new Date("2026-02-01T07:00:00Z");

    const result = publishCatalog(root, createTestConfig(), logger, now);

    expect(readFileSync(join(root, "opds.xml"), "utf-8")).toBe(result.catalog);
    expect(result.catalog).toContain("<subtitle>2 issues available (rolling weekly archive)</subtitle>");

    const health: unknown = JSON.parse(readFileSync(join(root, "health.json"), "utf-8"));
    expect(health).toEqual(result.health);
    expect(result.health.book_count).toBe(2);
    expect(result.health.newest_book).toBe("2026-01-31");
    expect(result.health.total_size_bytes).toBe(300);
  });

  it("should write pretty-printed json", () => {
    publishCatalog(root, createTestConfig(), logger);

    const raw = readFileSync(join(root, "health.json"), "utf-8");
    expect(raw.startsWith('{\n  "status": "ok",\n')).toBe(true);
  });
});
