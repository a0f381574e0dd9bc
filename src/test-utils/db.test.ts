import { describe, it, expect } from "vitest";
import { sql } from "drizzle-orm";
import { resolve } from "node:path";
import { createTestConfig, createTestDatabase, seedTestBuild } from "./db";
import { applyMigrations } from "../db/migrate";
import { builds } from "../db/schema";

describe("Test Database Utilities", () => {
  it("should create an in-memory database with the schema applied", () => {
    const db = createTestDatabase();

    const tables = db
      .all<{ name: string }>(
        sql.raw("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name"),
      )
      .map((row) => row.name);

    expect(tables).toContain("builds");
    expect(tables).toContain("sessions");
    expect(tables).toContain("__migrations");
  });

  it("should not re-apply migrations that already ran", () => {
    const db = createTestDatabase();

    expect(applyMigrations(db, resolve("./drizzle"))).toEqual([]);
  });

  it("should seed a build with overrides", () => {
    const db = createTestDatabase();
    const id = seedTestBuild(db, { sourceId: "gutenberg", status: "failed" });

    const row = db.select().from(builds).get();
    expect(row?.id).toBe(id);
    expect(row?.sourceId).toBe("gutenberg");
    expect(row?.status).toBe("failed");
  });

  it("should build a valid sources config", () => {
    const config = createTestConfig();

    expect(Object.keys(config.sources)).toEqual(["bloomberg", "gutenberg"]);
    expect(config.baseUrl).toBe("https://press.example.com/");
  });
});
