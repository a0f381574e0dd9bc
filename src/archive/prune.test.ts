import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { pruneArchive } from "./prune";

const logger = pino({ level: "silent" });

describe("pruneArchive", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "prune-"));
    for (const day of ["01", "02", "03", "04"]) {
      writeFileSync(join(dir, `Bloomberg_2026-02-${day}.epub`), "x");
    }
    writeFileSync(join(dir, "Reuters_2026-01-01.epub"), "x");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should do nothing while within the retention count", () => {
    expect(pruneArchive(dir, 10, logger)).toEqual([]);
    expect(readdirSync(dir)).toHaveLength(5);
  });

  it("should delete everything beyond the newest books", () => {
    const removed = pruneArchive(dir, 2, logger);

    expect(removed).toEqual([
      "Bloomberg_2026-02-02.epub",
      "Bloomberg_2026-02-01.epub",
      "Reuters_2026-01-01.epub",
    ]);
    expect(readdirSync(dir).sort()).toEqual([
      "Bloomberg_2026-02-03.epub",
      "Bloomberg_2026-02-04.epub",
    ]);
  });

  it("should only consider books with the given prefix", () => {
    const removed = pruneArchive(dir, 1, logger, "Bloomberg");

    expect(removed).toEqual([
      "Bloomberg_2026-02-03.epub",
      "Bloomberg_2026-02-02.epub",
      "Bloomberg_2026-02-01.epub",
    ]);
    expect(readdirSync(dir).sort()).toEqual([
      "Bloomberg_2026-02-04.epub",
      "Reuters_2026-01-01.epub",
    ]);
  });
});
