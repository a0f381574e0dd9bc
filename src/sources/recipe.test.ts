import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { buildConvertArgs, createRecipeSource, TOOLKIT_TIMEOUT_MS } from "./recipe";
import type { ExecFileFn } from "./command";
import { sourceConfigSchema } from "../config/schema";

const logger = pino({ level: "silent" });
const date = new Date("2026-01-31T06:00:00Z");

const source = sourceConfigSchema.parse({
  name: "Bloomberg",
  type: "calibre_recipe",
  recipe: "bloomberg.recipe",
  schedule: "0 6 * * *",
  sections: ["ai", "technology"],
});

describe("buildConvertArgs", () => {
  it("should pass the eink profile and the section list", () => {
    expect(buildConvertArgs(source, "/r/bloomberg.recipe", "/w/out.epub")).toEqual([
      "/r/bloomberg.recipe",
      "/w/out.epub",
      "--output-profile=generic_eink",
      "--recipe-specific-option=sections:ai,technology",
    ]);
  });

  it("should add author and publisher overrides and omit empty sections", () => {
    const config = {
      ...source,
      sections: [],
      authorOverride: "Newsroom",
      publisherOverride: "Press Co",
    };

    expect(buildConvertArgs(config, "r.recipe", "o.epub")).toEqual([
      "r.recipe",
      "o.epub",
      "--output-profile=generic_eink",
      "--authors=Newsroom",
      "--publisher=Press Co",
    ]);
  });
});

describe("createRecipeSource", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "recipe-"));
    mkdirSync(join(root, "recipes"));
    writeFileSync(join(root, "recipes", "bloomberg.recipe"), "# recipe");
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function makeSource(exec: ExecFileFn) {
    return createRecipeSource({
      sourceId: "bloomberg",
      config: source,
      recipesDir: join(root, "recipes"),
      workDir: join(root, "tmp"),
      booksDir: join(root, "books"),
      ebookConvert: "ebook-convert",
      logger,
      exec,
    });
  }

  it("should run the toolkit and return the raw epub path", async () => {
    const exec = vi.fn<ExecFileFn>(async (_file, args) => {
      writeFileSync(args[1] ?? "", "raw epub");
      return { stdout: "", stderr: "" };
    });

    const result = await makeSource(exec).fetch(date);

    expect(exec).toHaveBeenCalledWith(
      "ebook-convert",
      [
        join(root, "recipes", "bloomberg.recipe"),
        join(root, "tmp", "Bloomberg_2026-01-31.epub"),
        "--output-profile=generic_eink",
        "--recipe-specific-option=sections:ai,technology",
      ],
      { timeout: TOOLKIT_TIMEOUT_MS },
    );
    expect(result).toMatchObject({
      success: true,
      epubPath: join(root, "tmp", "Bloomberg_2026-01-31.epub"),
      title: "Bloomberg 2026-01-31",
      author: "Bloomberg",
    });
  });

  it("should report toolkit failures", async () => {
    const exec = vi.fn<ExecFileFn>().mockRejectedValue(new Error("recipe crashed"));

    const result = await makeSource(exec).fetch(date);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe("recipe crashed");
    }
  });

  it("should fail when the toolkit writes nothing", async () => {
    const exec = vi.fn<ExecFileFn>().mockResolvedValue({ stdout: "", stderr: "" });

    const result = await makeSource(exec).fetch(date);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe(
        `Toolkit produced no output at ${join(root, "tmp", "Bloomberg_2026-01-31.epub")}`,
      );
    }
  });

  it("should validate that the recipe file exists", async () => {
    const exec = vi.fn<ExecFileFn>();

    expect(await makeSource(exec).validate()).toEqual({ valid: true });

    rmSync(join(root, "recipes", "bloomberg.recipe"));
    expect(await makeSource(exec).validate()).toEqual({
      valid: false,
      error: `Recipe file not found: ${join(root, "recipes", "bloomberg.recipe")}`,
    });
  });

  it("should skip when today's issue is already archived", () => {
    const recipe = makeSource(vi.fn<ExecFileFn>());
    expect(recipe.shouldSkip(date)).toEqual({ skip: false });

    mkdirSync(join(root, "books"));
    writeFileSync(join(root, "books", "Bloomberg_2026-01-31.epub"), "x");

    expect(recipe.shouldSkip(date)).toEqual({
      skip: true,
      reason: "File already exists: Bloomberg_2026-01-31.epub",
    });
  });
});
