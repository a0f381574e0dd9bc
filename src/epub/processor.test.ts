import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import AdmZip from "adm-zip";
import pino from "pino";
import { processEpub } from "./processor";
import { SAMPLE_OPF, writeTestEpub } from "../test-utils/epub";

const logger = pino({ level: "silent" });

describe("processEpub", () => {
  let dir: string;
  let input: string;
  let output: string;
  let theme: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "process-"));
    input = join(dir, "in.epub");
    output = join(dir, "out", "out.epub");
    theme = join(dir, "theme.css");
    writeTestEpub(input);
    writeFileSync(theme, "body { margin: 0; }");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const build = { workflowRunId: "run-42", gitSha: "abc123", debug: false };

  it("should report article count, removed images and sizes", async () => {
    const result = await processEpub(input, output, { themePath: theme, build }, logger);

    expect(result.outputPath).toBe(output);
    expect(result.articleCount).toBe(2);
    expect(result.imagesRemoved).toBe(1);
    expect(result.sizeBytes).toBeGreaterThan(0);
    expect(result.rawSizeBytes).toBeGreaterThanOrEqual(1000);
  });

  it("should write mimetype first and uncompressed", async () => {
    await processEpub(input, output, { build }, logger);

    const entries = new AdmZip(output).getEntries();
    expect(entries[0]?.entryName).toBe("mimetype");
    expect(entries[0]?.header.method).toBe(0);
    expect(entries[0]?.getData().toString()).toBe("application/epub+zip");
  });

  it("should drop the skipped spine pages and image manifest items", async () => {
    await processEpub(input, output, { build }, logger);

    const opf = new AdmZip(output).readAsText("OEBPS/content.opf");
    expect(opf).not.toContain('idref="titlepage"');
    expect(opf).not.toContain('idref="index"');
    expect(opf).toContain('<itemref idref="a1"/>');
    expect(opf).not.toContain('id="photo"');
    expect(opf).toContain('id="cover-image"');
    expect(opf).toContain(
      '<item id="diagnostics" href="_diagnostics.json" media-type="application/json"/>',
    );
  });

  it("should honor custom skip pages and keep images when disabled", async () => {
    const result = await processEpub(
      input,
      output,
      { skipPages: [0], stripImages: false, build },
      logger,
    );

    const zip = new AdmZip(output);
    const opf = zip.readAsText("OEBPS/content.opf");
    expect(result.imagesRemoved).toBe(0);
    expect(opf).toContain('<itemref idref="index"/>');
    expect(zip.getEntry("OEBPS/images/photo.jpg")).not.toBeNull();
  });

  it("should remove image files other than the cover", async () => {
    await processEpub(input, output, { build }, logger);

    const zip = new AdmZip(output);
    expect(zip.getEntry("OEBPS/images/photo.jpg")).toBeNull();
    expect(zip.getEntry("OEBPS/images/cover.jpg")).not.toBeNull();
  });

  it("should replace the stylesheet with the theme and font scaling", async () => {
    await processEpub(
      input,
      output,
      { themePath: theme, fontSizeAdjust: 1.2, build },
      logger,
    );

    expect(new AdmZip(output).readAsText("OEBPS/stylesheet.css")).toBe(
      "body { margin: 0; }\n\nbody {\n  font-size: 120%;\n}\n",
    );
  });

  it("should keep the original stylesheet when the theme is missing", async () => {
    await processEpub(
      input,
      output,
      { themePath: join(dir, "absent.css"), build },
      logger,
    );

    expect(new AdmZip(output).readAsText("OEBPS/stylesheet.css")).toBe(
      "body { color: red; }",
    );
  });

  it("should shorten table of contents titles", async () => {
    await processEpub(input, output, { build }, logger);

    expect(new AdmZip(output).readAsText("OEBPS/toc.ncx")).toContain(
      "<text>Stocks Rally as Fed Holds Rates</text>",
    );
  });

  it("should embed build diagnostics", async () => {
    await processEpub(input, output, { build, sections: ["ai", "technology"] }, logger);

    const raw = new AdmZip(output).readAsText("OEBPS/_diagnostics.json");
    const diagnostics: unknown = JSON.parse(raw);
    expect(diagnostics).toMatchObject({
      workflow_run_id: "run-42",
      git_sha: "abc123",
      input_file: "in.epub",
      output_file: "out.epub",
      debug_mode: false,
      sections_found: ["ai", "technology"],
      article_count: 2,
      images_removed: 1,
      node_version: process.version,
    });
  });

  it("should reject an epub without a package document", async () => {
    writeTestEpub(input, { "OEBPS/content.opf": null });

    await expect(processEpub(input, output, { build }, logger)).rejects.toThrow(
      "No .opf file found in EPUB",
    );
  });

  it("should reject a package document without a spine", async () => {
    writeTestEpub(input, {
      "OEBPS/content.opf": SAMPLE_OPF.replace(/<spine[\s\S]*<\/spine>/, ""),
    });

    await expect(processEpub(input, output, { build }, logger)).rejects.toThrow(
      "Invalid EPUB: no spine element",
    );
  });
});
