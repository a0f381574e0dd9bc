import { describe, it, expect } from "vitest";
import { createDiagnostics } from "./diagnostics";

describe("createDiagnostics", () => {
  it("should describe the build with file names and timings", () => {
    const now = new Date("2026-01-31T06:00:05.250Z");

    const diagnostics = createDiagnostics({
      inputPath: "/work/raw/Bloomberg_2026-01-31.epub",
      outputPath: "/site/books/Bloomberg_2026-01-31.epub",
      rawSizeBytes: 123456,
      startedAt: now.getTime() - 1500,
      now,
      build: { workflowRunId: "987", gitSha: "deadbeef", debug: true },
      sections: ["ai"],
      articleCount: 12,
      imagesRemoved: 4,
    });

    expect(diagnostics).toEqual({
      build_time: "2026-01-31T06:00:05Z",
      workflow_run_id: "987",
      git_sha: "deadbeef",
      input_file: "Bloomberg_2026-01-31.epub",
      output_file: "Bloomberg_2026-01-31.epub",
      raw_size_bytes: 123456,
      processing_time_ms: 1500,
      debug_mode: true,
      node_version: process.version,
      sections_found: ["ai"],
      article_count: 12,
      images_removed: 4,
    });
  });
});
