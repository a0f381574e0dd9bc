// pattern: Functional Core
import { basename } from "node:path";
import { toIsoSeconds } from "../lib/time";

export const DIAGNOSTICS_FILENAME = "_diagnostics.json";

export type BuildInfo = {
  readonly workflowRunId: string;
  readonly gitSha: string;
  readonly debug: boolean;
};

export type Diagnostics = {
  readonly build_time: string;
  readonly workflow_run_id: string;
  readonly git_sha: string;
  readonly input_file: string;
  readonly output_file: string;
  readonly raw_size_bytes: number;
  readonly processing_time_ms: number;
  readonly debug_mode: boolean;
  readonly node_version: string;
  readonly sections_found: ReadonlyArray<string>;
  readonly article_count: number;
  readonly images_removed: number;
};

export type DiagnosticsInput = {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly rawSizeBytes: number;
  readonly startedAt: number;
  readonly now: Date;
  readonly build: BuildInfo;
  readonly sections: ReadonlyArray<string>;
  readonly articleCount: number;
  readonly imagesRemoved: number;
};

export function createDiagnostics(input: DiagnosticsInput): Diagnostics {
  return {
    build_time: toIsoSeconds(input.now),
    workflow_run_id: input.build.workflowRunId,
    git_sha: input.build.gitSha,
    input_file: basename(input.inputPath),
    output_file: basename(input.outputPath),
    raw_size_bytes: input.rawSizeBytes,
    processing_time_ms: Math.max(0, input.now.getTime() - input.startedAt),
    debug_mode: input.build.debug,
    node_version: process.version,
    sections_found: [...input.sections],
    article_count: input.articleCount,
    images_removed: input.imagesRemoved,
  };
}
