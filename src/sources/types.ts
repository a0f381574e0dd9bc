import type { SourceConfig, SourceType } from "../config/schema";

export type FetchResult =
  | {
      readonly success: true;
      readonly epubPath: string;
      readonly title: string;
      readonly author: string;
      readonly durationMs: number;
      readonly articleCount: number;
    }
  | {
      readonly success: false;
      readonly error: string;
      readonly title?: string;
      readonly author?: string;
      readonly durationMs: number;
    };

export type BookMetadata = {
  readonly title: string;
  readonly author: string;
  readonly identifier: string;
  readonly language: string;
  readonly publisher?: string;
  readonly publishedDate?: string;
  readonly description?: string;
  readonly subjects: ReadonlyArray<string>;
  readonly coverUrl?: string;
  readonly downloadUrl?: string;
};

export type SourceValidation =
  | { readonly valid: true }
  | { readonly valid: false; readonly error: string };

export type SkipDecision =
  | { readonly skip: true; readonly reason: string }
  | { readonly skip: false };

/**
 * A configured origin of EPUBs. Scheduled sources produce one issue per day
 * through `fetch`; on-demand sources expose their own lookup methods.
 */
export interface ContentSource {
  readonly sourceId: string;
  readonly sourceType: SourceType;
  readonly config: SourceConfig;
  fetch(date: Date): Promise<FetchResult>;
  validate(): Promise<SourceValidation>;
  outputFilename(date: Date): string;
  /** Skips when the day's issue is already in the archive. */
  shouldSkip(date: Date): SkipDecision;
}
