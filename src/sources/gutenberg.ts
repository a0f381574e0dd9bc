// pattern: Imperative Shell
import { createHash } from "node:crypto";
import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import type { Logger } from "pino";
import type { RateLimitConfig, SourceConfig } from "../config/schema";
import { sleep as defaultSleep } from "../lib/time";
import { skipIfArchived, sourceOutputFilename } from "./base";
import type { BookMetadata, ContentSource, FetchResult } from "./types";

export const GUTENDEX_API = "https://gutendex.com/books";
const USER_AGENT = "DailyPress/1.0 (e-ink reader news aggregator)";
const REQUEST_TIMEOUT_MS = 30_000;
const DOWNLOAD_TIMEOUT_MS = 60_000;

const gutendexAuthorSchema = z.object({
  name: z.string(),
  birth_year: z.number().nullable().optional(),
  death_year: z.number().nullable().optional(),
});

export const gutendexBookSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  authors: z.array(gutendexAuthorSchema).default([]),
  subjects: z.array(z.string()).default([]),
  bookshelves: z.array(z.string()).default([]),
  languages: z.array(z.string()).default([]),
  formats: z.record(z.string(), z.string()).default({}),
  download_count: z.number().int().default(0),
});

const gutendexPageSchema = z.object({
  count: z.number().int(),
  next: z.string().nullable(),
  previous: z.string().nullable(),
  results: z.array(gutendexBookSchema),
});

export type GutenbergBook = z.infer<typeof gutendexBookSchema>;

export type GutenbergSearch = {
  readonly query?: string;
  readonly author?: string;
  readonly title?: string;
  readonly topic?: string;
  readonly language?: string;
  readonly page?: number;
};

export type GutenbergSearchPage = {
  readonly books: ReadonlyArray<GutenbergBook>;
  readonly total: number;
  readonly page: number;
  readonly hasNext: boolean;
  readonly hasPrevious: boolean;
};

export class GutendexError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "GutendexError";
  }
}

export type GutenbergClientOptions = {
  readonly rateLimit: RateLimitConfig;
  readonly logger: Logger;
  readonly apiUrl?: string;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly now?: () => number;
};

export type GutenbergClient = {
  search(params: GutenbergSearch): Promise<GutenbergSearchPage>;
  getBook(id: number): Promise<GutenbergBook | null>;
  download(url: string): Promise<Buffer>;
  ping(): Promise<void>;
};

export function buildSearchParams(params: GutenbergSearch): Record<string, string> {
  const out: Record<string, string> = { page: String(params.page ?? 1) };
  if (params.query) out["search"] = params.query;
  if (params.author) out["author"] = params.author;
  if (params.title) out["title"] = params.title;
  if (params.topic) out["topic"] = params.topic;
  const language = params.language ?? "en";
  if (language) out["languages"] = language;
  return out;
}

export function searchCacheKey(params: Readonly<Record<string, string>>): string {
  const sorted = Object.fromEntries(
    Object.entries(params).sort(([a], [b]) => a.localeCompare(b)),
  );
  return createHash("md5").update(JSON.stringify(sorted)).digest("hex");
}

/**
 * Gutendex API client with a minimum spacing between requests and an
 * in-memory search cache.
 */
export function createGutenbergClient(options: GutenbergClientOptions): GutenbergClient {
  const { logger } = options;
  const apiUrl = options.apiUrl ?? GUTENDEX_API;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;
  const minIntervalMs = 1000 / options.rateLimit.requestsPerSecond;
  const cacheTtlMs = options.rateLimit.cacheHours * 60 * 60 * 1000;
  const cache = new Map<string, { readonly at: number; readonly page: GutenbergSearchPage }>();
  let lastRequestAt = Number.NEGATIVE_INFINITY;

  async function throttle(): Promise<void> {
    const elapsed = now() - lastRequestAt;
    if (elapsed < minIntervalMs) {
      const wait = minIntervalMs - elapsed;
      logger.debug({ waitMs: wait }, "rate limiting gutendex request");
      await sleep(wait);
    }
    lastRequestAt = now();
  }

  async function request(url: string, timeoutMs: number): Promise<Response> {
    await throttle();
    logger.debug({ url }, "gutendex request");
    const response = await fetch(url, {
      signal: AbortSignal.timeout(timeoutMs),
      headers: { "User-Agent": USER_AGENT },
    });
    if (!response.ok) {
      throw new GutendexError(
        response.status,
        `Gutendex API error: ${response.status} ${response.statusText}`,
      );
    }
    return response;
  }

  return {
    async search(params) {
      const query = buildSearchParams(params);
      const key = searchCacheKey(query);
      const cached = cache.get(key);
      if (cached && now() - cached.at < cacheTtlMs) {
        logger.debug({ key }, "using cached gutenberg search");
        return cached.page;
      }

      const response = await request(
        `${apiUrl}?${new URLSearchParams(query).toString()}`,
        REQUEST_TIMEOUT_MS,
      );
      const data = gutendexPageSchema.parse(await response.json());
      const page: GutenbergSearchPage = {
        books: data.results,
        total: data.count,
        page: params.page ?? 1,
        hasNext: data.next !== null,
        hasPrevious: data.previous !== null,
      };

      cache.set(key, { at: now(), page });
      logger.info({ found: data.results.length, total: data.count }, "gutenberg search complete");
      return page;
    },

    async getBook(id) {
      try {
        const response = await request(`${apiUrl}/${id}`, REQUEST_TIMEOUT_MS);
        return gutendexBookSchema.parse(await response.json());
      } catch (err) {
        if (err instanceof GutendexError && err.status === 404) {
          logger.warn({ id }, "gutenberg book not found");
          return null;
        }
        throw err;
      }
    },

    async download(url) {
      const response = await request(url, DOWNLOAD_TIMEOUT_MS);
      return Buffer.from(await response.arrayBuffer());
    },

    async ping() {
      await request(`${apiUrl}?page=1`, REQUEST_TIMEOUT_MS);
    },
  };
}

export function epubUrl(book: GutenbergBook): string | null {
  return book.formats["application/epub+zip"] ?? book.formats["application/epub"] ?? null;
}

export function primaryAuthor(book: GutenbergBook): string {
  return book.authors[0]?.name ?? "Unknown";
}

export function toBookMetadata(book: GutenbergBook): BookMetadata {
  const cover = book.formats["image/jpeg"];
  const download = epubUrl(book);
  return {
    title: book.title,
    author: primaryAuthor(book),
    identifier: `gutenberg:${book.id}`,
    language: book.languages[0] ?? "en",
    subjects: book.subjects,
    ...(cover ? { coverUrl: cover } : {}),
    ...(download ? { downloadUrl: download } : {}),
  };
}

export function toBookSummary(book: GutenbergBook) {
  return {
    id: book.id,
    title: book.title,
    author: primaryAuthor(book),
    authors: book.authors,
    subjects: book.subjects.slice(0, 5),
    language: book.languages[0] ?? "en",
    downloadCount: book.download_count,
    epubUrl: book.formats["application/epub+zip"] ?? null,
    coverUrl: book.formats["image/jpeg"] ?? null,
  };
}

export function toBookDetail(book: GutenbergBook) {
  return {
    ...toBookSummary(book),
    subjects: book.subjects,
    bookshelves: book.bookshelves,
    formats: {
      epub: book.formats["application/epub+zip"] ?? null,
      kindle: book.formats["application/x-mobipocket-ebook"] ?? null,
      html: book.formats["text/html"] ?? null,
      plainText:
        book.formats["text/plain; charset=utf-8"] ?? book.formats["text/plain"] ?? null,
    },
  };
}

export function gutenbergFilename(book: Pick<GutenbergBook, "id" | "title">): string {
  const safeTitle = Array.from(book.title)
    .filter((ch) => /[\p{L}\p{N} _-]/u.test(ch))
    .join("")
    .slice(0, 50);
  return `Gutenberg_${book.id}_${safeTitle}.epub`;
}

export const ON_DEMAND_MESSAGE =
  "Gutenberg is an on-demand source. Use search() and downloadBook() instead.";

export type GutenbergSource = ContentSource & {
  search(params: GutenbergSearch): Promise<GutenbergSearchPage>;
  getBook(id: number): Promise<GutenbergBook | null>;
  downloadBook(book: GutenbergBook): Promise<FetchResult>;
};

export type GutenbergSourceOptions = {
  readonly sourceId: string;
  readonly config: SourceConfig;
  readonly booksDir: string;
  readonly client: GutenbergClient;
  readonly logger: Logger;
};

/**
 * Project Gutenberg as an on-demand source: books are looked up and
 * downloaded one at a time rather than built on a schedule.
 */
export function createGutenbergSource(options: GutenbergSourceOptions): GutenbergSource {
  const { sourceId, config, client, booksDir } = options;
  const log = options.logger.child({ sourceId });

  return {
    sourceId,
    sourceType: "gutenberg",
    config,

    outputFilename: (date) => sourceOutputFilename(config, date),
    shouldSkip: (date) => skipIfArchived(config, booksDir, date),

    search: (params) => client.search(params),
    getBook: (id) => client.getBook(id),

    async fetch() {
      return { success: false, error: ON_DEMAND_MESSAGE, durationMs: 0 };
    },

    async validate() {
      try {
        await client.ping();
        return { valid: true };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return { valid: false, error: `Cannot connect to Gutenberg API: ${message}` };
      }
    },

    async downloadBook(book) {
      const startedAt = Date.now();
      const author = primaryAuthor(book);
      const url = epubUrl(book);
      if (!url) {
        return {
          success: false,
          error: `No EPUB format available for: ${book.title}`,
          durationMs: 0,
        };
      }

      const filename = gutenbergFilename(book);
      const outputPath = join(booksDir, filename);
      if (existsSync(outputPath)) {
        log.info({ filename }, "book already downloaded");
        return {
          success: true,
          epubPath: outputPath,
          title: book.title,
          author,
          durationMs: 0,
          articleCount: 0,
        };
      }

      log.info({ title: book.title, url }, "downloading gutenberg book");
      try {
        const content = await client.download(url);
        mkdirSync(booksDir, { recursive: true });
        writeFileSync(outputPath, content);
        const durationMs = Date.now() - startedAt;
        log.info({ filename, bytes: content.length, durationMs }, "gutenberg book downloaded");
        return {
          success: true,
          epubPath: outputPath,
          title: book.title,
          author,
          durationMs,
          articleCount: 0,
        };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.error({ error: message }, "gutenberg download failed");
        return {
          success: false,
          error: message,
          title: book.title,
          author,
          durationMs: Date.now() - startedAt,
        };
      }
    },
  };
}
