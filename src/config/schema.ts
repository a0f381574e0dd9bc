import { z } from "zod";

const CRON_FIELD = /^[\d*?\/,A-Za-z-]+$/;

/**
 * Accepts the classic five-field cron syntax (minute hour day month weekday).
 */
export function isValidCronExpression(expression: string): boolean {
  const fields = expression.trim().split(/\s+/);
  return fields.length === 5 && fields.every((f) => CRON_FIELD.test(f));
}

export const sourceTypeSchema = z.enum(["calibre_recipe", "gutenberg", "custom"]);
export const scheduleModeSchema = z.enum(["scheduled", "on_demand"]);

export const rateLimitSchema = z.object({
  requestsPerSecond: z.number().min(0.1).max(10).default(1),
  cacheHours: z.number().int().min(1).max(168).default(24),
});

export const deviceProfileSchema = z.object({
  cssTheme: z.string().min(1).default("default"),
  skipPages: z.array(z.number().int().nonnegative()).default([]),
  fontSizeAdjust: z.number().min(0.5).max(2).default(1),
  stripImages: z.boolean().default(false),
});

export const sourceConfigSchema = z.object({
  name: z.string().min(1).max(100),
  type: sourceTypeSchema,
  enabled: z.boolean().default(true),

  mode: scheduleModeSchema.default("scheduled"),
  schedule: z
    .string()
    .refine(isValidCronExpression, (v) => ({
      message: `Invalid cron expression: ${v}`,
    }))
    .optional(),

  recipe: z.string().min(1).optional(),
  sections: z.array(z.string().min(1)).default([]),

  searchQuery: z.string().min(1).optional(),

  retentionDays: z.number().int().min(1).max(365).default(7),
  rateLimit: rateLimitSchema.optional(),

  deviceProfiles: z.record(z.string(), deviceProfileSchema).default({}),

  authorOverride: z.string().min(1).optional(),
  publisherOverride: z.string().min(1).optional(),
});

const categorySchema = z.object({
  term: z.string().min(1),
  label: z.string().min(1),
});

const catalogSchema = z.object({
  id: z.string().min(1).default("urn:uuid:daily-press-opds-feed"),
  title: z.string().min(1).default("Bloomberg Daily Briefing"),
  entryTitle: z.string().min(1).default("Daily Briefing"),
  icon: z.string().url().optional(),
  authorName: z.string().min(1).default("Bloomberg News Pipeline"),
  authorUri: z.string().url().optional(),
  entryAuthor: z.string().min(1).default("Bloomberg News"),
  publisher: z.string().min(1).default("Bloomberg L.P."),
  summary: z
    .string()
    .default("AI, Technology, Industries, and Latest news from Bloomberg"),
  content: z.string().default("AI · Technology · Industries · Latest"),
  categories: z.array(categorySchema).default([
    { term: "news", label: "News" },
    { term: "technology", label: "Technology" },
    { term: "business", label: "Business" },
  ]),
});

const pathsSchema = z.object({
  books: z.string().min(1).default("books"),
  catalog: z.string().min(1).default("opds.xml"),
  health: z.string().min(1).default("health.json"),
  themes: z.string().min(1).default("assets/themes"),
  recipes: z.string().min(1).default("recipes"),
  work: z.string().min(1).default("tmp"),
});

const pipelineSchema = z.object({
  deviceProfile: z.string().min(1).default("crosspoint"),
  maxTitleLength: z.number().int().min(10).max(200).default(50),
  maxConcurrency: z.number().int().positive().default(1),
});

const baseUrlSchema = z
  .string()
  .url()
  .transform((url) => (url.endsWith("/") ? url : `${url}/`));

export const sourcesConfigSchema = z
  .object({
    version: z.string().default("1.0"),
    baseUrl: baseUrlSchema.default("https://example.github.io/daily-press/"),
    catalog: catalogSchema.default({}),
    paths: pathsSchema.default({}),
    pipeline: pipelineSchema.default({}),
    sources: z.record(z.string(), sourceConfigSchema).default({}),
    defaultRetentionDays: z.number().int().min(1).max(365).default(7),
    defaultRateLimit: rateLimitSchema.default({}),
  })
  .superRefine((config, ctx) => {
    for (const [sourceId, source] of Object.entries(config.sources)) {
      if (source.type === "calibre_recipe" && !source.recipe) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sources", sourceId, "recipe"],
          message: `Source '${sourceId}' is calibre_recipe type but has no recipe`,
        });
      }
      if (source.mode === "scheduled" && !source.schedule) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sources", sourceId, "schedule"],
          message: `Source '${sourceId}' is scheduled but has no cron schedule`,
        });
      }
    }
  });

export type SourceType = z.infer<typeof sourceTypeSchema>;
export type ScheduleMode = z.infer<typeof scheduleModeSchema>;
export type RateLimitConfig = z.infer<typeof rateLimitSchema>;
export type DeviceProfile = z.infer<typeof deviceProfileSchema>;
export type SourceConfig = z.infer<typeof sourceConfigSchema>;
export type SourcesConfig = z.infer<typeof sourcesConfigSchema>;
export type SourcesConfigInput = z.input<typeof sourcesConfigSchema>;
