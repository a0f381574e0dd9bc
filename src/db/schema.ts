import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ---------- JSON column types ----------

export type GitHubUser = {
  readonly id: number;
  readonly login: string;
  readonly name: string | null;
  readonly avatar_url: string;
  readonly email: string | null;
};

// ---------- Tables ----------

export const builds = sqliteTable(
  "builds",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    sourceId: text("source_id").notNull(),
    filename: text("filename").notNull(),
    status: text("status", { enum: ["success", "failed", "skipped"] }).notNull(),
    rawSizeBytes: integer("raw_size_bytes"),
    sizeBytes: integer("size_bytes"),
    articleCount: integer("article_count"),
    durationMs: integer("duration_ms").notNull().default(0),
    error: text("error"),
    workflowRunId: text("workflow_run_id").notNull().default("local"),
    startedAt: integer("started_at", { mode: "timestamp" }).notNull(),
    finishedAt: integer("finished_at", { mode: "timestamp" })
      .notNull()
      .default(sql`(unixepoch())`),
  },
  (table) => ({
    sourceIdIdx: index("builds_source_id_idx").on(table.sourceId),
  }),
);

export const sessions = sqliteTable("sessions", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  tokenHash: text("token_hash").notNull().unique(),
  user: text("user", { mode: "json" }).$type<GitHubUser>().notNull(),
  accessToken: text("access_token").notNull(),
  expiresAt: integer("expires_at", { mode: "timestamp" }).notNull(),
  createdAt: integer("created_at", { mode: "timestamp" })
    .notNull()
    .default(sql`(unixepoch())`),
});

export type BuildStatus = (typeof builds.$inferSelect)["status"];
export type BuildRecord = typeof builds.$inferSelect;
export type NewBuildRecord = typeof builds.$inferInsert;
export type SessionRecord = typeof sessions.$inferSelect;
