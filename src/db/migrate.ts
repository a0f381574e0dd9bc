// pattern: Imperative Shell
import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { sql } from "drizzle-orm";
import type { AppDatabase } from "./index";

const BREAKPOINT = "--> statement-breakpoint";

/**
 * Applies every `*.sql` file in `folder` that has not run yet, in lexical
 * order. Statements inside a file are separated by drizzle-kit breakpoints.
 * Returns the names of the files applied by this call.
 */
export function applyMigrations(
  db: AppDatabase,
  folder: string,
): ReadonlyArray<string> {
  db.run(
    sql.raw(
      "CREATE TABLE IF NOT EXISTS `__migrations` (`name` text PRIMARY KEY NOT NULL, `applied_at` integer NOT NULL)",
    ),
  );

  const applied = new Set(
    db
      .all<{ name: string }>(sql.raw("SELECT `name` FROM `__migrations`"))
      .map((row) => row.name),
  );

  const pending = readdirSync(folder)
    .filter((f) => f.endsWith(".sql") && !applied.has(f))
    .sort();

  for (const file of pending) {
    const statements = readFileSync(join(folder, file), "utf-8")
      .split(BREAKPOINT)
      .map((s) => s.trim())
      .filter((s) => s.length > 0);

    db.transaction((tx) => {
      for (const statement of statements) {
        tx.run(sql.raw(statement));
      }
      tx.run(
        sql`INSERT INTO __migrations (name, applied_at) VALUES (${file}, ${Date.now()})`,
      );
    });
  }

  return pending;
}
