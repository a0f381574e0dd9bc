// pattern: Imperative Shell
import { readdirSync } from "node:fs";
import { join, relative, sep } from "node:path";

/**
 * Every regular file below `root`, depth-first, in name order.
 */
export function listFilesRecursive(root: string): Array<string> {
  const files: Array<string> = [];
  const entries = readdirSync(root, { withFileTypes: true }).sort((a, b) =>
    a.name.localeCompare(b.name),
  );

  for (const entry of entries) {
    const full = join(root, entry.name);
    if (entry.isDirectory()) {
      files.push(...listFilesRecursive(full));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }

  return files;
}

/**
 * Breadth-first search for the first file whose name satisfies `predicate`.
 * Shallower files win; siblings are visited in name order.
 */
export function findFileBreadthFirst(
  root: string,
  predicate: (name: string) => boolean,
): string | null {
  const queue: Array<string> = [root];

  while (queue.length > 0) {
    const dir = queue.shift();
    if (dir === undefined) {
      break;
    }
    const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
      a.name.localeCompare(b.name),
    );

    const match = entries.find((e) => e.isFile() && predicate(e.name));
    if (match) {
      return join(dir, match.name);
    }

    for (const entry of entries) {
      if (entry.isDirectory()) {
        queue.push(join(dir, entry.name));
      }
    }
  }

  return null;
}

/**
 * Zip entry name for `file` relative to `root`, always with forward slashes.
 */
export function toArchiveName(root: string, file: string): string {
  return relative(root, file).split(sep).join("/");
}
