// pattern: Functional Core
import { DEFAULT_KEEP } from "../archive/prune";

export type CliCommand =
  | { readonly name: "process-epub"; readonly input: string; readonly output: string }
  | { readonly name: "cleanup"; readonly keep: number }
  | { readonly name: "generate-opds" }
  | { readonly name: "build"; readonly sourceId: string }
  | { readonly name: "build-all" }
  | { readonly name: "gutenberg"; readonly bookId: number };

export type ParsedArgs =
  | { readonly success: true; readonly command: CliCommand }
  | { readonly success: false; readonly error: string };

export const USAGE = `Usage: daily-press <command> [options]

Commands:
  process-epub <input> <output>  Post-process a toolkit EPUB for e-ink reading
  cleanup [--keep N]             Keep only the newest N issues (default ${DEFAULT_KEEP})
  generate-opds                  Regenerate opds.xml and health.json
  build <sourceId>               Fetch, process and archive one source
  build-all                      Build every enabled scheduled source
  gutenberg <bookId>             Download a Project Gutenberg book into the archive`;

function parseKeep(args: ReadonlyArray<string>): number | string {
  let keep = DEFAULT_KEEP;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    let value: string | undefined;
    if (arg === "--keep") {
      value = args[++i];
    } else if (arg.startsWith("--keep=")) {
      value = arg.slice("--keep=".length);
    } else {
      return `Unknown option for cleanup: ${arg}`;
    }
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1) {
      return `--keep expects a positive integer, got ${value ?? "nothing"}`;
    }
    keep = n;
  }
  return keep;
}

export function parseCliArgs(argv: ReadonlyArray<string>): ParsedArgs {
  const [name, ...rest] = argv;

  switch (name) {
    case "process-epub": {
      const [input, output] = rest;
      if (!input || !output || rest.length > 2) {
        return { success: false, error: "process-epub takes <input> <output>" };
      }
      return { success: true, command: { name, input, output } };
    }
    case "cleanup": {
      const keep = parseKeep(rest);
      if (typeof keep === "string") {
        return { success: false, error: keep };
      }
      return { success: true, command: { name, keep } };
    }
    case "generate-opds":
    case "build-all":
      if (rest.length > 0) {
        return { success: false, error: `${name} takes no arguments` };
      }
      return { success: true, command: { name } };
    case "build": {
      const [sourceId] = rest;
      if (!sourceId || rest.length > 1) {
        return { success: false, error: "build takes <sourceId>" };
      }
      return { success: true, command: { name, sourceId } };
    }
    case "gutenberg": {
      const bookId = Number(rest[0]);
      if (rest.length !== 1 || !Number.isInteger(bookId) || bookId < 1) {
        return { success: false, error: "gutenberg takes a numeric <bookId>" };
      }
      return { success: true, command: { name, bookId } };
    }
    case undefined:
      return { success: false, error: "No command given" };
    default:
      return { success: false, error: `Unknown command: ${name}` };
  }
}
