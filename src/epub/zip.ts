// pattern: Imperative Shell
import { createWriteStream, existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import AdmZip from "adm-zip";
import archiver from "archiver";
import { listFilesRecursive, toArchiveName } from "./files";

export const EPUB_MIMETYPE = "application/epub+zip";

export function extractEpub(inputPath: string, destination: string): void {
  const zip = new AdmZip(inputPath);
  zip.extractAllTo(destination, true);
}

/**
 * Zips `sourceDir` into an EPUB container. The `mimetype` entry is written
 * first and stored uncompressed; everything else is deflated.
 */
export function packageEpub(
  sourceDir: string,
  outputPath: string,
): Promise<number> {
  const mimetypePath = join(sourceDir, "mimetype");
  const mimetype = existsSync(mimetypePath)
    ? readFileSync(mimetypePath)
    : Buffer.from(EPUB_MIMETYPE);
  const files = listFilesRecursive(sourceDir).filter(
    (f) => toArchiveName(sourceDir, f) !== "mimetype",
  );

  return new Promise((resolve, reject) => {
    const output = createWriteStream(outputPath);
    const archive = archiver("zip", { zlib: { level: 9 } });

    output.on("close", () => resolve(files.length + 1));
    output.on("error", (err) => reject(err));
    archive.on("error", (err) => reject(err));
    archive.pipe(output);

    archive.append(mimetype, { name: "mimetype", store: true });
    for (const file of files) {
      archive.file(file, { name: toArchiveName(sourceDir, file) });
    }

    archive.finalize().catch(reject);
  });
}
