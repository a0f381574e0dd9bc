// pattern: Imperative Shell
import { existsSync, mkdirSync, statSync, unlinkSync, writeFileSync } from "node:fs";
import { dirname, extname, join } from "node:path";
import AdmZip from "adm-zip";
import type { Logger } from "pino";

export const MIN_EPUB_SIZE_BYTES = 1000;

export class EpubValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EpubValidationError";
  }
}

export type InputCheck = {
  readonly sizeBytes: number;
  readonly entryCount: number;
};

export function validateInput(inputPath: string, logger: Logger): InputCheck {
  logger.info({ inputPath }, "validating input");

  if (!existsSync(inputPath)) {
    logger.error({ inputPath, cwd: process.cwd() }, "input file not found");
    throw new EpubValidationError(`Input file not found: ${inputPath}`);
  }

  if (extname(inputPath).toLowerCase() !== ".epub") {
    throw new EpubValidationError(`Input file must be an EPUB: ${inputPath}`);
  }

  const sizeBytes = statSync(inputPath).size;
  logger.info({ inputPath, sizeBytes }, "input file size");

  if (sizeBytes < MIN_EPUB_SIZE_BYTES) {
    throw new EpubValidationError(`Input file is too small: ${sizeBytes} bytes`);
  }

  let zip: AdmZip;
  try {
    zip = new AdmZip(inputPath);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new EpubValidationError(`Input file is not a valid EPUB: ${message}`);
  }

  if (zip.getEntry("mimetype") === null) {
    logger.warn({ inputPath }, "epub has no mimetype entry, may be malformed");
  }

  const entryCount = zip.getEntries().length;
  logger.debug({ entryCount }, "input validation passed");

  return { sizeBytes, entryCount };
}

export function validateOutputPath(outputPath: string, logger: Logger): void {
  const dir = dirname(outputPath);
  logger.info({ outputPath }, "validating output path");

  try {
    mkdirSync(dir, { recursive: true });
    const probe = join(dir, `.write_test_${process.pid}`);
    writeFileSync(probe, "");
    unlinkSync(probe);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ dir, error: message }, "output directory not writable");
    throw new EpubValidationError(`Cannot write to output directory: ${message}`);
  }
}
