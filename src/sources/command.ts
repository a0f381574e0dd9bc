// pattern: Imperative Shell
import { execFile } from "node:child_process";

export type CommandOptions = {
  readonly timeout: number;
};

export type CommandOutput = {
  readonly stdout: string;
  readonly stderr: string;
};

export type ExecFileFn = (
  file: string,
  args: ReadonlyArray<string>,
  options: CommandOptions,
) => Promise<CommandOutput>;

const MAX_BUFFER_BYTES = 64 * 1024 * 1024;
const STDERR_TAIL_CHARS = 2000;

/**
 * Runs an external program without a shell. Rejects on a non-zero exit or a
 * timeout, carrying the tail of stderr in the message.
 */
export const runCommand: ExecFileFn = (file, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      [...args],
      { timeout: options.timeout, maxBuffer: MAX_BUFFER_BYTES },
      (error, stdout, stderr) => {
        if (error) {
          const tail = stderr.trim().slice(-STDERR_TAIL_CHARS);
          const detail = error.killed ? `timed out after ${options.timeout}ms` : error.message;
          reject(new Error(tail ? `${detail}\n${tail}` : detail));
          return;
        }
        resolve({ stdout, stderr });
      },
    );
  });
