// pattern: Functional Core
import { TRPCError } from "@trpc/server";
import { GitHubApiError } from "../github/client";

type GitHubErrorCode = "UNAUTHORIZED" | "FORBIDDEN" | "NOT_FOUND" | "BAD_REQUEST" | "INTERNAL_SERVER_ERROR";

function codeForStatus(status: number): GitHubErrorCode {
  if (status === 401) return "UNAUTHORIZED";
  if (status === 403) return "FORBIDDEN";
  if (status === 404) return "NOT_FOUND";
  if (status === 409 || status === 422) return "BAD_REQUEST";
  return "INTERNAL_SERVER_ERROR";
}

/**
 * Maps a failed GitHub call onto a tRPC error. GitHub's status decides the
 * code; anything else is an internal error carrying `message`.
 */
export function toTRPCError(err: unknown, message: string): TRPCError {
  if (err instanceof TRPCError) return err;
  if (err instanceof GitHubApiError) {
    return new TRPCError({ code: codeForStatus(err.status), message, cause: err });
  }
  return new TRPCError({
    code: "INTERNAL_SERVER_ERROR",
    message,
    ...(err instanceof Error ? { cause: err } : {}),
  });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
