/**
 * Shared zod helpers.
 */

import type { ZodError } from "zod";

/** `path: message; …` rendering of zod issues. */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}
