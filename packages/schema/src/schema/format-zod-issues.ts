// ─── Zod Issue Formatter ───────────────────────────────────────────
// Converts Zod validation issues into a human-readable error string.
// Uses a minimal structural type so callers need not import "zod".

/** Minimal shape of a Zod issue (path + message). */
export interface ZodIssueLike {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

/** Renders one issue as `path: message`, with `(root)` for an empty path. */
export function formatZodIssue(issue: ZodIssueLike): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/**
 * Formats an array of Zod issues into a single, human-readable string.
 *
 * @example
 * formatZodIssues([{ path: ["rules", 0, "type"], message: "Required" }])
 * // => "Validation failed: rules.0.type: Required"
 */
export function formatZodIssues(issues: readonly ZodIssueLike[]): string {
  return `Validation failed: ${issues.map(formatZodIssue).join("; ")}`;
}
