// ─── Zod Issue Formatter ───────────────────────────────────────────
// Renders zod issues as `path: message` lines.

/** Minimal shape of a zod issue (path + message). */
export interface ZodIssueLike {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

/**
 * Formats each issue as `path: message`. Root-level issues (empty path)
 * use `(root)` as the path label.
 *
 * @example
 * formatZodIssues([{ path: ["melds", 0, "kind"], message: "Required" }])
 * // => ["melds.0.kind: Required"]
 */
export function formatZodIssues(issues: readonly ZodIssueLike[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}
