// ─── Rule Set Loading ──────────────────────────────────────────────
// The parse boundary for rule-set files: raw JSON in, a validated
// RuleSet out, or a RuleSetParseError listing every schema issue.

import {
  formatZodIssue,
  formatZodIssues,
  safeParseRuleSet,
  type RuleSet,
} from "@gambit/schema";

export class RuleSetParseError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(message);
    this.name = "RuleSetParseError";
  }
}

/**
 * Validates a parsed JSON value as a rule set.
 *
 * @throws {RuleSetParseError} if the value does not conform to the schema.
 */
export function loadRuleSet(raw: unknown): RuleSet {
  const result = safeParseRuleSet(raw);
  if (!result.success) {
    throw new RuleSetParseError(
      formatZodIssues(result.error.issues),
      result.error.issues.map(formatZodIssue)
    );
  }
  return result.data;
}

/**
 * Parses rule-set JSON text.
 *
 * @throws {RuleSetParseError} on malformed JSON or a schema violation.
 */
export function parseRuleSetJson(text: string): RuleSet {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new RuleSetParseError(`Invalid JSON: ${detail}`, [detail]);
  }
  return loadRuleSet(raw);
}
