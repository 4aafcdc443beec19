// ─── Schema Validation ─────────────────────────────────────────────
// Zod schemas for runtime validation of .rules.json files.
// This is the "parse boundary": raw JSON enters, typed data exits.
// Token kinds are not enumerated here: an unknown kind is a compile
// error with a path, which reads better than a schema failure.

import { z } from "zod";
import type { RawToken } from "../types/index";

// ─── Tokens ────────────────────────────────────────────────────────

const TokenLiteralSchema = z.union([z.string(), z.number(), z.boolean()]);

export const RawTokenSchema: z.ZodType<RawToken> = z.lazy(() =>
  z
    .object({ type: z.string().min(1) })
    .catchall(z.union([RawTokenSchema, TokenLiteralSchema]))
);

// ─── Rule Set ──────────────────────────────────────────────────────

export const RuleSetSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  rules: z.array(RawTokenSchema),
});

export type RuleSet = z.infer<typeof RuleSetSchema>;

// ─── Public API ────────────────────────────────────────────────────

/**
 * Parse and validate a raw JSON value as a rule set.
 * Throws a ZodError with detailed issues if validation fails.
 */
export function parseRuleSet(raw: unknown): RuleSet {
  return RuleSetSchema.parse(raw);
}

/**
 * Safely parse a raw JSON value as a rule set.
 * Returns a discriminated result; never throws.
 */
export function safeParseRuleSet(
  raw: unknown
): z.SafeParseReturnType<unknown, RuleSet> {
  return RuleSetSchema.safeParse(raw);
}
