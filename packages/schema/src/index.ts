// ─── @gambit/schema ────────────────────────────────────────────────
// Token tree and battle types, plus Zod validation for .rules.json files.
// All types and schemas are re-exported from this single entry point.

export * from "./types/index";
export * from "./schema/index";
