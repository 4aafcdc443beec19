// ─── Evaluation Nodes ──────────────────────────────────────────────
// A compiled rule is a tree of nodes, each producing one value type.
// Nodes are immutable and re-evaluated every turn; all per-call state
// lives in the EvaluationContext.

import type { EvaluationContext } from "./evaluation-context";

export interface EvalNode<T> {
  /**
   * @throws {EvaluationError} when the tree cannot produce a value.
   * @throws {RuleBreak} when a guarded action does not apply.
   */
  evaluate(context: EvaluationContext): T;
}

/** A hard failure in an otherwise well-typed tree (e.g. Max of nothing). */
export class EvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EvaluationError";
  }
}

/**
 * "This rule does not apply this turn." Not an error: the rule resolver
 * moves on to the next rule.
 */
export class RuleBreak extends Error {
  constructor(readonly reason: string) {
    super(reason);
    this.name = "RuleBreak";
  }
}
