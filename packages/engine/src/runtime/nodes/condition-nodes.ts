// ─── Condition Nodes ───────────────────────────────────────────────

import type { EvaluationContext } from "../evaluation-context";
import type { EvalNode } from "../node";

export class RandomBoolNode implements EvalNode<boolean> {
  constructor(private readonly probability = 0.5) {}

  evaluate(context: EvaluationContext): boolean {
    return context.rng.next() < this.probability;
  }
}

export type Comparison = "greaterThan" | "lessThan";

/**
 * Numeric comparison. HP operands arrive already projected to their
 * numeric component, so mixed HP/integer comparisons need no variant.
 */
export class CompareNode implements EvalNode<boolean> {
  constructor(
    private readonly comparison: Comparison,
    private readonly left: EvalNode<number>,
    private readonly right: EvalNode<number>
  ) {}

  evaluate(context: EvaluationContext): boolean {
    const left = this.left.evaluate(context);
    const right = this.right.evaluate(context);
    return this.comparison === "greaterThan" ? left > right : left < right;
  }
}

export class EqualsNode<T> implements EvalNode<boolean> {
  constructor(
    private readonly left: EvalNode<T>,
    private readonly right: EvalNode<T>,
    private readonly equals: (a: T, b: T) => boolean
  ) {}

  evaluate(context: EvaluationContext): boolean {
    return this.equals(this.left.evaluate(context), this.right.evaluate(context));
  }
}
