// ─── Evaluation Context ────────────────────────────────────────────
// The per-call bundle every node evaluates against: the battle view,
// the caller's random source and the current list element, if any.

import type { BattleView } from "@gambit/schema";
import type { CurrentElement } from "./values";

/** A stream of random numbers, consumed in evaluation order. */
export interface RandomSource {
  /** A float in [0, 1). */
  next(): number;
  /** An integer in [min, max). */
  nextInt(min: number, max: number): number;
}

export interface EvaluationContext {
  readonly battle: BattleView;
  readonly rng: RandomSource;
  /** Bound by FilterList and Map while evaluating their per-element operand. */
  readonly currentElement?: CurrentElement;
}

export function createEvaluationContext(
  battle: BattleView,
  rng: RandomSource
): EvaluationContext {
  return { battle, rng };
}

/** A child context that differs from `context` only in its current element. */
export function withCurrentElement(
  context: EvaluationContext,
  element: CurrentElement
): EvaluationContext {
  return { ...context, currentElement: element };
}
