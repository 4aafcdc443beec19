// ─── Rule Resolver ─────────────────────────────────────────────────
// Picks a character's action for the turn: the first rule (in order)
// that produces one. A RuleBreak moves on to the next rule; any other
// error is a defect in the tree and propagates.

import type { Action, BattleView } from "@gambit/schema";
import { createEvaluationContext, type EvaluationContext, type RandomSource } from "./evaluation-context";
import { RuleBreak, type EvalNode } from "./node";

/**
 * Evaluates `rules` in order and returns the first Action, or null when
 * the list is empty or every rule breaks. Random draws made by breaking
 * rules stay consumed.
 */
export function resolveAction(
  rules: readonly EvalNode<Action>[],
  context: EvaluationContext
): Action | null {
  for (const rule of rules) {
    try {
      return rule.evaluate(context);
    } catch (error) {
      if (error instanceof RuleBreak) continue;
      throw error;
    }
  }
  return null;
}

/** One character's compiled rules, bound to its side's random source. */
export class ActionResolver {
  constructor(
    private readonly rules: readonly EvalNode<Action>[],
    private readonly rng: RandomSource
  ) {}

  get ruleCount(): number {
    return this.rules.length;
  }

  resolve(battle: BattleView): Action | null {
    const action = resolveAction(this.rules, createEvaluationContext(battle, this.rng));
    if (action === null) {
      console.warn(
        `${battle.actingCharacter.name}: no rule produced an action ` +
          `(${this.rules.length} rule(s) checked). Skipping the turn.`
      );
    }
    return action;
  }
}
