// ─── Action Nodes ──────────────────────────────────────────────────
// Nodes producing an Action. Strike and Heal guard on the acting
// character and break rather than fail when they do not apply.

import type { Action, Character } from "@gambit/schema";
import type { EvaluationContext } from "../evaluation-context";
import { RuleBreak, type EvalNode } from "../node";

export const DEFAULT_HEAL_COST = 10;

export class StrikeNode implements EvalNode<Action> {
  constructor(private readonly target: EvalNode<Character>) {}

  evaluate(context: EvaluationContext): Action {
    const actor = context.battle.actingCharacter;
    if (actor.hp <= 0) {
      throw new RuleBreak(`${actor.name} cannot strike while down`);
    }
    const target = this.target.evaluate(context);
    return { kind: "strike", targetId: target.id };
  }
}

export class HealNode implements EvalNode<Action> {
  constructor(
    private readonly target: EvalNode<Character>,
    private readonly cost: number = DEFAULT_HEAL_COST
  ) {}

  evaluate(context: EvaluationContext): Action {
    const actor = context.battle.actingCharacter;
    if (actor.hp <= 0) {
      throw new RuleBreak(`${actor.name} cannot heal while down`);
    }
    if (actor.mp < this.cost) {
      throw new RuleBreak(`${actor.name} has ${actor.mp} MP, heal costs ${this.cost}`);
    }
    const target = this.target.evaluate(context);
    return { kind: "heal", targetId: target.id };
  }
}

/** Runs the action when the condition holds; breaks otherwise. */
export class CheckNode implements EvalNode<Action> {
  constructor(
    private readonly condition: EvalNode<boolean>,
    private readonly thenAction: EvalNode<Action>
  ) {}

  evaluate(context: EvaluationContext): Action {
    if (!this.condition.evaluate(context)) {
      throw new RuleBreak("condition not met");
    }
    return this.thenAction.evaluate(context);
  }
}
