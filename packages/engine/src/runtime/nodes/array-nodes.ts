// ─── Array Nodes ───────────────────────────────────────────────────
// Roster queries and the list combinators. FilterList and Map evaluate
// their operand once per element under a derived context; the parent
// context is never touched, so outer bindings survive nested lists.

import type { Character, TeamSide } from "@gambit/schema";
import { withCurrentElement, type EvaluationContext } from "../evaluation-context";
import { EvaluationError, type EvalNode } from "../node";
import type { CurrentElement } from "../values";

export class AllCharactersNode implements EvalNode<readonly Character[]> {
  evaluate(context: EvaluationContext): readonly Character[] {
    const { playerTeam, enemyTeam } = context.battle;
    return [...playerTeam.members, ...enemyTeam.members];
  }
}

export class TeamMembersNode implements EvalNode<readonly Character[]> {
  constructor(private readonly side: EvalNode<TeamSide>) {}

  evaluate(context: EvaluationContext): readonly Character[] {
    const side = this.side.evaluate(context);
    const team = side === "player" ? context.battle.playerTeam : context.battle.enemyTeam;
    return team.members;
  }
}

export class FilterListNode<T> implements EvalNode<readonly T[]> {
  constructor(
    private readonly source: EvalNode<readonly T[]>,
    private readonly condition: EvalNode<boolean>,
    private readonly bind: (value: T) => CurrentElement
  ) {}

  evaluate(context: EvaluationContext): readonly T[] {
    return this.source
      .evaluate(context)
      .filter((item) => this.condition.evaluate(withCurrentElement(context, this.bind(item))));
  }
}

export class MapNode<S, T> implements EvalNode<readonly T[]> {
  constructor(
    private readonly source: EvalNode<readonly S[]>,
    private readonly transform: EvalNode<T>,
    private readonly bind: (value: S) => CurrentElement
  ) {}

  evaluate(context: EvaluationContext): readonly T[] {
    return this.source
      .evaluate(context)
      .map((item) => this.transform.evaluate(withCurrentElement(context, this.bind(item))));
  }
}

export class RandomPickNode<T> implements EvalNode<T> {
  constructor(private readonly source: EvalNode<readonly T[]>) {}

  evaluate(context: EvaluationContext): T {
    const items = this.source.evaluate(context);
    const picked = items.length > 0 ? items[context.rng.nextInt(0, items.length)] : undefined;
    if (picked === undefined) {
      throw new EvaluationError("Cannot pick from an empty array");
    }
    return picked;
  }
}

export type Extremum = "max" | "min";

/** Max/Min by a numeric key; the first of several equal elements wins. */
export class ExtremumNode<T> implements EvalNode<T> {
  constructor(
    private readonly extremum: Extremum,
    private readonly source: EvalNode<readonly T[]>,
    private readonly key: (value: T) => number
  ) {}

  evaluate(context: EvaluationContext): T {
    const items = this.source.evaluate(context);
    let best: T | undefined;
    let bestKey = 0;
    for (const item of items) {
      const key = this.key(item);
      if (best === undefined || (this.extremum === "max" ? key > bestKey : key < bestKey)) {
        best = item;
        bestKey = key;
      }
    }
    if (best === undefined) {
      throw new EvaluationError(`Cannot take the ${this.extremum} of an empty array`);
    }
    return best;
  }
}
