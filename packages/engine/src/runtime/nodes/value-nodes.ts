// ─── Value Nodes ───────────────────────────────────────────────────
// Constants, battle accessors, HP projections and the current element.

import type { BattleView, Character, CharacterHp, TeamSide } from "@gambit/schema";
import type { EvaluationContext } from "../evaluation-context";
import { EvaluationError, type EvalNode } from "../node";
import { ELEMENT_READERS, describeElement, type ElementKind, type RuntimeValues } from "../values";

export class ConstantNode<T> implements EvalNode<T> {
  constructor(private readonly value: T) {}

  evaluate(): T {
    return this.value;
  }
}

export class ActingCharacterNode implements EvalNode<Character> {
  evaluate(context: EvaluationContext): Character {
    return context.battle.actingCharacter;
  }
}

export class CharacterToHpNode implements EvalNode<CharacterHp> {
  constructor(private readonly character: EvalNode<Character>) {}

  evaluate(context: EvaluationContext): CharacterHp {
    const character = this.character.evaluate(context);
    return { character, hp: character.hp };
  }
}

export class CharacterHpToCharacterNode implements EvalNode<Character> {
  constructor(private readonly characterHp: EvalNode<CharacterHp>) {}

  evaluate(context: EvaluationContext): Character {
    return this.characterHp.evaluate(context).character;
  }
}

/** Projects an HP value to its number, for comparisons against integers. */
export class HpValueNode implements EvalNode<number> {
  constructor(private readonly characterHp: EvalNode<CharacterHp>) {}

  evaluate(context: EvaluationContext): number {
    return this.characterHp.evaluate(context).hp;
  }
}

export function sideOf(battle: BattleView, character: Character): TeamSide | undefined {
  if (battle.playerTeam.members.some((member) => member.id === character.id)) return "player";
  if (battle.enemyTeam.members.some((member) => member.id === character.id)) return "enemy";
  return undefined;
}

export class CharacterTeamNode implements EvalNode<TeamSide> {
  constructor(private readonly character: EvalNode<Character>) {}

  evaluate(context: EvaluationContext): TeamSide {
    const character = this.character.evaluate(context);
    const side = sideOf(context.battle, character);
    if (!side) {
      throw new EvaluationError(`${character.name} (#${character.id}) is not on either team`);
    }
    return side;
  }
}

/** Reads the current element bound by the nearest FilterList or Map. */
export class ElementNode<K extends ElementKind> implements EvalNode<RuntimeValues[K]> {
  constructor(private readonly kind: K) {}

  evaluate(context: EvaluationContext): RuntimeValues[K] {
    const element = context.currentElement;
    if (!element) {
      throw new EvaluationError("Element evaluated with no current element");
    }
    const value = ELEMENT_READERS[this.kind](element);
    if (value === undefined) {
      throw new EvaluationError(
        `Element expected a ${this.kind}, but the current element is a ${describeElement(element)}`
      );
    }
    return value;
  }
}
