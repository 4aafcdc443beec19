// ─── Battle Fixtures ───────────────────────────────────────────────
// Shared factories for tests: characters, a small two-team battle and
// a random source that replays a fixed script.

import type { BattleView, Character, TeamSide } from "@gambit/schema";
import type { RandomSource } from "../runtime/evaluation-context";

export function makeCharacter(
  overrides: Partial<Character> & Pick<Character, "id" | "name">
): Character {
  return { hp: 100, maxHp: 100, mp: 50, maxMp: 50, attack: 20, ...overrides };
}

export const hero = makeCharacter({ id: 1, name: "Hero" });
export const cleric = makeCharacter({ id: 2, name: "Cleric", hp: 60, mp: 30 });
export const goblin = makeCharacter({ id: 3, name: "Goblin", hp: 40, maxHp: 40 });
export const orc = makeCharacter({ id: 4, name: "Orc", hp: 80, maxHp: 120 });

export interface BattleOptions {
  readonly acting?: Character;
  readonly actingSide?: TeamSide;
  readonly players?: readonly Character[];
  readonly enemies?: readonly Character[];
}

/** Hero and Cleric against Goblin and Orc, Hero acting. */
export function makeBattle(options: BattleOptions = {}): BattleView {
  return {
    actingCharacter: options.acting ?? hero,
    actingSide: options.actingSide ?? "player",
    playerTeam: { name: "Players", members: options.players ?? [hero, cleric] },
    enemyTeam: { name: "Monsters", members: options.enemies ?? [goblin, orc] },
  };
}

/** Replays the given floats in order; throws once they run out. */
export class ScriptedRng implements RandomSource {
  private index = 0;

  constructor(private readonly values: readonly number[]) {}

  get drawCount(): number {
    return this.index;
  }

  next(): number {
    const value = this.values[this.index];
    if (value === undefined) {
      throw new Error(`Scripted random source exhausted after ${this.index} draw(s)`);
    }
    this.index++;
    return value;
  }

  nextInt(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min));
  }
}
