// ─── Battle Domain ─────────────────────────────────────────────────
// The read-only view of a battle that rules are evaluated against, and
// the closed set of actions a rule can decide on.

export interface Character {
  readonly id: number;
  readonly name: string;
  readonly hp: number;
  readonly maxHp: number;
  readonly mp: number;
  readonly maxMp: number;
  readonly attack: number;
}

export interface Team {
  readonly name: string;
  readonly members: readonly Character[];
}

export type TeamSide = "player" | "enemy";

/**
 * A character's HP as a value of its own. Ordered and compared by `hp`;
 * `character` lets rules get back to whoever owns it.
 */
export interface CharacterHp {
  readonly character: Character;
  readonly hp: number;
}

export interface BattleView {
  readonly actingCharacter: Character;
  readonly actingSide: TeamSide;
  readonly playerTeam: Team;
  readonly enemyTeam: Team;
}

// ─── Actions ───────────────────────────────────────────────────────
// Effects (damage, healing, MP cost) are applied by the battle driver.

export interface StrikeAction {
  readonly kind: "strike";
  readonly targetId: number;
}

export interface HealAction {
  readonly kind: "heal";
  readonly targetId: number;
}

export type Action = StrikeAction | HealAction;
