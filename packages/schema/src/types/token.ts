// ─── Token Tree ────────────────────────────────────────────────────
// A rule is a tree of tokens: nested objects tagged by `type`, with
// named fields for operand slots and inline literal fields.

/** Values a token may carry inline (e.g. `Number.value`). */
export type TokenLiteral = string | number | boolean;

/**
 * The structural form of a token, as the compiler receives it.
 * Unknown kinds are representable here so the checker can report them.
 */
export type RawToken = {
  readonly type: string;
  readonly [field: string]: RawToken | TokenLiteral;
};

/** Narrows an unknown field value to a nested token. */
export function isRawToken(value: unknown): value is RawToken {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string"
  );
}

// ─── Built-in Token Kinds ──────────────────────────────────────────
// Type aliases rather than interfaces so each kind stays assignable to
// RawToken's index signature.

export type StrikeToken = { readonly type: "Strike"; readonly target: Token };
export type HealToken = { readonly type: "Heal"; readonly target: Token };
export type CheckToken = {
  readonly type: "Check";
  readonly condition: Token;
  readonly thenAction: Token;
};
export type TrueOrFalseRandomToken = { readonly type: "TrueOrFalseRandom" };
export type GreaterThanToken = {
  readonly type: "GreaterThan";
  readonly left: Token;
  readonly right: Token;
};
export type LessThanToken = {
  readonly type: "LessThan";
  readonly left: Token;
  readonly right: Token;
};
export type EqToken = {
  readonly type: "Eq";
  readonly left: Token;
  readonly right: Token;
};
export type NumberToken = { readonly type: "Number"; readonly value: number };
export type ActingCharacterToken = { readonly type: "ActingCharacter" };
export type AllCharactersToken = { readonly type: "AllCharacters" };
export type CharacterToHpToken = {
  readonly type: "CharacterToHp";
  readonly character: Token;
};
export type CharacterHpToCharacterToken = {
  readonly type: "CharacterHpToCharacter";
  readonly characterHp: Token;
};
export type CharacterTeamToken = {
  readonly type: "CharacterTeam";
  readonly character: Token;
};
export type TeamMembersToken = {
  readonly type: "TeamMembers";
  readonly teamSide: Token;
};
export type AllTeamSidesToken = { readonly type: "AllTeamSides" };
export type HeroToken = { readonly type: "Hero" };
export type EnemyToken = { readonly type: "Enemy" };
export type RandomPickToken = { readonly type: "RandomPick"; readonly array: Token };
export type FilterListToken = {
  readonly type: "FilterList";
  readonly array: Token;
  readonly condition: Token;
};
export type MapToken = {
  readonly type: "Map";
  readonly array: Token;
  readonly transform: Token;
};
export type MaxToken = { readonly type: "Max"; readonly array: Token };
export type MinToken = { readonly type: "Min"; readonly array: Token };
export type NumericMaxToken = { readonly type: "NumericMax"; readonly array: Token };
export type NumericMinToken = { readonly type: "NumericMin"; readonly array: Token };
export type ElementToken = { readonly type: "Element" };

/** Discriminated union of every built-in token kind. */
export type Token =
  | StrikeToken
  | HealToken
  | CheckToken
  | TrueOrFalseRandomToken
  | GreaterThanToken
  | LessThanToken
  | EqToken
  | NumberToken
  | ActingCharacterToken
  | AllCharactersToken
  | CharacterToHpToken
  | CharacterHpToCharacterToken
  | CharacterTeamToken
  | TeamMembersToken
  | AllTeamSidesToken
  | HeroToken
  | EnemyToken
  | RandomPickToken
  | FilterListToken
  | MapToken
  | MaxToken
  | MinToken
  | NumericMaxToken
  | NumericMinToken
  | ElementToken;

export type TokenType = Token["type"];
