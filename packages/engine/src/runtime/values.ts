// ─── Runtime Values ────────────────────────────────────────────────
// The closed set of value kinds a compiled node can produce, and the
// per-kind helpers list combinators need: binding a value as the
// current element, reading it back, comparing and ordering.

import type { Action, Character, CharacterHp, TeamSide } from "@gambit/schema";

export interface RuntimeValues {
  int: number;
  bool: boolean;
  character: Character;
  characterHp: CharacterHp;
  teamSide: TeamSide;
  action: Action;
}

export type ValueKind = keyof RuntimeValues;

/** Kinds that can live in an array and be bound as the current element. */
export type ElementKind = Exclude<ValueKind, "action">;

/** Kinds with an order, used by Max/Min. Characters order by HP. */
export type OrderedKind = "int" | "characterHp" | "character";

export const ELEMENT_KINDS: readonly ElementKind[] = [
  "int",
  "bool",
  "character",
  "characterHp",
  "teamSide",
];

export type CurrentElement = {
  [K in ElementKind]: { readonly kind: K; readonly value: RuntimeValues[K] };
}[ElementKind];

export const ELEMENT_BINDERS: {
  readonly [K in ElementKind]: (value: RuntimeValues[K]) => CurrentElement;
} = {
  int: (value) => ({ kind: "int", value }),
  bool: (value) => ({ kind: "bool", value }),
  character: (value) => ({ kind: "character", value }),
  characterHp: (value) => ({ kind: "characterHp", value }),
  teamSide: (value) => ({ kind: "teamSide", value }),
};

/** Reads the element back; undefined if it holds a different kind. */
export const ELEMENT_READERS: {
  readonly [K in ElementKind]: (element: CurrentElement) => RuntimeValues[K] | undefined;
} = {
  int: (element) => (element.kind === "int" ? element.value : undefined),
  bool: (element) => (element.kind === "bool" ? element.value : undefined),
  character: (element) => (element.kind === "character" ? element.value : undefined),
  characterHp: (element) => (element.kind === "characterHp" ? element.value : undefined),
  teamSide: (element) => (element.kind === "teamSide" ? element.value : undefined),
};

/** Characters are equal by id; HP values by their numeric component. */
export const VALUE_EQUALITY: {
  readonly [K in ElementKind]: (a: RuntimeValues[K], b: RuntimeValues[K]) => boolean;
} = {
  int: (a, b) => a === b,
  bool: (a, b) => a === b,
  character: (a, b) => a.id === b.id,
  characterHp: (a, b) => a.hp === b.hp,
  teamSide: (a, b) => a === b,
};

export const ORDER_KEYS: {
  readonly [K in OrderedKind]: (value: RuntimeValues[K]) => number;
} = {
  int: (value) => value,
  characterHp: (value) => value.hp,
  character: (value) => value.hp,
};

export function describeElement(element: CurrentElement | undefined): string {
  return element ? element.kind : "nothing";
}
