// ─── Type Model ────────────────────────────────────────────────────
// The type algebra of the rule language: primitives, battle domain
// types, parameterized collections, abstract capabilities and the
// Any/Void markers, plus the compatibility relation over them.

export type SimpleKind =
  | "int"
  | "bool"
  | "string"
  | "character"
  | "team"
  | "characterHp"
  | "teamSide"
  | "numeric"
  | "action"
  | "condition"
  | "void"
  | "any";

export interface SimpleType {
  readonly kind: SimpleKind;
}

export interface ArrayType {
  readonly kind: "array";
  readonly element: Type;
}

export interface OptionType {
  readonly kind: "option";
  readonly inner: Type;
}

export type Type = SimpleType | ArrayType | OptionType;

// ─── Constructors ──────────────────────────────────────────────────

export const Types = {
  int: { kind: "int" },
  bool: { kind: "bool" },
  string: { kind: "string" },
  character: { kind: "character" },
  team: { kind: "team" },
  characterHp: { kind: "characterHp" },
  teamSide: { kind: "teamSide" },
  numeric: { kind: "numeric" },
  action: { kind: "action" },
  condition: { kind: "condition" },
  void: { kind: "void" },
  any: { kind: "any" },
} as const satisfies Record<SimpleKind, SimpleType>;

export function arrayOf(element: Type): ArrayType {
  return { kind: "array", element };
}

export function optionOf(inner: Type): OptionType {
  return { kind: "option", inner };
}

// ─── Relations ─────────────────────────────────────────────────────

export function typesEqual(a: Type, b: Type): boolean {
  if (a.kind === "array") {
    return b.kind === "array" && typesEqual(a.element, b.element);
  }
  if (a.kind === "option") {
    return b.kind === "option" && typesEqual(a.inner, b.inner);
  }
  return a.kind === b.kind;
}

/** Int and CharacterHP: the concrete types Numeric stands for. */
export function isNumericType(type: Type): boolean {
  return type.kind === "int" || type.kind === "characterHp" || type.kind === "numeric";
}

/**
 * Whether a value of type `actual` may fill a slot declared as `expected`.
 * Symmetric: identical types match, Numeric matches Int or CharacterHP,
 * Any matches anything, collections match element-wise.
 */
export function isCompatible(expected: Type, actual: Type): boolean {
  if (expected.kind === "any" || actual.kind === "any") return true;
  if (expected.kind === "numeric" || actual.kind === "numeric") {
    return isNumericType(expected) && isNumericType(actual);
  }
  if (expected.kind === "array") {
    return actual.kind === "array" && isCompatible(expected.element, actual.element);
  }
  if (expected.kind === "option") {
    return actual.kind === "option" && isCompatible(expected.inner, actual.inner);
  }
  return expected.kind === actual.kind;
}

/** True if the type (or anything nested in it) is Numeric or Any. */
export function isAbstract(type: Type): boolean {
  switch (type.kind) {
    case "numeric":
    case "any":
      return true;
    case "array":
      return isAbstract(type.element);
    case "option":
      return isAbstract(type.inner);
    default:
      return false;
  }
}

/** Element type of an array, or undefined for anything else. */
export function elementType(type: Type): Type | undefined {
  return type.kind === "array" ? type.element : undefined;
}

/**
 * Picks a concrete representative for an abstract type.
 * Numeric becomes CharacterHP when the hint says so, Int otherwise;
 * Any becomes the hint, or Void without one.
 */
export function resolveToConcrete(type: Type, hint?: Type): Type {
  switch (type.kind) {
    case "numeric":
      return hint?.kind === "characterHp" ? Types.characterHp : Types.int;
    case "any":
      return hint ?? Types.void;
    case "array":
      return arrayOf(resolveToConcrete(type.element, hint && elementType(hint)));
    case "option":
      return optionOf(
        resolveToConcrete(type.inner, hint?.kind === "option" ? hint.inner : undefined)
      );
    default:
      return type;
  }
}

// ─── Display ───────────────────────────────────────────────────────

const DISPLAY_NAMES: Readonly<Record<SimpleKind, string>> = {
  int: "Int",
  bool: "Bool",
  string: "String",
  character: "Character",
  team: "Team",
  characterHp: "CharacterHP",
  teamSide: "TeamSide",
  numeric: "Numeric",
  action: "Action",
  condition: "Condition",
  void: "Void",
  any: "Any",
};

export function formatType(type: Type): string {
  if (type.kind === "array") return `Array<${formatType(type.element)}>`;
  if (type.kind === "option") return `Option<${formatType(type.inner)}>`;
  return DISPLAY_NAMES[type.kind];
}
