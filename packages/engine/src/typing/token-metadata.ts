// ─── Token Metadata ────────────────────────────────────────────────
// Per-token-kind signatures: named argument types, literal fields, the
// output type and which arguments see an element scope. The checker
// reads these as its fact base; nothing here knows about evaluation.

import { Types, formatType, type Type } from "./types";

// ─── Signature Types ───────────────────────────────────────────────
// Signatures may mention type parameters (`T`), instantiated with fresh
// variables each time a token is checked.

export type SignatureType =
  | { readonly kind: "type"; readonly type: Type }
  | { readonly kind: "param"; readonly name: string }
  | { readonly kind: "array"; readonly element: SignatureType };

export const sig = {
  of: (type: Type): SignatureType => ({ kind: "type", type }),
  param: (name: string): SignatureType => ({ kind: "param", name }),
  array: (element: SignatureType): SignatureType => ({ kind: "array", element }),
};

export function formatSignatureType(type: SignatureType): string {
  switch (type.kind) {
    case "type":
      return formatType(type.type);
    case "param":
      return type.name;
    case "array":
      return `Array<${formatSignatureType(type.element)}>`;
  }
}

// ─── Metadata ──────────────────────────────────────────────────────

export interface ArgumentSpec {
  readonly name: string;
  readonly type: SignatureType;
  /** Traits the checked argument type must implement. */
  readonly bounds?: readonly string[];
}

/** An inline, non-token field such as `Number.value`. */
export interface LiteralSpec {
  readonly name: string;
  readonly type: "integer" | "string" | "boolean";
}

/**
 * While checking `argument`, Element refers to the element type of the
 * already-checked `source` argument.
 */
export interface ElementScopeSpec {
  readonly argument: string;
  readonly source: string;
}

export interface TokenMetadata {
  readonly type: string;
  readonly description: string;
  /** Type parameter names mapped to their trait bounds. */
  readonly typeParameters?: Readonly<Record<string, readonly string[]>>;
  readonly arguments: readonly ArgumentSpec[];
  readonly literals?: readonly LiteralSpec[];
  readonly output: SignatureType;
  readonly elementScopes?: readonly ElementScopeSpec[];
}

/** Reads its type from the enclosing FilterList/Map; never registered. */
export const ELEMENT_TOKEN = "Element";

export class TokenMetadataRegistry {
  private readonly entries = new Map<string, TokenMetadata>();

  /** @throws {Error} on a duplicate registration or a reserved name. */
  register(metadata: TokenMetadata): void {
    if (metadata.type === ELEMENT_TOKEN) {
      throw new Error(`"${ELEMENT_TOKEN}" is reserved and cannot be registered`);
    }
    if (this.entries.has(metadata.type)) {
      throw new Error(`Token metadata for "${metadata.type}" is already registered`);
    }
    for (const scope of metadata.elementScopes ?? []) {
      const names = metadata.arguments.map((arg) => arg.name);
      const sourceIndex = names.indexOf(scope.source);
      if (sourceIndex < 0 || sourceIndex >= names.indexOf(scope.argument)) {
        throw new Error(
          `${metadata.type}: element scope source "${scope.source}" must be an argument ` +
            `declared before "${scope.argument}"`
        );
      }
    }
    this.entries.set(metadata.type, metadata);
  }

  get(type: string): TokenMetadata | undefined {
    return this.entries.get(type);
  }

  has(type: string): boolean {
    return this.entries.has(type);
  }

  types(): string[] {
    return [...this.entries.keys()];
  }
}

// ─── Built-in Signatures ───────────────────────────────────────────

const character = sig.of(Types.character);
const T = sig.param("T");

function action(type: "Strike" | "Heal", description: string): TokenMetadata {
  return {
    type,
    description,
    arguments: [{ name: "target", type: character }],
    output: sig.of(Types.action),
  };
}

function comparison(type: "GreaterThan" | "LessThan", description: string): TokenMetadata {
  return {
    type,
    description,
    arguments: [
      { name: "left", type: sig.of(Types.numeric), bounds: ["Ord"] },
      { name: "right", type: sig.of(Types.numeric), bounds: ["Ord"] },
    ],
    output: sig.of(Types.bool),
  };
}

function constant(type: string, output: Type, description: string): TokenMetadata {
  return { type, description, arguments: [], output: sig.of(output) };
}

function reduction(
  type: string,
  bound: "Ord" | "Numeric",
  description: string
): TokenMetadata {
  return {
    type,
    description,
    typeParameters: { T: [bound] },
    arguments: [{ name: "array", type: sig.array(T), bounds: ["Collection"] }],
    output: T,
  };
}

const BUILTIN_METADATA: readonly TokenMetadata[] = [
  action("Strike", "Attack the target"),
  action("Heal", "Heal the target, spending MP"),
  {
    type: "Check",
    description: "Run the action only if the condition holds",
    arguments: [
      { name: "condition", type: sig.of(Types.bool) },
      { name: "thenAction", type: sig.of(Types.action) },
    ],
    output: sig.of(Types.action),
  },
  constant("TrueOrFalseRandom", Types.bool, "True half of the time"),
  comparison("GreaterThan", "Left is strictly greater than right"),
  comparison("LessThan", "Left is strictly less than right"),
  {
    type: "Eq",
    description: "Both sides are equal",
    typeParameters: { T: ["Eq"] },
    arguments: [
      { name: "left", type: T },
      { name: "right", type: T },
    ],
    output: sig.of(Types.bool),
  },
  {
    type: "Number",
    description: "An integer literal",
    arguments: [],
    literals: [{ name: "value", type: "integer" }],
    output: sig.of(Types.int),
  },
  constant("ActingCharacter", Types.character, "The character whose turn it is"),
  {
    type: "AllCharacters",
    description: "Every character, player team first",
    arguments: [],
    output: sig.array(character),
  },
  {
    type: "CharacterToHp",
    description: "The character's HP",
    arguments: [{ name: "character", type: character }],
    output: sig.of(Types.characterHp),
  },
  {
    type: "CharacterHpToCharacter",
    description: "The character an HP value belongs to",
    arguments: [{ name: "characterHp", type: sig.of(Types.characterHp) }],
    output: character,
  },
  {
    type: "CharacterTeam",
    description: "The side the character fights on",
    arguments: [{ name: "character", type: character }],
    output: sig.of(Types.teamSide),
  },
  {
    type: "TeamMembers",
    description: "Every member of the given side",
    arguments: [{ name: "teamSide", type: sig.of(Types.teamSide) }],
    output: sig.array(character),
  },
  {
    type: "AllTeamSides",
    description: "Both sides, player first",
    arguments: [],
    output: sig.array(sig.of(Types.teamSide)),
  },
  constant("Hero", Types.teamSide, "The player side"),
  constant("Enemy", Types.teamSide, "The enemy side"),
  {
    type: "RandomPick",
    description: "A uniformly random element",
    arguments: [{ name: "array", type: sig.array(T), bounds: ["Collection"] }],
    output: T,
  },
  {
    type: "FilterList",
    description: "Elements for which the condition holds, in order",
    arguments: [
      { name: "array", type: sig.array(T), bounds: ["Collection"] },
      { name: "condition", type: sig.of(Types.bool) },
    ],
    output: sig.array(T),
    elementScopes: [{ argument: "condition", source: "array" }],
  },
  {
    type: "Map",
    description: "The transform applied to each element, in order",
    typeParameters: { U: ["Listable"] },
    arguments: [
      { name: "array", type: sig.array(T), bounds: ["Collection"] },
      { name: "transform", type: sig.param("U") },
    ],
    output: sig.array(sig.param("U")),
    elementScopes: [{ argument: "transform", source: "array" }],
  },
  reduction("Max", "Ord", "The greatest element; the first one on ties"),
  reduction("Min", "Ord", "The least element; the first one on ties"),
  reduction("NumericMax", "Numeric", "The greatest numeric element"),
  reduction("NumericMin", "Numeric", "The least numeric element"),
];

export function createBuiltinMetadataRegistry(): TokenMetadataRegistry {
  const registry = new TokenMetadataRegistry();
  for (const metadata of BUILTIN_METADATA) {
    registry.register(metadata);
  }
  return registry;
}
