// ─── Traits ────────────────────────────────────────────────────────
// Abstract capabilities (Eq, Ord, Numeric, ...) and the concrete types
// that implement them. A type implementing a trait also implements all
// of that trait's supertraits.

import { Types, arrayOf, formatType, typesEqual, type Type } from "./types";

export interface TraitDefinition {
  readonly name: string;
  readonly description: string;
  readonly supertraits: readonly string[];
}

/** A type that failed a required trait bound. */
export interface TraitBoundViolation {
  readonly type: Type;
  readonly traitName: string;
  readonly availableTraits: readonly string[];
}

/**
 * Matches a registered implementation against a queried type.
 * `Array<Any>` stands for every array type.
 */
function implementationCovers(registered: Type, queried: Type): boolean {
  if (registered.kind === "array" && registered.element.kind === "any") {
    return queried.kind === "array";
  }
  return typesEqual(registered, queried);
}

export class TraitRegistry {
  private readonly traits = new Map<string, TraitDefinition>();
  private readonly implementations = new Map<string, Type[]>();

  defineTrait(definition: TraitDefinition): void {
    for (const parent of definition.supertraits) {
      if (!this.traits.has(parent)) {
        throw new Error(`Trait "${definition.name}" extends unknown trait "${parent}"`);
      }
    }
    this.traits.set(definition.name, definition);
    this.implementations.set(definition.name, []);
  }

  /** @throws {Error} if the trait has not been defined. */
  implement(traitName: string, type: Type): void {
    const impls = this.implementations.get(traitName);
    if (!impls) {
      throw new Error(`Cannot implement unknown trait "${traitName}" for ${formatType(type)}`);
    }
    impls.push(type);
  }

  has(traitName: string): boolean {
    return this.traits.has(traitName);
  }

  getTrait(traitName: string): TraitDefinition | undefined {
    return this.traits.get(traitName);
  }

  /**
   * All traits the type implements, including supertraits of the
   * directly implemented ones. Sorted by name.
   */
  traitsForType(type: Type): string[] {
    const found = new Set<string>();
    const visit = (name: string): void => {
      if (found.has(name)) return;
      found.add(name);
      for (const parent of this.traits.get(name)?.supertraits ?? []) {
        visit(parent);
      }
    };

    for (const [name, impls] of this.implementations) {
      if (impls.some((impl) => implementationCovers(impl, type))) {
        visit(name);
      }
    }
    return [...found].sort();
  }

  /** Any satisfies every bound: it is what an unconstrained variable resolves to. */
  implementsTrait(type: Type, traitName: string): boolean {
    if (type.kind === "any") return true;
    return this.traitsForType(type).includes(traitName);
  }

  /** Returns the first bound the type fails, or undefined if all hold. */
  checkBounds(type: Type, required: readonly string[]): TraitBoundViolation | undefined {
    const missing = required.find((name) => !this.implementsTrait(type, name));
    if (missing === undefined) return undefined;
    return {
      type,
      traitName: missing,
      availableTraits: this.traitsForType(type),
    };
  }
}

// ─── Built-in Traits ───────────────────────────────────────────────

/**
 * Eq, Ord (extends Eq), Numeric, Collection and Listable with their
 * built-in implementations. Characters are ordered by current HP.
 */
export function createBuiltinTraitRegistry(): TraitRegistry {
  const registry = new TraitRegistry();

  registry.defineTrait({
    name: "Eq",
    description: "Values that can be compared for equality",
    supertraits: [],
  });
  registry.defineTrait({
    name: "Ord",
    description: "Values with a total order",
    supertraits: ["Eq"],
  });
  registry.defineTrait({
    name: "Numeric",
    description: "Integers and values with a numeric component",
    supertraits: [],
  });
  registry.defineTrait({
    name: "Collection",
    description: "Ordered sequences of values",
    supertraits: [],
  });
  registry.defineTrait({
    name: "Listable",
    description: "Values that may be elements of a sequence",
    supertraits: [],
  });

  for (const type of [Types.bool, Types.string, Types.team, Types.teamSide]) {
    registry.implement("Eq", type);
  }
  for (const type of [Types.int, Types.characterHp, Types.character, Types.numeric]) {
    registry.implement("Ord", type);
  }
  for (const type of [Types.int, Types.characterHp, Types.numeric]) {
    registry.implement("Numeric", type);
  }
  registry.implement("Collection", arrayOf(Types.any));
  for (const type of [
    Types.int,
    Types.bool,
    Types.character,
    Types.characterHp,
    Types.teamSide,
  ]) {
    registry.implement("Listable", type);
  }

  return registry;
}
