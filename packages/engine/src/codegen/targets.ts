// ─── Generation Targets ────────────────────────────────────────────
// Maps checked types onto the runtime value kinds nodes can produce.

import type { ElementKind, ValueKind } from "../runtime/values";
import { Types, arrayOf, formatType, resolveToConcrete, type Type } from "../typing/types";

export const VALUE_TYPES: Readonly<Record<ValueKind, Type>> = {
  int: Types.int,
  bool: Types.bool,
  character: Types.character,
  characterHp: Types.characterHp,
  teamSide: Types.teamSide,
  action: Types.action,
};

export function describeTarget(kind: ValueKind): string {
  return formatType(VALUE_TYPES[kind]);
}

export function describeArrayTarget(kind: ElementKind): string {
  return formatType(arrayOf(VALUE_TYPES[kind]));
}

/**
 * The element kind a type is represented by at run time. Numeric
 * resolves to Int; anything else without a runtime kind is undefined.
 */
export function elementKindOf(type: Type): ElementKind | undefined {
  const resolved = resolveToConcrete(type);
  switch (resolved.kind) {
    case "int":
    case "bool":
    case "character":
    case "characterHp":
    case "teamSide":
      return resolved.kind;
    default:
      return undefined;
  }
}
