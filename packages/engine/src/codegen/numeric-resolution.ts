// ─── Numeric Resolution ────────────────────────────────────────────
// Numeric is a capability, not a runtime representation. Before code
// generation a Numeric-typed operand is pinned to Int or CharacterHP.

import type { TypedAst } from "../typing/type-checker";
import { elementType, type Type } from "../typing/types";

export type NumericKind = "int" | "characterHp";

const REDUCTIONS = new Set(["Max", "Min", "NumericMax", "NumericMin"]);

function representationOf(type: Type | undefined): NumericKind | undefined {
  if (type?.kind === "int" || type?.kind === "characterHp") return type.kind;
  return undefined;
}

/**
 * How `ast` is represented at run time, looking in order at its own
 * type, the element type of a reduction's source, the sibling operand
 * it is compared against, and finally defaulting to Int.
 */
export function numericRepresentation(ast: TypedAst, sibling?: TypedAst): NumericKind {
  const own = representationOf(ast.type);
  if (own) return own;

  const source = REDUCTIONS.has(ast.token.type) ? ast.children["array"] : undefined;
  const fromSource = source && representationOf(elementType(source.type));
  if (fromSource) return fromSource;

  return representationOf(sibling?.type) ?? "int";
}
