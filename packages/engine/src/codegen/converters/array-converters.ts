// ─── Array Converters ──────────────────────────────────────────────
// Roster queries, the list combinators and the reductions that pick a
// single element out of a list. The per-kind factories are registered
// once for every element kind they support.

import type { TeamSide } from "@gambit/schema";
import type { EvalNode } from "../../runtime/node";
import {
  AllCharactersNode,
  ExtremumNode,
  FilterListNode,
  MapNode,
  RandomPickNode,
  TeamMembersNode,
  type Extremum,
} from "../../runtime/nodes/array-nodes";
import { ConstantNode } from "../../runtime/nodes/value-nodes";
import {
  ELEMENT_BINDERS,
  ORDER_KEYS,
  type ElementKind,
  type OrderedKind,
  type RuntimeValues,
} from "../../runtime/values";
import type { TypedAst } from "../../typing/type-checker";
import { Types, elementType, formatType } from "../../typing/types";
import type { CodeGenerator } from "../code-generator";
import type { ArrayConverter, ScalarConverter } from "../converter-registry";
import type { NumericKind } from "../numeric-resolution";
import { elementKindOf } from "../targets";

// ─── Array Producers ───────────────────────────────────────────────

export const allCharactersConverter: ArrayConverter<"character"> = {
  tokenType: "AllCharacters",
  element: "character",
  convert: () => new AllCharactersNode(),
};

export const teamMembersConverter: ArrayConverter<"character"> = {
  tokenType: "TeamMembers",
  element: "character",
  convert: (ast, gen) => new TeamMembersNode(gen.childScalar(ast, "teamSide", "teamSide")),
};

const ALL_SIDES: readonly TeamSide[] = ["player", "enemy"];

export const allTeamSidesConverter: ArrayConverter<"teamSide"> = {
  tokenType: "AllTeamSides",
  element: "teamSide",
  convert: () => new ConstantNode(ALL_SIDES),
};

export function filterListConverter<E extends ElementKind>(element: E): ArrayConverter<E> {
  return {
    tokenType: "FilterList",
    element,
    convert: (ast, gen) =>
      new FilterListNode(
        gen.childArray(ast, "array", element),
        gen.childScalar(ast, "condition", "bool"),
        ELEMENT_BINDERS[element]
      ),
  };
}

/** The element kind of a child list, as inferred by the checker. */
function sourceKind(gen: CodeGenerator, ast: TypedAst): ElementKind {
  const source = gen.child(ast, "array").type;
  const kind = elementKindOf(elementType(source) ?? Types.void);
  if (!kind) {
    throw gen.error(
      { kind: "NoConverter", tokenType: ast.token.type, target: formatType(source) },
      ast
    );
  }
  return kind;
}

function mapNode<S extends ElementKind, R extends ElementKind>(
  gen: CodeGenerator,
  ast: TypedAst,
  source: S,
  result: R
): EvalNode<readonly RuntimeValues[R][]> {
  return new MapNode(
    gen.childArray(ast, "array", source),
    gen.childScalar(ast, "transform", result),
    ELEMENT_BINDERS[source]
  );
}

/** Map producing a list of `result`, over whatever its source holds. */
export function mapConverter<R extends ElementKind>(result: R): ArrayConverter<R> {
  return {
    tokenType: "Map",
    element: result,
    convert: (ast, gen) => mapNode(gen, ast, sourceKind(gen, ast), result),
  };
}

// ─── Reductions ────────────────────────────────────────────────────

export function randomPickConverter<K extends ElementKind>(kind: K): ScalarConverter<K> {
  return {
    tokenType: "RandomPick",
    target: kind,
    convert: (ast, gen) => new RandomPickNode(gen.childArray(ast, "array", kind)),
  };
}

export function extremumConverter<K extends OrderedKind>(
  tokenType: "Max" | "Min",
  kind: K
): ScalarConverter<K> {
  return reduction(tokenType, tokenType === "Max" ? "max" : "min", kind);
}

/** NumericMax/NumericMin exist only for the Numeric representations. */
export function numericExtremumConverter<K extends NumericKind>(
  tokenType: "NumericMax" | "NumericMin",
  kind: K
): ScalarConverter<K> {
  return reduction(tokenType, tokenType === "NumericMax" ? "max" : "min", kind);
}

function reduction<K extends OrderedKind>(
  tokenType: string,
  extremum: Extremum,
  kind: K
): ScalarConverter<K> {
  return {
    tokenType,
    target: kind,
    convert: (ast, gen) =>
      new ExtremumNode(extremum, gen.childArray(ast, "array", kind), ORDER_KEYS[kind]),
  };
}
