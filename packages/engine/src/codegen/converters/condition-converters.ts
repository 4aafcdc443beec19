// ─── Condition Converters ──────────────────────────────────────────
// Bool-producing tokens. Comparisons pin each Numeric operand to a
// runtime representation first; HP operands are projected to their
// number so Int and CharacterHP compare freely.

import type { EvalNode } from "../../runtime/node";
import {
  CompareNode,
  EqualsNode,
  RandomBoolNode,
  type Comparison,
} from "../../runtime/nodes/condition-nodes";
import { HpValueNode } from "../../runtime/nodes/value-nodes";
import { VALUE_EQUALITY, type ElementKind } from "../../runtime/values";
import type { TypedAst } from "../../typing/type-checker";
import { Types, formatType, isAbstract } from "../../typing/types";
import type { CodeGenerator } from "../code-generator";
import type { ScalarConverter } from "../converter-registry";
import { numericRepresentation } from "../numeric-resolution";
import { elementKindOf } from "../targets";

export const randomBoolConverter: ScalarConverter<"bool"> = {
  tokenType: "TrueOrFalseRandom",
  target: "bool",
  convert: () => new RandomBoolNode(),
};

function numericOperand(
  gen: CodeGenerator,
  ast: TypedAst,
  name: "left" | "right",
  sibling: "left" | "right"
): EvalNode<number> {
  const operand = gen.child(ast, name);
  return numericRepresentation(operand, ast.children[sibling]) === "characterHp"
    ? new HpValueNode(gen.childScalar(ast, name, "characterHp"))
    : gen.childScalar(ast, name, "int");
}

function comparisonConverter(
  tokenType: "GreaterThan" | "LessThan",
  comparison: Comparison
): ScalarConverter<"bool"> {
  return {
    tokenType,
    target: "bool",
    convert: (ast, gen) =>
      new CompareNode(
        comparison,
        numericOperand(gen, ast, "left", "right"),
        numericOperand(gen, ast, "right", "left")
      ),
  };
}

/** The kind both sides of Eq are generated as: the first concrete side, else Int. */
function equalityKind(gen: CodeGenerator, ast: TypedAst): ElementKind {
  const left = gen.child(ast, "left").type;
  const right = gen.child(ast, "right").type;
  const type = !isAbstract(left) ? left : !isAbstract(right) ? right : Types.int;
  const kind = elementKindOf(type);
  if (!kind) {
    throw gen.error({ kind: "NoConverter", tokenType: ast.token.type, target: formatType(type) }, ast);
  }
  return kind;
}

function equalsNode<K extends ElementKind>(
  gen: CodeGenerator,
  ast: TypedAst,
  kind: K
): EvalNode<boolean> {
  return new EqualsNode(
    gen.childScalar(ast, "left", kind),
    gen.childScalar(ast, "right", kind),
    VALUE_EQUALITY[kind]
  );
}

export const eqConverter: ScalarConverter<"bool"> = {
  tokenType: "Eq",
  target: "bool",
  convert: (ast, gen) => equalsNode(gen, ast, equalityKind(gen, ast)),
};

export const CONDITION_CONVERTERS: readonly ScalarConverter<"bool">[] = [
  randomBoolConverter,
  comparisonConverter("GreaterThan", "greaterThan"),
  comparisonConverter("LessThan", "lessThan"),
  eqConverter,
];
