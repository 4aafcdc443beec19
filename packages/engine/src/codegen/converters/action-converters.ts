// ─── Action Converters ─────────────────────────────────────────────

import { CheckNode, HealNode, StrikeNode } from "../../runtime/nodes/action-nodes";
import type { ScalarConverter } from "../converter-registry";

export const strikeConverter: ScalarConverter<"action"> = {
  tokenType: "Strike",
  target: "action",
  convert: (ast, gen) => new StrikeNode(gen.childScalar(ast, "target", "character")),
};

export const healConverter: ScalarConverter<"action"> = {
  tokenType: "Heal",
  target: "action",
  convert: (ast, gen) =>
    new HealNode(gen.childScalar(ast, "target", "character"), gen.options.healCost),
};

export const checkConverter: ScalarConverter<"action"> = {
  tokenType: "Check",
  target: "action",
  convert: (ast, gen) =>
    new CheckNode(
      gen.childScalar(ast, "condition", "bool"),
      gen.childScalar(ast, "thenAction", "action")
    ),
};

export const ACTION_CONVERTERS: readonly ScalarConverter<"action">[] = [
  strikeConverter,
  healConverter,
  checkConverter,
];
