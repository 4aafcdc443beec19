// ─── Value Converters ──────────────────────────────────────────────
// Literals, battle accessors, HP projections, team sides and Element.

import type { TeamSide } from "@gambit/schema";
import {
  ActingCharacterNode,
  CharacterHpToCharacterNode,
  CharacterTeamNode,
  CharacterToHpNode,
  ConstantNode,
  ElementNode,
} from "../../runtime/nodes/value-nodes";
import type { ElementKind } from "../../runtime/values";
import { ELEMENT_TOKEN } from "../../typing/token-metadata";
import type { ScalarConverter } from "../converter-registry";

export const numberConverter: ScalarConverter<"int"> = {
  tokenType: "Number",
  target: "int",
  convert: (ast, gen) => {
    const value = ast.token["value"];
    if (typeof value !== "number") {
      throw gen.error({ kind: "MissingField", tokenType: ast.token.type, field: "value" }, ast);
    }
    return new ConstantNode(value);
  },
};

export const actingCharacterConverter: ScalarConverter<"character"> = {
  tokenType: "ActingCharacter",
  target: "character",
  convert: () => new ActingCharacterNode(),
};

export const characterToHpConverter: ScalarConverter<"characterHp"> = {
  tokenType: "CharacterToHp",
  target: "characterHp",
  convert: (ast, gen) => new CharacterToHpNode(gen.childScalar(ast, "character", "character")),
};

export const characterHpToCharacterConverter: ScalarConverter<"character"> = {
  tokenType: "CharacterHpToCharacter",
  target: "character",
  convert: (ast, gen) =>
    new CharacterHpToCharacterNode(gen.childScalar(ast, "characterHp", "characterHp")),
};

export const characterTeamConverter: ScalarConverter<"teamSide"> = {
  tokenType: "CharacterTeam",
  target: "teamSide",
  convert: (ast, gen) => new CharacterTeamNode(gen.childScalar(ast, "character", "character")),
};

/** Hero and Enemy name absolute sides, whoever is acting. */
function sideConverter(tokenType: "Hero" | "Enemy", side: TeamSide): ScalarConverter<"teamSide"> {
  return {
    tokenType,
    target: "teamSide",
    convert: () => new ConstantNode<TeamSide>(side),
  };
}

export const heroConverter = sideConverter("Hero", "player");
export const enemyConverter = sideConverter("Enemy", "enemy");

/** Element of kind K; which kind is asked for is decided by the parent. */
export function elementConverter<K extends ElementKind>(kind: K): ScalarConverter<K> {
  return {
    tokenType: ELEMENT_TOKEN,
    target: kind,
    convert: () => new ElementNode(kind),
  };
}
