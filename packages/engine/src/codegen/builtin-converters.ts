// ─── Builtin Converters ────────────────────────────────────────────
// Registers every converter the built-in token set needs. Registration
// order only matters between converters for the same token and kind;
// the first match wins.

import { ELEMENT_KINDS } from "../runtime/values";
import { ConverterRegistry } from "./converter-registry";
import { ACTION_CONVERTERS } from "./converters/action-converters";
import {
  allCharactersConverter,
  allTeamSidesConverter,
  extremumConverter,
  filterListConverter,
  mapConverter,
  numericExtremumConverter,
  randomPickConverter,
  teamMembersConverter,
} from "./converters/array-converters";
import { CONDITION_CONVERTERS } from "./converters/condition-converters";
import {
  actingCharacterConverter,
  characterHpToCharacterConverter,
  characterTeamConverter,
  characterToHpConverter,
  elementConverter,
  enemyConverter,
  heroConverter,
  numberConverter,
} from "./converters/value-converters";

export function registerBuiltinConverters(registry: ConverterRegistry): void {
  for (const converter of ACTION_CONVERTERS) registry.registerScalar(converter);
  for (const converter of CONDITION_CONVERTERS) registry.registerScalar(converter);

  registry.registerScalar(numberConverter);
  registry.registerScalar(actingCharacterConverter);
  registry.registerScalar(characterToHpConverter);
  registry.registerScalar(characterHpToCharacterConverter);
  registry.registerScalar(characterTeamConverter);
  registry.registerScalar(heroConverter);
  registry.registerScalar(enemyConverter);

  registry.registerArray(allCharactersConverter);
  registry.registerArray(teamMembersConverter);
  registry.registerArray(allTeamSidesConverter);

  for (const kind of ELEMENT_KINDS) {
    registry.registerScalar(elementConverter(kind));
    registry.registerScalar(randomPickConverter(kind));
    registry.registerArray(filterListConverter(kind));
    registry.registerArray(mapConverter(kind));
  }

  for (const tokenType of ["Max", "Min"] as const) {
    registry.registerScalar(extremumConverter(tokenType, "int"));
    registry.registerScalar(extremumConverter(tokenType, "characterHp"));
    registry.registerScalar(extremumConverter(tokenType, "character"));
  }
  for (const tokenType of ["NumericMax", "NumericMin"] as const) {
    registry.registerScalar(numericExtremumConverter(tokenType, "int"));
    registry.registerScalar(numericExtremumConverter(tokenType, "characterHp"));
  }
}

export function createBuiltinConverterRegistry(): ConverterRegistry {
  const registry = new ConverterRegistry();
  registerBuiltinConverters(registry);
  return registry;
}
