import { describe, it, expect } from "vitest";
import {
  Types,
  arrayOf,
  elementType,
  formatType,
  isAbstract,
  isCompatible,
  optionOf,
  resolveToConcrete,
  typesEqual,
} from "./types.js";

describe("type model", () => {
  // ── typesEqual ───────────────────────────────────────────────────

  describe("typesEqual", () => {
    it("compares simple kinds", () => {
      expect(typesEqual(Types.int, Types.int)).toBe(true);
      expect(typesEqual(Types.int, Types.characterHp)).toBe(false);
    });

    it("compares collections structurally", () => {
      expect(typesEqual(arrayOf(Types.character), arrayOf(Types.character))).toBe(true);
      expect(typesEqual(arrayOf(Types.character), arrayOf(Types.int))).toBe(false);
      expect(typesEqual(arrayOf(Types.int), optionOf(Types.int))).toBe(false);
    });
  });

  // ── isCompatible ─────────────────────────────────────────────────

  describe("isCompatible", () => {
    it("matches identical types", () => {
      expect(isCompatible(Types.teamSide, Types.teamSide)).toBe(true);
    });

    it("matches Numeric against Int and CharacterHP in both directions", () => {
      expect(isCompatible(Types.numeric, Types.int)).toBe(true);
      expect(isCompatible(Types.numeric, Types.characterHp)).toBe(true);
      expect(isCompatible(Types.characterHp, Types.numeric)).toBe(true);
    });

    it("does not match Numeric against non-numeric types", () => {
      expect(isCompatible(Types.numeric, Types.character)).toBe(false);
      expect(isCompatible(Types.bool, Types.numeric)).toBe(false);
    });

    it("does not match Int against CharacterHP", () => {
      expect(isCompatible(Types.int, Types.characterHp)).toBe(false);
    });

    it("matches Any against anything", () => {
      expect(isCompatible(Types.any, Types.action)).toBe(true);
      expect(isCompatible(arrayOf(Types.int), Types.any)).toBe(true);
    });

    it("matches collections element-wise", () => {
      expect(isCompatible(arrayOf(Types.any), arrayOf(Types.character))).toBe(true);
      expect(isCompatible(arrayOf(Types.numeric), arrayOf(Types.characterHp))).toBe(true);
      expect(isCompatible(arrayOf(Types.int), arrayOf(Types.character))).toBe(false);
      expect(isCompatible(arrayOf(Types.int), Types.int)).toBe(false);
    });
  });

  // ── resolveToConcrete ────────────────────────────────────────────

  describe("resolveToConcrete", () => {
    it("defaults Numeric to Int", () => {
      expect(resolveToConcrete(Types.numeric)).toEqual(Types.int);
    });

    it("resolves Numeric to CharacterHP when hinted", () => {
      expect(resolveToConcrete(Types.numeric, Types.characterHp)).toEqual(Types.characterHp);
    });

    it("resolves Any to the hint, or Void without one", () => {
      expect(resolveToConcrete(Types.any, Types.character)).toEqual(Types.character);
      expect(resolveToConcrete(Types.any)).toEqual(Types.void);
    });

    it("resolves collection elements", () => {
      expect(
        resolveToConcrete(arrayOf(Types.numeric), arrayOf(Types.characterHp)),
      ).toEqual(arrayOf(Types.characterHp));
    });

    it("leaves concrete types alone", () => {
      expect(resolveToConcrete(Types.character, Types.int)).toEqual(Types.character);
    });
  });

  // ── Misc ─────────────────────────────────────────────────────────

  it("detects abstract types, including nested ones", () => {
    expect(isAbstract(Types.numeric)).toBe(true);
    expect(isAbstract(arrayOf(Types.any))).toBe(true);
    expect(isAbstract(arrayOf(Types.int))).toBe(false);
  });

  it("extracts array element types", () => {
    expect(elementType(arrayOf(Types.teamSide))).toEqual(Types.teamSide);
    expect(elementType(Types.teamSide)).toBeUndefined();
  });

  it("formats display names", () => {
    expect(formatType(Types.characterHp)).toBe("CharacterHP");
    expect(formatType(arrayOf(optionOf(Types.int)))).toBe("Array<Option<Int>>");
    expect(formatType(Types.void)).toBe("Void");
  });
});
