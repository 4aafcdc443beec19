import { describe, it, expect, vi, afterEach } from "vitest";
import { ZodError } from "zod";
import type { Token } from "@gambit/schema";
import { ScriptedRng, cleric, makeBattle } from "../__fixtures__/battle.js";
import { createBuiltinConverterRegistry } from "../codegen/builtin-converters.js";
import { createEvaluationContext } from "../runtime/evaluation-context.js";
import { RuleBreak } from "../runtime/node.js";
import { AllCharactersNode, ExtremumNode } from "../runtime/nodes/array-nodes.js";
import { ORDER_KEYS } from "../runtime/values.js";
import { createBuiltinMetadataRegistry, sig } from "../typing/token-metadata.js";
import { Types } from "../typing/types.js";
import { RuleCompiler, formatRuleFailures } from "./rule-compiler.js";

const acting: Token = { type: "ActingCharacter" };
const strikeSelf: Token = { type: "Strike", target: acting };
const unknown = { type: "Nope" };

afterEach(() => {
  vi.restoreAllMocks();
});

describe("RuleCompiler", () => {
  // ── Options ──────────────────────────────────────────────────────

  describe("options", () => {
    it("fills in defaults", () => {
      expect(new RuleCompiler().options).toEqual({ healCost: 10, debug: false });
    });

    it("rejects a negative heal cost", () => {
      expect(() => new RuleCompiler({ healCost: -1 })).toThrow(ZodError);
    });

    it("applies the heal cost to compiled Heal nodes", () => {
      const result = new RuleCompiler({ healCost: 40 }).compile({ type: "Heal", target: acting });
      if (!result.ok) throw new Error(result.error.message);

      const context = createEvaluationContext(makeBattle({ acting: cleric }), new ScriptedRng([]));
      expect(() => result.value.evaluate(context)).toThrow(RuleBreak);
    });
  });

  // ── compile ──────────────────────────────────────────────────────

  describe("compile", () => {
    it("compiles an Action rule", () => {
      const result = new RuleCompiler().compile(strikeSelf);
      if (!result.ok) throw new Error(result.error.message);

      const context = createEvaluationContext(makeBattle(), new ScriptedRng([]));
      expect(result.value.evaluate(context)).toEqual({ kind: "strike", targetId: 1 });
    });

    it("rejects a rule whose root is not an Action", () => {
      const result = new RuleCompiler().compile({ type: "Number", value: 3 });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.issue).toEqual({
        kind: "TypeMismatch",
        expected: Types.action,
        actual: Types.int,
      });
      expect(result.error.message).toBe("Type mismatch in rule: expected Action, but got Int");
    });

    it("returns type errors without generating", () => {
      const result = new RuleCompiler().compile({ type: "Strike", target: unknown });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("UndefinedToken");
      expect(result.error.path).toEqual([{ tokenType: "Strike", argument: "target" }]);
    });

    it("exposes the typed tree through check", () => {
      const result = new RuleCompiler().check(strikeSelf);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.type).toEqual(Types.action);
    });
  });

  // ── Registries ───────────────────────────────────────────────────

  describe("extended registries", () => {
    it("compiles a token added to the metadata and converter registries", () => {
      const metadata = createBuiltinMetadataRegistry();
      metadata.register({
        type: "Weakest",
        description: "The character with the least HP",
        arguments: [],
        output: sig.of(Types.character),
      });
      const converters = createBuiltinConverterRegistry();
      converters.registerScalar({
        tokenType: "Weakest",
        target: "character",
        convert: () => new ExtremumNode("min", new AllCharactersNode(), ORDER_KEYS.character),
      });

      const result = new RuleCompiler({}, { metadata, converters }).compile({
        type: "Strike",
        target: { type: "Weakest" },
      });
      if (!result.ok) throw new Error(result.error.message);

      const context = createEvaluationContext(makeBattle(), new ScriptedRng([]));
      expect(result.value.evaluate(context)).toEqual({ kind: "strike", targetId: 3 });
    });

    it("rejects the token with the built-in registries", () => {
      const result = new RuleCompiler().compile({ type: "Strike", target: { type: "Weakest" } });
      expect(result.ok).toBe(false);
    });
  });

  // ── compileAll ───────────────────────────────────────────────────

  describe("compileAll", () => {
    it("keeps going past failures and remembers each rule's index", () => {
      const { rules, failures } = new RuleCompiler().compileAll([strikeSelf, unknown, strikeSelf]);

      expect(rules.map((rule) => rule.index)).toEqual([0, 2]);
      expect(rules[0]?.source).toBe(strikeSelf);
      expect(failures).toHaveLength(1);
      expect(failures[0]?.index).toBe(1);
      expect(failures[0]?.error.kind).toBe("UndefinedToken");
    });

    it("returns nothing for an empty list", () => {
      expect(new RuleCompiler().compileAll([])).toEqual({ rules: [], failures: [] });
    });

    it("logs each rule in debug mode", () => {
      const debugSpy = vi.spyOn(console, "debug").mockImplementation(() => {});

      new RuleCompiler({ debug: true }).compileAll([strikeSelf, unknown]);

      expect(debugSpy.mock.calls).toEqual([
        ["[gambit] compiled rule #0 (Strike)"],
        ["[gambit] rule #1 failed: UndefinedToken: Undefined token type: Nope"],
      ]);
    });

    it("stays quiet without debug", () => {
      const debugSpy = vi.spyOn(console, "debug").mockImplementation(() => {});

      new RuleCompiler().compileAll([strikeSelf, unknown]);

      expect(debugSpy).not.toHaveBeenCalled();
    });
  });

  // ── Reports ──────────────────────────────────────────────────────

  describe("formatRuleFailures", () => {
    it("counts every failed rule under one header", () => {
      const { failures } = new RuleCompiler().compileAll([unknown, strikeSelf, unknown, unknown]);

      const report = formatRuleFailures(failures);
      const sections = report.split("\n\n---\n\n");

      expect(report.match(/Found \d+ compilation error\(s\)/g)).toEqual([
        "Found 3 compilation error(s)",
      ]);
      expect(sections).toHaveLength(3);
      expect(sections[0]?.startsWith("Found 3 compilation error(s):\n\nRule #0\nCompilation Error")).toBe(
        true
      );
      expect(sections[1]?.startsWith("Rule #2\nCompilation Error")).toBe(true);
      expect(sections[2]?.startsWith("Rule #3\nCompilation Error")).toBe(true);
    });
  });
});
