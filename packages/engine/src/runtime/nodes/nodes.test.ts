import { describe, it, expect } from "vitest";
import type { Character, CharacterHp, TeamSide } from "@gambit/schema";
import {
  ScriptedRng,
  cleric,
  goblin,
  hero,
  makeBattle,
  makeCharacter,
  orc,
} from "../../__fixtures__/battle.js";
import {
  createEvaluationContext,
  withCurrentElement,
  type EvaluationContext,
} from "../evaluation-context.js";
import { EvaluationError, RuleBreak } from "../node.js";
import { createRng } from "../prng.js";
import { ELEMENT_BINDERS, ORDER_KEYS, VALUE_EQUALITY } from "../values.js";
import { CheckNode, HealNode, StrikeNode } from "./action-nodes.js";
import {
  AllCharactersNode,
  ExtremumNode,
  FilterListNode,
  MapNode,
  RandomPickNode,
  TeamMembersNode,
} from "./array-nodes.js";
import { CompareNode, EqualsNode, RandomBoolNode } from "./condition-nodes.js";
import {
  ActingCharacterNode,
  CharacterHpToCharacterNode,
  CharacterTeamNode,
  CharacterToHpNode,
  ConstantNode,
  ElementNode,
  HpValueNode,
} from "./value-nodes.js";

// ─── Test Helpers ──────────────────────────────────────────────────

function context(rngValues: readonly number[] = [], acting: Character = hero): EvaluationContext {
  return createEvaluationContext(makeBattle({ acting }), new ScriptedRng(rngValues));
}

function hpOf(character: Character): CharacterHp {
  return { character, hp: character.hp };
}

const acting = new ActingCharacterNode();

// ══════════════════════════════════════════════════════════════════════
// Actions
// ══════════════════════════════════════════════════════════════════════

describe("action nodes", () => {
  describe("StrikeNode", () => {
    it("strikes the evaluated target", () => {
      const node = new StrikeNode(new ConstantNode(goblin));
      expect(node.evaluate(context())).toEqual({ kind: "strike", targetId: 3 });
    });

    it("breaks when the acting character is down", () => {
      const downed = makeCharacter({ id: 9, name: "Downed", hp: 0 });
      const node = new StrikeNode(acting);

      expect(() => node.evaluate(context([], downed))).toThrow(RuleBreak);
    });
  });

  describe("HealNode", () => {
    it("heals the target when MP covers the cost", () => {
      const node = new HealNode(new ConstantNode(cleric), 10);
      expect(node.evaluate(context())).toEqual({ kind: "heal", targetId: 2 });
    });

    it("breaks instead of failing when MP is short", () => {
      const tired = makeCharacter({ id: 9, name: "Tired", mp: 5 });
      const node = new HealNode(acting, 10);

      expect(() => node.evaluate(context([], tired))).toThrow(
        new RuleBreak("Tired has 5 MP, heal costs 10"),
      );
    });

    it("breaks when the acting character is down", () => {
      const downed = makeCharacter({ id: 9, name: "Downed", hp: 0 });
      expect(() => new HealNode(acting).evaluate(context([], downed))).toThrow(RuleBreak);
    });
  });

  describe("CheckNode", () => {
    const strike = new StrikeNode(new ConstantNode(orc));

    it("runs the action when the condition holds", () => {
      const node = new CheckNode(new ConstantNode(true), strike);
      expect(node.evaluate(context())).toEqual({ kind: "strike", targetId: 4 });
    });

    it("breaks when the condition fails", () => {
      const node = new CheckNode(new ConstantNode(false), strike);
      expect(() => node.evaluate(context())).toThrow(RuleBreak);
    });
  });
});

// ══════════════════════════════════════════════════════════════════════
// Conditions
// ══════════════════════════════════════════════════════════════════════

describe("condition nodes", () => {
  it("draws a fair coin from the random source", () => {
    const ctx = context([0.2, 0.7]);
    const node = new RandomBoolNode();

    expect(node.evaluate(ctx)).toBe(true);
    expect(node.evaluate(ctx)).toBe(false);
  });

  // ── Comparisons ──────────────────────────────────────────────────

  describe("CompareNode", () => {
    const stat80 = new HpValueNode(new CharacterToHpNode(new ConstantNode(orc)));

    it("compares a projected HP of 80 against integer literals", () => {
      expect(new CompareNode("greaterThan", stat80, new ConstantNode(50)).evaluate(context())).toBe(true);
      expect(new CompareNode("greaterThan", stat80, new ConstantNode(100)).evaluate(context())).toBe(false);
    });

    it("is strict", () => {
      expect(new CompareNode("greaterThan", stat80, new ConstantNode(80)).evaluate(context())).toBe(false);
      expect(new CompareNode("lessThan", stat80, new ConstantNode(80)).evaluate(context())).toBe(false);
      expect(new CompareNode("lessThan", new ConstantNode(3), stat80).evaluate(context())).toBe(true);
    });
  });

  describe("EqualsNode", () => {
    it("compares characters by id", () => {
      const renamed = { ...goblin, name: "Goblin (wounded)", hp: 5 };
      const node = new EqualsNode(new ConstantNode(goblin), new ConstantNode(renamed), VALUE_EQUALITY.character);

      expect(node.evaluate(context())).toBe(true);
    });

    it("compares HP values by their number", () => {
      const a = hpOf(makeCharacter({ id: 7, name: "A", hp: 30 }));
      const b = hpOf(makeCharacter({ id: 8, name: "B", hp: 30 }));

      expect(new EqualsNode(new ConstantNode(a), new ConstantNode(b), VALUE_EQUALITY.characterHp).evaluate(context())).toBe(true);
    });

    it("compares team sides", () => {
      const node = new EqualsNode<TeamSide>(
        new CharacterTeamNode(new ConstantNode(orc)),
        new ConstantNode("player"),
        VALUE_EQUALITY.teamSide,
      );
      expect(node.evaluate(context())).toBe(false);
    });
  });
});

// ══════════════════════════════════════════════════════════════════════
// Values
// ══════════════════════════════════════════════════════════════════════

describe("value nodes", () => {
  it("projects HP to a character and back", () => {
    const node = new CharacterHpToCharacterNode(new CharacterToHpNode(acting));
    expect(node.evaluate(context())).toBe(hero);
  });

  it("finds the side a character fights on", () => {
    expect(new CharacterTeamNode(new ConstantNode(cleric)).evaluate(context())).toBe("player");
    expect(new CharacterTeamNode(new ConstantNode(goblin)).evaluate(context())).toBe("enemy");
  });

  it("fails for a character on neither team", () => {
    const stranger = makeCharacter({ id: 99, name: "Stranger" });
    expect(() => new CharacterTeamNode(new ConstantNode(stranger)).evaluate(context())).toThrow(
      new EvaluationError("Stranger (#99) is not on either team"),
    );
  });

  describe("ElementNode", () => {
    it("reads the current element", () => {
      const ctx = withCurrentElement(context(), ELEMENT_BINDERS.character(orc));
      expect(new ElementNode("character").evaluate(ctx)).toBe(orc);
    });

    it("fails without a current element", () => {
      expect(() => new ElementNode("character").evaluate(context())).toThrow(
        new EvaluationError("Element evaluated with no current element"),
      );
    });

    it("fails when the current element has another shape", () => {
      const ctx = withCurrentElement(context(), ELEMENT_BINDERS.int(4));
      expect(() => new ElementNode("character").evaluate(ctx)).toThrow(
        new EvaluationError("Element expected a character, but the current element is a int"),
      );
    });
  });
});

// ══════════════════════════════════════════════════════════════════════
// Arrays
// ══════════════════════════════════════════════════════════════════════

describe("array nodes", () => {
  it("lists the player team before the enemy team", () => {
    expect(new AllCharactersNode().evaluate(context())).toEqual([hero, cleric, goblin, orc]);
  });

  it("lists the members of one side", () => {
    expect(new TeamMembersNode(new ConstantNode<TeamSide>("enemy")).evaluate(context())).toEqual([goblin, orc]);
  });

  // ── FilterList / Map ─────────────────────────────────────────────

  describe("FilterListNode", () => {
    it("keeps elements whose condition holds, in order", () => {
      const stats = [30, 80, 50].map((hp, i) => hpOf(makeCharacter({ id: 10 + i, name: `C${i}`, hp })));
      const node = new FilterListNode(
        new ConstantNode(stats),
        new CompareNode("greaterThan", new HpValueNode(new ElementNode("characterHp")), new ConstantNode(50)),
        ELEMENT_BINDERS.characterHp,
      );

      const result = node.evaluate(context());

      expect(result.map((stat) => stat.hp)).toEqual([80]);
      expect(result[0]?.character.id).toBe(11);
    });

    it("does not bind an element in the caller's context", () => {
      const ctx = context();
      const node = new FilterListNode(new AllCharactersNode(), new ConstantNode(true), ELEMENT_BINDERS.character);

      node.evaluate(ctx);

      expect(ctx.currentElement).toBeUndefined();
    });
  });

  describe("MapNode", () => {
    it("applies the transform to each element, in order", () => {
      const node = new MapNode(
        new AllCharactersNode(),
        new CharacterToHpNode(new ElementNode("character")),
        ELEMENT_BINDERS.character,
      );

      expect(node.evaluate(context()).map((stat) => stat.hp)).toEqual([100, 60, 40, 80]);
    });
  });

  it("resolves Element to the innermost binding and restores the outer one", () => {
    // Sides whose highest-HP living member fights for that same side.
    const livingMembers = new FilterListNode(
      new TeamMembersNode(new ElementNode("teamSide")),
      new CompareNode("greaterThan", new HpValueNode(new CharacterToHpNode(new ElementNode("character"))), new ConstantNode(0)),
      ELEMENT_BINDERS.character,
    );
    const node = new FilterListNode(
      new ConstantNode<readonly TeamSide[]>(["player", "enemy"]),
      new EqualsNode(
        new CharacterTeamNode(new ExtremumNode("max", livingMembers, ORDER_KEYS.character)),
        new ElementNode("teamSide"),
        VALUE_EQUALITY.teamSide,
      ),
      ELEMENT_BINDERS.teamSide,
    );

    expect(node.evaluate(context())).toEqual(["player", "enemy"]);
  });

  // ── RandomPick ───────────────────────────────────────────────────

  describe("RandomPickNode", () => {
    it("picks the index drawn from the random source", () => {
      const node = new RandomPickNode(new AllCharactersNode());
      expect(node.evaluate(context([0.6]))).toBe(goblin);
    });

    it("is reproducible with a fixed seed", () => {
      const node = new RandomPickNode(new AllCharactersNode());
      const battle = makeBattle();
      const first = createEvaluationContext(battle, createRng(42));
      const second = createEvaluationContext(battle, createRng(42));

      const picksA = Array.from({ length: 10 }, () => node.evaluate(first).id);
      const picksB = Array.from({ length: 10 }, () => node.evaluate(second).id);

      expect(picksA).toEqual(picksB);
    });

    it("fails on an empty source without drawing", () => {
      const rng = new ScriptedRng([]);
      const ctx = createEvaluationContext(makeBattle(), rng);
      const node = new RandomPickNode(new ConstantNode<readonly number[]>([]));

      expect(() => node.evaluate(ctx)).toThrow(new EvaluationError("Cannot pick from an empty array"));
      expect(rng.drawCount).toBe(0);
    });
  });

  // ── Max / Min ────────────────────────────────────────────────────

  describe("ExtremumNode", () => {
    it("fails on an empty source", () => {
      const node = new ExtremumNode("max", new ConstantNode<readonly number[]>([]), ORDER_KEYS.int);
      expect(() => node.evaluate(context())).toThrow(
        new EvaluationError("Cannot take the max of an empty array"),
      );
    });

    it("returns the only element of a singleton", () => {
      const node = new ExtremumNode("min", new ConstantNode([7]), ORDER_KEYS.int);
      expect(node.evaluate(context())).toBe(7);
    });

    it("keeps the first of several maxima", () => {
      const a = makeCharacter({ id: 20, name: "A", hp: 50 });
      const b = makeCharacter({ id: 21, name: "B", hp: 80 });
      const c = makeCharacter({ id: 22, name: "C", hp: 80 });

      const node = new ExtremumNode("max", new ConstantNode([a, b, c]), ORDER_KEYS.character);

      expect(node.evaluate(context())).toBe(b);
    });

    it("keeps the first of several minima", () => {
      const stats = [30, 10, 10].map((hp, i) => hpOf(makeCharacter({ id: 30 + i, name: `S${i}`, hp })));
      const node = new ExtremumNode("min", new ConstantNode(stats), ORDER_KEYS.characterHp);

      expect(node.evaluate(context()).character.id).toBe(31);
    });
  });
});

// ══════════════════════════════════════════════════════════════════════
// Purity
// ══════════════════════════════════════════════════════════════════════

describe("purity", () => {
  it("gives identical results for identical views and seeds", () => {
    const rule = new CheckNode(
      new RandomBoolNode(),
      new StrikeNode(new RandomPickNode(new TeamMembersNode(new ConstantNode<TeamSide>("enemy")))),
    );
    const run = (): unknown[] => {
      const ctx = createEvaluationContext(makeBattle(), createRng(2024));
      return Array.from({ length: 20 }, () => {
        try {
          return rule.evaluate(ctx);
        } catch (error) {
          if (error instanceof RuleBreak) return "break";
          throw error;
        }
      });
    };

    expect(run()).toEqual(run());
  });
});
