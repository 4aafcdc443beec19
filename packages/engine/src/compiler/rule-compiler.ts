// ─── Rule Compiler ─────────────────────────────────────────────────
// The entry point from raw token trees to evaluation nodes: type check,
// then generate an Action node. Rules compile independently, so one bad
// rule in a set does not hide the others.

import { z } from "zod";
import type { Action, RawToken } from "@gambit/schema";
import { createBuiltinConverterRegistry } from "../codegen/builtin-converters";
import { CodeGenerator } from "../codegen/code-generator";
import type { ConverterRegistry } from "../codegen/converter-registry";
import type { EvalNode } from "../runtime/node";
import { DEFAULT_HEAL_COST } from "../runtime/nodes/action-nodes";
import { formatCompileErrorLine, formatCompileErrors } from "../typing/error-reporter";
import type { CompileError, CompileResult } from "../typing/errors";
import { createBuiltinMetadataRegistry, type TokenMetadataRegistry } from "../typing/token-metadata";
import { TypeChecker, type TypedAst } from "../typing/type-checker";
import { createBuiltinTraitRegistry, type TraitRegistry } from "../typing/traits";

// ─── Options ───────────────────────────────────────────────────────

export const CompilerOptionsSchema = z.object({
  healCost: z.number().int().min(0).default(DEFAULT_HEAL_COST),
  debug: z.boolean().default(false),
});

export type CompilerOptions = z.infer<typeof CompilerOptionsSchema>;
export type CompilerOptionsInput = z.input<typeof CompilerOptionsSchema>;

/** Registries to compile against; the built-in ones by default. */
export interface CompilerRegistries {
  readonly metadata?: TokenMetadataRegistry;
  readonly traits?: TraitRegistry;
  readonly converters?: ConverterRegistry;
}

// ─── Results ───────────────────────────────────────────────────────

export interface CompiledRule {
  /** Position in the source list, kept for error reports. */
  readonly index: number;
  readonly source: RawToken;
  readonly node: EvalNode<Action>;
}

export interface RuleFailure {
  readonly index: number;
  readonly error: CompileError;
}

export interface CompiledRuleSet {
  readonly rules: readonly CompiledRule[];
  readonly failures: readonly RuleFailure[];
}

/** A single report covering every failed rule of a set, each headed by its index. */
export function formatRuleFailures(failures: readonly RuleFailure[]): string {
  return formatCompileErrors(
    failures.map((failure) => failure.error),
    failures.map((failure) => `Rule #${failure.index}`)
  );
}

// ─── Compiler ──────────────────────────────────────────────────────

export class RuleCompiler {
  readonly options: CompilerOptions;
  private readonly checker: TypeChecker;
  private readonly generator: CodeGenerator;

  /** @throws {ZodError} if `options` is invalid. */
  constructor(options: CompilerOptionsInput = {}, registries: CompilerRegistries = {}) {
    this.options = CompilerOptionsSchema.parse(options);
    this.checker = new TypeChecker(
      registries.metadata ?? createBuiltinMetadataRegistry(),
      registries.traits ?? createBuiltinTraitRegistry()
    );
    this.generator = new CodeGenerator(registries.converters ?? createBuiltinConverterRegistry(), {
      healCost: this.options.healCost,
    });
  }

  check(token: RawToken): CompileResult<TypedAst> {
    return this.checker.check(token);
  }

  /** Compiles one rule. Its root must produce an Action. */
  compile(token: RawToken): CompileResult<EvalNode<Action>> {
    const checked = this.checker.check(token);
    if (!checked.ok) return checked;
    return this.generator.generate(checked.value, "action");
  }

  /** Compiles every rule, collecting failures instead of stopping at the first. */
  compileAll(tokens: readonly RawToken[]): CompiledRuleSet {
    const rules: CompiledRule[] = [];
    const failures: RuleFailure[] = [];

    tokens.forEach((source, index) => {
      const result = this.compile(source);
      if (result.ok) {
        rules.push({ index, source, node: result.value });
        this.log(`compiled rule #${index} (${source.type})`);
      } else {
        failures.push({ index, error: result.error });
        this.log(`rule #${index} failed: ${formatCompileErrorLine(result.error)}`);
      }
    });

    return { rules, failures };
  }

  private log(message: string): void {
    if (this.options.debug) {
      console.debug(`[gambit] ${message}`);
    }
  }
}
