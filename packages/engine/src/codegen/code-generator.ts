// ─── Code Generator ────────────────────────────────────────────────
// Walks a Typed AST top-down and asks the converter registry for a node
// of the kind each parent needs. Converters recurse through the
// child* helpers, which check the child's inferred type against the
// requested kind and keep the error path current.

import type { EvalNode } from "../runtime/node";
import { DEFAULT_HEAL_COST } from "../runtime/nodes/action-nodes";
import type { ElementKind, RuntimeValues, ValueKind } from "../runtime/values";
import {
  CompileError,
  captureCompileError,
  type CompileIssue,
  type CompileResult,
  type PathSegment,
} from "../typing/errors";
import type { TypedAst } from "../typing/type-checker";
import { arrayOf, isCompatible } from "../typing/types";
import type { ConverterRegistry } from "./converter-registry";
import { VALUE_TYPES, describeArrayTarget, describeTarget } from "./targets";

export interface CodegenOptions {
  /** MP a Heal costs the acting character. */
  readonly healCost: number;
}

export const DEFAULT_CODEGEN_OPTIONS: CodegenOptions = { healCost: DEFAULT_HEAL_COST };

export class CodeGenerator {
  private path: PathSegment[] = [];

  constructor(
    readonly registry: ConverterRegistry,
    readonly options: CodegenOptions = DEFAULT_CODEGEN_OPTIONS
  ) {}

  /** Generates a `target` node for a whole checked tree. */
  generate<K extends ValueKind>(
    ast: TypedAst,
    target: K
  ): CompileResult<EvalNode<RuntimeValues[K]>> {
    this.path = [];
    return captureCompileError(() => {
      if (!isCompatible(VALUE_TYPES[target], ast.type)) {
        throw this.error({ kind: "TypeMismatch", expected: VALUE_TYPES[target], actual: ast.type }, ast);
      }
      return this.scalar(ast, target);
    });
  }

  // ─── Dispatch ──────────────────────────────────────────────────

  scalar<K extends ValueKind>(ast: TypedAst, target: K): EvalNode<RuntimeValues[K]> {
    const converter = this.registry.findScalar(target, ast);
    if (!converter) {
      throw this.error(
        { kind: "NoConverter", tokenType: ast.token.type, target: describeTarget(target) },
        ast
      );
    }
    return converter.convert(ast, this);
  }

  array<E extends ElementKind>(ast: TypedAst, element: E): EvalNode<readonly RuntimeValues[E][]> {
    const converter = this.registry.findArray(element, ast);
    if (!converter) {
      throw this.error(
        { kind: "NoConverter", tokenType: ast.token.type, target: describeArrayTarget(element) },
        ast
      );
    }
    return converter.convert(ast, this);
  }

  // ─── Children ──────────────────────────────────────────────────

  /** The checked child under `name`; a missing one is a MissingChild error. */
  child(parent: TypedAst, name: string): TypedAst {
    const child = parent.children[name];
    if (!child) {
      throw this.error({ kind: "MissingChild", tokenType: parent.token.type, child: name }, parent);
    }
    return child;
  }

  childScalar<K extends ValueKind>(
    parent: TypedAst,
    name: string,
    target: K
  ): EvalNode<RuntimeValues[K]> {
    const child = this.child(parent, name);
    if (!isCompatible(VALUE_TYPES[target], child.type)) {
      throw this.childMismatch(parent, name, child, describeTarget(target));
    }
    return this.within(parent, name, () => this.scalar(child, target));
  }

  childArray<E extends ElementKind>(
    parent: TypedAst,
    name: string,
    element: E
  ): EvalNode<readonly RuntimeValues[E][]> {
    const child = this.child(parent, name);
    if (!isCompatible(arrayOf(VALUE_TYPES[element]), child.type)) {
      throw this.childMismatch(parent, name, child, describeArrayTarget(element));
    }
    return this.within(parent, name, () => this.array(child, element));
  }

  // ─── Errors ────────────────────────────────────────────────────

  /** A CompileError located at the generator's current position. */
  error(issue: CompileIssue, ast: TypedAst): CompileError {
    return new CompileError(issue, [...this.path], ast.token);
  }

  private childMismatch(
    parent: TypedAst,
    name: string,
    child: TypedAst,
    expected: string
  ): CompileError {
    return new CompileError(
      {
        kind: "ChildTypeMismatch",
        tokenType: parent.token.type,
        child: name,
        expected,
        actual: child.type,
      },
      [...this.path, { tokenType: parent.token.type, argument: name }],
      child.token
    );
  }

  private within<T>(parent: TypedAst, argument: string, step: () => T): T {
    this.path.push({ tokenType: parent.token.type, argument });
    try {
      return step();
    } finally {
      this.path.pop();
    }
  }
}
