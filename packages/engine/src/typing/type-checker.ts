// ─── Type Checker ──────────────────────────────────────────────────
// Turns a raw token tree into a Typed AST. Each token's signature is
// instantiated with fresh type variables and each argument unified
// against it as soon as the argument is checked; trait bounds are
// checked once the whole tree is solved.
// Element gets its type from an explicit scope stack, pushed when
// entering a FilterList condition or a Map transform.

import { isRawToken, type RawToken } from "@gambit/schema";
import { CompileError, captureCompileError, type CompileResult, type PathSegment } from "./errors";
import {
  InferenceEngine,
  concrete,
  formatPolyType,
  generic,
  type ConstraintFailure,
  type PolyType,
} from "./inference";
import {
  ELEMENT_TOKEN,
  createBuiltinMetadataRegistry,
  type SignatureType,
  type TokenMetadata,
  type TokenMetadataRegistry,
} from "./token-metadata";
import { createBuiltinTraitRegistry, type TraitRegistry } from "./traits";
import { Types, elementType, type Type } from "./types";

export interface TypedAst {
  readonly token: RawToken;
  readonly type: Type;
  readonly children: Readonly<Record<string, TypedAst>>;
}

/** Per-node checking state, threaded down the tree and never mutated. */
interface CheckFrame {
  /** Element types of the enclosing combinators, innermost last. */
  readonly scope: readonly Type[];
  readonly path: readonly PathSegment[];
  readonly ancestors: ReadonlySet<RawToken>;
}

interface PendingBound {
  readonly type: PolyType;
  readonly traits: readonly string[];
  readonly path: readonly PathSegment[];
  readonly token: RawToken;
}

export class TypeChecker {
  private readonly engine = new InferenceEngine();
  private bounds: PendingBound[] = [];
  /** Variables bounded by Numeric; unresolved ones default to Numeric. */
  private readonly numericVars = new Set<number>();

  constructor(
    readonly metadata: TokenMetadataRegistry = createBuiltinMetadataRegistry(),
    readonly traits: TraitRegistry = createBuiltinTraitRegistry()
  ) {}

  /** Checks one rule tree. Never throws a CompileError; returns it. */
  check(token: RawToken): CompileResult<TypedAst> {
    this.engine.reset();
    this.bounds = [];
    this.numericVars.clear();

    return captureCompileError(() => {
      const ast = this.checkToken(token, { scope: [], path: [], ancestors: new Set() });
      this.checkTraitBounds();
      return ast;
    });
  }

  // ─── Nodes ─────────────────────────────────────────────────────

  private checkToken(token: RawToken, frame: CheckFrame): TypedAst {
    if (frame.ancestors.has(token)) {
      throw new CompileError({ kind: "CyclicReference", tokenType: token.type }, frame.path, token);
    }
    if (token.type === ELEMENT_TOKEN) {
      return this.checkElement(token, frame);
    }

    const metadata = this.metadata.get(token.type);
    if (!metadata) {
      throw new CompileError({ kind: "UndefinedToken", tokenType: token.type }, frame.path, token);
    }
    this.checkArgumentCount(token, metadata.arguments.map((arg) => arg.name), frame);
    this.checkLiterals(token, metadata, frame);

    const params = new Map<string, PolyType>();
    for (const [name, bounds] of Object.entries(metadata.typeParameters ?? {})) {
      const variable = this.engine.freshVar();
      params.set(name, variable);
      if (bounds.includes("Numeric")) this.numericVars.add(variable.id);
      this.bounds.push({ type: variable, traits: bounds, path: frame.path, token });
    }

    const ancestors = new Set(frame.ancestors).add(token);
    const children: Record<string, TypedAst> = {};

    for (const arg of metadata.arguments) {
      const value = token[arg.name];
      const path = [...frame.path, { tokenType: token.type, argument: arg.name }];
      if (value === undefined) {
        throw new CompileError(
          { kind: "MissingField", tokenType: token.type, field: arg.name },
          frame.path,
          token
        );
      }
      if (!isRawToken(value)) {
        throw new CompileError(
          {
            kind: "UnresolvedType",
            reason: "LiteralInTokenSlot",
            detail: `${token.type}.${arg.name} must be a token, got ${JSON.stringify(value)}`,
          },
          path,
          token
        );
      }
      const scope = this.scopeFor(token, metadata, arg.name, children, frame);
      const child = this.checkToken(value, { scope, path, ancestors });
      children[arg.name] = child;

      this.engine.addConstraint({
        expected: this.instantiate(arg.type, params),
        actual: concrete(child.type),
        origin: arg.name,
      });
      this.solve(token, frame);
      if (arg.bounds && arg.bounds.length > 0) {
        this.bounds.push({ type: concrete(child.type), traits: arg.bounds, path, token: value });
      }
    }

    const type = this.engine.toType(this.instantiate(metadata.output, params), (id) =>
      this.numericVars.has(id) ? Types.numeric : Types.any
    );
    return { token, type, children };
  }

  private checkElement(token: RawToken, frame: CheckFrame): TypedAst {
    this.checkArgumentCount(token, [], frame);
    const current = frame.scope[frame.scope.length - 1];
    if (current === undefined) {
      throw new CompileError(
        {
          kind: "UnresolvedType",
          reason: "ElementOutsideScope",
          detail: "Element used outside of a FilterList condition or Map transform",
        },
        frame.path,
        token
      );
    }
    return { token, type: current, children: {} };
  }

  // ─── Structure ─────────────────────────────────────────────────

  /** Token-valued fields the signature does not declare. */
  private checkArgumentCount(
    token: RawToken,
    declared: readonly string[],
    frame: CheckFrame
  ): void {
    const tokenFields = Object.entries(token)
      .filter(([key, value]) => key !== "type" && isRawToken(value))
      .map(([key]) => key);
    const unexpected = tokenFields.filter((field) => !declared.includes(field));

    if (unexpected.length > 0) {
      throw new CompileError(
        {
          kind: "ArgumentCountMismatch",
          tokenType: token.type,
          expected: declared.length,
          actual: tokenFields.length,
          declared,
          unexpected,
        },
        frame.path,
        token
      );
    }
  }

  private checkLiterals(token: RawToken, metadata: TokenMetadata, frame: CheckFrame): void {
    for (const literal of metadata.literals ?? []) {
      const value = token[literal.name];
      if (value === undefined) {
        throw new CompileError(
          { kind: "MissingField", tokenType: token.type, field: literal.name },
          frame.path,
          token
        );
      }
      const valid =
        literal.type === "integer"
          ? typeof value === "number" && Number.isSafeInteger(value)
          : typeof value === literal.type;
      if (!valid) {
        throw new CompileError(
          {
            kind: "UnresolvedType",
            reason: "InvalidLiteral",
            detail: `${token.type}.${literal.name} must be ${
              literal.type === "integer" ? "an integer" : `a ${literal.type}`
            }, got ${JSON.stringify(value)}`,
          },
          frame.path,
          token
        );
      }
    }
  }

  /**
   * The element scope for `argument`: pushes the source sibling's element
   * type when the signature declares one, otherwise inherits the frame's.
   */
  private scopeFor(
    token: RawToken,
    metadata: TokenMetadata,
    argument: string,
    checked: Readonly<Record<string, TypedAst>>,
    frame: CheckFrame
  ): readonly Type[] {
    const binding = metadata.elementScopes?.find((scope) => scope.argument === argument);
    if (!binding) return frame.scope;

    const source = checked[binding.source];
    if (!source) return frame.scope;

    const element = source.type.kind === "any" ? Types.any : elementType(source.type);
    if (element === undefined) {
      throw new CompileError(
        {
          kind: "UnresolvedType",
          reason: "NotACollection",
          detail: `${token.type}.${binding.source} does not produce a collection`,
        },
        [...frame.path, { tokenType: token.type, argument: binding.source }],
        source.token
      );
    }
    return [...frame.scope, element];
  }

  // ─── Inference ─────────────────────────────────────────────────

  private instantiate(type: SignatureType, params: Map<string, PolyType>): PolyType {
    switch (type.kind) {
      case "type":
        return concrete(type.type);
      case "array":
        return generic("Array", this.instantiate(type.element, params));
      case "param": {
        const existing = params.get(type.name);
        if (existing) return existing;
        const variable = this.engine.freshVar();
        params.set(type.name, variable);
        return variable;
      }
    }
  }

  private solve(token: RawToken, frame: CheckFrame): void {
    const failure = this.engine.solveConstraints();
    if (failure) throw this.constraintError(token, frame, failure);
  }

  private constraintError(
    token: RawToken,
    frame: CheckFrame,
    { constraint, failure }: ConstraintFailure
  ): CompileError {
    const path = [...frame.path, { tokenType: token.type, argument: constraint.origin }];
    const child = token[constraint.origin];
    const offending = isRawToken(child) ? child : token;

    if (failure.kind === "InfiniteType") {
      return new CompileError(
        {
          kind: "InfiniteType",
          variable: formatPolyType(failure.left),
          type: formatPolyType(failure.right),
        },
        path,
        offending
      );
    }
    return new CompileError(
      {
        kind: "TypeMismatch",
        expected: this.engine.toType(constraint.expected),
        actual: this.engine.toType(constraint.actual),
      },
      path,
      offending
    );
  }

  // ─── Trait Bounds ──────────────────────────────────────────────

  private checkTraitBounds(): void {
    for (const bound of this.bounds) {
      const type = this.engine.toType(bound.type, (id) =>
        this.numericVars.has(id) ? Types.numeric : Types.any
      );
      const violation = this.traits.checkBounds(type, bound.traits);
      if (violation) {
        throw new CompileError(
          {
            kind: "TraitBoundError",
            type: violation.type,
            traitName: violation.traitName,
            availableTraits: violation.availableTraits,
          },
          bound.path,
          bound.token
        );
      }
    }
  }
}
