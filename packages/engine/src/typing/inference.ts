// ─── Inference Engine ──────────────────────────────────────────────
// Type variables, unification with an occurs check, and a deferred
// constraint list. The checker instantiates token signatures through
// this engine; generalize/instantiate are here for binding forms.

import {
  Types,
  arrayOf,
  formatType,
  isCompatible,
  optionOf,
  type Type,
} from "./types";

// ─── Poly Types ────────────────────────────────────────────────────

export type PolyType =
  | { readonly kind: "concrete"; readonly type: Type }
  | { readonly kind: "var"; readonly id: number }
  | { readonly kind: "generic"; readonly name: "Array" | "Option"; readonly args: readonly PolyType[] };

export type TypeVar = Extract<PolyType, { readonly kind: "var" }>;

export function concrete(type: Type): PolyType {
  return { kind: "concrete", type };
}

export function generic(name: "Array" | "Option", ...args: PolyType[]): PolyType {
  return { kind: "generic", name, args };
}

export function formatPolyType(type: PolyType): string {
  switch (type.kind) {
    case "concrete":
      return formatType(type.type);
    case "var":
      return `'t${type.id}`;
    case "generic":
      return `${type.name}<${type.args.map(formatPolyType).join(", ")}>`;
  }
}

/** A type with universally quantified variables. */
export interface TypeScheme {
  readonly quantified: readonly number[];
  readonly body: PolyType;
}

export function monomorphic(body: PolyType): TypeScheme {
  return { quantified: [], body };
}

// ─── Errors ────────────────────────────────────────────────────────

export type InferenceFailureKind = "UnificationFailure" | "InfiniteType";

export class InferenceFailure extends Error {
  constructor(
    public readonly kind: InferenceFailureKind,
    public readonly left: PolyType,
    public readonly right: PolyType
  ) {
    super(
      kind === "InfiniteType"
        ? `${formatPolyType(left)} occurs in ${formatPolyType(right)}`
        : `Cannot unify ${formatPolyType(left)} with ${formatPolyType(right)}`
    );
    this.name = "InferenceFailure";
  }
}

/** A pending equality between an expected and an actual type. */
export interface Constraint {
  readonly expected: PolyType;
  readonly actual: PolyType;
  /** What produced the constraint, e.g. the argument name. */
  readonly origin: string;
}

export interface ConstraintFailure {
  readonly constraint: Constraint;
  readonly failure: InferenceFailure;
}

// ─── Type Environment ──────────────────────────────────────────────

export class TypeEnv {
  private constructor(private readonly bindings: ReadonlyMap<string, TypeScheme>) {}

  static empty(): TypeEnv {
    return new TypeEnv(new Map());
  }

  extend(name: string, scheme: TypeScheme): TypeEnv {
    const next = new Map(this.bindings);
    next.set(name, scheme);
    return new TypeEnv(next);
  }

  lookup(name: string): TypeScheme | undefined {
    return this.bindings.get(name);
  }

  schemes(): TypeScheme[] {
    return [...this.bindings.values()];
  }
}

// ─── Engine ────────────────────────────────────────────────────────

export class InferenceEngine {
  private nextVarId = 0;
  private readonly substitution = new Map<number, PolyType>();
  private constraints: Constraint[] = [];

  /** Drops all variables, bindings and pending constraints. */
  reset(): void {
    this.nextVarId = 0;
    this.substitution.clear();
    this.constraints = [];
  }

  freshVar(): TypeVar {
    return { kind: "var", id: this.nextVarId++ };
  }

  addConstraint(constraint: Constraint): void {
    this.constraints.push(constraint);
  }

  pendingConstraints(): readonly Constraint[] {
    return this.constraints;
  }

  /**
   * Unifies every pending constraint in order and clears the list.
   * Stops at the first failure and returns it.
   */
  solveConstraints(): ConstraintFailure | undefined {
    const pending = this.constraints;
    this.constraints = [];
    for (const constraint of pending) {
      try {
        this.unify(constraint.expected, constraint.actual);
      } catch (error) {
        if (error instanceof InferenceFailure) {
          return { constraint, failure: error };
        }
        throw error;
      }
    }
    return undefined;
  }

  /** @throws {InferenceFailure} if the types cannot be made equal. */
  unify(left: PolyType, right: PolyType): void {
    const a = this.prune(left);
    const b = this.prune(right);

    if (a.kind === "var") {
      this.bind(a.id, b);
      return;
    }
    if (b.kind === "var") {
      this.bind(b.id, a);
      return;
    }
    if (a.kind === "concrete" && b.kind === "concrete") {
      if (!isCompatible(a.type, b.type)) {
        throw new InferenceFailure("UnificationFailure", a, b);
      }
      return;
    }
    if (a.kind === "generic" && b.kind === "generic") {
      if (a.name !== b.name || a.args.length !== b.args.length) {
        throw new InferenceFailure("UnificationFailure", a, b);
      }
      a.args.forEach((arg, i) => {
        const other = b.args[i];
        if (other) this.unify(arg, other);
      });
      return;
    }

    // One concrete, one generic: open up the concrete collection.
    const [concreteSide, genericSide] = a.kind === "concrete" ? [a, b] : [b, a];
    if (concreteSide.kind !== "concrete" || genericSide.kind !== "generic") {
      throw new InferenceFailure("UnificationFailure", a, b);
    }
    const inner = this.openCollection(concreteSide.type, genericSide.name);
    const arg = genericSide.args[0];
    if (inner === undefined || arg === undefined || genericSide.args.length !== 1) {
      throw new InferenceFailure("UnificationFailure", a, b);
    }
    this.unify(concrete(inner), arg);
  }

  /** Applies the current substitution all the way down. */
  apply(type: PolyType): PolyType {
    const pruned = this.prune(type);
    if (pruned.kind === "generic") {
      return generic(pruned.name, ...pruned.args.map((arg) => this.apply(arg)));
    }
    return pruned;
  }

  /**
   * Converts back to a plain type. Unbound variables become `fallback`
   * (Any unless the caller knows better).
   */
  toType(type: PolyType, fallback: (varId: number) => Type = () => Types.any): Type {
    const applied = this.apply(type);
    switch (applied.kind) {
      case "concrete":
        return applied.type;
      case "var":
        return fallback(applied.id);
      case "generic": {
        const arg = applied.args[0];
        const inner = arg ? this.toType(arg, fallback) : Types.any;
        return applied.name === "Array" ? arrayOf(inner) : optionOf(inner);
      }
    }
  }

  freeVars(type: PolyType): Set<number> {
    const applied = this.apply(type);
    if (applied.kind === "var") return new Set([applied.id]);
    if (applied.kind === "concrete") return new Set();
    const vars = new Set<number>();
    for (const arg of applied.args) {
      for (const id of this.freeVars(arg)) vars.add(id);
    }
    return vars;
  }

  /** Quantifies the variables free in `type` but not in `env`. */
  generalize(env: TypeEnv, type: PolyType): TypeScheme {
    const envVars = new Set<number>();
    for (const scheme of env.schemes()) {
      const bound = new Set(scheme.quantified);
      for (const id of this.freeVars(scheme.body)) {
        if (!bound.has(id)) envVars.add(id);
      }
    }
    const quantified = [...this.freeVars(type)].filter((id) => !envVars.has(id));
    return { quantified, body: this.apply(type) };
  }

  /** Replaces each quantified variable with a fresh one. */
  instantiate(scheme: TypeScheme): PolyType {
    const fresh = new Map<number, PolyType>();
    for (const id of scheme.quantified) {
      fresh.set(id, this.freshVar());
    }
    const substitute = (type: PolyType): PolyType => {
      if (type.kind === "var") return fresh.get(type.id) ?? type;
      if (type.kind === "generic") return generic(type.name, ...type.args.map(substitute));
      return type;
    };
    return substitute(scheme.body);
  }

  // ─── Internals ─────────────────────────────────────────────────

  private prune(type: PolyType): PolyType {
    let current = type;
    while (current.kind === "var") {
      const bound = this.substitution.get(current.id);
      if (!bound) break;
      current = bound;
    }
    return current;
  }

  private bind(id: number, type: PolyType): void {
    if (type.kind === "var" && type.id === id) return;
    if (this.occurs(id, type)) {
      throw new InferenceFailure("InfiniteType", { kind: "var", id }, type);
    }
    this.substitution.set(id, type);
  }

  private occurs(id: number, type: PolyType): boolean {
    const pruned = this.prune(type);
    if (pruned.kind === "var") return pruned.id === id;
    if (pruned.kind === "generic") return pruned.args.some((arg) => this.occurs(id, arg));
    return false;
  }

  /** Element type of a concrete Array/Option, Any for Any, else undefined. */
  private openCollection(type: Type, name: "Array" | "Option"): Type | undefined {
    if (type.kind === "any") return Types.any;
    if (name === "Array" && type.kind === "array") return type.element;
    if (name === "Option" && type.kind === "option") return type.inner;
    return undefined;
  }
}
