// ─── Compile Errors ────────────────────────────────────────────────
// Everything the checker and code generator can reject a rule for.
// Each error knows where in the tree it happened (a breadcrumb of
// token-kind/argument pairs) and, when available, the offending token.

import type { RawToken } from "@gambit/schema";
import { formatType, type Type } from "./types";

export interface PathSegment {
  readonly tokenType: string;
  readonly argument: string;
}

export type UnresolvedReason =
  | "ElementOutsideScope"
  | "NotACollection"
  | "InvalidLiteral"
  | "LiteralInTokenSlot";

export type CompileIssue =
  | { readonly kind: "TypeMismatch"; readonly expected: Type; readonly actual: Type }
  | { readonly kind: "UndefinedToken"; readonly tokenType: string }
  | { readonly kind: "MissingField"; readonly tokenType: string; readonly field: string }
  | { readonly kind: "UnresolvedType"; readonly reason: UnresolvedReason; readonly detail: string }
  | { readonly kind: "InfiniteType"; readonly variable: string; readonly type: string }
  | {
      readonly kind: "TraitBoundError";
      readonly type: Type;
      readonly traitName: string;
      readonly availableTraits: readonly string[];
    }
  | { readonly kind: "CyclicReference"; readonly tokenType: string }
  | {
      readonly kind: "ArgumentCountMismatch";
      readonly tokenType: string;
      readonly expected: number;
      readonly actual: number;
      readonly declared: readonly string[];
      /** Token-valued fields the signature does not name. */
      readonly unexpected: readonly string[];
    }
  | { readonly kind: "NoConverter"; readonly tokenType: string; readonly target: string }
  | { readonly kind: "MissingChild"; readonly tokenType: string; readonly child: string }
  | {
      readonly kind: "ChildTypeMismatch";
      readonly tokenType: string;
      readonly child: string;
      readonly expected: string;
      readonly actual: Type;
    };

export type CompileIssueKind = CompileIssue["kind"];

/** "Check.condition → GreaterThan.left", or "" for the root. */
export function formatPath(path: readonly PathSegment[]): string {
  return path.map((segment) => `${segment.tokenType}.${segment.argument}`).join(" → ");
}

function quoteAll(names: readonly string[]): string {
  return names.map((name) => `'${name}'`).join(", ");
}

export function describeIssue(issue: CompileIssue, path: readonly PathSegment[]): string {
  switch (issue.kind) {
    case "TypeMismatch":
      return (
        `Type mismatch in ${formatPath(path) || "rule"}: ` +
        `expected ${formatType(issue.expected)}, but got ${formatType(issue.actual)}`
      );
    case "UndefinedToken":
      return `Undefined token type: ${issue.tokenType}`;
    case "MissingField":
      return `Token '${issue.tokenType}' is missing required field '${issue.field}'`;
    case "UnresolvedType":
      return `Cannot resolve type in context: ${issue.detail}`;
    case "InfiniteType":
      return `Infinite type: ${issue.variable} occurs in ${issue.type}`;
    case "TraitBoundError":
      return `Type ${formatType(issue.type)} does not implement trait ${issue.traitName}`;
    case "CyclicReference":
      return `Cyclic reference detected in token '${issue.tokenType}'`;
    case "ArgumentCountMismatch":
      return (
        `Token '${issue.tokenType}' does not take ${quoteAll(issue.unexpected)}; it takes ` +
        (issue.declared.length === 0
          ? "no token arguments"
          : `${issue.expected} token argument(s): ${quoteAll(issue.declared)}`)
      );
    case "NoConverter":
      return `No converter produces ${issue.target} from token '${issue.tokenType}'`;
    case "MissingChild":
      return `Token '${issue.tokenType}' has no checked child '${issue.child}'`;
    case "ChildTypeMismatch":
      return (
        `Child '${issue.child}' of '${issue.tokenType}' has type ` +
        `${formatType(issue.actual)}, but ${issue.expected} was requested`
      );
  }
}

export class CompileError extends Error {
  constructor(
    public readonly issue: CompileIssue,
    public readonly path: readonly PathSegment[] = [],
    public readonly token?: RawToken
  ) {
    super(describeIssue(issue, path));
    this.name = "CompileError";
  }

  get kind(): CompileIssueKind {
    return this.issue.kind;
  }
}

// ─── Results ───────────────────────────────────────────────────────

export type CompileResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: CompileError };

/**
 * Runs a checker/generator step, turning a thrown CompileError into a
 * failed result. Anything else is a defect and keeps propagating.
 */
export function captureCompileError<T>(step: () => T): CompileResult<T> {
  try {
    return { ok: true, value: step() };
  } catch (error) {
    if (error instanceof CompileError) {
      return { ok: false, error };
    }
    throw error;
  }
}
