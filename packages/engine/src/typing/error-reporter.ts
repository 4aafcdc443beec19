// ─── Error Reporter ────────────────────────────────────────────────
// Renders compile errors for rule authors: a multi-line report with a
// breadcrumb, the offending subtree and a suggestion, a batch form, and
// a one-line form for logs.

import { isRawToken, type RawToken, type TokenLiteral } from "@gambit/schema";
import {
  formatPath,
  type CompileError,
  type CompileIssue,
  type UnresolvedReason,
} from "./errors";
import { formatType } from "./types";

// ─── Token Printing ────────────────────────────────────────────────

function formatLiteral(value: TokenLiteral): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

/**
 * Pretty-prints a token tree. Tokens with only literal fields stay on
 * one line; tokens with children break one field per line.
 */
export function formatToken(
  token: RawToken,
  depth = 0,
  seen: ReadonlySet<RawToken> = new Set()
): string {
  if (seen.has(token)) return "<cycle>";
  const inner = new Set(seen).add(token);
  const fields = Object.entries(token).filter(([key]) => key !== "type");

  if (fields.length === 0) return token.type;
  if (!fields.some(([, value]) => isRawToken(value))) {
    const literals = fields.map(([key, value]) =>
      isRawToken(value) ? key : `${key}: ${formatLiteral(value)}`
    );
    return `${token.type} { ${literals.join(", ")} }`;
  }

  const pad = "  ".repeat(depth + 1);
  const lines = fields.map(([key, value]) =>
    isRawToken(value)
      ? `${pad}${key}: ${formatToken(value, depth + 1, inner)}`
      : `${pad}${key}: ${formatLiteral(value)}`
  );
  return `${token.type} {\n${lines.join(",\n")}\n${"  ".repeat(depth)}}`;
}

// ─── Suggestions ───────────────────────────────────────────────────

const UNRESOLVED_SUGGESTIONS: Readonly<Record<UnresolvedReason, string>> = {
  ElementOutsideScope: "Element can only appear inside a FilterList condition or a Map transform.",
  NotACollection: "Pass a token that produces an array, such as AllCharacters or TeamMembers.",
  InvalidLiteral: "Fix the literal value; Number tokens take whole numbers.",
  LiteralInTokenSlot: 'Wrap the value in a token, such as { "type": "Number", "value": 5 }.',
};

export function suggestionFor(issue: CompileIssue): string {
  switch (issue.kind) {
    case "TypeMismatch":
      if (issue.expected.kind === "characterHp" && issue.actual.kind === "character") {
        return "Wrap the character in CharacterToHp to use its HP.";
      }
      if (issue.expected.kind === "character" && issue.actual.kind === "characterHp") {
        return "Wrap the HP value in CharacterHpToCharacter to get its character.";
      }
      return `Use a token that produces ${formatType(issue.expected)} here.`;
    case "UndefinedToken":
      return `Check the spelling of '${issue.tokenType}', or register metadata for it.`;
    case "MissingField":
      return `Add the '${issue.field}' field to the ${issue.tokenType} token.`;
    case "UnresolvedType":
      return UNRESOLVED_SUGGESTIONS[issue.reason];
    case "InfiniteType":
      return "A type cannot contain itself; check arguments that refer to their own collection.";
    case "TraitBoundError":
      return issue.availableTraits.length > 0
        ? `Use a value that implements ${issue.traitName}. ${formatType(issue.type)} implements: ${issue.availableTraits.join(", ")}.`
        : `Use a value that implements ${issue.traitName}. ${formatType(issue.type)} implements no traits.`;
    case "CyclicReference":
      return "A token cannot contain itself; build a separate subtree instead of reusing an ancestor.";
    case "ArgumentCountMismatch":
      return `Remove or rename ${issue.unexpected.map((name) => `'${name}'`).join(", ")}.`;
    case "NoConverter":
      return `Register a converter for '${issue.tokenType}' producing ${issue.target}.`;
    case "MissingChild":
    case "ChildTypeMismatch":
      return "The typed tree does not match what the converter expects; check custom converters.";
  }
}

// ─── Reports ───────────────────────────────────────────────────────

/**
 * Multi-line report for one error:
 *
 *     Compilation Error
 *     =================
 *
 *     Error: <message>
 *
 *     Location: Check.condition → GreaterThan.left
 *
 *     Token:
 *     ActingCharacter
 *
 *     Suggestion: <text>
 */
export function formatCompileError(error: CompileError): string {
  const sections = ["Compilation Error\n=================", `Error: ${error.message}`];
  if (error.path.length > 0) {
    sections.push(`Location: ${formatPath(error.path)}`);
  }
  if (error.token) {
    sections.push(`Token:\n${formatToken(error.token)}`);
  }
  sections.push(`Suggestion: ${suggestionFor(error.issue)}`);
  return sections.join("\n\n");
}

/** One batch report. `labels[i]`, when given, heads the i-th error's report. */
export function formatCompileErrors(
  errors: readonly CompileError[],
  labels: readonly string[] = []
): string {
  const header = `Found ${errors.length} compilation error(s):`;
  if (errors.length === 0) return header;
  const reports = errors.map((error, i) => {
    const label = labels[i];
    const report = formatCompileError(error);
    return label === undefined ? report : `${label}\n${report}`;
  });
  return `${header}\n\n${reports.join("\n\n---\n\n")}`;
}

/** `Kind: message (at A.x → B.y)` */
export function formatCompileErrorLine(error: CompileError): string {
  const location = error.path.length > 0 ? ` (at ${formatPath(error.path)})` : "";
  return `${error.kind}: ${error.message}${location}`;
}
