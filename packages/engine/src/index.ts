// ─── @gambit/engine ────────────────────────────────────────────────
// Type checker, code generator and runtime for battle rules.

// Typing
export * from "./typing/types";
export * from "./typing/traits";
export * from "./typing/token-metadata";
export * from "./typing/inference";
export * from "./typing/errors";
export * from "./typing/type-checker";
export * from "./typing/error-reporter";

// Code generation
export * from "./codegen/converter-registry";
export * from "./codegen/code-generator";
export * from "./codegen/builtin-converters";
export * from "./codegen/numeric-resolution";
export * from "./codegen/targets";

// Runtime
export * from "./runtime/node";
export * from "./runtime/values";
export * from "./runtime/evaluation-context";
export * from "./runtime/prng";
export * from "./runtime/rule-resolver";
export * from "./runtime/nodes/action-nodes";
export * from "./runtime/nodes/condition-nodes";
export * from "./runtime/nodes/value-nodes";
export * from "./runtime/nodes/array-nodes";

// Compiler
export * from "./compiler/rule-compiler";
export * from "./compiler/load-rule-set";
