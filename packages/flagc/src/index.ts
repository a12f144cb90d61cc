export * as Source from "#source";
export * as Ir from "#ir";
export * as Inliner from "#inliner";

export { NameGenerator } from "#names";

// Re-export the passes as plain functions
export { precompile } from "#normalizer";
export { inline, FunctionTable, type Builtin } from "#inliner";
export { flatten } from "#flattener";
export { analyzeLiveness, type LivenessInfo } from "#liveness";
export { arithmeticBuiltins } from "#builtins";

// Re-export error handling utilities
export * from "#errors";

// Re-export result type
export * from "#result";

// Re-export compiler interfaces
export {
  compile,
  type CompileOptions,
  type CompileError,
  type Target,
  type Pass,
} from "#compiler";
