/**
 * Inlining and lowering of source trees into flag IR
 */

export * from "./errors.js";
export { inline, type InlineOptions } from "./inliner.js";
export {
  FunctionTable,
  countResults,
  type Builtin,
  type FunctionEntry,
} from "./functions.js";
export { Scope } from "./scope.js";
export { lowerStatement, inlineCall } from "./statements.js";
export {
  lowerExpression,
  lowerCondition,
  relate,
  UNROLL_LIMIT,
} from "./expressions.js";
export type { Context, Lowered } from "./context.js";
export { pass } from "./pass.js";
