/**
 * Compiler pass system and driver
 */

export * from "./pass.js";
export {
  compile,
  type CompileOptions,
  type CompileError,
  type Target,
  type NormalizedOutput,
  type IrOutput,
  type TaggedOutput,
} from "./compile.js";
