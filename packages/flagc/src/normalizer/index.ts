/**
 * Normalization of source trees ahead of lowering
 */

export {
  leftify,
  absorbBranches,
  returns,
  removeDeadBranches,
  precompile,
} from "./normalize.js";
export { pass } from "./pass.js";
