import type { Statement } from "#source";
import type * as Ir from "#ir";
import type { Pass } from "#compiler";
import type { NameGenerator } from "#names";
import { Result } from "#result";

import type { Error } from "./errors.js";
import type { Builtin } from "./functions.js";
import { inline } from "./inliner.js";

/**
 * Inlining pass - lowers the normalized program to untagged IR
 */
export const pass: Pass<{
  needs: {
    program: Statement;
    builtins?: readonly Builtin[];
    inputs?: readonly string[];
    results?: readonly string[];
    names?: NameGenerator;
  };
  adds: {
    ir: Ir.Untagged;
  };
  error: Error;
}> = {
  run({ program, ...options }) {
    return Result.map(inline(program, options), (ir) => ({ ir }));
  },
};
