import type { Statement } from "#source";
import type { Pass } from "#compiler";
import type { Builtin } from "#inliner";
import { Result } from "#result";

import { precompile } from "./normalize.js";

/**
 * Normalization pass - prepares the program and every builtin body for
 * lowering
 */
export const pass: Pass<{
  needs: {
    program: Statement;
    builtins?: readonly Builtin[];
  };
  adds: {
    program: Statement;
    builtins: Builtin[];
  };
  error: never;
}> = {
  run({ program, builtins = [] }) {
    return Result.ok({
      program: precompile(program),
      builtins: builtins.map((builtin) => ({
        ...builtin,
        body: precompile(builtin.body),
      })),
    });
  },
};
