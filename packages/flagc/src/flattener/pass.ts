import type * as Ir from "#ir";
import type { Pass } from "#compiler";
import { Result } from "#result";

import { flatten } from "./flatten.js";

/**
 * Flattening pass - one flat instruction list per block
 */
export const pass: Pass<{
  needs: {
    ir: Ir.Untagged;
  };
  adds: {
    ir: Ir.Untagged;
  };
  error: never;
}> = {
  run({ ir }) {
    return Result.ok({ ir: flatten(ir) });
  },
};
