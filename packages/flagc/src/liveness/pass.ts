/**
 * Liveness Analysis Pass
 *
 * Removes dead stores and tags every remaining instruction with the names
 * live after it.
 */

import type * as Ir from "#ir";
import type { Pass } from "#compiler";
import { Result } from "#result";

import { analyzeLiveness, type LivenessInfo } from "./liveness.js";

export const pass: Pass<{
  needs: {
    ir: Ir.Untagged;
    /** Cells read once the program has finished */
    results?: readonly string[];
  };
  adds: {
    tagged: Ir.Tagged;
    liveness: LivenessInfo;
  };
  error: never;
}> = {
  run({ ir, results = [] }) {
    return Result.ok(analyzeLiveness(ir, results));
  },
};
