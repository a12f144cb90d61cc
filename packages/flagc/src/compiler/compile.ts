/**
 * Compiler driver: runs the passes in order up to the requested target
 */

import type * as Source from "#source";
import type * as Ir from "#ir";
import type { NameGenerator } from "#names";
import { Result } from "#result";
import { pass as normalizationPass } from "#normalizer";
import {
  pass as inliningPass,
  type Builtin,
  type Error as InlinerError,
} from "#inliner";
import { pass as flatteningPass } from "#flattener";
import { pass as livenessPass, type LivenessInfo } from "#liveness";

/**
 * Stage at which compilation stops:
 * - normalized: precompiled source tree
 * - ir: untagged IR straight out of inlining
 * - flat: flattened untagged IR
 * - tagged: flattened IR after liveness analysis
 */
export type Target = "normalized" | "ir" | "flat" | "tagged";

export interface CompileOptions<T extends Target = Target> {
  to: T;
  program: Source.Statement;
  builtins?: readonly Builtin[];
  inputs?: readonly string[];
  results?: readonly string[];
  names?: NameGenerator;
}

export interface NormalizedOutput {
  program: Source.Statement;
  builtins: Builtin[];
}

export interface IrOutput extends NormalizedOutput {
  ir: Ir.Untagged;
}

export interface TaggedOutput extends IrOutput {
  tagged: Ir.Tagged;
  liveness: LivenessInfo;
}

export type CompileError = InlinerError;

export function compile(
  options: CompileOptions<"normalized">,
): Result<NormalizedOutput, CompileError>;
export function compile(
  options: CompileOptions<"ir" | "flat">,
): Result<IrOutput, CompileError>;
export function compile(
  options: CompileOptions<"tagged">,
): Result<TaggedOutput, CompileError>;
export function compile(
  options: CompileOptions,
): Result<NormalizedOutput | IrOutput | TaggedOutput, CompileError> {
  const { to, program, builtins, inputs, results, names } = options;

  const normalized = normalizationPass.run({ program, builtins });
  if (!normalized.success || to === "normalized") {
    return normalized;
  }

  const lowered = inliningPass.run({
    ...normalized.value,
    inputs,
    results,
    names,
  });
  if (!lowered.success) {
    return lowered;
  }
  if (to === "ir") {
    return Result.ok({ ...normalized.value, ir: lowered.value.ir });
  }

  const flattened = flatteningPass.run({ ir: lowered.value.ir });
  if (!flattened.success) {
    return flattened;
  }
  if (to === "flat") {
    return Result.ok({ ...normalized.value, ir: flattened.value.ir });
  }

  const analyzed = livenessPass.run({ ir: flattened.value.ir, results });
  if (!analyzed.success) {
    return analyzed;
  }
  return Result.ok({
    ...normalized.value,
    ir: flattened.value.ir,
    ...analyzed.value,
  });
}
