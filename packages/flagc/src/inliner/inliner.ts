/**
 * Entry point of inlining and lowering
 */

import type * as Source from "#source";
import type * as Ir from "#ir";
import { NameGenerator } from "#names";
import { Result } from "#result";

import { Error as InlinerError } from "./errors.js";
import { FunctionTable, type Builtin } from "./functions.js";
import { Scope } from "./scope.js";
import { lowerStatement } from "./statements.js";

export interface InlineOptions {
  /** Functions callable without a definition in the program */
  builtins?: FunctionTable | readonly Builtin[];
  /** Cells the executor fills in before the program starts */
  inputs?: readonly string[];
  /** Cells receiving the values of a top-level return, in order */
  results?: readonly string[];
  /** Fresh name source; a new one is created when omitted */
  names?: NameGenerator;
}

/**
 * Lower a normalized program to untagged IR, inlining every call
 */
export function inline(
  program: Source.Statement,
  options: InlineOptions = {},
): Result<Ir.Untagged, InlinerError> {
  const {
    builtins = FunctionTable.empty(),
    inputs = [],
    results = [],
    names = new NameGenerator(),
  } = options;

  const functions =
    builtins instanceof FunctionTable ? builtins : FunctionTable.from(builtins);

  // executor-supplied cells keep their names, so they must stay clear of
  // fresh ones
  const reserved = [...inputs, ...results].filter((name) => names.owns(name));
  if (reserved.length > 0) {
    return Result.err(reserved.map((name) => InlinerError.reservedName(name)));
  }

  try {
    return Result.ok(
      lowerStatement(program, {
        functions,
        scope: Scope.root(inputs, results),
        names,
      }),
    );
  } catch (error) {
    if (error instanceof InlinerError) {
      return Result.err(error);
    }
    throw error;
  }
}
