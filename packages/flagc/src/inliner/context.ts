import type * as Ir from "#ir";
import type { NameGenerator } from "#names";

import type { FunctionTable } from "./functions.js";
import type { Scope } from "./scope.js";

/**
 * Everything lowering threads through the tree. Function table and scope
 * are replaced, never modified, as lowering descends; the name generator is
 * shared by the whole run.
 */
export interface Context {
  readonly functions: FunctionTable;
  readonly scope: Scope;
  readonly names: NameGenerator;
}

/**
 * A lowered value together with the instructions that must run before it
 */
export interface Lowered<T> {
  prelude: Ir.Untagged[];
  value: T;
}
