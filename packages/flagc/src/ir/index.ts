/**
 * Flag IR (intermediate representation) module
 *
 * The target of lowering: assignments, compares, flag-guarded conditionals
 * and loops, sequences and parallel blocks.
 */

export * from "./spec/index.js";
export * as Analysis from "./analysis/index.js";
