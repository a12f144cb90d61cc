/**
 * Liveness analysis pass
 *
 * Computes which names are live at each point of the flattened IR, deletes
 * assignments nothing reads, and tags what remains for the emitter.
 */

export * from "./liveness.js";
export * from "./pass.js";
