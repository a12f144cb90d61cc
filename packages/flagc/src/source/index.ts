/**
 * Source language model
 */

export * from "./spec.js";
export * from "./errors.js";
export { decode, fromData } from "./codec.js";
