/**
 * IR analysis utilities
 */

export { Formatter, type FormatOptions } from "./formatter.js";
export { Validator, type ValidationResult } from "./validator.js";
