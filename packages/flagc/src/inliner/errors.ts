/**
 * Inlining and lowering errors
 *
 * Every one of these aborts the run; no partial IR is produced.
 */

import { CompilerError } from "#errors";

export enum ErrorCode {
  UNDEFINED_VARIABLE = "INLINE001",
  UNDEFINED_FUNCTION = "INLINE002",
  ARITY_MISMATCH = "INLINE003",
  SOURCE_FLAG = "INLINE004",
  RESERVED_NAME = "INLINE005",
}

export const ErrorMessages = {
  UNDEFINED_VARIABLE: (name: string) => `Undefined variable: ${name}`,
  UNDEFINED_FUNCTION: (name: string) => `Undefined function: ${name}`,
  ARGUMENT_COUNT: (name: string, expected: number, actual: number) =>
    `Function ${name} takes ${expected} argument(s) ` +
    `but was called with ${actual}`,
  RESULT_COUNT: (name: string, available: number, requested: number) =>
    `Function ${name} returns ${available} value(s) ` +
    `but ${requested} were assigned`,
  ASSIGNMENT_COUNT: (count: number) =>
    `An expression yields one value but ${count} name(s) were assigned`,
  SOURCE_FLAG: (name: string) =>
    `Flag ${name} cannot appear in source; flags only come from comparisons`,
  RESERVED_NAME: (name: string) =>
    `Cell ${name} has the shape of a generated name`,
} as const;

export class Error extends CompilerError {
  /** Variable or function the error is about */
  public readonly subject: string;

  constructor(code: ErrorCode, message: string, subject: string) {
    super(message, code);
    this.subject = subject;
  }

  static undefinedVariable(name: string): Error {
    return new Error(
      ErrorCode.UNDEFINED_VARIABLE,
      ErrorMessages.UNDEFINED_VARIABLE(name),
      name,
    );
  }

  static undefinedFunction(name: string): Error {
    return new Error(
      ErrorCode.UNDEFINED_FUNCTION,
      ErrorMessages.UNDEFINED_FUNCTION(name),
      name,
    );
  }

  static arityMismatch(name: string, message: string): Error {
    return new Error(ErrorCode.ARITY_MISMATCH, message, name);
  }

  static sourceFlag(name: string): Error {
    return new Error(
      ErrorCode.SOURCE_FLAG,
      ErrorMessages.SOURCE_FLAG(name),
      name,
    );
  }

  static reservedName(name: string): Error {
    return new Error(
      ErrorCode.RESERVED_NAME,
      ErrorMessages.RESERVED_NAME(name),
      name,
    );
  }
}
