/**
 * Errors raised while reading a source tree
 */

import { CompilerError } from "#errors";

export enum ErrorCode {
  INVALID_SOURCE = "SOURCE001",
}

export class Error extends CompilerError {
  constructor(message: string, code: ErrorCode = ErrorCode.INVALID_SOURCE) {
    super(message, code);
  }
}
