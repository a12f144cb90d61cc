/**
 * Result type shared by every compiler pass
 *
 * A pass either succeeds with a value or fails; in both cases it may carry
 * messages grouped by severity.
 */

import type { CompilerError } from "./errors.js";

export enum Severity {
  Error = "error",
}

export type MessagesBySeverity<E extends CompilerError> = {
  [S in Severity]?: E[];
};

export type Result<T, E extends CompilerError = CompilerError> =
  | { success: true; value: T; messages: MessagesBySeverity<E> }
  | { success: false; messages: MessagesBySeverity<E> };

export namespace Result {
  export function ok<T, E extends CompilerError = never>(
    value: T,
  ): Result<T, E> {
    return { success: true, value, messages: {} };
  }

  export function err<T, E extends CompilerError>(
    error: E | E[],
  ): Result<T, E> {
    const errors = Array.isArray(error) ? error : [error];
    const messages: MessagesBySeverity<E> = {};
    for (const e of errors) {
      (messages[e.severity] ??= []).push(e);
    }
    return { success: false, messages };
  }

  export function map<T, U, E extends CompilerError>(
    result: Result<T, E>,
    fn: (value: T) => U,
  ): Result<U, E> {
    if (!result.success) {
      return result;
    }
    return {
      success: true,
      value: fn(result.value),
      messages: result.messages,
    };
  }

  export function errors<T, E extends CompilerError>(
    result: Result<T, E>,
  ): E[] {
    return result.messages[Severity.Error] ?? [];
  }
}
