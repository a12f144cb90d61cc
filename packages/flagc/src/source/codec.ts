/**
 * Reading source trees that an external parser wrote out as YAML or JSON
 */

import YAML from "yaml";

import { Result } from "#result";

import { Error as SourceError } from "./errors.js";
import { isStatement, type Statement } from "./spec.js";

/**
 * Validate already-parsed data as a source tree
 */
export function fromData(data: unknown): Result<Statement, SourceError> {
  if (!isStatement(data)) {
    return Result.err(new SourceError("Data is not a well-formed source tree"));
  }
  return Result.ok(data);
}

/**
 * Parse a YAML (or JSON) document holding a source tree
 */
export function decode(text: string): Result<Statement, SourceError> {
  let data: unknown;
  try {
    data = YAML.parse(text);
  } catch (error) {
    return Result.err(
      new SourceError(
        `Malformed document: ${
          error instanceof globalThis.Error ? error.message : String(error)
        }`,
      ),
    );
  }
  return fromData(data);
}
