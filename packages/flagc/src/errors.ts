/**
 * Base error class for all compiler passes
 */

import { Severity } from "./result.js";

export class CompilerError extends Error {
  public readonly code: string;
  public readonly severity: Severity;

  constructor(
    message: string,
    code: string,
    severity: Severity = Severity.Error,
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.severity = severity;
  }
}
