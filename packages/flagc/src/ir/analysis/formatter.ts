/**
 * IR formatter for human-readable text output
 */

import * as Ir from "#ir/spec";

export interface FormatOptions {
  /** Append the liveness tag to every tagged line */
  tags?: boolean;
}

export class Formatter {
  private indent = 0;
  private output: string[] = [];
  private tags = false;

  format<T>(
    instruction: Ir.Instruction<T>,
    options: FormatOptions = {},
  ): string {
    this.output = [];
    this.indent = 0;
    this.tags = options.tags ?? false;

    this.formatInstruction(instruction);

    return this.output.join("\n");
  }

  private formatInstruction<T>(instruction: Ir.Instruction<T>): void {
    switch (instruction.kind) {
      case "sequence":
        for (const child of instruction.instructions) {
          this.formatInstruction(child);
        }
        break;
      case "parallel":
        this.line("parallel {");
        this.indent++;
        for (const branch of instruction.branches) {
          this.block("branch {", branch);
          this.line("}");
        }
        this.indent--;
        this.line("}");
        break;
      case "assign":
        this.line(
          `${instruction.dest} := ${this.formatExpression(instruction.value)}`,
          instruction.tag,
        );
        break;
      case "compare":
        this.line(
          `compare ${instruction.left}, ${instruction.right}`,
          instruction.tag,
        );
        break;
      case "conditional":
        this.block(
          `if ${this.formatCondition(instruction.condition)} {`,
          instruction.consequent,
          instruction.tag,
        );
        this.block("} else {", instruction.alternative);
        this.line("}");
        break;
      case "loop":
        this.block(
          `while ${this.formatCondition(instruction.condition)} {`,
          instruction.body,
          instruction.tag,
        );
        this.line("}");
        break;
    }
  }

  private block<T>(header: string, body: Ir.Instruction<T>, tag?: T): void {
    this.line(header, tag);
    this.indent++;
    this.formatInstruction(body);
    this.indent--;
  }

  formatExpression(expression: Ir.Expression): string {
    switch (expression.kind) {
      case "identifier":
        return expression.name;
      case "integer":
        return String(expression.value);
      case "binary":
        return [
          this.operand(expression.left),
          this.operand(expression.right),
        ].join(" + ");
    }
  }

  private operand(expression: Ir.Expression): string {
    const text = this.formatExpression(expression);
    return expression.kind === "binary" ? `(${text})` : text;
  }

  formatCondition(condition: Ir.Condition): string {
    switch (condition.kind) {
      case "flag":
        return condition.name;
      case "not":
        return `!${this.clause(condition.operand)}`;
      case "and":
        return [this.clause(condition.left), this.clause(condition.right)].join(
          " & ",
        );
      case "or":
        return [this.clause(condition.left), this.clause(condition.right)].join(
          " | ",
        );
    }
  }

  private clause(condition: Ir.Condition): string {
    const text = this.formatCondition(condition);
    return condition.kind === "and" || condition.kind === "or"
      ? `(${text})`
      : text;
  }

  private line(text: string, tag?: unknown): void {
    const live =
      this.tags && tag instanceof Set
        ? `  ; live: ${[...tag].map(String).sort().join(", ")}`
        : "";
    this.output.push(`${"  ".repeat(this.indent)}${text}${live}`);
  }
}
