/**
 * IR validator
 *
 * Checks the structural guarantees later consumers rely on: flattened
 * blocks, and guards that only read flags some compare in the tree sets.
 */

import * as Ir from "#ir/spec";

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

export class Validator {
  private errors: string[] = [];
  private compared = new Set<string>();
  private guards: Ir.Condition[] = [];

  validate<T>(instruction: Ir.Instruction<T>): ValidationResult {
    this.errors = [];
    this.compared = new Set();
    this.guards = [];

    this.visit(instruction, false);

    for (const guard of this.guards) {
      for (const flag of Ir.Condition.reads(guard)) {
        if (!this.compared.has(flag)) {
          this.errors.push(`Guard reads flag ${flag} that no compare sets`);
        }
      }
    }

    return { isValid: this.errors.length === 0, errors: this.errors };
  }

  private visit<T>(instruction: Ir.Instruction<T>, inSequence: boolean): void {
    switch (instruction.kind) {
      case "sequence":
        if (inSequence) {
          this.errors.push("Sequence nested directly in a sequence");
        }
        if (instruction.instructions.length === 1) {
          this.errors.push("Sequence with a single instruction");
        }
        for (const child of instruction.instructions) {
          this.visit(child, true);
        }
        break;
      case "parallel":
        for (const branch of instruction.branches) {
          this.visit(branch, false);
        }
        break;
      case "assign":
        break;
      case "compare":
        this.compared.add(instruction.left);
        this.compared.add(instruction.right);
        break;
      case "conditional":
        this.guards.push(instruction.condition);
        this.visit(instruction.consequent, false);
        this.visit(instruction.alternative, false);
        break;
      case "loop":
        this.guards.push(instruction.condition);
        this.visit(instruction.body, false);
        break;
    }
  }
}
