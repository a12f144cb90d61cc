/**
 * Sequence flattening
 *
 * Splices nested sequences into their enclosing block. Conditionals, loops
 * and parallel blocks keep their shape; each of their sub-blocks is
 * flattened on its own.
 */

import * as Ir from "#ir";

export function flatten<T>(instruction: Ir.Instruction<T>): Ir.Instruction<T> {
  const instructions = splice(instruction);
  return instructions.length === 1
    ? instructions[0]
    : Ir.Instruction.sequence(instructions);
}

function splice<T>(instruction: Ir.Instruction<T>): Ir.Instruction<T>[] {
  switch (instruction.kind) {
    case "sequence":
      return instruction.instructions.flatMap((child) => splice(child));
    case "parallel":
      return [
        Ir.Instruction.parallel(
          instruction.branches.map((branch) => flatten(branch)),
        ),
      ];
    case "conditional":
      return [
        {
          ...instruction,
          consequent: flatten(instruction.consequent),
          alternative: flatten(instruction.alternative),
        },
      ];
    case "loop":
      return [{ ...instruction, body: flatten(instruction.body) }];
    case "assign":
    case "compare":
      return [instruction];
  }
}
