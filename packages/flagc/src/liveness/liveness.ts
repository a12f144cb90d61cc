/**
 * Liveness analysis and dead-store elimination
 *
 * Walks the IR backwards carrying the set of names whose current value may
 * still be read. Assignments to names outside that set are deleted; every
 * surviving tagged instruction is tagged with the set live after it. A flag
 * read by a guard is tracked under the name of the compare operand that
 * produces it.
 *
 * A compare is never deleted. It overwrites the flags named by its operands
 * and reads the cells of the same names, so the set live before it is the
 * set live after it plus both operand names.
 */

import * as Ir from "#ir";

/**
 * Record of one rewrite made by the analysis
 */
export interface Transformation {
  type: "delete";
  pass: "liveness";
  original: Ir.Instruction.Assign<unknown>;
  reason: string;
}

export interface LivenessInfo {
  /** Names live at program entry */
  liveIn: Ir.LiveSet;
  /** Dead stores removed from the final tree */
  transformations: Transformation[];
}

export interface LivenessResult {
  tagged: Ir.Tagged;
  liveness: LivenessInfo;
}

type Track = (transformation: Transformation) => void;

interface Step {
  /** Undefined when the instruction was deleted */
  instruction?: Ir.Tagged;
  before: Ir.LiveSet;
}

/**
 * Tag `instruction` with liveness, given the names live after it
 */
export function analyzeLiveness<T>(
  instruction: Ir.Instruction<T>,
  liveOut: Iterable<string> = [],
): LivenessResult {
  const transformations: Transformation[] = [];
  const step = analyze(instruction, new Set(liveOut), (transformation) =>
    transformations.push(transformation),
  );
  return {
    tagged: block(step),
    liveness: { liveIn: step.before, transformations },
  };
}

function analyze<T>(
  instruction: Ir.Instruction<T>,
  after: Ir.LiveSet,
  track: Track,
): Step {
  switch (instruction.kind) {
    case "assign": {
      const { dest, value } = instruction;
      if (!after.has(dest)) {
        track({
          type: "delete",
          pass: "liveness",
          original: instruction,
          reason: `Removed dead store: ${dest}`,
        });
        return { before: after };
      }
      const before = new Set(after);
      before.delete(dest);
      return {
        instruction: Ir.Instruction.assign(dest, value, after),
        before: Ir.Expression.reads(value, before),
      };
    }

    case "compare":
      // overwrites flags `left`/`right` and reads the cells of the same
      // names, so both stay live above it
      return {
        instruction: Ir.Instruction.compare(
          instruction.left,
          instruction.right,
          after,
        ),
        before: union(after, [instruction.left, instruction.right]),
      };

    case "conditional": {
      const consequent = analyze(instruction.consequent, after, track);
      const alternative = analyze(instruction.alternative, after, track);
      return {
        instruction: Ir.Instruction.conditional(
          instruction.condition,
          block(consequent),
          block(alternative),
          after,
        ),
        before: Ir.Condition.reads(
          instruction.condition,
          union(consequent.before, alternative.before),
        ),
      };
    }

    case "loop": {
      const live = loopFixpoint(instruction, after);
      const body = analyze(instruction.body, live, track);
      return {
        instruction: Ir.Instruction.loop(
          instruction.condition,
          block(body),
          live,
        ),
        before: live,
      };
    }

    case "sequence": {
      const instructions: Ir.Tagged[] = [];
      let live = after;
      for (let i = instruction.instructions.length - 1; i >= 0; i--) {
        const step = analyze(instruction.instructions[i], live, track);
        if (step.instruction) {
          instructions.unshift(step.instruction);
        }
        live = step.before;
      }
      return {
        instruction: Ir.Instruction.sequence(instructions),
        before: live,
      };
    }

    case "parallel": {
      const branches = instruction.branches.map((branch) =>
        analyze(branch, after, track),
      );
      return {
        instruction: Ir.Instruction.parallel(branches.map(block)),
        before: union(...branches.map((branch) => branch.before)),
      };
    }
  }
}

/**
 * Names live at the head of a loop: the smallest set containing the guard's
 * flags and the names live after the loop that is stable under one more pass
 * through the body
 */
export function loopFixpoint<T>(
  loop: Ir.Instruction.Loop<T>,
  after: Ir.LiveSet,
): Ir.LiveSet {
  const entry = Ir.Condition.reads(loop.condition, new Set(after));
  const ignore: Track = () => {};

  let live: Ir.LiveSet = entry;
  for (;;) {
    const next = union(entry, analyze(loop.body, live, ignore).before);
    if (next.size === live.size) {
      // sets only grow, so equal size means equal sets
      return live;
    }
    live = next;
  }
}

function block(step: Step): Ir.Tagged {
  return step.instruction ?? Ir.Instruction.sequence<Ir.LiveSet>([]);
}

function union(...sets: Iterable<string>[]): Set<string> {
  const result = new Set<string>();
  for (const set of sets) {
    for (const name of set) {
      result.add(name);
    }
  }
  return result;
}
