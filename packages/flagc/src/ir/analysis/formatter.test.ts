import { describe, it, expect } from "vitest";

import { Condition, Expression, Instruction } from "#ir/spec";

import { Formatter } from "./formatter.js";

const id = Expression.identifier;
const flag = Condition.flag;

describe("Formatter", () => {
  const formatter = new Formatter();

  it("parenthesizes nested additions", () => {
    const instruction = Instruction.assign(
      "y",
      Expression.add(id("x"), Expression.add(id("x"), Expression.integer(1))),
      null,
    );

    expect(formatter.format(instruction)).toBe("y := x + (x + 1)");
  });

  it("prints conditionals with both branches", () => {
    const instruction = Instruction.conditional(
      Condition.and(Condition.not(flag("a")), Condition.not(flag("b"))),
      Instruction.assign("x", Expression.integer(1), null),
      Instruction.sequence<null>([]),
      null,
    );

    expect(formatter.format(instruction)).toBe(
      ["if !a & !b {", "  x := 1", "} else {", "}"].join("\n"),
    );
  });

  it("parenthesizes compound operands of a negation", () => {
    const condition = Condition.not(Condition.or(flag("a"), flag("b")));

    expect(formatter.formatCondition(condition)).toBe("!(a | b)");
  });

  it("prints parallel blocks branch by branch", () => {
    const instruction = Instruction.parallel<null>([
      Instruction.assign("a", Expression.integer(1), null),
      Instruction.sequence([
        Instruction.assign("b", Expression.integer(2), null),
        Instruction.compare("a", "b", null),
      ]),
    ]);

    expect(formatter.format(instruction)).toBe(
      [
        "parallel {",
        "  branch {",
        "    a := 1",
        "  }",
        "  branch {",
        "    b := 2",
        "    compare a, b",
        "  }",
        "}",
      ].join("\n"),
    );
  });

  it("appends sorted live sets when asked to", () => {
    const instruction = Instruction.sequence([
      Instruction.assign("n", Expression.integer(3), new Set(["n", "m"])),
      Instruction.loop(
        flag("n"),
        Instruction.assign("n", id("m"), new Set(["n"])),
        new Set(["n", "m"]),
      ),
    ]);

    expect(formatter.format(instruction, { tags: true })).toBe(
      [
        "n := 3  ; live: m, n",
        "while n {  ; live: m, n",
        "  n := m  ; live: n",
        "}",
      ].join("\n"),
    );
    expect(formatter.format(instruction)).toBe(
      ["n := 3", "while n {", "  n := m", "}"].join("\n"),
    );
  });
});
