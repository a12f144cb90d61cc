import { describe, it, expect } from "vitest";

import * as Ir from "#ir";

import { analyzeLiveness, loopFixpoint } from "./liveness.js";

const { Instruction, Expression, Condition } = Ir;
const id = Expression.identifier;
const int = Expression.integer;

const live = (...names: string[]): Ir.LiveSet => new Set(names);

describe("analyzeLiveness", () => {
  it("removes stores nobody reads", () => {
    const instruction = Instruction.sequence([
      Instruction.assign("x", int(1), null),
      Instruction.assign("y", int(2), null),
      Instruction.assign("out", id("y"), null),
    ]);

    const { tagged, liveness } = analyzeLiveness(instruction, ["out"]);

    expect(tagged).toEqual(
      Instruction.sequence([
        Instruction.assign("y", int(2), live("y")),
        Instruction.assign("out", id("y"), live("out")),
      ]),
    );
    expect(liveness.liveIn).toEqual(live());
    expect(liveness.transformations).toEqual([
      {
        type: "delete",
        pass: "liveness",
        original: Instruction.assign("x", int(1), null),
        reason: "Removed dead store: x",
      },
    ]);
  });

  it("removes everything when nothing is live afterwards", () => {
    const instruction = Instruction.assign("x", int(1), null);

    const { tagged, liveness } = analyzeLiveness(instruction);

    expect(tagged).toEqual(Instruction.sequence([]));
    expect(liveness.transformations).toHaveLength(1);
  });

  it("keeps compares and the cells they read", () => {
    const instruction = Instruction.sequence([
      Instruction.assign("_1", id("a"), null),
      Instruction.assign("_2", id("b"), null),
      Instruction.compare("_1", "_2", null),
      Instruction.conditional(
        Condition.flag("_2"),
        Instruction.assign("x", int(1), null),
        Instruction.assign("x", id("c"), null),
        null,
      ),
      Instruction.assign("out", id("x"), null),
    ]);

    const { tagged, liveness } = analyzeLiveness(instruction, ["out"]);

    expect(tagged).toEqual(
      Instruction.sequence([
        Instruction.assign("_1", id("a"), live("_1", "b", "c")),
        Instruction.assign("_2", id("b"), live("_1", "_2", "c")),
        Instruction.compare("_1", "_2", live("_2", "c")),
        Instruction.conditional(
          Condition.flag("_2"),
          Instruction.assign("x", int(1), live("x")),
          Instruction.assign("x", id("c"), live("x")),
          live("x"),
        ),
        Instruction.assign("out", id("x"), live("out")),
      ]),
    );
    expect(liveness.liveIn).toEqual(live("a", "b", "c"));
    expect(liveness.transformations).toEqual([]);
  });

  it("leaves an empty block where a branch lost its only store", () => {
    const instruction = Instruction.conditional(
      Condition.flag("f"),
      Instruction.assign("unused", int(1), null),
      Instruction.assign("out", int(2), null),
      null,
    );

    const { tagged, liveness } = analyzeLiveness(instruction, ["out"]);

    expect(tagged).toEqual(
      Instruction.conditional(
        Condition.flag("f"),
        Instruction.sequence([]),
        Instruction.assign("out", int(2), live("out")),
        live("out"),
      ),
    );
    // `out` may keep its old value when the consequent runs
    expect(liveness.liveIn).toEqual(live("f", "out"));
  });

  it("unions what the branches of a parallel block need", () => {
    const instruction = Instruction.parallel([
      Instruction.assign("a", id("x"), null),
      Instruction.assign("b", id("y"), null),
    ]);

    const { tagged, liveness } = analyzeLiveness(instruction, ["a"]);

    expect(tagged).toEqual(
      Instruction.parallel([
        Instruction.assign("a", id("x"), live("a")),
        Instruction.sequence([]),
      ]),
    );
    expect(liveness.liveIn).toEqual(live("a", "x"));
  });

  describe("loops", () => {
    // i := i + 1 while i < n, guard prelude repeated at the end of the body
    const counter = Instruction.sequence([
      Instruction.assign("_1", id("i"), null),
      Instruction.assign("_2", id("n"), null),
      Instruction.compare("_1", "_2", null),
      Instruction.loop(
        Condition.flag("_2"),
        Instruction.sequence([
          Instruction.assign("i", Expression.add(id("i"), int(1)), null),
          Instruction.assign("_1", id("i"), null),
          Instruction.assign("_2", id("n"), null),
          Instruction.compare("_1", "_2", null),
        ]),
        null,
      ),
    ]);

    it("tags the loop with the set live at its head", () => {
      const { tagged, liveness } = analyzeLiveness(counter, ["i"]);

      expect(new Ir.Analysis.Formatter().format(tagged, { tags: true })).toBe(
        [
          "_1 := i  ; live: _1, i, n",
          "_2 := n  ; live: _1, _2, i, n",
          "compare _1, _2  ; live: _2, i, n",
          "while _2 {  ; live: _2, i, n",
          "  i := i + 1  ; live: i, n",
          "  _1 := i  ; live: _1, i, n",
          "  _2 := n  ; live: _1, _2, i, n",
          "  compare _1, _2  ; live: _2, i, n",
          "}",
        ].join("\n"),
      );
      expect(liveness.liveIn).toEqual(live("i", "n"));
    });

    it("reaches a fixpoint containing the guard and the live-out set", () => {
      const [, , , loop] = counter.instructions;
      if (loop.kind !== "loop") {
        throw new Error("Expected a loop");
      }

      const head = loopFixpoint(loop, live("i"));

      expect(head).toEqual(live("_2", "i", "n"));
      expect(loopFixpoint(loop, head)).toEqual(head);
    });

    it("keeps a store read only by a later iteration", () => {
      // while f { out := t; t := 1 }
      const instruction = Instruction.loop(
        Condition.flag("f"),
        Instruction.sequence([
          Instruction.assign("out", id("t"), null),
          Instruction.assign("t", int(1), null),
        ]),
        null,
      );

      const { tagged } = analyzeLiveness(instruction, ["out"]);

      expect(tagged).toEqual(
        Instruction.loop(
          Condition.flag("f"),
          Instruction.sequence([
            Instruction.assign("out", id("t"), live("f", "out")),
            Instruction.assign("t", int(1), live("f", "out", "t")),
          ]),
          live("f", "out", "t"),
        ),
      );
    });
  });

  it("changes nothing when run again on its own output", () => {
    const instruction = Instruction.sequence([
      Instruction.assign("x", int(1), null),
      Instruction.assign("y", id("x"), null),
      Instruction.assign("z", int(3), null),
    ]);

    const first = analyzeLiveness(instruction, ["y"]);
    const second = analyzeLiveness(first.tagged, ["y"]);

    expect(second.tagged).toEqual(first.tagged);
    expect(second.liveness.transformations).toEqual([]);
  });
});
