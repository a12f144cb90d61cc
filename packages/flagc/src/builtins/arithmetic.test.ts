import { describe, it, expect } from "vitest";

import { Expression, Statement } from "#source";
import { FunctionTable, inline } from "#inliner";
import { precompile } from "#normalizer";

import { arithmeticBuiltins } from "./arithmetic.js";

describe("arithmeticBuiltins", () => {
  const builtins = arithmeticBuiltins();

  it("defines the operators as binary functions returning one value", () => {
    const table = FunctionTable.from(builtins);

    expect(table.names).toEqual(["*", "/", "%"]);
    for (const name of table.names) {
      const entry = table.lookup(name);
      expect(entry.parameters).toEqual(["a", "b"]);
      expect(entry.results).toBe(1);
    }
  });

  it("are already in normal form", () => {
    for (const { body } of builtins) {
      expect(precompile(body)).toEqual(body);
    }
  });

  it("lower without errors for every operator", () => {
    for (const operator of ["mul", "div", "mod"] as const) {
      const program = Statement.assign(
        ["x"],
        Expression.binary(
          Expression.identifier("a"),
          operator,
          Expression.identifier("b"),
        ),
      );

      const result = inline(program, { builtins, inputs: ["a", "b", "x"] });

      expect(result.success).toBe(true);
    }
  });
});
