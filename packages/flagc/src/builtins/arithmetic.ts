/**
 * Source definitions of the arithmetic builtins
 *
 * Lowering turns `a * b` (unless one side is a small constant), `a / b` and
 * `a % b` into calls of "*", "/" and "%". These bodies use only additions,
 * comparisons and loops, and expect non-negative operands and a positive
 * divisor.
 */

import { Condition, Expression, Statement } from "#source";
import type { Builtin } from "#inliner";

const id = Expression.identifier;
const int = Expression.integer;
const plus = (left: Expression, right: Expression) =>
  Expression.binary(left, "add", right);
const increment = (name: string) =>
  Statement.assign([name], plus(id(name), int(1)));

/**
 * product := 0; i := 0; while i < b { product += a; i += 1 }
 */
const multiply: Builtin = {
  name: "*",
  parameters: ["a", "b"],
  body: Statement.bind(
    "product",
    int(0),
    Statement.bind(
      "i",
      int(0),
      Statement.block(
        Statement.loop(
          Condition.compare(id("i"), "lt", id("b")),
          Statement.block(
            Statement.assign(["product"], plus(id("product"), id("a"))),
            increment("i"),
          ),
        ),
        Statement.ret([id("product")]),
      ),
    ),
  ),
};

/**
 * quotient := 0; next := b; while next <= a { quotient += 1; next += b }
 */
const divide: Builtin = {
  name: "/",
  parameters: ["a", "b"],
  body: Statement.bind(
    "quotient",
    int(0),
    Statement.bind(
      "next",
      id("b"),
      Statement.block(
        Statement.loop(
          Condition.compare(id("next"), "lte", id("a")),
          Statement.block(
            increment("quotient"),
            Statement.assign(["next"], plus(id("next"), id("b"))),
          ),
        ),
        Statement.ret([id("quotient")]),
      ),
    ),
  ),
};

/**
 * Counts up to a, wrapping the remainder back to 0 whenever it reaches b
 */
const remainder: Builtin = {
  name: "%",
  parameters: ["a", "b"],
  body: Statement.bind(
    "remainder",
    int(0),
    Statement.bind(
      "i",
      int(0),
      Statement.block(
        Statement.loop(
          Condition.compare(id("i"), "lt", id("a")),
          Statement.block(
            increment("i"),
            increment("remainder"),
            Statement.conditional(
              Condition.compare(id("remainder"), "eq", id("b")),
              Statement.assign(["remainder"], int(0)),
            ),
          ),
        ),
        Statement.ret([id("remainder")]),
      ),
    ),
  ),
};

/**
 * Builtins for "*", "/" and "%", in an order where none depends on a later one
 */
export function arithmeticBuiltins(): Builtin[] {
  return [multiply, divide, remainder];
}
