/**
 * Lowering of value expressions and conditions
 */

import * as Source from "#source";
import * as Ir from "#ir";

import type { Context, Lowered } from "./context.js";
import { Error as InlinerError } from "./errors.js";
import { inlineCall } from "./statements.js";

/**
 * Largest constant factor unrolled into additions; larger (and negative)
 * factors go through the "*" builtin
 */
export const UNROLL_LIMIT = 16;

export function lowerExpression(
  expression: Source.Expression,
  context: Context,
): Lowered<Ir.Expression> {
  switch (expression.kind) {
    case "identifier":
      return {
        prelude: [],
        value: Ir.Expression.identifier(context.scope.resolve(expression.name)),
      };
    case "integer":
      return { prelude: [], value: Ir.Expression.integer(expression.value) };
    case "call": {
      const result = context.names.next();
      const call = inlineCall([result], expression, {
        ...context,
        scope: context.scope.bind(result, result),
      });
      return { prelude: [call], value: Ir.Expression.identifier(result) };
    }
    case "binary":
      return lowerBinary(expression, context);
  }
}

function lowerBinary(
  expression: Source.Expression.Binary,
  context: Context,
): Lowered<Ir.Expression> {
  const { left, right } = expression;
  switch (expression.operator) {
    case "add": {
      const lhs = lowerExpression(left, context);
      const rhs = lowerExpression(right, context);
      return {
        prelude: [...lhs.prelude, ...rhs.prelude],
        value: Ir.Expression.add(lhs.value, rhs.value),
      };
    }
    case "mul":
      if (left.kind === "integer") {
        return multiplyByConstant(left.value, right, expression, context);
      }
      if (right.kind === "integer") {
        return multiplyByConstant(right.value, left, expression, context);
      }
      return lowerBuiltin("*", expression, context);
    case "div":
      return lowerBuiltin("/", expression, context);
    case "mod":
      return lowerBuiltin("%", expression, context);
  }
}

function lowerBuiltin(
  name: "*" | "/" | "%",
  { left, right }: Source.Expression.Binary,
  context: Context,
): Lowered<Ir.Expression> {
  return lowerExpression(Source.Expression.call(name, [left, right]), context);
}

/**
 * n * e becomes e + (e + (... + e)) with n copies of e
 */
function multiplyByConstant(
  factor: number,
  operand: Source.Expression,
  expression: Source.Expression.Binary,
  context: Context,
): Lowered<Ir.Expression> {
  if (factor === 0) {
    // still resolve the operand so undefined names are reported
    lowerExpression(operand, context);
    return { prelude: [], value: Ir.Expression.integer(0) };
  }
  if (factor < 0 || factor > UNROLL_LIMIT) {
    return lowerBuiltin("*", expression, context);
  }

  let sum: Source.Expression = operand;
  for (let copies = 1; copies < factor; copies++) {
    sum = Source.Expression.binary(operand, "add", sum);
  }
  return lowerExpression(sum, context);
}

export function lowerCondition(
  condition: Source.Condition,
  context: Context,
): Lowered<Ir.Condition> {
  switch (condition.kind) {
    case "compare": {
      const greater = context.names.next();
      const less = context.names.next();
      const lhs = lowerExpression(condition.left, context);
      const rhs = lowerExpression(condition.right, context);
      return {
        prelude: [
          ...lhs.prelude,
          ...rhs.prelude,
          Ir.Instruction.assign(greater, lhs.value, null),
          Ir.Instruction.assign(less, rhs.value, null),
          Ir.Instruction.compare(greater, less, null),
        ],
        value: relate(condition.relation, greater, less),
      };
    }
    case "and":
    case "or": {
      const lhs = lowerCondition(condition.left, context);
      const rhs = lowerCondition(condition.right, context);
      const combine =
        condition.kind === "and" ? Ir.Condition.and : Ir.Condition.or;
      return {
        prelude: [...lhs.prelude, ...rhs.prelude],
        value: combine(lhs.value, rhs.value),
      };
    }
    case "not": {
      const operand = lowerCondition(condition.operand, context);
      return {
        prelude: operand.prelude,
        value: Ir.Condition.not(operand.value),
      };
    }
    case "flag":
      throw InlinerError.sourceFlag(condition.name);
  }
}

/**
 * Encode a relation over the flags of `compare greater, less`: flag
 * `greater` is set when lhs > rhs, flag `less` when lhs < rhs, never both.
 */
export function relate(
  relation: Source.Condition.Relation,
  greater: string,
  less: string,
): Ir.Condition {
  const gt = Ir.Condition.flag(greater);
  const lt = Ir.Condition.flag(less);
  switch (relation) {
    case "eq":
      return Ir.Condition.and(Ir.Condition.not(gt), Ir.Condition.not(lt));
    case "neq":
      return Ir.Condition.or(gt, lt);
    case "lt":
      return lt;
    case "lte":
      return Ir.Condition.not(gt);
    case "gt":
      return gt;
    case "gte":
      return Ir.Condition.not(lt);
  }
}
