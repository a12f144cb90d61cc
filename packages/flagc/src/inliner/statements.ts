/**
 * Lowering of statements, including inlining of calls
 */

import type * as Source from "#source";
import * as Ir from "#ir";

import type { Context } from "./context.js";
import { Error as InlinerError, ErrorMessages } from "./errors.js";
import { lowerCondition, lowerExpression } from "./expressions.js";

export function lowerStatement(
  statement: Source.Statement,
  context: Context,
): Ir.Untagged {
  switch (statement.kind) {
    case "nop":
      return Ir.Instruction.sequence<null>([]);

    case "function":
      return lowerStatement(statement.rest, {
        ...context,
        functions: context.functions.define(
          statement.name,
          statement.parameters,
          statement.body,
        ),
      });

    case "assign":
      if (statement.value.kind === "call") {
        return inlineCall(statement.names, statement.value, context);
      }
      return lowerAssign(statement.names, statement.value, context);

    case "return":
      return lowerReturn(statement, context);

    case "binding": {
      const { prelude, value } = lowerExpression(
        statement.initializer,
        context,
      );
      // keep the source name unless it would shadow a visible cell or
      // could be handed out later as a fresh name
      const { scope, names } = context;
      const target =
        scope.has(statement.name) || names.owns(statement.name)
          ? names.next()
          : statement.name;
      return Ir.Instruction.sequence([
        ...prelude,
        Ir.Instruction.assign(target, value, null),
        lowerStatement(statement.rest, {
          ...context,
          scope: context.scope.bind(statement.name, target),
        }),
      ]);
    }

    case "sequence":
      return Ir.Instruction.sequence([
        lowerStatement(statement.first, context),
        lowerStatement(statement.second, context),
      ]);

    case "loop": {
      const { prelude, value } = lowerCondition(statement.condition, context);
      const body = lowerStatement(statement.body, context);
      // the guard's prelude runs again after every pass through the body
      return Ir.Instruction.sequence([
        ...prelude,
        Ir.Instruction.loop(
          value,
          Ir.Instruction.sequence([body, ...prelude]),
          null,
        ),
      ]);
    }

    case "conditional": {
      const { prelude, value } = lowerCondition(statement.condition, context);
      return Ir.Instruction.sequence([
        ...prelude,
        Ir.Instruction.conditional(
          value,
          lowerStatement(statement.consequent, context),
          lowerStatement(statement.alternative, context),
          null,
        ),
      ]);
    }
  }
}

function lowerAssign(
  names: string[],
  expression: Source.Expression,
  context: Context,
): Ir.Untagged {
  if (names.length !== 1) {
    throw InlinerError.arityMismatch(
      names.join(", "),
      ErrorMessages.ASSIGNMENT_COUNT(names.length),
    );
  }
  const [name] = names;
  const { prelude, value } = lowerExpression(expression, context);
  return Ir.Instruction.sequence([
    ...prelude,
    Ir.Instruction.assign(context.scope.resolve(name), value, null),
  ]);
}

/**
 * Write each returned value into the matching slot of the active call
 * site. A value whose slot the caller does not keep is dropped together
 * with its prelude.
 */
function lowerReturn(
  statement: Source.Statement.Return,
  context: Context,
): Ir.Untagged {
  return Ir.Instruction.sequence(
    statement.values.map((expression, index) => {
      const { prelude, value } = lowerExpression(expression, context);
      const slot = context.scope.slot(index);
      if (slot === undefined) {
        return Ir.Instruction.sequence<null>([]);
      }
      return Ir.Instruction.sequence([
        ...prelude,
        Ir.Instruction.assign(slot, value, null),
      ]);
    }),
  );
}

/**
 * Inline `names := callee(arguments)`.
 *
 * Arguments are evaluated in the caller's scope into fresh cells, the
 * destinations are reset to 0, and the callee body is lowered with its
 * parameters bound to those cells and its return slots bound to the
 * destinations.
 */
export function inlineCall(
  names: string[],
  call: Source.Expression.Call,
  context: Context,
): Ir.Untagged {
  const callee = context.functions.lookup(call.callee);

  if (call.arguments.length !== callee.parameters.length) {
    throw InlinerError.arityMismatch(
      call.callee,
      ErrorMessages.ARGUMENT_COUNT(
        call.callee,
        callee.parameters.length,
        call.arguments.length,
      ),
    );
  }
  if (names.length > callee.results) {
    throw InlinerError.arityMismatch(
      call.callee,
      ErrorMessages.RESULT_COUNT(call.callee, callee.results, names.length),
    );
  }

  const cells = call.arguments.map(() => context.names.next());
  const prelude: Ir.Untagged[] = [];
  call.arguments.forEach((argument, index) => {
    const lowered = lowerExpression(argument, context);
    prelude.push(
      ...lowered.prelude,
      Ir.Instruction.assign(cells[index], lowered.value, null),
    );
  });

  const destinations = names.map((name) => context.scope.resolve(name));
  const resets = destinations.map((dest) =>
    Ir.Instruction.assign(dest, Ir.Expression.integer(0), null),
  );

  const body = lowerStatement(callee.body, {
    functions: callee.scope,
    scope: context.scope.enterCall(
      callee.parameters.map(
        (parameter, index) => [parameter, cells[index]] as const,
      ),
      destinations,
    ),
    names: context.names,
  });

  return Ir.Instruction.sequence([...prelude, ...resets, body]);
}
