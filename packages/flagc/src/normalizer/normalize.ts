/**
 * Source normalization
 *
 * Rewrites a source tree so that nothing ever runs after a return:
 * sequences are made right-leaning, code following a conditional is pushed
 * into both of its branches, and statements behind a returning statement
 * are dropped.
 */

import { Statement } from "#source";

/**
 * Right-associate every sequence: (a; b); c becomes a; (b; c)
 */
export function leftify(statement: Statement): Statement {
  switch (statement.kind) {
    case "sequence": {
      const { first, second } = statement;
      if (first.kind === "sequence") {
        return leftify(
          Statement.sequence(
            first.first,
            Statement.sequence(first.second, second),
          ),
        );
      }
      return Statement.sequence(leftify(first), leftify(second));
    }
    case "function":
      return {
        ...statement,
        body: leftify(statement.body),
        rest: leftify(statement.rest),
      };
    case "loop":
      return { ...statement, body: leftify(statement.body) };
    case "conditional":
      return {
        ...statement,
        consequent: leftify(statement.consequent),
        alternative: leftify(statement.alternative),
      };
    case "binding":
      return { ...statement, rest: leftify(statement.rest) };
    case "assign":
    case "return":
    case "nop":
      return statement;
  }
}

/**
 * Move the statements that follow a conditional into both of its branches.
 *
 * The tail is duplicated even when a branch always returns; the copy is
 * removed afterwards by {@link removeDeadBranches}.
 */
export function absorbBranches(statement: Statement): Statement {
  switch (statement.kind) {
    case "sequence": {
      const { first, second } = statement;
      if (first.kind === "nop") {
        return absorbBranches(second);
      }
      if (second.kind === "nop") {
        return absorbBranches(first);
      }
      if (first.kind === "conditional") {
        const consequent = absorbBranches(first.consequent);
        const alternative = absorbBranches(first.alternative);
        const tail = absorbBranches(second);
        return Statement.conditional(
          first.condition,
          absorbBranches(leftify(Statement.sequence(consequent, tail))),
          absorbBranches(leftify(Statement.sequence(alternative, tail))),
        );
      }
      const head = absorbBranches(first);
      const rest = absorbBranches(second);
      // either half may have reduced to nop (e.g. `x; (nop; nop)`)
      if (head.kind === "nop") {
        return rest;
      }
      if (rest.kind === "nop") {
        return head;
      }
      return leftify(Statement.sequence(head, rest));
    }
    case "loop":
      return { ...statement, body: absorbBranches(statement.body) };
    case "binding":
      return { ...statement, rest: absorbBranches(statement.rest) };
    case "conditional":
      return {
        ...statement,
        consequent: absorbBranches(statement.consequent),
        alternative: absorbBranches(statement.alternative),
      };
    case "function":
      return {
        ...statement,
        body: absorbBranches(statement.body),
        rest: absorbBranches(statement.rest),
      };
    case "assign":
    case "return":
    case "nop":
      return statement;
  }
}

/**
 * Whether a return statement is structurally reachable inside `statement`
 */
export function returns(statement: Statement): boolean {
  switch (statement.kind) {
    case "return":
      return true;
    case "sequence":
      return returns(statement.first) || returns(statement.second);
    case "conditional":
      return returns(statement.consequent) || returns(statement.alternative);
    case "loop":
      return returns(statement.body);
    case "binding":
      return returns(statement.rest);
    case "function":
      return returns(statement.body) || returns(statement.rest);
    case "assign":
    case "nop":
      return false;
  }
}

/**
 * Drop the second half of every sequence whose first half returns.
 * Expects a tree already prepared by {@link absorbBranches}.
 */
export function removeDeadBranches(statement: Statement): Statement {
  switch (statement.kind) {
    case "sequence":
      if (returns(statement.first)) {
        return removeDeadBranches(statement.first);
      }
      return Statement.sequence(
        removeDeadBranches(statement.first),
        removeDeadBranches(statement.second),
      );
    case "loop":
      return { ...statement, body: removeDeadBranches(statement.body) };
    case "binding":
      return { ...statement, rest: removeDeadBranches(statement.rest) };
    case "conditional":
      return {
        ...statement,
        consequent: removeDeadBranches(statement.consequent),
        alternative: removeDeadBranches(statement.alternative),
      };
    case "function":
      return {
        ...statement,
        body: removeDeadBranches(statement.body),
        rest: removeDeadBranches(statement.rest),
      };
    case "assign":
    case "return":
    case "nop":
      return statement;
  }
}

/**
 * Prepare a source tree for lowering
 */
export function precompile(statement: Statement): Statement {
  return removeDeadBranches(absorbBranches(leftify(statement)));
}
