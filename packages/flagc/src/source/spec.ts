/**
 * Source tree for the input language
 *
 * The tree is produced by an external parser. Every node is a plain object
 * discriminated by its `kind` field, so a tree can travel as YAML or JSON and
 * be checked back into shape with the guards below.
 */

export type Statement =
  | Statement.Sequence
  | Statement.Function
  | Statement.Conditional
  | Statement.Loop
  | Statement.Binding
  | Statement.Assign
  | Statement.Return
  | Statement.Nop;

export namespace Statement {
  export interface Sequence {
    kind: "sequence";
    first: Statement;
    second: Statement;
  }

  export const sequence = (first: Statement, second: Statement): Sequence => ({
    kind: "sequence",
    first,
    second,
  });

  /**
   * Function definition. The name is visible in `rest` only, never inside
   * its own body.
   */
  export interface Function {
    kind: "function";
    name: string;
    parameters: string[];
    body: Statement;
    rest: Statement;
  }

  export const define = (
    name: string,
    parameters: string[],
    body: Statement,
    rest: Statement,
  ): Function => ({ kind: "function", name, parameters, body, rest });

  export interface Conditional {
    kind: "conditional";
    condition: Condition;
    consequent: Statement;
    alternative: Statement;
  }

  export const conditional = (
    condition: Condition,
    consequent: Statement,
    alternative: Statement = nop(),
  ): Conditional => ({
    kind: "conditional",
    condition,
    consequent,
    alternative,
  });

  export interface Loop {
    kind: "loop";
    condition: Condition;
    body: Statement;
  }

  export const loop = (condition: Condition, body: Statement): Loop => ({
    kind: "loop",
    condition,
    body,
  });

  /**
   * Scoped binding: `name` holds `initializer` for the duration of `rest`
   * and shadows any outer binding of the same name.
   */
  export interface Binding {
    kind: "binding";
    name: string;
    initializer: Expression;
    rest: Statement;
  }

  export const bind = (
    name: string,
    initializer: Expression,
    rest: Statement,
  ): Binding => ({ kind: "binding", name, initializer, rest });

  export interface Assign {
    kind: "assign";
    names: string[];
    value: Expression;
  }

  export const assign = (names: string[], value: Expression): Assign => ({
    kind: "assign",
    names,
    value,
  });

  export interface Return {
    kind: "return";
    values: Expression[];
  }

  export const ret = (values: Expression[]): Return => ({
    kind: "return",
    values,
  });

  export interface Nop {
    kind: "nop";
  }

  export const nop = (): Nop => ({ kind: "nop" });

  /**
   * Right-nested sequence of the given statements
   */
  export function block(...statements: Statement[]): Statement {
    const last = statements.at(-1);
    if (!last) {
      return nop();
    }
    return statements
      .slice(0, -1)
      .reduceRight<Statement>(
        (rest, statement) => sequence(statement, rest),
        last,
      );
  }
}

export type Expression =
  | Expression.Identifier
  | Expression.Integer
  | Expression.Binary
  | Expression.Call;

export namespace Expression {
  export interface Identifier {
    kind: "identifier";
    name: string;
  }

  export const identifier = (name: string): Identifier => ({
    kind: "identifier",
    name,
  });

  export interface Integer {
    kind: "integer";
    value: number;
  }

  export const integer = (value: number): Integer => ({
    kind: "integer",
    value,
  });

  export const operators = ["add", "mul", "div", "mod"] as const;
  export type Operator = (typeof operators)[number];

  export interface Binary {
    kind: "binary";
    left: Expression;
    operator: Operator;
    right: Expression;
  }

  export const binary = (
    left: Expression,
    operator: Operator,
    right: Expression,
  ): Binary => ({ kind: "binary", left, operator, right });

  export interface Call {
    kind: "call";
    callee: string;
    arguments: Expression[];
  }

  export const call = (callee: string, args: Expression[]): Call => ({
    kind: "call",
    callee,
    arguments: args,
  });
}

export type Condition =
  | Condition.Compare
  | Condition.And
  | Condition.Or
  | Condition.Not
  | Condition.Flag;

export namespace Condition {
  export const relations = ["eq", "neq", "lt", "lte", "gt", "gte"] as const;
  export type Relation = (typeof relations)[number];

  export interface Compare {
    kind: "compare";
    left: Expression;
    relation: Relation;
    right: Expression;
  }

  export const compare = (
    left: Expression,
    relation: Relation,
    right: Expression,
  ): Compare => ({ kind: "compare", left, relation, right });

  export interface And {
    kind: "and";
    left: Condition;
    right: Condition;
  }

  export const and = (left: Condition, right: Condition): And => ({
    kind: "and",
    left,
    right,
  });

  export interface Or {
    kind: "or";
    left: Condition;
    right: Condition;
  }

  export const or = (left: Condition, right: Condition): Or => ({
    kind: "or",
    left,
    right,
  });

  export interface Not {
    kind: "not";
    operand: Condition;
  }

  export const not = (operand: Condition): Not => ({ kind: "not", operand });

  /**
   * Reference to a boolean flag. Flags only exist in the IR; the lowering
   * rejects one found in a source tree.
   */
  export interface Flag {
    kind: "flag";
    name: string;
  }

  export const flag = (name: string): Flag => ({ kind: "flag", name });
}

// Structural guards for trees that arrive as untyped data

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && !!value && !Array.isArray(value);

const isName = (value: unknown): value is string =>
  typeof value === "string" && value.length > 0;

const isNameList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every(isName);

const isOneOf = <T extends string>(
  options: readonly T[],
  value: unknown,
): value is T => options.some((option) => option === value);

export const isExpression = (node: unknown): node is Expression => {
  if (!isObject(node)) {
    return false;
  }
  switch (node.kind) {
    case "identifier":
      return isName(node.name);
    case "integer":
      return Number.isSafeInteger(node.value);
    case "binary":
      return (
        isOneOf(Expression.operators, node.operator) &&
        isExpression(node.left) &&
        isExpression(node.right)
      );
    case "call":
      return (
        isName(node.callee) &&
        Array.isArray(node.arguments) &&
        node.arguments.every(isExpression)
      );
    default:
      return false;
  }
};

export const isCondition = (node: unknown): node is Condition => {
  if (!isObject(node)) {
    return false;
  }
  switch (node.kind) {
    case "compare":
      return (
        isOneOf(Condition.relations, node.relation) &&
        isExpression(node.left) &&
        isExpression(node.right)
      );
    case "and":
    case "or":
      return isCondition(node.left) && isCondition(node.right);
    case "not":
      return isCondition(node.operand);
    case "flag":
      return isName(node.name);
    default:
      return false;
  }
};

export const isStatement = (node: unknown): node is Statement => {
  if (!isObject(node)) {
    return false;
  }
  switch (node.kind) {
    case "sequence":
      return isStatement(node.first) && isStatement(node.second);
    case "function":
      return (
        isName(node.name) &&
        isNameList(node.parameters) &&
        isStatement(node.body) &&
        isStatement(node.rest)
      );
    case "conditional":
      return (
        isCondition(node.condition) &&
        isStatement(node.consequent) &&
        isStatement(node.alternative)
      );
    case "loop":
      return isCondition(node.condition) && isStatement(node.body);
    case "binding":
      return (
        isName(node.name) &&
        isExpression(node.initializer) &&
        isStatement(node.rest)
      );
    case "assign":
      return isNameList(node.names) && isExpression(node.value);
    case "return":
      return Array.isArray(node.values) && node.values.every(isExpression);
    case "nop":
      return true;
    default:
      return false;
  }
};
