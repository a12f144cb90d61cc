/**
 * Ir expression - the value written by an assignment
 *
 * Multiplication, division and modulo never reach the IR; lowering turns
 * them into additions or inlined builtin calls.
 */
export type Expression =
  | Expression.Identifier
  | Expression.Integer
  | Expression.Binary;

export namespace Expression {
  export interface Identifier {
    kind: "identifier";
    name: string;
  }

  export interface Integer {
    kind: "integer";
    value: number;
  }

  export interface Binary {
    kind: "binary";
    operator: "add";
    left: Expression;
    right: Expression;
  }

  export const identifier = (name: string): Identifier => ({
    kind: "identifier",
    name,
  });

  export const integer = (value: number): Integer => ({
    kind: "integer",
    value,
  });

  export const add = (left: Expression, right: Expression): Binary => ({
    kind: "binary",
    operator: "add",
    left,
    right,
  });

  /**
   * Names of the cells an expression reads
   */
  export function reads(
    expression: Expression,
    into: Set<string> = new Set(),
  ): Set<string> {
    switch (expression.kind) {
      case "identifier":
        into.add(expression.name);
        break;
      case "integer":
        break;
      case "binary":
        reads(expression.left, into);
        reads(expression.right, into);
        break;
    }
    return into;
  }
}
