/**
 * Function table
 *
 * Functions are inlined at every call, so the table keeps each body
 * together with the table that was visible where it was defined. A body
 * therefore never sees its own name or anything defined after it.
 */

import type { Statement } from "#source";

import { Error as InlinerError } from "./errors.js";

/**
 * Function supplied from outside the program, such as "*"
 */
export interface Builtin {
  name: string;
  parameters: string[];
  body: Statement;
}

export interface FunctionEntry extends Builtin {
  /** Number of return slots: the longest return list in the body */
  results: number;
  /** Functions visible from inside the body */
  scope: FunctionTable;
}

export class FunctionTable {
  private constructor(
    private readonly entries: ReadonlyMap<string, FunctionEntry>,
  ) {}

  static empty(): FunctionTable {
    return new FunctionTable(new Map());
  }

  /**
   * Table holding `builtins` in order; each may call the ones before it
   */
  static from(builtins: Iterable<Builtin>): FunctionTable {
    let table = FunctionTable.empty();
    for (const { name, parameters, body } of builtins) {
      table = table.define(name, parameters, body);
    }
    return table;
  }

  define(name: string, parameters: string[], body: Statement): FunctionTable {
    const entry: FunctionEntry = {
      name,
      parameters,
      body,
      results: countResults(body),
      scope: this,
    };
    return new FunctionTable(new Map(this.entries).set(name, entry));
  }

  lookup(name: string): FunctionEntry {
    const entry = this.entries.get(name);
    if (!entry) {
      throw InlinerError.undefinedFunction(name);
    }
    return entry;
  }

  get names(): string[] {
    return [...this.entries.keys()];
  }
}

/**
 * Longest return list reachable in a body, not counting the bodies of
 * functions defined inside it
 */
export function countResults(statement: Statement): number {
  switch (statement.kind) {
    case "return":
      return statement.values.length;
    case "sequence":
      return Math.max(
        countResults(statement.first),
        countResults(statement.second),
      );
    case "conditional":
      return Math.max(
        countResults(statement.consequent),
        countResults(statement.alternative),
      );
    case "loop":
      return countResults(statement.body);
    case "binding":
    case "function":
      return countResults(statement.rest);
    case "assign":
    case "nop":
      return 0;
  }
}
