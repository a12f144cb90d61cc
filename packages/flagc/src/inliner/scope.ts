/**
 * Renaming scope used while lowering
 *
 * Maps each visible source name to the cell that holds it in the IR, and
 * records where the active call site wants each returned value. Scopes are
 * never modified: every extension returns a new scope, so a binding made
 * while lowering one branch is never seen by a sibling.
 */

import { Error as InlinerError } from "./errors.js";

export class Scope {
  private constructor(
    private readonly variables: ReadonlyMap<string, string>,
    private readonly slots: readonly string[],
  ) {}

  /**
   * Top-level scope: `names` and `results` are bound to themselves, and
   * return slot `i` writes `results[i]`
   */
  static root(
    names: Iterable<string> = [],
    results: readonly string[] = [],
  ): Scope {
    const variables = new Map<string, string>();
    for (const name of [...names, ...results]) {
      variables.set(name, name);
    }
    return new Scope(variables, [...results]);
  }

  has(name: string): boolean {
    return this.variables.has(name);
  }

  resolve(name: string): string {
    const target = this.variables.get(name);
    if (target === undefined) {
      throw InlinerError.undefinedVariable(name);
    }
    return target;
  }

  bind(name: string, target: string): Scope {
    return new Scope(new Map(this.variables).set(name, target), this.slots);
  }

  /**
   * Scope for the body of an inlined call. Parameters are bound on top of
   * the caller's names; the caller's own return slots are replaced.
   */
  enterCall(
    parameters: Iterable<readonly [string, string]>,
    slots: readonly string[],
  ): Scope {
    const variables = new Map(this.variables);
    for (const [name, target] of parameters) {
      variables.set(name, target);
    }
    return new Scope(variables, [...slots]);
  }

  /**
   * Cell receiving the `index`-th returned value, if the call site keeps it
   */
  slot(index: number): string | undefined {
    return this.slots[index];
  }
}
