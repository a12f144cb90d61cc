/**
 * Fresh name source for one lowering run
 *
 * Names are `${prefix}${n}` with `n` strictly increasing, so two calls never
 * return the same name. A run owns its generator; concurrent runs each
 * create their own.
 */
export class NameGenerator {
  private count = 0;

  constructor(private readonly prefix: string = "_") {}

  next(): string {
    this.count++;
    return `${this.prefix}${this.count}`;
  }

  /**
   * Whether `name` has the shape of a name this generator hands out, issued
   * yet or not
   */
  owns(name: string): boolean {
    return (
      name.startsWith(this.prefix) &&
      /^[0-9]+$/.test(name.slice(this.prefix.length))
    );
  }

  /** Number of names handed out so far */
  get issued(): number {
    return this.count;
  }
}
