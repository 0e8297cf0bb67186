import { RuleTheory } from "./theory";
import { TheoryLookup } from "../datalog/validator";
import { ExecutionException } from "../exceptions";

/**
 * Named collection of sibling theories.
 *
 * Theories registered here get the registry as their `theories` lookup, so
 * their checks can see the tables defined by their siblings.
 */
export class TheoryRegistry implements TheoryLookup, Iterable<RuleTheory> {
  private theories = new Map<string, RuleTheory>();

  /**
   * Registers `theory` under its name.
   * @throws If the theory has no name or the name is already taken.
   */
  public add(theory: RuleTheory): RuleTheory {
    if (theory.name === undefined) {
      throw ExecutionException.make("Cannot register a theory without a name");
    }
    if (this.theories.has(theory.name)) {
      throw ExecutionException.make(
        `Theory ${theory.name} is already defined`,
      );
    }
    theory.theories = this;
    this.theories.set(theory.name, theory);
    return theory;
  }

  public get(name: string): RuleTheory | undefined {
    return this.theories.get(name);
  }

  public has(name: string): boolean {
    return this.theories.has(name);
  }

  public delete(name: string): boolean {
    return this.theories.delete(name);
  }

  public names(): string[] {
    return [...this.theories.keys()];
  }

  public entries(): [string, RuleTheory][] {
    return [...this.theories.entries()];
  }

  public arity(table: string, theory: string): number | undefined {
    return this.theories.get(theory)?.arity(table);
  }

  public [Symbol.iterator](): Iterator<RuleTheory> {
    return this.theories.values();
  }
}
