import {
  CheckTarget,
  TheoryVariant,
  UpdateChecker,
  makeChecker,
} from "./checks";
import { RuleDependencyGraph } from "../datalog/dependencyGraph";
import { PolicyError } from "../datalog/errors";
import { formatEvents, formatFormula } from "../datalog/prettyPrinter";
import { RuleSet } from "../datalog/ruleSet";
import {
  Atom,
  Event,
  Formula,
  Literal,
  Rule,
  TheoryKind,
} from "../datalog/syntax";
import { deleteEvent, insertEvent } from "../datalog/syntaxConstructors";
import { isFact, toRule } from "../datalog/syntaxUtils";
import {
  DatalogValidator,
  FormulaValidator,
  TheoryLookup,
} from "../datalog/validator";
import { LogLevel, Logger, QuietLogger } from "../logger";
import { differenceSets } from "../util";

export type RuleTheoryOptions = Partial<{
  /** Name of the theory, used to resolve references from sibling theories. */
  name: string;
  /** Short name used in diagnostics. */
  abbr: string;
  /** Sibling theories consulted by the checks. */
  theories: TheoryLookup;
  validator: FormulaValidator;
  logger: Logger;
}>;

const NO_THEORIES: TheoryLookup = { arity: () => undefined };

/**
 * A collection of datalog rules and facts indexed by the table of their
 * heads.
 *
 * All the variants share this storage and differ only in the checker that
 * validates changesets (see `UpdateChecker`).
 *
 * Calls mutating the theory must be serialized by the caller.
 */
export class RuleTheory {
  public readonly name: string | undefined;
  public readonly abbr: string | undefined;
  public readonly kind: TheoryKind;
  public theories: TheoryLookup;
  public readonly validator: FormulaValidator;
  public logger: Logger;

  private rules = new RuleSet();
  private graph: RuleDependencyGraph;

  constructor(
    private readonly checker: UpdateChecker,
    {
      name = undefined,
      abbr = undefined,
      theories = NO_THEORIES,
      validator = new DatalogValidator(),
      logger = new QuietLogger(),
    }: RuleTheoryOptions = {},
  ) {
    this.name = name;
    this.abbr = abbr;
    this.kind = checker.kind;
    this.theories = theories;
    this.validator = validator;
    this.logger = logger;
    this.graph = new RuleDependencyGraph(name);
  }

  static nonrecursive(options: RuleTheoryOptions = {}): RuleTheory {
    return new RuleTheory(makeChecker("nonrecursive"), options);
  }

  static action(options: RuleTheoryOptions = {}): RuleTheory {
    return new RuleTheory(makeChecker("action"), options);
  }

  /**
   * A nonrecursive theory that reports no errors for any changeset.
   */
  static unsafe(options: RuleTheoryOptions = {}): RuleTheory {
    return new RuleTheory(makeChecker("unsafe"), options);
  }

  /**
   * Table dependency graph of the current contents.
   */
  get dependencyGraph(): RuleDependencyGraph {
    return this.graph;
  }

  private debug(table: string | undefined, message: () => string): void {
    if (this.logger.isEnabled(LogLevel.DEBUG)) {
      this.logger.debug(message(), table ?? this.name);
    }
  }

  /**
   * Replaces the contents of `tablenames` with `facts`.
   *
   * Tables of facts that are not listed in `tablenames` are cleared before
   * their first fact is inserted.
   */
  public initializeTables(
    tablenames: Iterable<string>,
    facts: Iterable<Atom>,
  ): void {
    const cleared = new Set<string>();
    for (const table of tablenames) {
      this.clearTable(table);
      cleared.add(table);
    }
    let count = 0;
    for (const fact of facts) {
      if (!cleared.has(fact.table)) {
        this.clearTable(fact.table);
        cleared.add(fact.table);
      }
      this.insertActual(fact);
      count++;
    }
    this.logger.info(
      `Initialized ${cleared.size} tables with ${count} facts`,
      this.name,
    );
  }

  public insert(formula: Formula): Formula[] {
    return this.update([insertEvent(formula)]).map((event) => event.formula);
  }

  public delete(formula: Formula): Formula[] {
    return this.update([deleteEvent(formula)]).map((event) => event.formula);
  }

  /**
   * Applies `events` in order.
   *
   * If an event fails, the exception is propagated and the events applied
   * before it stay applied.
   *
   * @returns The events that actually changed the theory.
   */
  public update(events: readonly Event[]): Event[] {
    this.debug(undefined, () => `Update ${formatEvents(events)}`);
    const changes: Event[] = [];
    try {
      for (const event of events) {
        const formula = this.validator.reorderForSafety(event.formula);
        const changed = event.insert
          ? this.insertActual(formula)
          : this.deleteActual(formula);
        if (changed) {
          changes.push(event);
        }
      }
    } catch (err) {
      this.logger.error(
        `Update failed after ${changes.length} changes: ${err instanceof Error ? err.message : String(err)}`,
        this.name,
      );
      throw err;
    }
    return changes;
  }

  /**
   * Returns the errors that applying `events` would cause.
   * Recursion is not checked; see `recursionErrors`.
   */
  public updateWouldCauseErrors(events: readonly Event[]): PolicyError[] {
    this.debug(
      undefined,
      () => `update_would_cause_errors ${formatEvents(events)}`,
    );
    return this.checker.check(this.checkTarget(), events);
  }

  /**
   * Returns the errors that `initializeTables(tablenames, facts)` followed
   * by `update(events)` would cause. Tables about to be replaced take their
   * arity from the first of `facts` defining them.
   */
  public initializeWouldCauseErrors(
    tablenames: Iterable<string>,
    facts: readonly Atom[],
    events: readonly Event[] = [],
  ): PolicyError[] {
    const replaced = new Map<string, number | undefined>();
    for (const table of tablenames) {
      replaced.set(table, undefined);
    }
    for (const fact of facts) {
      if (replaced.get(fact.table) === undefined) {
        replaced.set(fact.table, fact.args.length);
      }
    }
    const theories: TheoryLookup = {
      arity: (table, theory) =>
        theory === this.name && replaced.has(table)
          ? replaced.get(table)
          : this.theories.arity(table, theory),
    };
    return this.checker.check({ ...this.checkTarget(), theories }, [
      ...facts.map(insertEvent),
      ...events,
    ]);
  }

  private checkTarget(): CheckTarget {
    return {
      name: this.name,
      theories: this.theories,
      validator: this.validator,
    };
  }

  /**
   * Empties the theory and inserts `rules`.
   */
  public define(rules: Iterable<Formula>): Event[] {
    this.empty();
    return this.update([...rules].map(insertEvent));
  }

  /**
   * Deletes contents of the theory.
   *
   * @param tablenames Only the rules defining these tables are removed.
   * @param invert Remove the rules defining every table except `tablenames`.
   */
  public empty(tablenames?: Iterable<string>, invert: boolean = false): void {
    if (tablenames === undefined) {
      this.rules.clear();
      this.graph = new RuleDependencyGraph(this.name);
      return;
    }
    const toClear = invert
      ? differenceSets(new Set(this.definedTablenames()), new Set(tablenames))
      : new Set(tablenames);
    for (const table of toClear) {
      this.clearTable(table);
    }
  }

  private clearTable(table: string): void {
    for (const rule of this.rules.getRules(table)) {
      this.graph.formulaDelete(rule);
    }
    this.rules.clearTable(table);
  }

  /**
   * Rules with non-empty bodies.
   */
  public policy(): Rule[] {
    return this.content().filter((rule) => !isFact(rule));
  }

  /**
   * Arity of `table` among the rules whose head is tagged with `theory`.
   */
  public getAritySelf(table: string, theory: string): number | undefined {
    const match = this.rules
      .getRules(table)
      .find((rule) => rule.head.theory === theory);
    return match === undefined ? undefined : match.head.args.length;
  }

  /**
   * Checks membership of `formula` in the same normalized form `update`
   * stores it in.
   */
  public contains(formula: Formula): boolean {
    const rule = toRule(this.validator.reorderForSafety(formula));
    return this.rules.contains(rule.head.table, rule);
  }

  private insertActual(formula: Formula): boolean {
    const rule = toRule(formula);
    this.debug(rule.head.table, () => `Insert: ${formatFormula(rule)}`);
    const changed = this.rules.addRule(rule.head.table, rule);
    if (changed) {
      this.graph.formulaInsert(rule);
    }
    return changed;
  }

  private deleteActual(formula: Formula): boolean {
    const rule = toRule(formula);
    this.debug(rule.head.table, () => `Delete: ${formatFormula(rule)}`);
    const changed = this.rules.discardRule(rule.head.table, rule);
    if (changed) {
      this.graph.formulaDelete(rule);
    }
    return changed;
  }

  /**
   * All the rules, optionally only those defining `tablenames`.
   */
  public content(tablenames?: Iterable<string>): Rule[] {
    const tables = tablenames ?? this.rules.keys();
    const results: Rule[] = [];
    for (const table of tables) {
      results.push(...this.rules.getRules(table));
    }
    return results;
  }

  /**
   * Returns the formulas pertinent to top-down evaluation of a literal with
   * table `table`.
   */
  public headIndex(table: string, matchLiteral?: Atom): Rule[] {
    return this.rules.has(table)
      ? this.rules.getRules(table, matchLiteral)
      : [];
  }

  /**
   * Number of arguments of `table`, taken from any of its rules.
   *
   * Rules of one table are assumed to share the arity; this is not enforced.
   *
   * @returns `undefined` if `table` is not defined here.
   */
  public arity(table: string): number | undefined {
    const formulas = this.headIndex(table);
    return formulas.length === 0
      ? undefined
      : this.head(formulas[0]).args.length;
  }

  /**
   * Tables defined by at least one rule of this theory.
   */
  public definedTablenames(): string[] {
    return this.rules.keys();
  }

  /**
   * The atom to unify against for a formula returned by `headIndex`.
   */
  public head(rule: Rule): Atom {
    return rule.head;
  }

  /**
   * The literals to push onto the evaluation stack for a formula returned
   * by `headIndex`.
   */
  public body(rule: Rule): readonly Literal[] {
    return rule.body;
  }

  /**
   * Reports the cycles of the dependency graph.
   */
  public recursionErrors(): PolicyError[] {
    return this.graph.cycles().map(
      (cycle) =>
        new PolicyError(
          "recursion",
          `${this.describe()} contains recursive rules: ${[...cycle, cycle[0]].join(" -> ")}`,
          cycle,
        ),
    );
  }

  /**
   * Reports a dependency cycle through an edge labeled with one of `labels`.
   */
  public stratificationErrors(labels: Iterable<string>): PolicyError[] {
    const labelSet = [...labels];
    if (this.graph.stratification(labelSet) !== undefined) {
      return [];
    }
    return [
      new PolicyError(
        "stratification",
        `${this.describe()} is not stratified with respect to ${labelSet.map((l) => `"${l}"`).join(", ")}`,
        this.graph.toString(),
      ),
    ];
  }

  private describe(): string {
    const name = this.abbr ?? this.name;
    return name === undefined ? "Theory" : `Theory ${name}`;
  }
}

/**
 * Creates a theory of the given variant.
 */
export function createTheory(
  variant: TheoryVariant,
  options: RuleTheoryOptions = {},
): RuleTheory {
  return new RuleTheory(makeChecker(variant), options);
}
