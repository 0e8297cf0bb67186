import { PolicyError } from "./errors";
import { Atom, Formula, Literal, Rule } from "./syntax";
import { atomVariables, isGround } from "./syntaxUtils";

/**
 * Read access to the arities of tables in a collection of theories.
 */
export interface TheoryLookup {
  /**
   * @returns Arity of `table` in theory `theory`, `undefined` if unknown.
   */
  arity(table: string, theory: string): number | undefined;
}

/**
 * Syntactic services rule theories rely on.
 */
export interface FormulaValidator {
  /**
   * Returns an equivalent formula whose body literals can be evaluated left
   * to right with every variable bound before it is used negatively.
   */
  reorderForSafety(formula: Formula): Formula;
  isAtom(formula: Formula): formula is Atom;
  /**
   * Checks that `value` is a well-formed datalog formula.
   */
  isDatalog(value: unknown): value is Formula;
  factErrors(
    atom: Atom,
    theories: TheoryLookup,
    theory: string | undefined,
  ): PolicyError[];
  ruleErrors(
    rule: Rule,
    theories: TheoryLookup,
    theory: string | undefined,
  ): PolicyError[];
  ruleHeadHasNoTheory(
    rule: Rule,
    permitHead?: (head: Atom) => boolean,
  ): PolicyError[];
  ruleNegationSafety(rule: Rule): PolicyError[];
}

/**
 * Default implementation of the syntactic checks.
 */
export class DatalogValidator implements FormulaValidator {
  public reorderForSafety(formula: Formula): Formula {
    if (formula.kind === "atom") {
      return formula;
    }
    const body = reorderBody(formula.body);
    return body.every((lit, idx) => lit === formula.body[idx])
      ? formula
      : { ...formula, body };
  }

  public isAtom(formula: Formula): formula is Atom {
    return formula.kind === "atom";
  }

  public isDatalog(value: unknown): value is Formula {
    if (!isObject(value)) return false;
    if (value.kind === "atom") return isAtomValue(value);
    if (value.kind !== "rule") return false;
    return (
      isAtomValue(value.head) &&
      Array.isArray(value.body) &&
      value.body.every(isLiteralValue)
    );
  }

  public factErrors(
    atom: Atom,
    theories: TheoryLookup,
    theory: string | undefined,
  ): PolicyError[] {
    const errors: PolicyError[] = [];
    if (!isGround(atom)) {
      errors.push(
        PolicyError.make("fact-not-ground", "Facts must be ground", atom),
      );
    }
    if (atom.theory !== undefined) {
      errors.push(
        PolicyError.make(
          "fact-has-theory",
          "Facts may not reference another theory",
          atom,
        ),
      );
    }
    errors.push(...arityErrors(atom, atom, theories, theory));
    return errors;
  }

  public ruleErrors(
    rule: Rule,
    theories: TheoryLookup,
    theory: string | undefined,
  ): PolicyError[] {
    const errors = [
      ...this.ruleHeadHasNoTheory(rule),
      ...ruleHeadSafety(rule),
      ...this.ruleNegationSafety(rule),
      ...arityErrors(rule.head, rule, theories, theory),
    ];
    for (const lit of rule.body) {
      errors.push(...arityErrors(lit.atom, rule, theories, theory));
    }
    return errors;
  }

  public ruleHeadHasNoTheory(
    rule: Rule,
    permitHead: (head: Atom) => boolean = () => false,
  ): PolicyError[] {
    if (rule.head.theory === undefined || permitHead(rule.head)) {
      return [];
    }
    return [
      PolicyError.make(
        "head-has-theory",
        `Rule head may not reference theory ${rule.head.theory}`,
        rule,
      ),
    ];
  }

  public ruleNegationSafety(rule: Rule): PolicyError[] {
    const bound = positiveVariables(rule.body);
    const unbound = new Set<string>();
    for (const lit of rule.body) {
      if (!lit.negated) continue;
      for (const name of atomVariables(lit.atom)) {
        if (!bound.has(name)) unbound.add(name);
      }
    }
    if (unbound.size === 0) {
      return [];
    }
    return [
      PolicyError.make(
        "unsafe-negation",
        `Variables in negated literals must appear in a positive literal: ${[...unbound].join(", ")}`,
        rule,
      ),
    ];
  }
}

function positiveVariables(body: readonly Literal[]): Set<string> {
  const names = new Set<string>();
  for (const lit of body) {
    if (lit.negated) continue;
    for (const name of atomVariables(lit.atom)) names.add(name);
  }
  return names;
}

function ruleHeadSafety(rule: Rule): PolicyError[] {
  const bound = positiveVariables(rule.body);
  const unbound = atomVariables(rule.head).filter((name) => !bound.has(name));
  if (unbound.length === 0) {
    return [];
  }
  return [
    PolicyError.make(
      "unsafe-head",
      `Variables in the head must appear in a positive body literal: ${unbound.join(", ")}`,
      rule,
    ),
  ];
}

/**
 * Compares the arity of `atom` with the arity of its table in the theory it
 * refers to.
 */
function arityErrors(
  atom: Atom,
  formula: Formula,
  theories: TheoryLookup,
  theory: string | undefined,
): PolicyError[] {
  const target = atom.theory ?? theory;
  if (target === undefined) {
    return [];
  }
  const expected = theories.arity(atom.table, target);
  if (expected === undefined || expected === atom.args.length) {
    return [];
  }
  return [
    PolicyError.make(
      "arity-mismatch",
      `Table ${target}:${atom.table} has arity ${expected}, but is used with ${atom.args.length} arguments`,
      formula,
    ),
  ];
}

/**
 * Moves each negated literal right after the positive literals that bind
 * its variables. Literals that never become safe keep their relative order
 * at the end.
 */
function reorderBody(body: readonly Literal[]): Literal[] {
  const bound = new Set<string>();
  const pending = [...body];
  const result: Literal[] = [];
  let progress = true;
  while (pending.length > 0 && progress) {
    progress = false;
    for (let i = 0; i < pending.length; i++) {
      const lit = pending[i];
      const ready =
        !lit.negated ||
        atomVariables(lit.atom).every((name) => bound.has(name));
      if (ready) {
        result.push(lit);
        if (!lit.negated) {
          atomVariables(lit.atom).forEach((name) => bound.add(name));
        }
        pending.splice(i, 1);
        progress = true;
        break;
      }
    }
  }
  return [...result, ...pending];
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isTermValue(value: unknown): boolean {
  if (!isObject(value)) return false;
  if (value.kind === "variable") {
    return typeof value.name === "string" && value.name !== "";
  }
  return (
    value.kind === "constant" &&
    (typeof value.value === "string" ||
      (typeof value.value === "number" && Number.isFinite(value.value)))
  );
}

function isAtomValue(value: unknown): boolean {
  return (
    isObject(value) &&
    value.kind === "atom" &&
    typeof value.table === "string" &&
    value.table !== "" &&
    (value.theory === undefined || typeof value.theory === "string") &&
    Array.isArray(value.args) &&
    value.args.every(isTermValue)
  );
}

function isLiteralValue(value: unknown): boolean {
  return (
    isObject(value) &&
    value.kind === "literal" &&
    typeof value.negated === "boolean" &&
    isAtomValue(value.atom)
  );
}
