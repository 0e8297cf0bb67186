import { Atom, Formula, Literal, Rule, Term } from "./syntax";

export function isAtom(formula: Formula): formula is Atom {
  return formula.kind === "atom";
}

export function isRule(formula: Formula): formula is Rule {
  return formula.kind === "rule";
}

/**
 * A rule with an empty body.
 */
export function isFact(rule: Rule): boolean {
  return rule.body.length === 0;
}

/**
 * Update atoms describe changes to a table: `p+(x)` inserts, `p-(x)` deletes.
 */
export function isUpdate(atom: Atom): boolean {
  return atom.table.endsWith("+") || atom.table.endsWith("-");
}

/**
 * Converts a bare atom to a rule with an empty body.
 */
export function toRule(formula: Formula): Rule {
  if (isRule(formula)) return formula;
  return {
    kind: "rule",
    head: formula,
    body: [],
    ...(formula.location === undefined ? {} : { location: formula.location }),
  };
}

/**
 * Table a formula is stored under.
 */
export function headTable(formula: Formula): string {
  return isAtom(formula) ? formula.table : formula.head.table;
}

/**
 * Table name prefixed with the theory tag, e.g. `nova:servers`.
 */
export function qualifiedTable(atom: Atom, defaultTheory?: string): string {
  const theory = atom.theory ?? defaultTheory;
  return theory === undefined ? atom.table : `${theory}:${atom.table}`;
}

type TermTuple = ["v", string] | ["c", string, string | number];
type AtomTuple = [string, string | null, TermTuple[]];

function termTuple(term: Term): TermTuple {
  return term.kind === "variable"
    ? ["v", term.name]
    : ["c", typeof term.value, term.value];
}

function atomTuple(atom: Atom): AtomTuple {
  return [atom.table, atom.theory ?? null, atom.args.map(termTuple)];
}

function literalTuple(lit: Literal): [number, AtomTuple] {
  return [lit.negated ? 1 : 0, atomTuple(lit.atom)];
}

/**
 * Canonical key of a formula. Two formulas have the same key iff they are
 * structurally equal; locations are ignored.
 */
export function formulaKey(formula: Formula): string {
  return isAtom(formula)
    ? JSON.stringify(["atom", atomTuple(formula)])
    : JSON.stringify([
        "rule",
        atomTuple(formula.head),
        formula.body.map(literalTuple),
      ]);
}

export function eqFormulas(lhs: Formula, rhs: Formula): boolean {
  return formulaKey(lhs) === formulaKey(rhs);
}

/**
 * Names of the variables occurring in `atom`, in order of first occurrence.
 */
export function atomVariables(atom: Atom): string[] {
  const names: string[] = [];
  for (const arg of atom.args) {
    if (arg.kind === "variable" && !names.includes(arg.name)) {
      names.push(arg.name);
    }
  }
  return names;
}

export function isGround(atom: Atom): boolean {
  return atom.args.every((arg) => arg.kind === "constant");
}
