import {
  Atom,
  Constant,
  Event,
  Formula,
  Literal,
  Location,
  Rule,
  Term,
  Variable,
} from "./syntax";

export function variable(name: string): Variable {
  return { kind: "variable", name };
}

export function constant(value: string | number): Constant {
  return { kind: "constant", value };
}

/**
 * Creates an atom. Plain strings and numbers become constants.
 */
export function atom(
  table: string,
  args: (Term | string | number)[] = [],
  {
    theory = undefined,
    location = undefined,
  }: Partial<{ theory: string; location: Location }> = {},
): Atom {
  return {
    kind: "atom",
    table,
    args: args.map((arg) => (typeof arg === "object" ? arg : constant(arg))),
    ...(theory === undefined ? {} : { theory }),
    ...(location === undefined ? {} : { location }),
  };
}

export function literal(value: Atom, negated: boolean = false): Literal {
  return { kind: "literal", atom: value, negated };
}

/**
 * Creates a negated body literal.
 */
export function not(value: Atom): Literal {
  return literal(value, true);
}

/**
 * Creates a rule. Atoms given in the body become positive literals.
 */
export function rule(
  head: Atom,
  body: (Literal | Atom)[] = [],
  location?: Location,
): Rule {
  return {
    kind: "rule",
    head,
    body: body.map((entry) =>
      entry.kind === "literal" ? entry : literal(entry),
    ),
    ...(location === undefined ? {} : { location }),
  };
}

/**
 * Creates a ground fact, e.g. `fact("p", [1, "a"])`.
 */
export function fact(
  table: string,
  values: (string | number)[],
  location?: Location,
): Atom {
  return atom(table, values, location === undefined ? {} : { location });
}

export function insertEvent(formula: Formula): Event {
  return { formula, insert: true };
}

export function deleteEvent(formula: Formula): Event {
  return { formula, insert: false };
}
