/**
 * Source position of a formula, kept for diagnostics only.
 */
export type Location = {
  readonly file?: string;
  readonly line: number;
  readonly col: number;
};

export type Variable = {
  readonly kind: "variable";
  readonly name: string;
};

export type Constant = {
  readonly kind: "constant";
  readonly value: string | number;
};

/**
 * An argument of an atom: either bound to a constant or a free variable.
 */
export type Term = Variable | Constant;

/**
 * A table identifier applied to an ordered list of arguments.
 *
 * `theory` is set when the atom refers to a table of another theory,
 * e.g. `nova:servers(x)`.
 */
export type Atom = {
  readonly kind: "atom";
  readonly table: string;
  readonly args: readonly Term[];
  readonly theory?: string;
  readonly location?: Location;
};

/**
 * An atom with a polarity, used in rule bodies.
 */
export type Literal = {
  readonly kind: "literal";
  readonly atom: Atom;
  readonly negated: boolean;
};

/**
 * A rule `head :- body`. A rule with an empty body is a fact.
 */
export type Rule = {
  readonly kind: "rule";
  readonly head: Atom;
  readonly body: readonly Literal[];
  readonly location?: Location;
};

export type Formula = Atom | Rule;

/**
 * A single requested mutation of a theory.
 */
export type Event = {
  readonly formula: Formula;
  readonly insert: boolean;
};

/**
 * Kind tag of a theory.
 */
export type TheoryKind = "nonrecursive" | "action";
