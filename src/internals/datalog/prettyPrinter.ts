import { Atom, Event, Formula, Literal, Rule, Term } from "./syntax";

/**
 * Pretty-prints datalog formulas.
 */
export class DatalogPrettyPrinter {
  private constructor(private multiline: boolean) {}
  public static make({
    multiline = false,
  }: Partial<{ multiline: boolean }> = {}): DatalogPrettyPrinter {
    return new DatalogPrettyPrinter(multiline);
  }

  public prettyPrint(node: Formula | Literal | Term | Event): string {
    if (!("kind" in node)) {
      return this.ppEvent(node);
    }
    switch (node.kind) {
      case "atom":
        return this.ppAtom(node);
      case "rule":
        return this.ppRule(node);
      case "literal":
        return this.ppLiteral(node);
      case "variable":
        return node.name;
      case "constant":
        return typeof node.value === "string"
          ? JSON.stringify(node.value)
          : `${node.value}`;
    }
  }

  private ppAtom(atom: Atom): string {
    const theory = atom.theory === undefined ? "" : `${atom.theory}:`;
    const args = atom.args.map((arg) => this.prettyPrint(arg)).join(", ");
    return `${theory}${atom.table}(${args})`;
  }

  private ppLiteral(lit: Literal): string {
    return lit.negated ? `not ${this.ppAtom(lit.atom)}` : this.ppAtom(lit.atom);
  }

  private ppRule(rule: Rule): string {
    const head = this.ppAtom(rule.head);
    if (rule.body.length === 0) {
      return head;
    }
    const separator = this.multiline ? ",\n  " : ", ";
    const body = rule.body.map((lit) => this.ppLiteral(lit)).join(separator);
    return this.multiline
      ? `${head} :-\n  ${body}`
      : `${head} :- ${body}`;
  }

  private ppEvent(event: Event): string {
    return `${event.insert ? "+" : "-"}${this.prettyPrint(event.formula)}`;
  }
}

const printer = DatalogPrettyPrinter.make();

/**
 * Single-line representation of a formula, literal, term or event.
 */
export function formatFormula(node: Formula | Literal | Term | Event): string {
  return printer.prettyPrint(node);
}

/**
 * Formats a changeset as `[+p(1); -q(x) :- p(x)]`.
 */
export function formatEvents(events: readonly Event[]): string {
  return `[${events.map((event) => printer.prettyPrint(event)).join("; ")}]`;
}
