import { OrderedSet } from "../orderedSet";
import { Atom, Rule, Term } from "./syntax";
import { formulaKey } from "./syntaxUtils";

type TableName = string;

/**
 * Index from a table name to the rules whose head refers to that table.
 */
export class RuleSet {
  private rules = new Map<TableName, OrderedSet<Rule, string>>();

  /**
   * Adds `rule` to `table`.
   * @returns `true` iff the rule was not already present.
   */
  public addRule(table: TableName, rule: Rule): boolean {
    let rules = this.rules.get(table);
    if (rules === undefined) {
      rules = OrderedSet.keyed<Rule, string>(formulaKey);
      this.rules.set(table, rules);
    }
    return rules.add(rule);
  }

  /**
   * Removes `rule` from `table`.
   * @returns `true` iff the rule was present.
   */
  public discardRule(table: TableName, rule: Rule): boolean {
    const rules = this.rules.get(table);
    if (rules === undefined || !rules.discard(rule)) {
      return false;
    }
    if (rules.size === 0) {
      this.rules.delete(table);
    }
    return true;
  }

  public clearTable(table: TableName): void {
    this.rules.delete(table);
  }

  public clear(): void {
    this.rules.clear();
  }

  public contains(table: TableName, rule: Rule): boolean {
    return this.rules.get(table)?.has(rule) ?? false;
  }

  /**
   * Returns the rules defining `table`.
   *
   * If `matchLiteral` is given, only the rules whose head could unify with it
   * are returned: a constant in the head must be equal to a constant at the
   * same position of the literal. Arities are not compared.
   */
  public getRules(table: TableName, matchLiteral?: Atom): Rule[] {
    const rules = this.rules.get(table);
    if (rules === undefined) {
      return [];
    }
    if (matchLiteral === undefined) {
      return rules.toArray();
    }
    if (matchLiteral.table !== table) {
      return [];
    }
    return rules
      .toArray()
      .filter((rule) => headCouldMatch(rule.head.args, matchLiteral.args));
  }

  /**
   * Tables that have at least one rule.
   */
  public keys(): TableName[] {
    return [...this.rules.keys()];
  }

  public has(table: TableName): boolean {
    return this.rules.has(table);
  }

  /**
   * Total number of rules.
   */
  get size(): number {
    let total = 0;
    for (const rules of this.rules.values()) total += rules.size;
    return total;
  }
}

function headCouldMatch(head: readonly Term[], args: readonly Term[]): boolean {
  const positions = Math.min(head.length, args.length);
  for (let i = 0; i < positions; i++) {
    const lhs = head[i];
    const rhs = args[i];
    if (
      lhs.kind === "constant" &&
      rhs.kind === "constant" &&
      lhs.value !== rhs.value
    ) {
      return false;
    }
  }
  return true;
}
