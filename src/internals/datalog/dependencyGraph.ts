import { BagGraph } from "../graph";
import { Event, Formula } from "./syntax";
import { qualifiedTable, toRule } from "./syntaxUtils";

/**
 * Label of the edges produced by negated body literals.
 */
export const NEGATION_LABEL = "-";

/**
 * Table dependency graph of a set of rules.
 *
 * Each rule contributes an edge from its head table to the table of every
 * body literal; edges of negated literals are labeled with `-`. Facts only
 * contribute their head table. Rules may be inserted several times, so the
 * graph keeps bag semantics.
 */
export class RuleDependencyGraph extends BagGraph<string, string> {
  /**
   * @param theory Name of the theory the rules belong to. Atoms carrying a
   *               theory tag are qualified with it; atoms without one are
   *               qualified with `theory` when it is set.
   */
  constructor(public readonly theory?: string) {
    super();
  }

  protected override emptyLike(): RuleDependencyGraph {
    return new RuleDependencyGraph(this.theory);
  }

  /**
   * Node name of the table `formula` defines.
   */
  public headNode(formula: Formula): string {
    return qualifiedTable(toRule(formula).head, this.theory);
  }

  public formulaInsert(formula: Formula): void {
    const rule = toRule(formula);
    const head = this.headNode(rule);
    if (rule.body.length === 0) {
      this.addNode(head);
      return;
    }
    for (const lit of rule.body) {
      this.addEdge(
        head,
        qualifiedTable(lit.atom, this.theory),
        lit.negated ? NEGATION_LABEL : undefined,
      );
    }
  }

  public formulaDelete(formula: Formula): void {
    const rule = toRule(formula);
    const head = this.headNode(rule);
    if (rule.body.length === 0) {
      this.deleteNode(head);
      return;
    }
    for (const lit of rule.body) {
      this.deleteEdge(
        head,
        qualifiedTable(lit.atom, this.theory),
        lit.negated ? NEGATION_LABEL : undefined,
      );
    }
  }

  public formulaUpdate(events: readonly Event[]): void {
    for (const event of events) {
      if (event.insert) {
        this.formulaInsert(event.formula);
      } else {
        this.formulaDelete(event.formula);
      }
    }
  }

  public copy(): RuleDependencyGraph {
    const result = new RuleDependencyGraph(this.theory);
    result.merge(this);
    return result;
  }

  /**
   * Checks whether applying `events` would introduce a cycle. This graph is
   * left unchanged.
   */
  public updateWouldCreateCycle(events: readonly Event[]): boolean {
    const updated = this.copy();
    updated.formulaUpdate(events);
    return updated.hasCycle();
  }

  public isRecursive(): boolean {
    return this.hasCycle();
  }

  /**
   * Checks that the rules can be evaluated stratum by stratum, i.e. there is
   * no recursion through an edge labeled with one of `labels`.
   */
  public isStratified(
    labels: Iterable<string> = [NEGATION_LABEL],
  ): boolean {
    return this.stratification(labels) !== undefined;
  }
}
