import { Graph, NodeValue } from "./graph";

/**
 * A graph with bag semantics for nodes and edges.
 *
 * Keeps track of the number of times each node and edge has been inserted.
 * A node or an edge is removed from the graph only once it has been deleted
 * the same number of times it was inserted. Deletions of absent nodes and
 * edges are ignored.
 */
export class BagGraph<
  N extends NodeValue = string,
  L extends string = string,
> extends Graph<N, L> {
  private nodeRefcounts = new Map<N, number>();
  /** src -> dst -> label -> counter */
  private edgeRefcounts = new Map<N, Map<N, Map<L | undefined, number>>>();

  protected override emptyLike(): Graph<N, L> {
    return new BagGraph<N, L>();
  }

  public override addNode(node: N): boolean {
    const added = super.addNode(node);
    this.nodeRefcounts.set(node, (this.nodeRefcounts.get(node) ?? 0) + 1);
    this.invalidate();
    return added;
  }

  /**
   * Decrements the counter of `node`, removing it when it reaches zero.
   */
  public override deleteNode(node: N): void {
    const count = this.nodeRefcounts.get(node);
    if (count === undefined) {
      return;
    }
    this.invalidate();
    if (count > 1) {
      this.nodeRefcounts.set(node, count - 1);
      return;
    }
    this.nodeRefcounts.delete(node);
    this.dropIncidentEdgeCounts(node);
    super.deleteNode(node);
  }

  /**
   * Forgets the counters of the edges that disappear together with `node`.
   */
  private dropIncidentEdgeCounts(node: N): void {
    this.edgeRefcounts.delete(node);
    for (const [src, targets] of this.edgeRefcounts) {
      targets.delete(node);
      if (targets.size === 0) this.edgeRefcounts.delete(src);
    }
  }

  /**
   * Adds an edge and increments the counters of both of its nodes.
   */
  public override addEdge(src: N, dst: N, label?: L): void {
    super.addEdge(src, dst, label);
    this.countEdge(src, dst, label, 1);
  }

  private countEdge(src: N, dst: N, label: L | undefined, by: number): void {
    let targets = this.edgeRefcounts.get(src);
    if (targets === undefined) {
      targets = new Map();
      this.edgeRefcounts.set(src, targets);
    }
    let labels = targets.get(dst);
    if (labels === undefined) {
      labels = new Map();
      targets.set(dst, labels);
    }
    labels.set(label, (labels.get(label) ?? 0) + by);
  }

  /**
   * Decrements the counter of the edge. If the edge exists, the counters
   * of both of its nodes are decremented as well.
   */
  public override deleteEdge(src: N, dst: N, label?: L): void {
    const targets = this.edgeRefcounts.get(src);
    const labels = targets?.get(dst);
    const count = labels?.get(label);
    if (targets === undefined || labels === undefined || count === undefined) {
      return;
    }
    if (count > 1) {
      labels.set(label, count - 1);
      this.invalidate();
    } else {
      labels.delete(label);
      if (labels.size === 0) targets.delete(dst);
      if (targets.size === 0) this.edgeRefcounts.delete(src);
      super.deleteEdge(src, dst, label);
    }
    this.deleteNode(src);
    this.deleteNode(dst);
  }

  public override nodeIn(node: N): boolean {
    return this.nodeRefcounts.has(node);
  }

  public override edgeIn(src: N, dst: N, label?: L): boolean {
    return this.edgeCount(src, dst, label) > 0;
  }

  public override nodeCount(node: N): number {
    return this.nodeRefcounts.get(node) ?? 0;
  }

  public override edgeCount(src: N, dst: N, label?: L): number {
    return this.edgeRefcounts.get(src)?.get(dst)?.get(label) ?? 0;
  }

  /**
   * Sum of all node and edge counters.
   */
  public override size(): number {
    let total = 0;
    for (const count of this.nodeRefcounts.values()) total += count;
    this.forEachEdge((src, dst, label) => {
      total += this.edgeCount(src, dst, label);
    });
    return total;
  }

  /**
   * Adds the nodes and edges of `other` keeping their multiplicities.
   * Node counters are copied as they are, since they already include the
   * edges of `other`.
   */
  public override merge(other: Graph<N, L>): this {
    if (other.isEmpty()) {
      return this;
    }
    this.invalidate();
    for (const node of other.getNodes()) {
      this.nodes.add(node);
      this.nodeRefcounts.set(
        node,
        this.nodeCount(node) + other.nodeCount(node),
      );
    }
    other.forEachEdge((src, dst, label) => {
      this.linkEdge(src, dst, label);
      this.countEdge(src, dst, label, other.edgeCount(src, dst, label));
    });
    return this;
  }

  public override toString(): string {
    const lines = this.getNodes().map((node) => {
      const out = this.getEdges()
        .filter((edge) => edge.src === node)
        .map((edge) => {
          const label = edge.label === undefined ? "" : ` [${edge.label}]`;
          return `${edge.dst}${label} *${this.edgeCount(edge.src, edge.dst, edge.label)}`;
        });
      return `${node} *${this.nodeCount(node)} -> [${out.join(", ")}]`;
    });
    return `{${lines.join(",\n")}}`;
  }
}
