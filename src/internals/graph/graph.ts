import { OrderedSet } from "../orderedSet";

/**
 * Identifiers of graph nodes. Only primitives are allowed so that equal
 * identifiers are the same map key.
 */
export type NodeValue = string | number;

/**
 * An edge as it is reported to the user. `label` is `undefined` for
 * unlabeled edges.
 */
export type GraphEdge<N extends NodeValue, L extends string> = {
  src: N;
  dst: N;
  label: L | undefined;
};

/**
 * State of the latest depth-first search.
 */
type SearchState<N extends NodeValue> = {
  /** Node the search was started from, `undefined` for a search over all nodes. */
  root: N | undefined;
  begin: Map<N, number>;
  end: Map<N, number>;
  counter: number;
  cycles: N[][];
  /** Maps each discovered node to the node it was discovered from. */
  backpath: Map<N, N>;
};

/**
 * Directed graph with labeled multi-edges used to analyze dependencies
 * between tables.
 *
 * Two edges between the same pair of nodes are distinct iff their labels
 * differ. The results of a depth-first search are cached until the next
 * mutation.
 */
export class Graph<N extends NodeValue = string, L extends string = string> {
  protected nodes: OrderedSet<N> = OrderedSet.from<N>();
  /** src -> dst -> labels of the edges between them */
  protected edges = new Map<N, Map<N, Set<L | undefined>>>();
  private search: SearchState<N> | undefined = undefined;

  /**
   * Creates an empty graph of the same kind. Used by `union`.
   */
  protected emptyLike(): Graph<N, L> {
    return new Graph<N, L>();
  }

  /**
   * Drops the cached search results.
   */
  protected invalidate(): void {
    this.search = undefined;
  }

  /**
   * Number of nodes plus the number of edges.
   */
  public size(): number {
    let edges = 0;
    this.forEachEdge(() => edges++);
    return this.nodes.size + edges;
  }

  public isEmpty(): boolean {
    return this.size() === 0;
  }

  /**
   * Adds node `node` to the graph.
   * @returns `true` iff the node was not present before.
   */
  public addNode(node: N): boolean {
    const added = this.nodes.add(node);
    if (added) this.invalidate();
    return added;
  }

  /**
   * Deletes node `node` and all the edges incident to it.
   */
  public deleteNode(node: N): void {
    if (!this.nodes.discard(node)) {
      return;
    }
    this.edges.delete(node);
    for (const [src, targets] of this.edges) {
      targets.delete(node);
      if (targets.size === 0) this.edges.delete(src);
    }
    this.invalidate();
  }

  /**
   * Adds an edge from `src` to `dst` with label `label`. Also adds the nodes.
   */
  public addEdge(src: N, dst: N, label?: L): void {
    this.addNode(src);
    this.addNode(dst);
    this.linkEdge(src, dst, label);
  }

  /**
   * Records the edge itself. Both nodes must already be present.
   */
  protected linkEdge(src: N, dst: N, label: L | undefined): void {
    let targets = this.edges.get(src);
    if (targets === undefined) {
      targets = new Map();
      this.edges.set(src, targets);
    }
    let labels = targets.get(dst);
    if (labels === undefined) {
      labels = new Set();
      targets.set(dst, labels);
    }
    labels.add(label);
    this.invalidate();
  }

  /**
   * Deletes the edge from `src` to `dst` with label `label`.
   * The label must match exactly, `undefined` included. Nodes are kept.
   */
  public deleteEdge(src: N, dst: N, label?: L): void {
    const targets = this.edges.get(src);
    const labels = targets?.get(dst);
    if (targets === undefined || labels === undefined) {
      return;
    }
    if (!labels.delete(label)) {
      return;
    }
    if (labels.size === 0) targets.delete(dst);
    if (targets.size === 0) this.edges.delete(src);
    this.invalidate();
  }

  public nodeIn(node: N): boolean {
    return this.nodes.has(node);
  }

  public edgeIn(src: N, dst: N, label?: L): boolean {
    return this.edges.get(src)?.get(dst)?.has(label) ?? false;
  }

  /**
   * Number of times `node` is present: 0 or 1 for a plain graph.
   */
  public nodeCount(node: N): number {
    return this.nodeIn(node) ? 1 : 0;
  }

  /**
   * Number of times the edge is present: 0 or 1 for a plain graph.
   */
  public edgeCount(src: N, dst: N, label?: L): number {
    return this.edgeIn(src, dst, label) ? 1 : 0;
  }

  public getNodes(): N[] {
    return this.nodes.toArray();
  }

  public getEdges(): GraphEdge<N, L>[] {
    const result: GraphEdge<N, L>[] = [];
    this.forEachEdge((src, dst, label) => result.push({ src, dst, label }));
    return result;
  }

  public forEachEdge(
    callback: (src: N, dst: N, label: L | undefined) => void,
  ): void {
    for (const [src, targets] of this.edges) {
      for (const [dst, labels] of targets) {
        for (const label of labels) {
          callback(src, dst, label);
        }
      }
    }
  }

  /**
   * Returns a new graph containing the nodes and edges of both graphs.
   */
  public union(other: Graph<N, L>): Graph<N, L> {
    const result = this.emptyLike();
    result.merge(this);
    result.merge(other);
    return result;
  }

  /**
   * Adds all nodes and edges of `other` to this graph.
   * Merging an empty graph changes nothing, the cached search included.
   */
  public merge(other: Graph<N, L>): this {
    if (other.isEmpty()) {
      return this;
    }
    this.invalidate();
    for (const node of other.nodes) {
      this.addNode(node);
    }
    other.forEachEdge((src, dst, label) => this.addEdge(src, dst, label));
    return this;
  }

  /**
   * Runs depth-first search over the whole graph, recording discovery and
   * finish times for every node and the cycles found on the way.
   */
  public depthFirstSearch(): void {
    const state = this.resetSearch(undefined);
    for (const node of this.nodes) {
      if (!state.begin.has(node)) {
        this.visit(state, node);
      }
    }
  }

  /**
   * Runs depth-first search over the nodes reachable from `node`.
   */
  public depthFirstSearchNode(node: N): void {
    const state = this.resetSearch(node);
    if (this.nodes.has(node)) {
      this.visit(state, node);
    }
  }

  private resetSearch(root: N | undefined): SearchState<N> {
    this.search = {
      root,
      begin: new Map(),
      end: new Map(),
      counter: 0,
      cycles: [],
      backpath: new Map(),
    };
    return this.search;
  }

  private visit(state: SearchState<N>, start: N): void {
    const stack: [N, Iterator<N>][] = [];
    const enter = (node: N): void => {
      state.begin.set(node, state.counter++);
      stack.push([
        node,
        (this.edges.get(node) ?? new Map<N, Set<L | undefined>>()).keys(),
      ]);
    };
    enter(start);
    while (stack.length > 0) {
      const [node, targets] = stack[stack.length - 1];
      const next = targets.next();
      if (next.done === true) {
        stack.pop();
        state.end.set(node, state.counter++);
        continue;
      }
      const dst = next.value;
      if (!state.begin.has(dst)) {
        state.backpath.set(dst, node);
        enter(dst);
      } else if (!state.end.has(dst)) {
        state.cycles.push(this.constructCycle(state, node, dst));
      }
    }
  }

  /**
   * Builds the cycle closed by the back edge `from -> to`, walking the
   * discoverers of `from` until `to` is reached.
   */
  private constructCycle(state: SearchState<N>, from: N, to: N): N[] {
    const cycle = [from];
    let current = from;
    while (current !== to) {
      const prev = state.backpath.get(current);
      if (prev === undefined) break;
      cycle.push(prev);
      current = prev;
    }
    return cycle.reverse();
  }

  /**
   * Discovery and finish times of `node` in the latest search, if it was
   * visited.
   */
  public searchInterval(node: N): [number, number] | undefined {
    const begin = this.search?.begin.get(node);
    const end = this.search?.end.get(node);
    return begin === undefined || end === undefined ? undefined : [begin, end];
  }

  /**
   * Checks if there are cycles, reusing the cached search over the whole
   * graph if the graph has not changed since.
   */
  public hasCycle(): boolean {
    return this.cycles().length > 0;
  }

  /**
   * Returns the cycles found by a search over the whole graph.
   */
  public cycles(): N[][] {
    if (this.search === undefined || this.search.root !== undefined) {
      this.depthFirstSearch();
    }
    return (this.search?.cycles ?? []).map((cycle) => [...cycle]);
  }

  /**
   * Returns the nodes reachable from `node`, `node` itself included.
   * @returns `undefined` if `node` is not in the graph.
   */
  public dependencies(node: N): Set<N> | undefined {
    if (!this.nodes.has(node)) {
      return undefined;
    }
    if (this.search === undefined || this.search.root !== node) {
      this.depthFirstSearchNode(node);
    }
    const [begin, end] = this.searchInterval(node) ?? [0, -1];
    const result = new Set<N>();
    for (const other of this.nodes) {
      const interval = this.searchInterval(other);
      if (
        interval !== undefined &&
        begin <= interval[0] &&
        interval[1] <= end
      ) {
        result.add(other);
      }
    }
    return result;
  }

  /**
   * Returns the nodes with no incoming edges.
   */
  public roots(): Set<N> {
    const roots = new Set(this.nodes);
    this.forEachEdge((_src, dst) => roots.delete(dst));
    return roots;
  }

  /**
   * Assigns a stratum to every node, so that the stratum of the source of an
   * edge is not lower than the stratum of its destination, and strictly
   * higher when the edge label is one of `labels`.
   *
   * @returns `undefined` if no such assignment exists, which happens iff
   *          some cycle goes through an edge labeled with one of `labels`.
   */
  public stratification(labels: Iterable<L>): Map<N, number> | undefined {
    const stratifying = new Set<L | undefined>(labels);
    const stratum = new Map<N, number>();
    for (const node of this.nodes) {
      stratum.set(node, 1);
    }
    const limit = this.nodes.size;
    let changed = true;
    while (changed) {
      changed = false;
      for (const [src, targets] of this.edges) {
        for (const [dst, edgeLabels] of targets) {
          for (const label of edgeLabels) {
            const old = stratum.get(src) ?? 1;
            const step = stratifying.has(label) ? 1 : 0;
            const next = Math.max(old, (stratum.get(dst) ?? 1) + step);
            if (next > limit) {
              return undefined;
            }
            if (next !== old) {
              stratum.set(src, next);
              changed = true;
            }
          }
        }
      }
    }
    return stratum;
  }

  public toString(): string {
    const lines = this.getNodes().map((node) => {
      const out = this.getEdges()
        .filter((edge) => edge.src === node)
        .map((edge) =>
          edge.label === undefined
            ? `${edge.dst}`
            : `${edge.dst} [${edge.label}]`,
        );
      return `${node} -> [${out.join(", ")}]`;
    });
    return `{${lines.join(",\n")}}`;
  }
}
