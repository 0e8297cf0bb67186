export { Graph, GraphEdge, NodeValue } from "./graph";
export { BagGraph } from "./bagGraph";
