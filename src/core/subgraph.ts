import {
  compareEdges,
  edgeKey,
  successorsOf,
  type Edge,
  type ModuleGraph,
} from "./graph.js";

export interface PathSubgraph {
  nodes: Set<string>;
  edges: Edge[];
}

type VisitState = "unvisited" | "active" | "finished";

interface DfsFrame {
  node: string;
  successors: readonly string[];
  index: number;
}

/**
 * Compute the nodes and edges lying on any route from a start node to the
 * target in O(V+E), without enumerating the routes.
 *
 * `reachable` is the target's reachability set from `computeReachability`.
 * Back-edges closing a cycle are dropped, so the returned edges form a DAG.
 * Edges come back sorted by source, then destination.
 */
export function computeSubgraph(
  startNodes: readonly string[],
  graph: ModuleGraph,
  reachable: ReadonlySet<string>,
): PathSubgraph {
  // Forward BFS from the start nodes, staying inside the reachability set
  const nodes = new Set<string>();
  const queue: string[] = [];
  for (const start of startNodes) {
    if (reachable.has(start) && !nodes.has(start)) {
      nodes.add(start);
      queue.push(start);
    }
  }
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (current === undefined) break;

    for (const next of successorsOf(graph, current)) {
      if (reachable.has(next) && !nodes.has(next)) {
        nodes.add(next);
        queue.push(next);
      }
    }
  }

  // Restrict to edges between subgraph nodes, sorted for deterministic DFS
  const sortedNodes = [...nodes].sort();
  const adjacency = new Map<string, string[]>();
  for (const from of sortedNodes) {
    const successors = [
      ...new Set(successorsOf(graph, from).filter((to) => nodes.has(to))),
    ].sort();
    adjacency.set(from, successors);
  }

  const state = new Map<string, VisitState>();
  const edges = new Map<string, Edge>();

  const addEdge = (from: string, to: string): void => {
    const edge = { from, to };
    edges.set(edgeKey(edge), edge);
  };

  // Three-color DFS with an explicit frame stack
  for (const root of sortedNodes) {
    if ((state.get(root) ?? "unvisited") !== "unvisited") continue;

    state.set(root, "active");
    const stack: DfsFrame[] = [
      { node: root, successors: adjacency.get(root) ?? [], index: 0 },
    ];
    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const next = frame.successors[frame.index];
      if (next === undefined) {
        state.set(frame.node, "finished");
        stack.pop();
        continue;
      }
      frame.index++;

      switch (state.get(next) ?? "unvisited") {
        case "unvisited":
          addEdge(frame.node, next);
          state.set(next, "active");
          stack.push({
            node: next,
            successors: adjacency.get(next) ?? [],
            index: 0,
          });
          break;
        case "active":
          // Back-edge: skip to keep the picture acyclic
          break;
        case "finished":
          addEdge(frame.node, next);
          break;
      }
    }
  }

  return { nodes, edges: [...edges.values()].sort(compareEdges) };
}
