/**
 * In-memory module dependency graph.
 * An edge `from -> to` means "from depends on to".
 */
export type ModuleGraph = ReadonlyMap<string, readonly string[]>;

/**
 * A directed edge, used as a set element when collecting edges
 */
export interface Edge {
  from: string;
  to: string;
}

/**
 * Build a graph from edge pairs, keeping first-seen successor order
 * and collapsing repeated edges
 */
export function createModuleGraph(
  edges: Iterable<readonly [string, string]>,
): ModuleGraph {
  const graph = new Map<string, string[]>();
  const seen = new Set<string>();

  for (const [from, to] of edges) {
    const key = edgeKey({ from, to });
    if (seen.has(key)) continue;
    seen.add(key);

    const successors = graph.get(from);
    if (successors) {
      successors.push(to);
    } else {
      graph.set(from, [to]);
    }
  }

  return graph;
}

export function successorsOf(
  graph: ModuleGraph,
  node: string,
): readonly string[] {
  return graph.get(node) ?? [];
}

/**
 * Every node that appears in the graph, as a key or as a successor,
 * in first-seen order
 */
export function graphNodes(graph: ModuleGraph): string[] {
  const nodes = new Set<string>();
  for (const [from, successors] of graph) {
    nodes.add(from);
    for (const to of successors) {
      nodes.add(to);
    }
  }
  return [...nodes];
}

export function hasNode(graph: ModuleGraph, node: string): boolean {
  if (graph.has(node)) return true;
  for (const successors of graph.values()) {
    if (successors.includes(node)) return true;
  }
  return false;
}

// NUL cannot appear in a module path, so the key is unambiguous
export function edgeKey(edge: Edge): string {
  return `${edge.from}\u0000${edge.to}`;
}

export function compareEdges(a: Edge, b: Edge): number {
  if (a.from !== b.from) return a.from < b.from ? -1 : 1;
  if (a.to !== b.to) return a.to < b.to ? -1 : 1;
  return 0;
}
