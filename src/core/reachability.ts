import type { ModuleGraph } from "./graph.js";

/**
 * Find every node with a directed path to the target, by walking the
 * reversed edges breadth-first. The target itself is always included.
 */
export function computeReachability(
  target: string,
  graph: ModuleGraph,
): ReadonlySet<string> {
  // Build reverse adjacency list
  const reverse = new Map<string, string[]>();
  for (const [from, successors] of graph) {
    for (const to of successors) {
      const predecessors = reverse.get(to);
      if (predecessors) {
        predecessors.push(from);
      } else {
        reverse.set(to, [from]);
      }
    }
  }

  const reachable = new Set<string>([target]);
  const queue: string[] = [target];
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (current === undefined) break;

    for (const previous of reverse.get(current) ?? []) {
      if (!reachable.has(previous)) {
        reachable.add(previous);
        queue.push(previous);
      }
    }
  }

  return reachable;
}
