import { successorsOf, type ModuleGraph } from "./graph.js";

/**
 * A resolved chain stored as a link to the chain of its chosen successor,
 * so chains that share a tail share its storage.
 */
export interface ChainLink {
  readonly node: string;
  readonly rest: ChainLink | undefined;
  readonly length: number;
}

/**
 * Memo of fully resolved chains. A missing key means "not resolved yet",
 * which is different from a resolved chain of any length.
 */
export type ChainMemo = Map<string, ChainLink>;

interface ChainFrame {
  node: string;
  successors: readonly string[];
  index: number;
  best: ChainLink | undefined;
}

/** Flatten a memoized chain into a new array of node identifiers. */
export function chainNodes(link: ChainLink | undefined): string[] {
  const nodes: string[] = [];
  for (let current = link; current; current = current.rest) {
    nodes.push(current.node);
  }
  return nodes;
}

function linkTo(node: string, rest: ChainLink | undefined): ChainLink {
  return { node, rest, length: (rest?.length ?? 0) + 1 };
}

/**
 * Get the longest acyclic dependency chain starting from `node`.
 *
 * `activeChain` holds the ancestors of `node`. Reaching an ancestor again
 * closes a cycle: that step yields an empty chain and leaves the memo
 * untouched, so another root can still resolve the node. Ties go to the
 * first successor in stored order.
 *
 * The returned array is always a fresh copy.
 */
export function longestChain(
  node: string,
  graph: ModuleGraph,
  activeChain: readonly string[] = [],
  memo: ChainMemo = new Map(),
): string[] {
  const active = new Set(activeChain);

  // undefined: needs exploring; null: closes a cycle
  const settle = (candidate: string): ChainLink | null | undefined => {
    const cached = memo.get(candidate);
    if (cached) return cached;

    if (successorsOf(graph, candidate).length === 0) {
      const chain = linkTo(candidate, undefined);
      memo.set(candidate, chain);
      return chain;
    }

    return active.has(candidate) ? null : undefined;
  };

  const settled = settle(node);
  if (settled !== undefined) return chainNodes(settled ?? undefined);

  const stack: ChainFrame[] = [];
  const open = (candidate: string): void => {
    active.add(candidate);
    stack.push({
      node: candidate,
      successors: successorsOf(graph, candidate),
      index: 0,
      best: undefined,
    });
  };

  let result: ChainLink | undefined;
  open(node);

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    const successor = frame.successors[frame.index];

    if (successor === undefined) {
      const chain = linkTo(frame.node, frame.best);
      memo.set(frame.node, chain);
      stack.pop();
      active.delete(frame.node);

      const parent = stack[stack.length - 1];
      if (parent) {
        if (chain.length > (parent.best?.length ?? 0)) parent.best = chain;
      } else {
        result = chain;
      }
      continue;
    }
    frame.index++;

    const child = settle(successor);
    if (child === undefined) {
      open(successor);
    } else if (child && child.length > (frame.best?.length ?? 0)) {
      frame.best = child;
    }
  }

  return chainNodes(result);
}
