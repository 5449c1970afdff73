import { successorsOf, type ModuleGraph } from "./graph.js";

export interface PathSearchOptions {
  /** Stop after this many paths in total; 0 or less means unlimited */
  maxPaths?: number;
  /** Prune paths longer than this many hops; 0 or less means unlimited */
  maxDepth?: number;
}

export interface PathSearchResult {
  paths: string[][];
  truncated: boolean;
}

/**
 * Accumulator shared by every frame of the search. One instance is owned
 * by a single search, so concurrent searches never share counters.
 */
interface PathSearchState {
  target: string;
  graph: ModuleGraph;
  reachable: ReadonlySet<string>;
  maxPaths: number;
  maxDepth: number;
  paths: string[][];
  currentPath: string[];
  onPath: Set<string>;
}

function budgetExhausted(state: PathSearchState): boolean {
  return state.maxPaths > 0 && state.paths.length >= state.maxPaths;
}

interface SearchFrame {
  node: string;
  successors: readonly string[];
  index: number;
}

/**
 * Applies the per-node checks in search order. Returns true when `node`
 * was pushed onto the current path and its successors must be explored.
 */
function enter(node: string, state: PathSearchState): boolean {
  if (node === state.target) {
    state.paths.push([...state.currentPath, node]);
    return false;
  }
  if (budgetExhausted(state)) return false;
  if (!state.reachable.has(node)) return false;
  if (state.maxDepth > 0 && state.currentPath.length >= state.maxDepth) {
    return false;
  }
  if (state.onPath.has(node)) return false;

  state.onPath.add(node);
  state.currentPath.push(node);
  return true;
}

function leave(node: string, state: PathSearchState): void {
  state.currentPath.pop();
  state.onPath.delete(node);
}

// Depth-first search with an explicit frame stack, so path length is
// bounded by memory instead of the call stack.
function visit(start: string, state: PathSearchState): void {
  if (!enter(start, state)) return;

  const stack: SearchFrame[] = [
    { node: start, successors: successorsOf(state.graph, start), index: 0 },
  ];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (budgetExhausted(state)) break;

    const next = frame.successors[frame.index];
    if (next === undefined) {
      stack.pop();
      leave(frame.node, state);
      continue;
    }
    frame.index++;

    if (!state.reachable.has(next)) continue;
    if (enter(next, state)) {
      stack.push({
        node: next,
        successors: successorsOf(state.graph, next),
        index: 0,
      });
    }
  }

  // Budget ran out mid-search: unwind the frames still open
  while (stack.length > 0) {
    const frame = stack.pop();
    if (frame) leave(frame.node, state);
  }
}

function createState(
  target: string,
  graph: ModuleGraph,
  reachable: ReadonlySet<string>,
  options: PathSearchOptions,
): PathSearchState {
  return {
    target,
    graph,
    reachable,
    maxPaths: options.maxPaths ?? 0,
    maxDepth: options.maxDepth ?? 0,
    paths: [],
    currentPath: [],
    onPath: new Set(),
  };
}

/**
 * Enumerate simple paths from start to target with a depth-first search.
 * Paths come out in the graph's successor order; use {@link sortPaths}
 * for a canonical order.
 */
export function findAllPaths(
  start: string,
  target: string,
  graph: ModuleGraph,
  reachable: ReadonlySet<string>,
  options: PathSearchOptions = {},
): string[][] {
  const state = createState(target, graph, reachable, options);
  visit(start, state);
  return state.paths;
}

/**
 * Enumerate paths from every root that can reach the target, sharing a
 * single path budget across roots
 */
export function findPathsFromRoots(
  roots: readonly string[],
  target: string,
  graph: ModuleGraph,
  reachable: ReadonlySet<string>,
  options: PathSearchOptions = {},
): PathSearchResult {
  const state = createState(target, graph, reachable, options);

  for (const root of roots) {
    if (!reachable.has(root)) continue;
    visit(root, state);
    if (budgetExhausted(state)) break;
  }

  return { paths: state.paths, truncated: budgetExhausted(state) };
}

export function formatPath(path: readonly string[]): string {
  return path.join(" -> ");
}

/**
 * Order paths shortest first, then by their joined text
 */
export function sortPaths(paths: readonly string[][]): string[][] {
  return [...paths].sort((a, b) => {
    if (a.length !== b.length) return a.length - b.length;
    const aText = formatPath(a);
    const bText = formatPath(b);
    if (aText === bText) return 0;
    return aText < bText ? -1 : 1;
  });
}
