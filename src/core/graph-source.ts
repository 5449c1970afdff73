import fs from "fs";
import path from "path";
import { load } from "js-yaml";
import { createModuleGraph, graphNodes, type ModuleGraph } from "./graph.js";
import { matchesAnyWildcard } from "./matcher.js";

/**
 * A graph as read from disk, before main-module selection and exclusions
 */
export interface GraphSource {
  graph: ModuleGraph;
  /** Main modules declared by the source, possibly empty */
  mainModules: string[];
}

export interface DependencyOverview {
  mainModules: string[];
  graph: ModuleGraph;
  directDeps: string[];
  transitiveDeps: string[];
}

export interface OverviewOptions {
  mainModules?: string[];
  excludeModules?: string[];
}

export const GRAPH_PATH_ENV = "DEPWHY_GRAPH_PATH";
const DEFAULT_GRAPH_FILE = "modgraph.txt";
const STDIN_PATH = "-";

const graphCache = new Map<string, GraphSource>();

/**
 * Strip the version suffix from a `go mod graph` field
 * e.g. "golang.org/x/net@v0.17.0" -> "golang.org/x/net"
 */
export function stripVersion(field: string): string {
  const atIndex = field.lastIndexOf("@");
  return atIndex > 0 ? field.substring(0, atIndex) : field;
}

/**
 * Parse `go mod graph` output. The first module on the left-hand side is
 * taken as the main module.
 */
export function parseModGraph(text: string): GraphSource {
  const edges: Array<[string, string]> = [];

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line) return;

    const fields = line.split(/\s+/);
    const [from, to] = fields;
    if (fields.length !== 2 || from === undefined || to === undefined) {
      throw new Error(
        `Invalid graph line ${index + 1}: expected "<module> <dependency>", got "${line}"`,
      );
    }
    edges.push([stripVersion(from), stripVersion(to)]);
  });

  const first = edges[0];
  return {
    graph: createModuleGraph(edges),
    mainModules: first ? [first[0]] : [],
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toStringList(value: unknown, field: string): string[] {
  if (!Array.isArray(value)) {
    throw new Error(`"${field}" must be a list of module paths`);
  }
  return value.map((item, index) => {
    if (typeof item !== "string" || !item) {
      throw new Error(`"${field}[${index}]" must be a non-empty string`);
    }
    return item;
  });
}

/**
 * Parse a YAML or JSON graph document:
 *
 * ```yaml
 * mainModules: [example.com/app]
 * dependencies:
 *   example.com/app: [example.com/lib]
 *   example.com/lib: []
 * ```
 */
export function parseGraphDocument(text: string): GraphSource {
  const parsed: unknown = load(text);

  if (!isRecord(parsed)) {
    throw new Error("Invalid graph document format");
  }
  if (!isRecord(parsed.dependencies)) {
    throw new Error('Missing "dependencies" mapping in graph document');
  }

  const graph = new Map<string, string[]>();
  for (const [from, successors] of Object.entries(parsed.dependencies)) {
    // An empty YAML value (`lib:`) means no dependencies
    const list =
      successors === null
        ? []
        : toStringList(successors, `dependencies.${from}`);
    graph.set(from, [...new Set(list)]);
  }

  const mainModules =
    parsed.mainModules === undefined
      ? []
      : toStringList(parsed.mainModules, "mainModules");

  return { graph, mainModules };
}

function isDocumentPath(filePath: string): boolean {
  return [".yaml", ".yml", ".json"].includes(
    path.extname(filePath).toLowerCase(),
  );
}

/**
 * Load a dependency graph from a file, or from stdin when the path is "-"
 * @param filePath - Path to the graph file (optional)
 */
export function loadGraphFile(filePath?: string): GraphSource {
  const resolvedPath =
    filePath ||
    process.env[GRAPH_PATH_ENV] ||
    path.join(process.cwd(), DEFAULT_GRAPH_FILE);

  if (resolvedPath === STDIN_PATH) {
    return parseModGraph(fs.readFileSync(0, "utf8"));
  }

  const cached = graphCache.get(resolvedPath);
  if (cached) {
    return cached;
  }

  if (!fs.existsSync(resolvedPath)) {
    throw new Error(`Graph file not found at ${resolvedPath}`);
  }

  try {
    const content = fs.readFileSync(resolvedPath, "utf8");
    const source = isDocumentPath(resolvedPath)
      ? parseGraphDocument(content)
      : parseModGraph(content);

    graphCache.set(resolvedPath, source);
    return source;
  } catch (error) {
    throw new Error(
      `Failed to load graph at ${resolvedPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

/**
 * Clear the graph cache
 */
export function clearGraphCache(): void {
  graphCache.clear();
}

function excludeFromGraph(
  graph: ModuleGraph,
  patterns: readonly string[],
): ModuleGraph {
  if (patterns.length === 0) return graph;

  const filtered = new Map<string, string[]>();
  for (const [from, successors] of graph) {
    if (matchesAnyWildcard(from, patterns)) continue;
    filtered.set(
      from,
      successors.filter((to) => !matchesAnyWildcard(to, patterns)),
    );
  }
  return filtered;
}

function forwardReachable(
  roots: readonly string[],
  graph: ModuleGraph,
): Set<string> {
  const seen = new Set(roots);
  const queue = [...roots];
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (current === undefined) break;
    for (const next of graph.get(current) ?? []) {
      if (!seen.has(next)) {
        seen.add(next);
        queue.push(next);
      }
    }
  }
  return seen;
}

/**
 * Select main modules, apply exclusions and classify dependencies as
 * direct or transitive
 */
export function buildOverview(
  source: GraphSource,
  options: OverviewOptions = {},
): DependencyOverview {
  const excludes = options.excludeModules ?? [];
  const graph = excludeFromGraph(source.graph, excludes);

  let candidates = options.mainModules ?? [];
  if (candidates.length === 0) candidates = source.mainModules;
  if (candidates.length === 0) candidates = graphNodes(source.graph).slice(0, 1);

  const mainModules = [...new Set(candidates)].filter(
    (module) => !matchesAnyWildcard(module, excludes),
  );
  const mainSet = new Set(mainModules);

  const direct = new Set<string>();
  for (const main of mainModules) {
    for (const dep of graph.get(main) ?? []) {
      if (!mainSet.has(dep)) direct.add(dep);
    }
  }

  const transitive = [...forwardReachable(mainModules, graph)].filter(
    (module) => !mainSet.has(module) && !direct.has(module),
  );

  return {
    mainModules,
    graph,
    directDeps: [...direct].sort(),
    transitiveDeps: transitive.sort(),
  };
}

/**
 * Sorted union of direct and transitive dependencies
 */
export function getAllDeps(overview: DependencyOverview): string[] {
  return [...new Set([...overview.directDeps, ...overview.transitiveDeps])].sort();
}
