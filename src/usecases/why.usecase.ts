import type { DependencyOverview } from "../core/graph-source.js";
import { ConfigurationError } from "../core/errors.js";
import { hasNode } from "../core/graph.js";
import { computeReachability } from "../core/reachability.js";
import { findPathsFromRoots, sortPaths } from "../core/path-finder.js";
import { computeSubgraph } from "../core/subgraph.js";
import {
  formatWhyDot,
  formatWhyJson,
  formatWhySvg,
  formatWhyText,
} from "../core/formatter.js";
import type { WhyPath, WhyResult } from "../core/types.js";

export const DEFAULT_MAX_PATHS = 1000;

export interface WhyOptions {
  maxPaths?: number;
  maxDepth?: number;
}

export interface AnalyzeOptions {
  /**
   * "paths" enumerates individual paths (text/JSON output);
   * "subgraph" computes the path picture in linear time (DOT/SVG output)
   */
  mode?: "paths" | "subgraph";
}

export type OutputFormat = "text" | "json" | "dot" | "svg";

export class WhyUsecase {
  private maxPaths: number;
  private maxDepth: number;

  constructor(
    private overview: DependencyOverview,
    options: WhyOptions = {},
  ) {
    this.maxPaths = options.maxPaths ?? DEFAULT_MAX_PATHS;
    this.maxDepth = options.maxDepth ?? 0;
  }

  /**
   * Explain why the target module is part of the dependency graph
   */
  analyze(target: string, options: AnalyzeOptions = {}): WhyResult {
    const { mainModules, graph } = this.overview;
    if (mainModules.length === 0) {
      throw new ConfigurationError(
        "no main modules remain after exclusions; adjust --exclude-modules or --main-modules",
      );
    }

    // A main module is the root of the graph, not a dependency of it
    const result: WhyResult = {
      target,
      found: !mainModules.includes(target) && hasNode(graph, target),
      reachable: false,
      paths: [],
      directDependents: [],
      mainModules,
      truncated: false,
      totalPaths: 0,
      maxPaths: this.maxPaths,
    };
    if (!result.found) {
      return result;
    }

    // Find all modules that directly depend on target
    const dependents = new Set<string>();
    for (const [from, successors] of graph) {
      if (successors.includes(target)) dependents.add(from);
    }
    result.directDependents = [...dependents].sort();

    // Pre-compute which nodes can reach the target to prune the searches
    const reachable = computeReachability(target, graph);
    result.reachable = mainModules.some((main) => reachable.has(main));
    if (!result.reachable) {
      return result;
    }

    if (options.mode === "subgraph") {
      const subgraph = computeSubgraph(mainModules, graph, reachable);
      result.subgraph = subgraph;
      // Edge count stands in for the path count in picture headers
      result.totalPaths = subgraph.edges.length;
      return result;
    }

    const { paths, truncated } = findPathsFromRoots(
      mainModules,
      target,
      graph,
      reachable,
      { maxPaths: this.maxPaths, maxDepth: this.maxDepth },
    );

    result.paths = sortPaths(paths).map(
      (path): WhyPath => ({
        path,
        direct:
          path.length === 2 &&
          path[0] !== undefined &&
          mainModules.includes(path[0]),
      }),
    );
    result.truncated = truncated;
    result.totalPaths = result.paths.length;
    return result;
  }

  /**
   * Format an analysis result
   */
  formatResult(
    result: WhyResult,
    format: OutputFormat = "text",
    useColor = true,
  ): string {
    switch (format) {
      case "json":
        return formatWhyJson(result);
      case "dot":
        return formatWhyDot(result);
      case "svg":
        return formatWhySvg(result);
      case "text":
      default:
        return formatWhyText(result, useColor);
    }
  }
}
