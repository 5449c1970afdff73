/**
 * Shared type definitions for dependency path analysis
 */

import type { PathSubgraph } from "./subgraph.js";

/**
 * A dependency path from a main module to the target
 */
export interface WhyPath {
  path: string[];
  direct: boolean; // true if the target is a direct dependency of a main module
}

/**
 * Result of a "why is this module included" query
 */
export interface WhyResult {
  target: string;
  found: boolean;
  reachable: boolean; // false when no main module can reach the target
  paths: WhyPath[];
  directDependents: string[]; // modules that directly depend on target
  mainModules: string[];
  truncated: boolean;
  totalPaths: number;
  maxPaths: number;
  // Pre-computed picture for DOT/SVG output, avoids path enumeration
  subgraph?: PathSubgraph;
}

export interface StatsSnapshot {
  directDependencies: number;
  transitiveDependencies: number;
  totalDependencies: number;
  maxDepthOfDependencies: number;
  mainModules: string[];
  excludeModules: string[];
}

export type StatsDelta = Omit<StatsSnapshot, "mainModules" | "excludeModules">;

export interface StatsComparison {
  setA: string;
  setB: string;
  before: StatsSnapshot;
  after: StatsSnapshot;
  delta: StatsDelta;
  onlyInB: string[]; // dependencies of set B that set A does not have
}
