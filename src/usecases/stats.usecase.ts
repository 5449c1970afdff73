import {
  getAllDeps,
  type DependencyOverview,
} from "../core/graph-source.js";
import { ConfigurationError } from "../core/errors.js";
import { longestChain } from "../core/longest-chain.js";
import {
  formatComparisonCsv,
  formatComparisonJson,
  formatComparisonText,
  formatStatsCsv,
  formatStatsJson,
  formatStatsText,
} from "../core/formatter.js";
import type { StatsComparison, StatsSnapshot } from "../core/types.js";

export type OutputFormat = "text" | "json" | "csv";

export interface ComparisonLabels {
  setA?: string;
  setB?: string;
}

export class StatsUsecase {
  /**
   * Count dependencies and measure the longest chain from the first
   * main module
   */
  computeStats(
    overview: DependencyOverview,
    excludeModules: string[] = [],
  ): StatsSnapshot {
    const [firstMain] = overview.mainModules;
    if (firstMain === undefined) {
      throw new ConfigurationError(
        "no main modules remain after exclusions; adjust --exclude-modules or --main-modules",
      );
    }

    const chain = longestChain(firstMain, overview.graph);

    return {
      directDependencies: overview.directDeps.length,
      transitiveDependencies: overview.transitiveDeps.length,
      totalDependencies: getAllDeps(overview).length,
      maxDepthOfDependencies: chain.length,
      mainModules: overview.mainModules,
      excludeModules,
    };
  }

  /**
   * Compare two module sets; deltas are B minus A
   */
  compareStats(
    before: DependencyOverview,
    after: DependencyOverview,
    labels: ComparisonLabels = {},
    excludeModules: string[] = [],
  ): StatsComparison {
    const beforeStats = this.computeStats(before, excludeModules);
    const afterStats = this.computeStats(after, excludeModules);
    const beforeDeps = new Set(getAllDeps(before));

    return {
      setA: labels.setA || "A",
      setB: labels.setB || "B",
      before: beforeStats,
      after: afterStats,
      delta: {
        directDependencies:
          afterStats.directDependencies - beforeStats.directDependencies,
        transitiveDependencies:
          afterStats.transitiveDependencies -
          beforeStats.transitiveDependencies,
        totalDependencies:
          afterStats.totalDependencies - beforeStats.totalDependencies,
        maxDepthOfDependencies:
          afterStats.maxDepthOfDependencies -
          beforeStats.maxDepthOfDependencies,
      },
      onlyInB: getAllDeps(after).filter((dep) => !beforeDeps.has(dep)),
    };
  }

  formatStats(snapshot: StatsSnapshot, format: OutputFormat = "text"): string {
    switch (format) {
      case "json":
        return formatStatsJson(snapshot);
      case "csv":
        return formatStatsCsv(snapshot);
      case "text":
      default:
        return formatStatsText(snapshot);
    }
  }

  formatComparison(
    comparison: StatsComparison,
    format: OutputFormat = "text",
  ): string {
    switch (format) {
      case "json":
        return formatComparisonJson(comparison);
      case "csv":
        return formatComparisonCsv(comparison);
      case "text":
      default:
        return formatComparisonText(comparison);
    }
  }
}
