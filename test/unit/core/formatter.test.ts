import { describe, it, expect } from "vitest";
import {
  assignLayers,
  collectGraphElements,
  formatComparisonCsv,
  formatComparisonText,
  formatStatsCsv,
  formatStatsJson,
  formatStatsText,
  formatWhyDot,
  formatWhyJson,
  formatWhySvg,
  formatWhyText,
} from "../../../src/core/formatter.js";
import type {
  StatsComparison,
  StatsSnapshot,
  WhyResult,
} from "../../../src/core/types.js";

function whyResult(overrides: Partial<WhyResult> = {}): WhyResult {
  return {
    target: "D",
    found: true,
    reachable: true,
    paths: [],
    directDependents: [],
    mainModules: ["A"],
    truncated: false,
    totalPaths: 0,
    maxPaths: 1000,
    ...overrides,
  };
}

const diamondPaths = [
  { path: ["A", "C", "D"], direct: false },
  { path: ["A", "B", "D"], direct: false },
];

describe("formatWhyText", () => {
  it("should list dependents and numbered paths", () => {
    const result = whyResult({
      target: "lib-x",
      mainModules: ["app"],
      directDependents: ["app", "lib-a"],
      paths: [
        { path: ["app", "lib-x"], direct: true },
        { path: ["app", "lib-a", "lib-x"], direct: false },
      ],
      totalPaths: 2,
    });

    expect(formatWhyText(result, false)).toBe(
      [
        "Why is lib-x included?",
        "==================================================",
        "",
        "Directly depended on by (2 modules):",
        "  * app",
        "    lib-a",
        "",
        "Dependency paths (showing 2 of 2):",
        "",
        "  1. [DIRECT] app -> lib-x",
        "  2. app -> lib-a -> lib-x",
      ].join("\n"),
    );
  });

  it("should note truncated searches", () => {
    const result = whyResult({
      paths: [{ path: ["A", "D"], direct: true }],
      truncated: true,
      maxPaths: 1,
    });

    const lines = formatWhyText(result, false).split("\n");

    expect(lines.at(-1)).toBe("  (search truncated at --max-paths=1)");
  });

  it("should cap the paths shown in text output", () => {
    const paths = Array.from({ length: 3 }, (_, i) => ({
      path: ["A", `B${i}`, "D"],
      direct: false,
    }));
    const result = whyResult({ paths });

    const lines = formatWhyText(result, false, 2).split("\n");

    expect(lines).toContain("Dependency paths (showing 2 of 3):");
    expect(lines).not.toContain("  3. A -> B2 -> D");
    expect(lines.at(-1)).toBe(
      "  (showing first 2 in text output; use --output json/dot/svg for full set)",
    );
  });

  it("should report targets missing from the graph", () => {
    const result = whyResult({ found: false });

    expect(formatWhyText(result, false).split("\n").at(-1)).toBe(
      "Not found in dependency graph.",
    );
  });
});

describe("collectGraphElements", () => {
  it("should flatten paths into sorted nodes and edges", () => {
    const { nodes, edges } = collectGraphElements(
      whyResult({ paths: diamondPaths }),
    );

    expect(nodes).toEqual(["A", "B", "C", "D"]);
    expect(edges).toEqual([
      { from: "A", to: "B" },
      { from: "A", to: "C" },
      { from: "B", to: "D" },
      { from: "C", to: "D" },
    ]);
  });

  it("should prefer the pre-computed subgraph", () => {
    const { nodes, edges } = collectGraphElements(
      whyResult({
        paths: diamondPaths,
        subgraph: {
          nodes: new Set(["D", "A"]),
          edges: [{ from: "A", to: "D" }],
        },
      }),
    );

    expect(nodes).toEqual(["A", "D"]);
    expect(edges).toEqual([{ from: "A", to: "D" }]);
  });
});

describe("formatWhyDot", () => {
  it("should emit sorted, colored nodes and sorted edges", () => {
    expect(formatWhyDot(whyResult({ paths: diamondPaths }))).toBe(
      [
        "strict digraph {",
        'graph [overlap=false, label="Why: D", labelloc=t];',
        "node [shape=box, style=filled, fillcolor=white];",
        "",
        "// Nodes",
        '"A" [fillcolor="#ccffcc"];',
        '"B" [fillcolor="white"];',
        '"C" [fillcolor="white"];',
        '"D" [fillcolor="#ffffcc"];',
        "",
        "// Edges",
        '"A" -> "B";',
        '"A" -> "C";',
        '"B" -> "D";',
        '"C" -> "D";',
        "}",
      ].join("\n"),
    );
  });

  it("should be identical for the same input", () => {
    const result = whyResult({ paths: diamondPaths });

    expect(formatWhyDot(result)).toBe(formatWhyDot(result));
  });

  it("should escape quotes in identifiers", () => {
    const output = formatWhyDot(
      whyResult({
        target: 'x"y',
        paths: [{ path: ["A", 'x"y'], direct: true }],
      }),
    );

    expect(output).toContain('"x\\"y" [fillcolor="#ffffcc"];');
  });
});

describe("formatWhyJson", () => {
  it("should serialize path results", () => {
    const parsed: unknown = JSON.parse(
      formatWhyJson(whyResult({ paths: diamondPaths, totalPaths: 2 })),
    );

    expect(parsed).toMatchObject({
      target: "D",
      found: true,
      totalPaths: 2,
      paths: diamondPaths,
    });
  });

  it("should replace the subgraph with sorted nodes and edges", () => {
    const parsed: unknown = JSON.parse(
      formatWhyJson(
        whyResult({
          subgraph: {
            nodes: new Set(["D", "A"]),
            edges: [{ from: "A", to: "D" }],
          },
        }),
      ),
    );

    expect(parsed).toMatchObject({
      nodes: ["A", "D"],
      edges: [{ from: "A", to: "D" }],
    });
    expect(parsed).not.toHaveProperty("subgraph");
  });
});

describe("assignLayers", () => {
  it("should place nodes by longest distance from a source", () => {
    const layers = assignLayers(
      ["A", "B", "C", "D"],
      [
        { from: "A", to: "B" },
        { from: "A", to: "C" },
        { from: "B", to: "C" },
        { from: "C", to: "D" },
      ],
    );

    expect(Object.fromEntries(layers)).toEqual({ A: 0, B: 1, C: 2, D: 3 });
  });
});

describe("formatWhySvg", () => {
  it("should render a titled, self-contained document", () => {
    const output = formatWhySvg(whyResult({ paths: diamondPaths }));

    expect(output.startsWith('<svg xmlns="http://www.w3.org/2000/svg"')).toBe(
      true,
    );
    expect(output).toContain(">Why is D included?</text>");
    for (const node of ["A", "B", "C", "D"]) {
      expect(output).toContain(`<title>${node}</title>`);
    }
    expect(output.match(/<line /g)).toHaveLength(4);
    expect(output.endsWith("</svg>")).toBe(true);
  });

  it("should escape markup in module names", () => {
    const output = formatWhySvg(
      whyResult({
        target: "a<b>",
        paths: [{ path: ["A", "a<b>"], direct: true }],
      }),
    );

    expect(output).toContain("<title>a&lt;b&gt;</title>");
    expect(output).not.toContain("<title>a<b></title>");
  });
});

describe("stats formatting", () => {
  const snapshot: StatsSnapshot = {
    directDependencies: 2,
    transitiveDependencies: 2,
    totalDependencies: 4,
    maxDepthOfDependencies: 3,
    mainModules: ["app"],
    excludeModules: [],
  };

  it("should format text", () => {
    expect(formatStatsText(snapshot)).toBe(
      [
        "Direct Dependencies: 2",
        "Transitive Dependencies: 2",
        "Total Dependencies: 4",
        "Max Depth Of Dependencies: 3",
      ].join("\n"),
    );
  });

  it("should format JSON with counts only", () => {
    expect(JSON.parse(formatStatsJson(snapshot))).toEqual({
      directDependencies: 2,
      transitiveDependencies: 2,
      totalDependencies: 4,
      maxDepthOfDependencies: 3,
    });
  });

  it("should format CSV", () => {
    expect(formatStatsCsv(snapshot)).toBe(
      "Direct,Transitive,Total,MaxDepth\n2,2,4,3",
    );
  });

  const comparison: StatsComparison = {
    setA: "before",
    setB: "after",
    before: snapshot,
    after: { ...snapshot, directDependencies: 3, totalDependencies: 5 },
    delta: {
      directDependencies: 1,
      transitiveDependencies: 0,
      totalDependencies: 1,
      maxDepthOfDependencies: 0,
    },
    onlyInB: ["lib-z"],
  };

  it("should format comparison text with signed deltas", () => {
    expect(formatComparisonText(comparison)).toBe(
      [
        "Stats compare (before -> after)",
        "Direct Dependencies: 2 -> 3 (delta +1)",
        "Transitive Dependencies: 2 -> 2 (delta +0)",
        "Total Dependencies: 4 -> 5 (delta +1)",
        "Max Depth Of Dependencies: 3 -> 3 (delta +0)",
        "Only in after: lib-z",
      ].join("\n"),
    );
  });

  it("should format comparison CSV", () => {
    expect(formatComparisonCsv(comparison)).toBe(
      [
        "Set,Direct,Transitive,Total,MaxDepth",
        "before,2,2,4,3",
        "after,3,2,5,3",
        "Delta,1,0,1,0",
        "OnlyInafter,lib-z",
      ].join("\n"),
    );
  });
});
