import chalk from "chalk";
import { compareEdges, edgeKey, type Edge } from "./graph.js";
import { formatPath } from "./path-finder.js";
import type {
  StatsComparison,
  StatsDelta,
  StatsSnapshot,
  WhyResult,
} from "./types.js";

export const DEFAULT_TEXT_PATHS = 20;

const TARGET_FILL = "#ffffcc";
const MAIN_MODULE_FILL = "#ccffcc";
const DEFAULT_FILL = "white";

type Colorize = (s: string) => string;
const plain: Colorize = (s) => s;

function nodeFill(node: string, result: WhyResult): string {
  if (node === result.target) return TARGET_FILL;
  if (result.mainModules.includes(node)) return MAIN_MODULE_FILL;
  return DEFAULT_FILL;
}

/**
 * Nodes and edges to draw, taken from the pre-computed subgraph when
 * available, otherwise flattened out of the path list
 */
export function collectGraphElements(result: WhyResult): {
  nodes: string[];
  edges: Edge[];
} {
  if (result.subgraph) {
    return {
      nodes: [...result.subgraph.nodes].sort(),
      edges: [...result.subgraph.edges].sort(compareEdges),
    };
  }

  const nodes = new Set<string>();
  const edges = new Map<string, Edge>();
  for (const { path } of result.paths) {
    path.forEach((node, index) => {
      nodes.add(node);
      const previous = path[index - 1];
      if (previous !== undefined) {
        const edge = { from: previous, to: node };
        edges.set(edgeKey(edge), edge);
      }
    });
  }

  return {
    nodes: [...nodes].sort(),
    edges: [...edges.values()].sort(compareEdges),
  };
}

export function formatWhyText(
  result: WhyResult,
  useColor = true,
  textPathLimit = DEFAULT_TEXT_PATHS,
): string {
  const headerColor = useColor ? chalk.bold : plain;
  const mainColor = useColor ? chalk.green : plain;
  const directColor = useColor ? chalk.cyan : plain;
  const noteColor = useColor ? chalk.gray : plain;

  const lines: string[] = [
    headerColor(`Why is ${result.target} included?`),
    "=".repeat(50),
    "",
  ];

  if (!result.found) {
    lines.push("Not found in dependency graph.");
    return lines.join("\n");
  }

  lines.push(
    `Directly depended on by (${result.directDependents.length} modules):`,
  );
  for (const dependent of result.directDependents) {
    if (result.mainModules.includes(dependent)) {
      lines.push(`  * ${mainColor(dependent)}`);
    } else {
      lines.push(`    ${dependent}`);
    }
  }
  lines.push("");

  const pathsToShow = result.paths.slice(0, textPathLimit);
  lines.push(
    `Dependency paths (showing ${pathsToShow.length} of ${result.paths.length}):`,
  );
  lines.push("");

  pathsToShow.forEach((whyPath, index) => {
    const marker = whyPath.direct ? `${directColor("[DIRECT]")} ` : "";
    lines.push(`  ${index + 1}. ${marker}${formatPath(whyPath.path)}`);
  });

  if (result.truncated) {
    lines.push("");
    lines.push(
      noteColor(`  (search truncated at --max-paths=${result.maxPaths})`),
    );
  } else if (result.paths.length > pathsToShow.length) {
    lines.push("");
    lines.push(
      noteColor(
        `  (showing first ${textPathLimit} in text output; use --output json/dot/svg for full set)`,
      ),
    );
  }

  return lines.join("\n");
}

export function formatWhyJson(result: WhyResult): string {
  const { subgraph, ...rest } = result;
  if (!subgraph) {
    return JSON.stringify(rest, null, 2);
  }

  const { nodes, edges } = collectGraphElements(result);
  return JSON.stringify({ ...rest, nodes, edges }, null, 2);
}

function dotId(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/**
 * Graphviz DOT output, e.g. `depwhy why <module> -o dot | dot -Tsvg`
 */
export function formatWhyDot(result: WhyResult): string {
  const { nodes, edges } = collectGraphElements(result);
  const lines: string[] = [
    "strict digraph {",
    `graph [overlap=false, label=${dotId(`Why: ${result.target}`)}, labelloc=t];`,
    "node [shape=box, style=filled, fillcolor=white];",
    "",
    "// Nodes",
  ];

  for (const node of nodes) {
    lines.push(`${dotId(node)} [fillcolor="${nodeFill(node, result)}"];`);
  }
  lines.push("");

  lines.push("// Edges");
  const edgeLines = edges.map(
    (edge) => `${dotId(edge.from)} -> ${dotId(edge.to)};`,
  );
  lines.push(...edgeLines.sort());
  lines.push("}");

  return lines.join("\n");
}

// ── SVG ────────────────────────────────────────────────────────────────────

const SVG_CHAR_WIDTH = 7;
const SVG_NODE_HEIGHT = 28;
const SVG_NODE_PADDING = 12;
const SVG_MIN_NODE_WIDTH = 60;
const SVG_H_GAP = 24;
const SVG_V_GAP = 56;
const SVG_MARGIN = 20;
const SVG_TITLE_HEIGHT = 40;

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Assign each node a layer equal to its longest distance from a node
 * without incoming edges. The edges must be acyclic.
 */
export function assignLayers(
  nodes: readonly string[],
  edges: readonly Edge[],
): Map<string, number> {
  const layers = new Map<string, number>();
  const inDegree = new Map<string, number>();
  const outgoing = new Map<string, string[]>();

  for (const node of nodes) {
    inDegree.set(node, 0);
    outgoing.set(node, []);
  }
  for (const { from, to } of edges) {
    inDegree.set(to, (inDegree.get(to) ?? 0) + 1);
    const targets = outgoing.get(from);
    if (targets) {
      targets.push(to);
    } else {
      outgoing.set(from, [to]);
    }
  }

  const queue = [...inDegree.keys()].filter((node) => inDegree.get(node) === 0);
  for (const node of queue) layers.set(node, 0);

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (current === undefined) break;
    const layer = layers.get(current) ?? 0;

    for (const next of outgoing.get(current) ?? []) {
      layers.set(next, Math.max(layers.get(next) ?? 0, layer + 1));
      const remaining = (inDegree.get(next) ?? 0) - 1;
      inDegree.set(next, remaining);
      if (remaining === 0) queue.push(next);
    }
  }

  return layers;
}

interface NodeBox {
  x: number;
  y: number;
  width: number;
}

/**
 * Self-contained SVG picture of the dependency paths
 */
export function formatWhySvg(result: WhyResult): string {
  const { nodes, edges } = collectGraphElements(result);
  const layers = assignLayers(nodes, edges);

  const rows: string[][] = [];
  for (const node of nodes) {
    const layer = layers.get(node) ?? 0;
    const row = rows[layer] ?? [];
    row.push(node);
    rows[layer] = row;
  }

  const widthOf = (node: string): number =>
    Math.max(
      SVG_MIN_NODE_WIDTH,
      node.length * SVG_CHAR_WIDTH + SVG_NODE_PADDING * 2,
    );
  const rowWidth = (row: readonly string[]): number =>
    row.reduce((sum, node) => sum + widthOf(node), 0) +
    Math.max(0, row.length - 1) * SVG_H_GAP;

  const title = `Why is ${result.target} included?`;
  const contentWidth = Math.max(
    title.length * SVG_CHAR_WIDTH,
    ...rows.map((row) => rowWidth(row)),
  );
  const width = contentWidth + SVG_MARGIN * 2;
  const height =
    SVG_TITLE_HEIGHT +
    rows.length * SVG_NODE_HEIGHT +
    Math.max(0, rows.length - 1) * SVG_V_GAP +
    SVG_MARGIN * 2;

  const boxes = new Map<string, NodeBox>();
  rows.forEach((row, layer) => {
    let x = SVG_MARGIN + (contentWidth - rowWidth(row)) / 2;
    const y =
      SVG_MARGIN + SVG_TITLE_HEIGHT + layer * (SVG_NODE_HEIGHT + SVG_V_GAP);
    for (const node of row) {
      const nodeWidth = widthOf(node);
      boxes.set(node, { x, y, width: nodeWidth });
      x += nodeWidth + SVG_H_GAP;
    }
  });

  const lines: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="sans-serif" font-size="12">`,
    "<defs>",
    '<marker id="arrow" viewBox="0 0 10 7" refX="10" refY="3.5" markerWidth="8" markerHeight="6" orient="auto">',
    '<polygon points="0 0, 10 3.5, 0 7" fill="#555555"/>',
    "</marker>",
    "</defs>",
    `<text x="${width / 2}" y="${SVG_MARGIN + 16}" text-anchor="middle" font-size="16" font-weight="bold">${escapeXml(title)}</text>`,
  ];

  for (const { from, to } of edges) {
    const source = boxes.get(from);
    const destination = boxes.get(to);
    if (!source || !destination) continue;
    lines.push(
      `<line x1="${source.x + source.width / 2}" y1="${source.y + SVG_NODE_HEIGHT}" x2="${destination.x + destination.width / 2}" y2="${destination.y}" stroke="#555555" marker-end="url(#arrow)"/>`,
    );
  }

  for (const node of nodes) {
    const box = boxes.get(node);
    if (!box) continue;
    lines.push(
      "<g>",
      `<title>${escapeXml(node)}</title>`,
      `<rect x="${box.x}" y="${box.y}" width="${box.width}" height="${SVG_NODE_HEIGHT}" rx="4" fill="${nodeFill(node, result)}" stroke="#333333"/>`,
      `<text x="${box.x + box.width / 2}" y="${box.y + SVG_NODE_HEIGHT / 2 + 4}" text-anchor="middle">${escapeXml(node)}</text>`,
      "</g>",
    );
  }

  lines.push("</svg>");
  return lines.join("\n");
}

// ── Stats ──────────────────────────────────────────────────────────────────

function formatDelta(value: number): string {
  return value >= 0 ? `+${value}` : String(value);
}

export function formatStatsText(snapshot: StatsSnapshot): string {
  return [
    `Direct Dependencies: ${snapshot.directDependencies}`,
    `Transitive Dependencies: ${snapshot.transitiveDependencies}`,
    `Total Dependencies: ${snapshot.totalDependencies}`,
    `Max Depth Of Dependencies: ${snapshot.maxDepthOfDependencies}`,
  ].join("\n");
}

export function formatStatsJson(snapshot: StatsSnapshot): string {
  return JSON.stringify(
    {
      directDependencies: snapshot.directDependencies,
      transitiveDependencies: snapshot.transitiveDependencies,
      totalDependencies: snapshot.totalDependencies,
      maxDepthOfDependencies: snapshot.maxDepthOfDependencies,
    },
    null,
    2,
  );
}

export function formatStatsCsv(snapshot: StatsSnapshot): string {
  return [
    "Direct,Transitive,Total,MaxDepth",
    [
      snapshot.directDependencies,
      snapshot.transitiveDependencies,
      snapshot.totalDependencies,
      snapshot.maxDepthOfDependencies,
    ].join(","),
  ].join("\n");
}

export function formatComparisonText(comparison: StatsComparison): string {
  const { before, after, delta } = comparison;
  const row = (label: string, a: number, b: number, d: number): string =>
    `${label}: ${a} -> ${b} (delta ${formatDelta(d)})`;

  const lines = [
    `Stats compare (${comparison.setA} -> ${comparison.setB})`,
    row(
      "Direct Dependencies",
      before.directDependencies,
      after.directDependencies,
      delta.directDependencies,
    ),
    row(
      "Transitive Dependencies",
      before.transitiveDependencies,
      after.transitiveDependencies,
      delta.transitiveDependencies,
    ),
    row(
      "Total Dependencies",
      before.totalDependencies,
      after.totalDependencies,
      delta.totalDependencies,
    ),
    row(
      "Max Depth Of Dependencies",
      before.maxDepthOfDependencies,
      after.maxDepthOfDependencies,
      delta.maxDepthOfDependencies,
    ),
  ];
  if (comparison.onlyInB.length > 0) {
    lines.push(`Only in ${comparison.setB}: ${comparison.onlyInB.join(", ")}`);
  }
  return lines.join("\n");
}

export function formatComparisonJson(comparison: StatsComparison): string {
  return JSON.stringify(comparison, null, 2);
}

export function formatComparisonCsv(comparison: StatsComparison): string {
  const { before, after, delta } = comparison;
  const values = (s: StatsDelta): string =>
    [
      s.directDependencies,
      s.transitiveDependencies,
      s.totalDependencies,
      s.maxDepthOfDependencies,
    ].join(",");

  const lines = [
    "Set,Direct,Transitive,Total,MaxDepth",
    `${comparison.setA},${values(before)}`,
    `${comparison.setB},${values(after)}`,
    `Delta,${values(delta)}`,
  ];
  if (comparison.onlyInB.length > 0) {
    lines.push(`OnlyIn${comparison.setB},${comparison.onlyInB.join(";")}`);
  }
  return lines.join("\n");
}
