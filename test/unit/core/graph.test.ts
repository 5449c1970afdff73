import { describe, it, expect } from "vitest";
import {
  compareEdges,
  createModuleGraph,
  graphNodes,
  hasNode,
  successorsOf,
} from "../../../src/core/graph.js";

describe("createModuleGraph", () => {
  it("should keep first-seen successor order", () => {
    const graph = createModuleGraph([
      ["app", "lib-b"],
      ["app", "lib-a"],
      ["lib-a", "lib-c"],
    ]);

    expect(graph.get("app")).toEqual(["lib-b", "lib-a"]);
    expect(graph.get("lib-a")).toEqual(["lib-c"]);
  });

  it("should collapse repeated edges", () => {
    const graph = createModuleGraph([
      ["app", "lib-a"],
      ["app", "lib-a"],
      ["app", "lib-b"],
    ]);

    expect(graph.get("app")).toEqual(["lib-a", "lib-b"]);
  });
});

describe("graph helpers", () => {
  const graph = createModuleGraph([
    ["app", "lib-a"],
    ["lib-a", "lib-b"],
  ]);

  it("should return successors or an empty list", () => {
    expect(successorsOf(graph, "app")).toEqual(["lib-a"]);
    expect(successorsOf(graph, "lib-b")).toEqual([]);
    expect(successorsOf(graph, "unknown")).toEqual([]);
  });

  it("should find nodes that only appear as successors", () => {
    expect(hasNode(graph, "app")).toBe(true);
    expect(hasNode(graph, "lib-b")).toBe(true);
    expect(hasNode(graph, "unknown")).toBe(false);
  });

  it("should list every node in first-seen order", () => {
    expect(graphNodes(graph)).toEqual(["app", "lib-a", "lib-b"]);
  });

  it("should order edges by source then destination", () => {
    const edges = [
      { from: "b", to: "a" },
      { from: "a", to: "c" },
      { from: "a", to: "b" },
    ];

    expect([...edges].sort(compareEdges)).toEqual([
      { from: "a", to: "b" },
      { from: "a", to: "c" },
      { from: "b", to: "a" },
    ]);
  });
});
