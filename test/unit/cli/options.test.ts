import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { collectModules, parseLimit } from "../../../src/cli/options.js";

describe("parseLimit", () => {
  it("should parse non-negative integers", () => {
    expect(parseLimit("0")).toBe(0);
    expect(parseLimit("25")).toBe(25);
  });

  it("should reject other values", () => {
    expect(() => parseLimit("-1")).toThrow(InvalidArgumentError);
    expect(() => parseLimit("1.5")).toThrow(InvalidArgumentError);
    expect(() => parseLimit("many")).toThrow(InvalidArgumentError);
  });
});

describe("collectModules", () => {
  it("should split comma-separated values and accumulate", () => {
    const first = collectModules("a, b");

    expect(first).toEqual(["a", "b"]);
    expect(collectModules("c,,", first)).toEqual(["a", "b", "c"]);
  });
});
