/**
 * Unit tests for relationship graphs and cycle detection
 */

import { describe, it, expect } from "vitest";
import {
  cycleThrough,
  dependencyGraph,
  findAllCycles,
  parentGraph,
  type Graph,
} from "../../src/graph.js";
import { subEntityId, topLevelId } from "../../src/entity-id.js";
import { makeEntity } from "../helpers/store-fixture.js";

function graphOf(edges: Record<string, string[]>): Graph {
  return new Map(Object.entries(edges));
}

describe("Graphs", () => {
  it("should build dependency edges keyed by formatted id", () => {
    const graph = dependencyGraph([
      makeEntity(topLevelId(1)),
      makeEntity(topLevelId(2), { dependencies: [topLevelId(1), subEntityId(topLevelId(1), 2)] }),
    ]);
    expect([...graph.entries()]).toEqual([
      ["1", []],
      ["2", ["1", "1.2"]],
    ]);
  });

  it("should build parent edges", () => {
    const graph = parentGraph([
      makeEntity(topLevelId(1)),
      makeEntity(subEntityId(topLevelId(1), 1), { parent_task: topLevelId(1) }),
    ]);
    expect(graph.get("1.1")).toEqual(["1"]);
    expect(graph.get("1")).toEqual([]);
  });

  describe("cycleThrough", () => {
    it("should return the closed path through the start node", () => {
      const graph = graphOf({ "1": ["2"], "2": ["3"], "3": ["1"] });
      expect(cycleThrough(graph, "1")).toEqual(["1", "2", "3", "1"]);
    });

    it("should return null for a node that only leads into a cycle", () => {
      const graph = graphOf({ "1": ["2"], "2": ["1"], "4": ["1"] });
      expect(cycleThrough(graph, "4")).toBeNull();
    });

    it("should detect self references", () => {
      expect(cycleThrough(graphOf({ "5": ["5"] }), "5")).toEqual(["5", "5"]);
    });

    it("should ignore edges to unknown nodes", () => {
      expect(cycleThrough(graphOf({ "1": ["9"] }), "1")).toBeNull();
    });
  });

  describe("findAllCycles", () => {
    it("should report each cycle once", () => {
      const graph = graphOf({
        "1": ["2"],
        "2": ["3"],
        "3": ["1"],
        "4": ["4"],
        "5": ["1"],
      });
      expect(findAllCycles(graph)).toEqual([
        ["1", "2", "3", "1"],
        ["4", "4"],
      ]);
    });
  });
});
