/**
 * Cycle detection over entity relationship graphs
 */

import type { Entity, EntityId } from "@taskledger/types";
import { formatId, parseId } from "./entity-id.js";

/**
 * Adjacency list keyed by formatted id
 */
export type Graph = Map<string, string[]>;

export function dependencyGraph(entities: Iterable<Entity>): Graph {
  const graph: Graph = new Map();
  for (const entity of entities) {
    const key = formatId(entity.id);
    const edges = graph.get(key) ?? [];
    edges.push(...entity.dependencies.map(formatId));
    graph.set(key, edges);
  }
  return graph;
}

export function parentGraph(entities: Iterable<Entity>): Graph {
  const graph: Graph = new Map();
  for (const entity of entities) {
    const key = formatId(entity.id);
    const edges = graph.get(key) ?? [];
    if (entity.parent_task) {
      edges.push(formatId(entity.parent_task));
    }
    graph.set(key, edges);
  }
  return graph;
}

/**
 * A closed path from `start` back to itself (`[a, b, a]`), or null when
 * `start` is not on a cycle. Edges to unknown nodes are ignored.
 */
export function cycleThrough(graph: Graph, start: string): string[] | null {
  const visited = new Set<string>();
  const path = [start];

  const visit = (node: string): boolean => {
    for (const next of graph.get(node) ?? []) {
      if (next === start) {
        path.push(start);
        return true;
      }
      if (visited.has(next) || !graph.has(next)) continue;
      visited.add(next);
      path.push(next);
      if (visit(next)) return true;
      path.pop();
    }
    return false;
  };

  return visit(start) ? path : null;
}

/**
 * Every distinct cycle in the graph, each reported once
 */
export function findAllCycles(graph: Graph): string[][] {
  const seen = new Set<string>();
  const cycles: string[][] = [];
  for (const node of graph.keys()) {
    const cycle = cycleThrough(graph, node);
    if (!cycle) continue;
    const key = [...new Set(cycle)].sort().join(",");
    if (seen.has(key)) continue;
    seen.add(key);
    cycles.push(cycle);
  }
  return cycles;
}

export function toIds(path: string[]): EntityId[] {
  return path.flatMap((p) => {
    const id = parseId(p);
    return id ? [id] : [];
  });
}
