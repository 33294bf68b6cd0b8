import { AcyclicViolationError, UnknownNodeError } from "../errors.js";
import type { Adjacency } from "./types.js";

/**
 * Kahn's algorithm. Zero in-degree names seed the ready stack in insertion
 * order; the stack is consumed LIFO, so siblings do not come out in FIFO
 * order. The result is one valid topological order, not a canonical one.
 */
export function topologicalSort(nodes: Adjacency): string[] {
  const inDegree = new Map<string, number>();
  for (const name of nodes.keys()) inDegree.set(name, 0);
  for (const node of nodes.values()) {
    for (const succ of node.outEdges) {
      inDegree.set(succ, (inDegree.get(succ) ?? 0) + 1);
    }
  }

  const ready: string[] = [];
  for (const [name, degree] of inDegree) {
    if (degree === 0) ready.push(name);
  }

  const sorted: string[] = [];
  let name = ready.pop();
  while (name !== undefined) {
    sorted.push(name);
    for (const succ of nodes.get(name)?.outEdges ?? []) {
      const degree = (inDegree.get(succ) ?? 0) - 1;
      inDegree.set(succ, degree);
      if (degree === 0) ready.push(succ);
    }
    name = ready.pop();
  }

  if (sorted.length < nodes.size) {
    throw new AcyclicViolationError(sorted.length, nodes.size);
  }
  return sorted;
}

/** True iff `topologicalSort` succeeds. */
export function validate(nodes: Adjacency): boolean {
  try {
    topologicalSort(nodes);
    return true;
  } catch (err) {
    if (err instanceof AcyclicViolationError) return false;
    throw err;
  }
}

/**
 * Everything reachable from `start` through out-edges (`start` included),
 * listed in the order of a full topological sort.
 */
export function allDownstreams(nodes: Adjacency, start: string): string[] {
  if (!nodes.has(start)) throw new UnknownNodeError(start);

  const seen = new Set<string>();
  const toVisit = [start];
  let current = toVisit.pop();
  while (current !== undefined) {
    if (!seen.has(current)) {
      seen.add(current);
      for (const succ of nodes.get(current)?.outEdges ?? []) toVisit.push(succ);
    }
    current = toVisit.pop();
  }

  return topologicalSort(nodes).filter((name) => seen.has(name));
}
