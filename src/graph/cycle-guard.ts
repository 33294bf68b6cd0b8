import { AcyclicViolationError, CycleError } from "../errors.js";
import { topologicalSort } from "./scheduler.js";
import type { Adjacency } from "./types.js";

/**
 * Reject `from -> to` if it would close a cycle. The edge is simulated on an
 * isolated copy of the whole structure, which is then re-sorted; the caller's
 * graph is never touched.
 */
export function assertEdgeKeepsAcyclic(nodes: Adjacency, from: string, to: string): void {
  const copy = new Map<string, { outEdges: Set<string> }>();
  for (const [name, node] of nodes) {
    copy.set(name, { outEdges: new Set(node.outEdges) });
  }
  copy.get(from)?.outEdges.add(to);

  try {
    topologicalSort(copy);
  } catch (err) {
    if (err instanceof AcyclicViolationError) throw new CycleError(from, to);
    throw err;
  }
}
