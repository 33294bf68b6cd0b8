import {
  DuplicateEdgeError,
  DuplicateNodeError,
  SentinelError,
  UnknownEdgeError,
  UnknownNodeError,
} from "../errors.js";
import { assertEdgeKeepsAcyclic } from "./cycle-guard.js";
import * as scheduler from "./scheduler.js";
import { createSinkTask, createSourceTask, refName } from "./task.js";
import type { Edge, SinkTask, SourceTask, Task, TaskGraphNode, TaskRef } from "./types.js";

type Snapshot = Array<{ task: Task; outEdges: string[]; inEdges: string[] }>;

/**
 * Insertion-ordered DAG of tasks. Every structural change goes through the
 * methods below, each of which either applies completely or throws and leaves
 * the graph as it was.
 */
export class TaskGraph {
  private graph = new Map<string, TaskGraphNode>();

  get size(): number {
    return this.graph.size;
  }

  has(name: string): boolean {
    return this.graph.has(name);
  }

  get(name: string): TaskGraphNode {
    const node = this.graph.get(name);
    if (!node) throw new UnknownNodeError(name);
    return node;
  }

  nodes(): TaskGraphNode[] {
    return [...this.graph.values()];
  }

  names(): string[] {
    return [...this.graph.keys()];
  }

  edges(): Edge[] {
    const edges: Edge[] = [];
    for (const [name, node] of this.graph) {
      for (const succ of node.outEdges) edges.push([name, succ]);
    }
    return edges;
  }

  source(): SourceTask | undefined {
    for (const { task } of this.graph.values()) {
      if (task.kind === "source") return task;
    }
    return undefined;
  }

  sink(): SinkTask | undefined {
    for (const { task } of this.graph.values()) {
      if (task.kind === "sink") return task;
    }
    return undefined;
  }

  addNode(task: Task): TaskGraphNode {
    if (!task.name || this.graph.has(task.name)) {
      throw new DuplicateNodeError(task.name);
    }
    if (task.kind === "source" && this.source()) {
      throw new SentinelError(`Graph already has a source; cannot add "${task.name}"`, { name: task.name });
    }
    if (task.kind === "sink" && this.sink()) {
      throw new SentinelError(`Graph already has a sink; cannot add "${task.name}"`, { name: task.name });
    }

    const node: TaskGraphNode = { task, outEdges: new Set(), inEdges: new Set() };
    this.graph.set(task.name, node);
    return node;
  }

  /** Remove a node and every edge that references it. */
  deleteNode(ref: TaskRef): void {
    const name = refName(ref);
    const node = this.get(name);
    for (const pred of node.inEdges) {
      this.graph.get(pred)?.outEdges.delete(name);
    }
    for (const succ of node.outEdges) {
      this.graph.get(succ)?.inEdges.delete(name);
    }
    this.graph.delete(name);
  }

  addEdge(from: TaskRef, to: TaskRef): void {
    const fromName = refName(from);
    const toName = refName(to);
    const fromNode = this.graph.get(fromName);
    const toNode = this.graph.get(toName);
    if (!fromNode) throw new UnknownNodeError(fromName);
    if (!toNode) throw new UnknownNodeError(toName);

    if (toNode.task.kind === "source") {
      throw new SentinelError(`Source "${toName}" cannot have incoming edges`, { from: fromName, to: toName });
    }
    if (fromNode.task.kind === "sink") {
      throw new SentinelError(`Sink "${fromName}" cannot have outgoing edges`, { from: fromName, to: toName });
    }
    if (fromNode.outEdges.has(toName)) {
      throw new DuplicateEdgeError(fromName, toName);
    }

    assertEdgeKeepsAcyclic(this.graph, fromName, toName);

    fromNode.outEdges.add(toName);
    toNode.inEdges.add(fromName);
  }

  deleteEdge(from: TaskRef, to: TaskRef): void {
    const fromName = refName(from);
    const toName = refName(to);
    const fromNode = this.graph.get(fromName);
    if (!fromNode || !fromNode.outEdges.has(toName)) {
      throw new UnknownEdgeError(fromName, toName);
    }
    fromNode.outEdges.delete(toName);
    this.graph.get(toName)?.inEdges.delete(fromName);
  }

  topologicalSort(): string[] {
    return scheduler.topologicalSort(this.graph);
  }

  validate(): boolean {
    return scheduler.validate(this.graph);
  }

  allDownstreams(ref: TaskRef): string[] {
    return scheduler.allDownstreams(this.graph, refName(ref));
  }

  /**
   * Run `fn` against this graph. If it throws, node membership, order and
   * edges are restored to their state before the call and the error is
   * rethrown. Task fields are not part of the snapshot.
   */
  transaction<T>(fn: (graph: this) => T): T {
    const snapshot = this.snapshot();
    try {
      return fn(this);
    } catch (err) {
      this.restore(snapshot);
      throw err;
    }
  }

  private snapshot(): Snapshot {
    return this.nodes().map((node) => ({
      task: node.task,
      outEdges: [...node.outEdges],
      inEdges: [...node.inEdges],
    }));
  }

  private restore(snapshot: Snapshot): void {
    this.graph = new Map(
      snapshot.map(({ task, outEdges, inEdges }) => [
        task.name,
        { task, outEdges: new Set(outEdges), inEdges: new Set(inEdges) },
      ]),
    );
  }

  toString(): string {
    const lines = this.nodes().map((node) => {
      const succ = [...node.outEdges];
      return succ.length > 0 ? `  ${node.task.name} -> ${succ.join(", ")}` : `  ${node.task.name}`;
    });
    return [`TaskGraph(${this.size} nodes)`, ...lines].join("\n");
  }
}

/** A fresh graph holding only Source -> Sink, ready for the bootstrap round. */
export function createSeedGraph(source = createSourceTask(), sink = createSinkTask()): TaskGraph {
  const graph = new TaskGraph();
  graph.addNode(source);
  graph.addNode(sink);
  graph.addEdge(source, sink);
  return graph;
}
