import { describe, expect, it } from "vitest";
import {
  CycleError,
  DuplicateEdgeError,
  DuplicateNodeError,
  SentinelError,
  UnknownEdgeError,
  UnknownNodeError,
} from "../../src/errors.js";
import { createSinkTask, createSourceTask, createTask } from "../../src/graph/task.js";
import { createSeedGraph, TaskGraph } from "../../src/graph/task-graph.js";

function structure(graph: TaskGraph): { names: string[]; edges: string[]; inEdges: Record<string, string[]> } {
  return {
    names: graph.names(),
    edges: graph.edges().map(([from, to]) => `${from}->${to}`),
    inEdges: Object.fromEntries(graph.nodes().map((n) => [n.task.name, [...n.inEdges].sort()])),
  };
}

function chain(...names: string[]): TaskGraph {
  const graph = new TaskGraph();
  for (const name of names) graph.addNode(createTask(name, name));
  for (let i = 1; i < names.length; i++) graph.addEdge(names[i - 1], names[i]);
  return graph;
}

describe("TaskGraph", () => {
  describe("nodes", () => {
    it("adds and looks up nodes", () => {
      const graph = new TaskGraph();
      const node = graph.addNode(createTask("a", "first"));

      expect(graph.size).toBe(1);
      expect(graph.has("a")).toBe(true);
      expect(graph.get("a")).toBe(node);
      expect(node.task.description).toBe("first");
      expect(node.outEdges.size).toBe(0);
      expect(node.inEdges.size).toBe(0);
    });

    it("rejects duplicate names", () => {
      const graph = chain("a");
      expect(() => graph.addNode(createTask("a", "again"))).toThrow(DuplicateNodeError);
      expect(graph.get("a").task.description).toBe("a");
    });

    it("rejects an empty name", () => {
      const graph = new TaskGraph();
      expect(() => graph.addNode(createTask("", "nameless"))).toThrow("Task has no name");
    });

    it("throws UnknownNodeError for missing nodes", () => {
      const graph = new TaskGraph();
      expect(() => graph.get("nope")).toThrow(UnknownNodeError);
      expect(() => graph.deleteNode("nope")).toThrow(UnknownNodeError);
    });

    it("allows only one source and one sink", () => {
      const graph = createSeedGraph();
      expect(() => graph.addNode(createSourceTask("source_2"))).toThrow(SentinelError);
      expect(() => graph.addNode(createSinkTask("sink_2"))).toThrow(SentinelError);
      expect(graph.size).toBe(2);
    });

    it("deletes a node and every edge that references it", () => {
      const graph = chain("a", "b", "c");
      graph.addEdge("a", "c");

      graph.deleteNode("b");

      expect(graph.names()).toEqual(["a", "c"]);
      expect(graph.edges()).toEqual([["a", "c"]]);
      for (const node of graph.nodes()) {
        expect(node.outEdges.has("b")).toBe(false);
        expect(node.inEdges.has("b")).toBe(false);
      }
    });

    it("add then delete of a node restores the prior structure", () => {
      const graph = chain("a", "b");
      const before = structure(graph);

      graph.addNode(createTask("x", "temporary"));
      graph.addEdge("a", "x");
      graph.addEdge("x", "b");
      graph.deleteNode("x");

      expect(structure(graph)).toEqual(before);
    });

    it("accepts task objects wherever a name is expected", () => {
      const graph = new TaskGraph();
      const a = createTask("a", "a");
      const b = createTask("b", "b");
      graph.addNode(a);
      graph.addNode(b);
      graph.addEdge(a, b);
      expect(graph.allDownstreams(a)).toEqual(["a", "b"]);
      graph.deleteNode(b);
      expect(graph.edges()).toEqual([]);
    });
  });

  describe("edges", () => {
    it("keeps in- and out-edges in step", () => {
      const graph = chain("a", "b");
      expect(graph.get("a").outEdges.has("b")).toBe(true);
      expect(graph.get("b").inEdges.has("a")).toBe(true);
    });

    it("rejects edges between unknown nodes", () => {
      const graph = chain("a");
      expect(() => graph.addEdge("a", "ghost")).toThrow(UnknownNodeError);
      expect(() => graph.addEdge("ghost", "a")).toThrow(UnknownNodeError);
    });

    it("rejects a duplicate edge", () => {
      const graph = chain("a", "b");
      expect(() => graph.addEdge("a", "b")).toThrow(DuplicateEdgeError);
    });

    it("rejects a self loop", () => {
      const graph = chain("a");
      expect(() => graph.addEdge("a", "a")).toThrow(CycleError);
      expect(graph.get("a").outEdges.size).toBe(0);
    });

    it("rejects a cycle and leaves the structure unchanged", () => {
      const graph = chain("a", "b", "c");
      const before = structure(graph);

      expect(() => graph.addEdge("c", "a")).toThrow('Adding edge "c" -> "a" would create a cycle');
      expect(structure(graph)).toEqual(before);
      expect(graph.validate()).toBe(true);
    });

    it("keeps the source free of in-edges and the sink free of out-edges", () => {
      const graph = createSeedGraph();
      graph.addNode(createTask("t", "t"));
      expect(() => graph.addEdge("t", "source")).toThrow(SentinelError);
      expect(() => graph.addEdge("sink", "t")).toThrow(SentinelError);
    });

    it("deletes edges and rejects unknown ones", () => {
      const graph = chain("a", "b");
      graph.deleteEdge("a", "b");
      expect(graph.edges()).toEqual([]);
      expect(graph.get("b").inEdges.size).toBe(0);
      expect(() => graph.deleteEdge("a", "b")).toThrow(UnknownEdgeError);
      expect(() => graph.deleteEdge("ghost", "b")).toThrow(UnknownEdgeError);
    });
  });

  describe("transaction", () => {
    it("commits when the callback returns", () => {
      const graph = chain("a", "b");
      const result = graph.transaction((g) => {
        g.addNode(createTask("c", "c"));
        g.addEdge("b", "c");
        return g.size;
      });
      expect(result).toBe(3);
      expect(graph.edges()).toEqual([
        ["a", "b"],
        ["b", "c"],
      ]);
    });

    it("restores nodes, order and edges when the callback throws", () => {
      const graph = chain("a", "b");
      const before = structure(graph);

      expect(() =>
        graph.transaction((g) => {
          g.addNode(createTask("c", "c"));
          g.addEdge("b", "c");
          g.deleteEdge("a", "b");
          g.addEdge("c", "b");
        }),
      ).toThrow(CycleError);

      expect(structure(graph)).toEqual(before);
      expect(graph.has("c")).toBe(false);
    });
  });

  it("formats its structure", () => {
    const graph = chain("a", "b");
    graph.addNode(createTask("c", "c"));
    graph.addEdge("a", "c");
    expect(graph.toString()).toBe("TaskGraph(3 nodes)\n  a -> b, c\n  b\n  c");
  });

  it("seeds a graph with source -> sink", () => {
    const graph = createSeedGraph();
    expect(graph.names()).toEqual(["source", "sink"]);
    expect(graph.edges()).toEqual([["source", "sink"]]);
    expect(graph.source()?.kind).toBe("source");
    expect(graph.sink()?.kind).toBe("sink");
  });
});
