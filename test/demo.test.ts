import { describe, expect, it } from "vitest";
import { buildDemoGraph, describeDemo } from "../src/demo.js";

describe("demo graph", () => {
  it("prints its order, downstreams and structure", () => {
    expect(describeDemo(buildDemoGraph())).toEqual([
      "Topological sort: task_1, task_4, task_2, task_3",
      'All downstreams of "task_2": task_2, task_3',
      "Graph representation:",
      "TaskGraph(4 nodes)\n  task_1 -> task_2, task_4\n  task_2 -> task_3\n  task_3\n  task_4",
    ]);
  });

  it("has no sentinels", () => {
    const graph = buildDemoGraph();
    expect(graph.source()).toBeUndefined();
    expect(graph.sink()).toBeUndefined();
  });
});
