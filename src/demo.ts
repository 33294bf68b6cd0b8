import { createTask } from "./graph/task.js";
import { TaskGraph } from "./graph/task-graph.js";

/** task_1 -> task_2 -> task_3, and task_1 -> task_4. No sentinels. */
export function buildDemoGraph(): TaskGraph {
  const graph = new TaskGraph();
  const [t1, t2, t3, t4] = ["task_1", "task_2", "task_3", "task_4"].map((name) => createTask(name, name));
  for (const task of [t1, t2, t3, t4]) graph.addNode(task);

  graph.addEdge(t1, t2);
  graph.addEdge(t1, t4);
  graph.addEdge(t2, t3);
  return graph;
}

/** The report printed by `demo`. */
export function describeDemo(graph: TaskGraph): string[] {
  return [
    `Topological sort: ${graph.topologicalSort().join(", ")}`,
    `All downstreams of "task_2": ${graph.allDownstreams("task_2").join(", ")}`,
    "Graph representation:",
    graph.toString(),
  ];
}
