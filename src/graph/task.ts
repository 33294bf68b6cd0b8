import type { RegularTask, SinkTask, SourceTask, Task, TaskRef } from "./types.js";

export const SOURCE_NAME = "source";
export const SINK_NAME = "sink";

export function createSourceTask(name = SOURCE_NAME): SourceTask {
  return { kind: "source", name, description: "Virtual task that turns the run's input into its first task." };
}

export function createSinkTask(name = SINK_NAME): SinkTask {
  return { kind: "sink", name, description: "Virtual task that collects the run's final output." };
}

export function createTask(name: string, description: string): RegularTask {
  return { kind: "regular", name, description };
}

export function refName(ref: TaskRef): string {
  return typeof ref === "string" ? ref : ref.name;
}

/** Short human label for renderers and logs. */
export function displayName(task: Task): string {
  switch (task.kind) {
    case "source":
      return `${task.name} (source)`;
    case "sink":
      return `${task.name} (sink)`;
    case "regular":
      return task.name;
  }
}
