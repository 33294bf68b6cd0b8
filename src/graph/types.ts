import type { AllocationResult } from "../schemas.js";

export type TaskKind = "source" | "sink" | "regular";

type TaskBase = {
  /** Identity key within a graph. */
  name: string;
  description: string;
  input?: string;
  /** Predecessors whose output fed this task, in the order they were joined. */
  context?: string[];
};

/** Entry sentinel: turns raw external input into the first task's name. */
export type SourceTask = TaskBase & {
  kind: "source";
  output?: SourceOutput;
};

/** Exit sentinel: its resolved input is the run's final output. */
export type SinkTask = TaskBase & {
  kind: "sink";
};

export type RegularTask = TaskBase & {
  kind: "regular";
  output?: TaskOutput;
};

export type Task = SourceTask | SinkTask | RegularTask;

export type SourceOutput = {
  input: string;
  taskName: string;
};

export type TaskOutput = {
  answer: string;
  allocation: AllocationResult;
};

/** A graph node: the task plus the names of its neighbours. */
export type TaskGraphNode = {
  task: Task;
  outEdges: Set<string>;
  inEdges: Set<string>;
};

/** Anything the scheduler can walk: insertion-ordered names with successor sets. */
export type Adjacency = ReadonlyMap<string, { readonly outEdges: ReadonlySet<string> }>;

/** A task, or a task's name. */
export type TaskRef = string | { name: string };

export type Edge = [from: string, to: string];
