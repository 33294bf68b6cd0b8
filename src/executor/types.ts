import type { TaskGraph } from "../graph/task-graph.js";
import type { TaskOutput } from "../graph/types.js";
import type { InputProvider, Oracle } from "../oracle/types.js";
import type { GraphRenderer } from "../render/dot-renderer.js";
import type { DecompositionMode } from "../schemas.js";

export type RunStatus = "done" | "max-rounds" | "aborted";

export type RunCallbacks = {
  onRoundStart?: (round: number, order: string[]) => void;
  onTaskStart?: (round: number, task: string) => void;
  onTaskEnd?: (round: number, task: string, output: TaskOutput) => void;
  onSplice?: (round: number, task: string, subtasks: string[], mode: DecompositionMode) => void;
  onRoundEnd?: (round: number) => void;
  onFinish?: (result: RunResult) => void;
  onError?: (error: Error) => void;
};

export type EngineOptions = {
  graph: TaskGraph;
  oracle: Oracle;
  /** Raw run input, read once by the bootstrap round. */
  input: InputProvider;
  renderer?: GraphRenderer;
  /** Defaults to config `render.dir`. */
  renderDir?: string;
  /** Defaults to config `render.keep`. */
  renderKeep?: number;
  callbacks?: RunCallbacks;
};

export type RunOptions = {
  signal?: AbortSignal;
};

export type RunResult = {
  runId: string;
  status: RunStatus;
  /** Rounds executed by this engine so far, the bootstrap round included. */
  rounds: number;
  finalOutput?: string;
  /** Answer of every executed regular task, by name. */
  outputs: Record<string, string>;
  startedAt: number;
  finishedAt: number;
};
