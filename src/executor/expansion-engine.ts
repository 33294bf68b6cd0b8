import { randomUUID } from "node:crypto";
import { join } from "node:path";
import { getConfig } from "../config.js";
import {
  CollaboratorError,
  CollaboratorParseError,
  InputConflictError,
  MissingInputError,
  SentinelError,
  TaskGraphError,
} from "../errors.js";
import { createTask } from "../graph/task.js";
import type { TaskGraph } from "../graph/task-graph.js";
import type { RegularTask, SinkTask, SourceTask } from "../graph/types.js";
import type { InputProvider, Oracle } from "../oracle/types.js";
import { formatActorInput, formatAllocatorInput } from "../planner/prompts.js";
import { graphLabels, roundFileName, type GraphRenderer } from "../render/dot-renderer.js";
import type { DecompositionMode, SubtaskDescriptor } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import type { EngineOptions, RunCallbacks, RunOptions, RunResult, RunStatus } from "./types.js";

const log = createLogger("engine");

/** `base`, or `base_2`, `base_3`... when the name is taken. */
export function uniqueName(base: string, taken: (name: string) => boolean): string {
  if (!taken(base)) return base;
  let n = 2;
  while (taken(`${base}_${n}`)) n++;
  return `${base}_${n}`;
}

/**
 * Whether `err` is how a cancelled collaborator call surfaced. Graph errors
 * still propagate when they happen to coincide with an abort.
 */
function isInterruption(err: unknown, signal: AbortSignal): boolean {
  if (err === signal.reason) return true;
  if (err instanceof CollaboratorError || err instanceof CollaboratorParseError) return true;
  return !(err instanceof TaskGraphError);
}

type RoundState = {
  round: number;
  deferred: Set<string>;
  signal?: AbortSignal;
};

/**
 * Drives a task graph round by round. The first round turns the run input
 * into a task between source and sink; every later round executes the
 * runnable tasks in topological order, splices in the subtasks of any task
 * the allocator rejects, and passes answers along edges until the sink's
 * input resolves.
 */
export class ExpansionEngine {
  readonly graph: TaskGraph;

  private oracle: Oracle;
  private input: InputProvider;
  private renderer?: GraphRenderer;
  private renderDir: string;
  private renderKeep: number;
  private callbacks: RunCallbacks;

  // Input slots: receiver -> (sender -> text).
  private slots = new Map<string, Map<string, string>>();
  private round = 0;
  private finalOutput?: string;

  constructor(opts: EngineOptions) {
    this.graph = opts.graph;
    this.oracle = opts.oracle;
    this.input = opts.input;
    this.renderer = opts.renderer;
    this.renderDir = opts.renderDir ?? getConfig().render.dir;
    this.renderKeep = opts.renderKeep ?? getConfig().render.keep;
    this.callbacks = opts.callbacks ?? {};
  }

  get rounds(): number {
    return this.round;
  }

  /** Pending input of `receiver` from `sender`, if one has been written. */
  slot(receiver: string, sender: string): string | undefined {
    return this.slots.get(receiver)?.get(sender);
  }

  async run(maxRounds = getConfig().limits.maxRounds, opts: RunOptions = {}): Promise<RunResult> {
    const runId = randomUUID();
    const startedAt = Date.now();
    const { signal } = opts;

    const finish = (status: RunStatus): RunResult => {
      const result: RunResult = {
        runId,
        status,
        rounds: this.round,
        finalOutput: this.finalOutput,
        outputs: this.outputs(),
        startedAt,
        finishedAt: Date.now(),
      };
      log.info(`Run finished: ${status}`, { runId, rounds: this.round });
      this.callbacks.onFinish?.(result);
      return result;
    };

    if (this.finalOutput !== undefined) return finish("done");

    log.info("Run started", { runId, maxRounds, oracle: this.oracle.name });

    try {
      const { source, sink } = this.sentinels();
      for (let i = 0; i < maxRounds; i++) {
        if (signal?.aborted) return finish("aborted");

        const state: RoundState = { round: ++this.round, deferred: new Set(), signal };
        if (this.isBootstrap(source, sink)) {
          this.callbacks.onRoundStart?.(state.round, this.graph.topologicalSort());
          await this.bootstrap(source, sink, state);
        } else {
          await this.steadyRound(state);
        }
        await this.endRound(state.round);

        if (this.finalOutput !== undefined) return finish("done");
      }
      return finish("max-rounds");
    } catch (err) {
      if (signal?.aborted && isInterruption(err, signal)) {
        log.warn("Run aborted during a collaborator call", { runId, round: this.round });
        return finish("aborted");
      }
      const error = err instanceof Error ? err : new Error(String(err));
      log.error("Run failed", { runId, round: this.round, error: error.message });
      this.callbacks.onError?.(error);
      throw error;
    }
  }

  private sentinels(): { source: SourceTask; sink: SinkTask } {
    const source = this.graph.source();
    const sink = this.graph.sink();
    if (!source || !sink) {
      throw new SentinelError("Graph needs a source and a sink before it can run", {
        source: source?.name ?? null,
        sink: sink?.name ?? null,
      });
    }
    return { source, sink };
  }

  private isBootstrap(source: SourceTask, sink: SinkTask): boolean {
    return this.graph.size === 2 && this.graph.has(source.name) && this.graph.has(sink.name);
  }

  private async bootstrap(source: SourceTask, sink: SinkTask, state: RoundState): Promise<void> {
    const rawInput = await this.input.read(state.signal);
    this.callbacks.onTaskStart?.(state.round, source.name);
    const taskName = await this.oracle.nameTask(rawInput, { task: source.name, signal: state.signal });
    source.output = { input: rawInput, taskName };

    const task = createTask(uniqueName(taskName, (n) => this.graph.has(n)), rawInput);
    this.graph.transaction((g) => {
      g.addNode(task);
      g.addEdge(source, task);
      g.addEdge(task, sink);
      if (g.get(source.name).outEdges.has(sink.name)) g.deleteEdge(source, sink);
    });
    this.dropSlot(sink.name, source.name);
    this.writeSlot(task.name, source.name, rawInput);

    log.info(`Bootstrapped "${task.name}" from run input`, { chars: rawInput.length });
  }

  private async steadyRound(state: RoundState): Promise<void> {
    const order = this.graph.topologicalSort();
    log.info(`Round ${state.round}`, { tasks: order.length });
    this.callbacks.onRoundStart?.(state.round, order);

    for (const name of order) {
      if (state.deferred.has(name)) continue;
      const { task } = this.graph.get(name);

      switch (task.kind) {
        case "source":
          break;
        case "sink": {
          const { input, context } = this.resolveInput(name);
          task.input = input;
          task.context = context;
          this.finalOutput = input;
          log.info(`Sink "${name}" resolved`, { from: context });
          return;
        }
        case "regular":
          if (task.output === undefined) await this.execute(task, state);
          break;
      }
    }
  }

  private async execute(task: RegularTask, state: RoundState): Promise<void> {
    const { input, context } = this.resolveInput(task.name);
    task.input = input;
    task.context = context;
    this.callbacks.onTaskStart?.(state.round, task.name);

    const ctx = { task: task.name, signal: state.signal };
    const answer = await this.oracle.askActor(formatActorInput(task, input), ctx);
    const allocation = await this.oracle.askAllocator(formatAllocatorInput(task, input, answer), ctx);
    task.output = { answer, allocation };
    log.debug(`Task "${task.name}" answered`, { satisfied: allocation.satisfied, chars: answer.length });

    if (!allocation.satisfied) {
      const spliced = this.splice(task, allocation.decompositionMode, allocation.subtasks);
      if (spliced.length > 0) {
        for (const name of spliced) {
          for (const downstream of this.graph.allDownstreams(name)) state.deferred.add(downstream);
        }
        this.callbacks.onSplice?.(state.round, task.name, spliced, allocation.decompositionMode);
      }
    }

    for (const succ of this.graph.get(task.name).outEdges) {
      this.writeSlot(succ, task.name, answer);
    }
    this.callbacks.onTaskEnd?.(state.round, task.name, task.output);
  }

  /**
   * Insert subtasks between `task` and its current successors. Returns the
   * names actually inserted; an empty list means the decomposition was
   * declined and the task stands as answered.
   */
  private splice(task: RegularTask, mode: DecompositionMode, descriptors: SubtaskDescriptor[]): string[] {
    const { maxSubtasks, maxNodes } = getConfig().limits;
    const ordered = [...descriptors].sort((a, b) => a.order - b.order).slice(0, maxSubtasks);
    if (ordered.length === 0) {
      log.warn(`Decomposition of "${task.name}" lists no subtasks; keeping its answer`);
      return [];
    }
    if (this.graph.size + ordered.length > maxNodes) {
      log.warn(`Decomposition of "${task.name}" declined: graph would exceed ${maxNodes} nodes`, {
        size: this.graph.size,
        subtasks: ordered.length,
      });
      return [];
    }
    if (descriptors.length > ordered.length) {
      log.warn(`Decomposition of "${task.name}" capped at ${maxSubtasks} subtasks`, { proposed: descriptors.length });
    }

    const taken = new Set<string>();
    const subtasks = ordered.map((d) => {
      const name = uniqueName(d.name, (n) => taken.has(n) || this.graph.has(n));
      taken.add(name);
      return createTask(name, d.description);
    });
    const successors = [...this.graph.get(task.name).outEdges];

    this.graph.transaction((g) => {
      for (const sub of subtasks) g.addNode(sub);

      if (mode === "sequential") {
        let prev: RegularTask = task;
        for (const sub of subtasks) {
          g.addEdge(prev, sub);
          prev = sub;
        }
        for (const succ of successors) g.addEdge(prev, succ);
      } else {
        for (const sub of subtasks) {
          g.addEdge(task, sub);
          for (const succ of successors) g.addEdge(sub, succ);
        }
      }

      for (const succ of successors) g.deleteEdge(task, succ);
    });
    for (const succ of successors) this.dropSlot(succ, task.name);

    log.info(`Split "${task.name}" into ${subtasks.length} ${mode} subtasks`, {
      subtasks: subtasks.map((s) => s.name),
    });
    return subtasks.map((s) => s.name);
  }

  /** One predecessor's text verbatim, or a `## <name>` section per predecessor. */
  private resolveInput(name: string): { input: string; context: string[] } {
    const received = this.slots.get(name);
    const parts: Array<[string, string]> = [];
    const missing: string[] = [];
    for (const pred of this.graph.get(name).inEdges) {
      const text = received?.get(pred);
      if (text === undefined) missing.push(pred);
      else parts.push([pred, text]);
    }
    if (missing.length > 0 || parts.length === 0) {
      throw new MissingInputError(name, missing);
    }

    const context = parts.map(([pred]) => pred);
    if (parts.length === 1) return { input: parts[0][1], context };
    return { input: parts.map(([pred, text]) => `## ${pred}\n${text}`).join("\n\n"), context };
  }

  private writeSlot(receiver: string, sender: string, text: string): void {
    let received = this.slots.get(receiver);
    if (!received) {
      received = new Map();
      this.slots.set(receiver, received);
    }
    if (received.has(sender)) throw new InputConflictError(receiver, sender);
    received.set(sender, text);
  }

  private dropSlot(receiver: string, sender: string): void {
    this.slots.get(receiver)?.delete(sender);
  }

  private async endRound(round: number): Promise<void> {
    if (this.renderer) {
      const outputPath = join(this.renderDir, roundFileName(round, this.renderKeep));
      try {
        await this.renderer.render(this.graph.edges(), graphLabels(this.graph), outputPath);
        log.debug(`Rendered round ${round}`, { path: outputPath });
      } catch (err) {
        log.warn(`Failed to render round ${round}`, { path: outputPath, error: String(err) });
      }
    }
    this.callbacks.onRoundEnd?.(round);
  }

  private outputs(): Record<string, string> {
    const outputs: Record<string, string> = {};
    for (const { task } of this.graph.nodes()) {
      if (task.kind === "regular" && task.output) outputs[task.name] = task.output.answer;
    }
    return outputs;
  }
}
