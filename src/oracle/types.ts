import type { AllocationResult } from "../schemas.js";

export type OracleCallContext = {
  /** Name of the task the call is made for. */
  task: string;
  signal?: AbortSignal;
};

/**
 * The engine's only view of the outside world. Implementations answer task
 * inputs (Actor), judge answers and decompose unsatisfied tasks (Allocator),
 * and name the first task from raw input.
 */
export interface Oracle {
  readonly name: string;
  /** Summarize raw run input into a task name. Used by the bootstrap round. */
  nameTask(rawInput: string, ctx: OracleCallContext): Promise<string>;
  askActor(input: string, ctx: OracleCallContext): Promise<string>;
  askAllocator(input: string, ctx: OracleCallContext): Promise<AllocationResult>;
}

/** Where the source task gets the run's raw input. */
export interface InputProvider {
  read(signal?: AbortSignal): Promise<string>;
}

export function staticInput(text: string): InputProvider {
  return {
    async read() {
      return text;
    },
  };
}

export type ChatRequest = {
  system?: string;
  message: string;
  /** Correlates related calls on backends that keep sessions. */
  sessionKey?: string;
  signal?: AbortSignal;
};

/** A text-in, text-out model backend. */
export interface ChatClient {
  readonly name: string;
  readonly type: "http" | "gateway" | string;
  chat(request: ChatRequest): Promise<string>;
  close?(): void;
}
