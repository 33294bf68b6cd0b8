import { getConfig } from "../config.js";
import { CollaboratorError } from "../errors.js";
import { parseAllocation } from "../planner/allocation-parser.js";
import { AllocationResultSchema, parseOrThrow, type AllocationResult } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import type { Oracle, OracleCallContext } from "./types.js";

const log = createLogger("function-oracle");

export type OracleFunction<T> = (input: string, ctx: OracleCallContext) => Promise<T>;

export type FunctionOracleOptions = {
  name?: string;
  /** Defaults to naming the task after the raw input itself. */
  nameTask?: OracleFunction<string>;
  actor: OracleFunction<string>;
  /** May return allocator text (parsed) or a structured result (validated). */
  allocator: OracleFunction<string | AllocationResult>;
  /** Timeout in ms (default: config `timeouts.chat`) */
  timeout?: number;
};

/** An Oracle backed by plain async functions, for embedding and tests. */
export class FunctionOracle implements Oracle {
  readonly name: string;

  private nameFn: OracleFunction<string>;
  private actorFn: OracleFunction<string>;
  private allocatorFn: OracleFunction<string | AllocationResult>;
  private timeout: number;

  constructor(opts: FunctionOracleOptions) {
    this.name = opts.name ?? "function";
    this.nameFn = opts.nameTask ?? (async (input) => input.trim().slice(0, 80));
    this.actorFn = opts.actor;
    this.allocatorFn = opts.allocator;
    this.timeout = opts.timeout ?? getConfig().timeouts.chat;
  }

  async nameTask(rawInput: string, ctx: OracleCallContext): Promise<string> {
    return this.invoke("nameTask", this.nameFn, rawInput, ctx);
  }

  async askActor(input: string, ctx: OracleCallContext): Promise<string> {
    return this.invoke("actor", this.actorFn, input, ctx);
  }

  async askAllocator(input: string, ctx: OracleCallContext): Promise<AllocationResult> {
    const result = await this.invoke("allocator", this.allocatorFn, input, ctx);
    return typeof result === "string"
      ? parseAllocation(result)
      : parseOrThrow(AllocationResultSchema, result, "allocation result");
  }

  private async invoke<T>(role: string, fn: OracleFunction<T>, input: string, ctx: OracleCallContext): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new CollaboratorError(`${role} function timed out after ${this.timeout}ms`, { task: ctx.task })),
        this.timeout,
      );
    });
    try {
      log.debug(`[${this.name}] Running ${role} for "${ctx.task}"`);
      return await Promise.race([fn(input, ctx), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
