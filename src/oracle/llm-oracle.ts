import { randomUUID } from "node:crypto";
import { getConfig } from "../config.js";
import { CollaboratorError, CollaboratorParseError, ValidationError } from "../errors.js";
import { parseAllocation } from "../planner/allocation-parser.js";
import {
  ACTOR_SYSTEM_PROMPT,
  ALLOCATOR_FORMAT_REMINDER,
  ALLOCATOR_SYSTEM_PROMPT,
  SOURCE_NAMING_PROMPT,
} from "../planner/prompts.js";
import type { AllocationResult } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import { withRetry, type RetryOptions } from "../utils/retry.js";
import type { ChatClient, Oracle, OracleCallContext } from "./types.js";

const log = createLogger("llm-oracle");

const MAX_TASK_NAME_LENGTH = 80;

export type LlmOracleOptions = {
  client: ChatClient;
  /** Defaults to the `retry` section of the config. */
  retry?: Omit<RetryOptions, "signal" | "label">;
};

/** Keep the first non-empty line, without labels, quotes or markdown. */
export function cleanTaskName(raw: string): string {
  const line = raw
    .split(/\r?\n/)
    .map((l) => l.trim())
    .find((l) => l.length > 0) ?? "";
  return line
    .replace(/[*#`"]/g, "")
    .replace(/^\s*(task\s*)?name\s*:\s*/i, "")
    .replace(/^'+|'+$/g, "")
    .replace(/[.。]+$/, "")
    .trim()
    .slice(0, MAX_TASK_NAME_LENGTH)
    .trim();
}

// Parse and schema failures are answered by re-prompting, not by resending.
function isTransient(err: unknown): boolean {
  if (err instanceof CollaboratorParseError || err instanceof ValidationError) return false;
  const status = err instanceof CollaboratorError ? err.details?.status : undefined;
  if (typeof status === "number") return status === 429 || status >= 500;
  return true;
}

export class LlmOracle implements Oracle {
  readonly name: string;

  private client: ChatClient;
  private retry: Omit<RetryOptions, "signal" | "label">;

  constructor(opts: LlmOracleOptions) {
    this.client = opts.client;
    this.name = `llm:${opts.client.name}`;
    this.retry = opts.retry ?? { ...getConfig().retry };
  }

  async nameTask(rawInput: string, ctx: OracleCallContext): Promise<string> {
    const raw = await this.call("namer", SOURCE_NAMING_PROMPT, rawInput, ctx);
    const name = cleanTaskName(raw);
    if (!name) {
      throw new CollaboratorError("Model returned an empty task name", { raw: raw.slice(0, 200) });
    }
    return name;
  }

  async askActor(input: string, ctx: OracleCallContext): Promise<string> {
    return this.call("actor", ACTOR_SYSTEM_PROMPT, input, ctx);
  }

  async askAllocator(input: string, ctx: OracleCallContext): Promise<AllocationResult> {
    const first = await this.call("allocator", ALLOCATOR_SYSTEM_PROMPT, input, ctx);
    try {
      return parseAllocation(first);
    } catch (err) {
      if (!(err instanceof CollaboratorParseError)) throw err;
      log.warn(`Allocator reply for "${ctx.task}" did not parse, re-prompting`, { error: err.message });
    }

    const second = await this.call(
      "allocator",
      ALLOCATOR_SYSTEM_PROMPT,
      `${input}\n\n${ALLOCATOR_FORMAT_REMINDER}`,
      ctx,
    );
    return parseAllocation(second);
  }

  private async call(role: string, system: string, message: string, ctx: OracleCallContext): Promise<string> {
    const sessionKey = `${role}-${ctx.task}-${randomUUID().slice(0, 8)}`;
    log.debug(`Asking ${role} for "${ctx.task}"`, { chars: message.length });
    return withRetry(
      () => this.client.chat({ system, message, sessionKey, signal: ctx.signal }),
      { ...this.retry, retryIf: isTransient, signal: ctx.signal, label: `${role} call for "${ctx.task}"` },
    );
  }
}
