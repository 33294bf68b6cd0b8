import { randomUUID } from "node:crypto";
import WebSocket from "ws";
import { getConfig } from "../config.js";
import { CollaboratorError } from "../errors.js";
import type { ChatClient, ChatRequest } from "../oracle/types.js";
import {
  ChatAckSchema,
  ChatEventPayloadSchema,
  GatewayFrameSchema,
  HelloPayloadSchema,
  parseOrThrow,
} from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import type { RateLimiter } from "../utils/rate-limiter.js";
import type {
  ChatSendParams,
  ConnectParams,
  EventFrame,
  GatewayConfig,
  HelloPayload,
  RequestFrame,
  ResponseFrame,
} from "./types.js";

const log = createLogger("gateway");

const PROTOCOL_VERSION = 1;
const CLIENT_VERSION = "0.1.0";

type Pending<T> = {
  resolve: (value: T) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
};

type ChatOutcome = { ok: true; text: string } | { ok: false; error: string };

export type GatewayChatClientOptions = {
  /** Per-request and per-chat timeout in ms (default: config `timeouts.chat`) */
  timeout?: number;
  /** Handshake timeout in ms (default: config `timeouts.connect`) */
  connectTimeout?: number;
  rateLimiter?: RateLimiter;
};

function rawToString(raw: WebSocket.RawData): string {
  if (Buffer.isBuffer(raw)) return raw.toString("utf-8");
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf-8");
  return Buffer.from(raw).toString("utf-8");
}

/**
 * Chat backend reached through a gateway over a single WebSocket. Requests are
 * correlated by frame id; chat replies arrive as `chat` events keyed by the
 * runId that `chat.send` acknowledged.
 */
export class GatewayChatClient implements ChatClient {
  readonly name: string;
  readonly type = "gateway" as const;
  readonly config: GatewayConfig;

  private ws: WebSocket | null = null;
  private hello: HelloPayload | null = null;
  private connectPromise: Promise<HelloPayload> | null = null;
  private pending = new Map<string, Pending<unknown>>();
  private pendingChats = new Map<string, Pending<string>>();
  // Replies with no waiter: either ahead of their ack, or for a chat already
  // given up on. Entries expire after `timeout`.
  private earlyChats = new Map<string, { outcome: ChatOutcome; timer: ReturnType<typeof setTimeout> }>();
  private timeout: number;
  private connectTimeout: number;
  private rateLimiter?: RateLimiter;

  constructor(config: GatewayConfig, opts: GatewayChatClientOptions = {}) {
    this.config = config;
    this.name = config.name;
    this.timeout = opts.timeout ?? getConfig().timeouts.chat;
    this.connectTimeout = opts.connectTimeout ?? getConfig().timeouts.connect;
    this.rateLimiter = opts.rateLimiter;
  }

  get connected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN && this.hello !== null;
  }

  /** Chat replies held for a runId nobody is waiting on yet. */
  get bufferedReplies(): number {
    return this.earlyChats.size;
  }

  get serverVersion(): string | undefined {
    return this.hello?.server?.version;
  }

  async connect(): Promise<HelloPayload> {
    if (this.connected && this.hello) return this.hello;
    if (this.connectPromise) return this.connectPromise;

    this.connectPromise = this.doConnect();
    try {
      return await this.connectPromise;
    } finally {
      this.connectPromise = null;
    }
  }

  private doConnect(): Promise<HelloPayload> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        fn();
      };

      const ws = new WebSocket(this.config.url);
      this.ws = ws;

      const timer = setTimeout(() => {
        settle(() => {
          ws.terminate();
          reject(new CollaboratorError(`Connection to gateway "${this.name}" timed out`));
        });
      }, this.connectTimeout);

      ws.on("open", () => {
        const params: ConnectParams = {
          minProtocol: PROTOCOL_VERSION,
          maxProtocol: PROTOCOL_VERSION,
          client: { id: "dynamic-taskgraph", version: CLIENT_VERSION, platform: process.platform, mode: "cli" },
          auth: this.config.token ? { token: this.config.token } : undefined,
        };
        this.send("connect", params, this.connectTimeout).then(
          (payload) => {
            clearTimeout(timer);
            const hello = HelloPayloadSchema.safeParse(payload ?? {});
            if (!hello.success) {
              settle(() => reject(new CollaboratorError(`Gateway "${this.name}" sent an invalid hello`)));
              return;
            }
            this.hello = hello.data;
            log.info(`Connected to gateway "${this.name}"`, { version: hello.data.server?.version ?? "unknown" });
            settle(() => resolve(hello.data));
          },
          (err: Error) => {
            clearTimeout(timer);
            settle(() => reject(err));
          },
        );
      });

      ws.on("message", (raw) => this.handleFrame(rawToString(raw)));

      ws.on("error", (err) => {
        clearTimeout(timer);
        log.error(`Gateway "${this.name}" error`, { error: String(err) });
        settle(() => reject(new CollaboratorError(`Gateway "${this.name}" error: ${err.message}`)));
      });

      ws.on("close", (code) => {
        clearTimeout(timer);
        this.hello = null;
        if (this.ws === ws) this.ws = null;
        const closed = new CollaboratorError(`Gateway connection closed (code=${code})`, { code });
        settle(() => reject(closed));
        this.rejectAll(closed);
        log.debug(`Gateway "${this.name}" closed`, { code });
      });
    });
  }

  private handleFrame(data: string): void {
    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch {
      log.warn("Ignoring non-JSON gateway frame", { data: data.slice(0, 200) });
      return;
    }
    const parsed = GatewayFrameSchema.safeParse(json);
    if (!parsed.success) {
      log.warn("Ignoring malformed gateway frame", { data: data.slice(0, 200) });
      return;
    }

    const frame = parsed.data;
    if (frame.type === "res") {
      this.handleResponse(frame);
    } else if (frame.type === "event" && frame.event === "chat") {
      this.handleChatEvent(frame);
    }
  }

  private handleResponse(frame: ResponseFrame): void {
    const p = this.pending.get(frame.id);
    if (!p) return;

    clearTimeout(p.timer);
    this.pending.delete(frame.id);

    if (frame.ok) {
      p.resolve(frame.payload);
    } else {
      const err = frame.error;
      p.reject(new CollaboratorError(err ? `${err.code}: ${err.message}` : "Unknown gateway error"));
    }
  }

  private handleChatEvent(frame: EventFrame): void {
    const parsed = ChatEventPayloadSchema.safeParse(frame.payload);
    if (!parsed.success) return;
    const payload = parsed.data;

    let outcome: ChatOutcome;
    if (payload.state === "final") {
      const text = payload.message?.content?.map((c) => c.text ?? "").join("") ?? "";
      outcome = { ok: true, text };
    } else if (payload.state === "error") {
      outcome = { ok: false, error: payload.error ?? "Chat stream error" };
    } else {
      return;
    }

    const p = this.pendingChats.get(payload.runId);
    if (!p) {
      this.bufferReply(payload.runId, outcome);
      return;
    }
    clearTimeout(p.timer);
    this.pendingChats.delete(payload.runId);
    if (outcome.ok) p.resolve(outcome.text);
    else p.reject(new CollaboratorError(outcome.error));
  }

  private bufferReply(runId: string, outcome: ChatOutcome): void {
    const previous = this.earlyChats.get(runId);
    if (previous) clearTimeout(previous.timer);
    const timer = setTimeout(() => this.earlyChats.delete(runId), this.timeout);
    this.earlyChats.set(runId, { outcome, timer });
  }

  private send(method: string, params: unknown, timeoutMs: number): Promise<unknown> {
    const ws = this.ws;
    if (!ws) return Promise.reject(new CollaboratorError(`Gateway "${this.name}" is not connected`));

    const id = randomUUID();
    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new CollaboratorError(`Request ${method} timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      // Payload shape is checked by the caller.
      this.pending.set(id, { resolve, reject, timer });
      const frame: RequestFrame = { type: "req", id, method, params };
      ws.send(JSON.stringify(frame));
    });
  }

  async call(method: string, params?: unknown, timeoutMs = this.timeout): Promise<unknown> {
    if (!this.connected) await this.connect();
    return this.send(method, params, timeoutMs);
  }

  async chat(request: ChatRequest): Promise<string> {
    if (request.signal?.aborted) throw request.signal.reason;
    await this.rateLimiter?.acquire(request.signal);

    const params: ChatSendParams = {
      message: request.message,
      system: request.system,
      sessionKey: request.sessionKey ?? "taskgraph",
      idempotencyKey: randomUUID(),
    };
    const ack = parseOrThrow(ChatAckSchema, await this.call("chat.send", params), "chat.send acknowledgement");
    return this.awaitChat(ack.runId, request.signal);
  }

  private awaitChat(runId: string, signal?: AbortSignal): Promise<string> {
    const early = this.earlyChats.get(runId);
    if (early) {
      clearTimeout(early.timer);
      this.earlyChats.delete(runId);
      const { outcome } = early;
      return outcome.ok ? Promise.resolve(outcome.text) : Promise.reject(new CollaboratorError(outcome.error));
    }

    if (signal?.aborted) return Promise.reject(signal.reason);

    return new Promise<string>((resolve, reject) => {
      const onAbort = () => {
        const p = this.pendingChats.get(runId);
        if (p) clearTimeout(p.timer);
        this.pendingChats.delete(runId);
        reject(signal?.reason);
      };
      const cleanup = () => signal?.removeEventListener("abort", onAbort);

      const timer = setTimeout(() => {
        this.pendingChats.delete(runId);
        cleanup();
        reject(new CollaboratorError(`Chat response timed out after ${this.timeout}ms`, { runId }));
      }, this.timeout);

      this.pendingChats.set(runId, {
        resolve: (text) => {
          cleanup();
          resolve(text);
        },
        reject: (err) => {
          cleanup();
          reject(err);
        },
        timer,
      });
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private rejectAll(err: Error): void {
    for (const [id, p] of this.pending) {
      clearTimeout(p.timer);
      p.reject(err);
      this.pending.delete(id);
    }
    for (const [id, p] of this.pendingChats) {
      clearTimeout(p.timer);
      p.reject(err);
      this.pendingChats.delete(id);
    }
  }

  close(): void {
    for (const { timer } of this.earlyChats.values()) clearTimeout(timer);
    this.earlyChats.clear();
    if (this.ws) {
      this.ws.close(1000, "client disconnect");
      this.ws = null;
      this.hello = null;
    }
  }
}
