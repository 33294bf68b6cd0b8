import { getConfig } from "../config.js";
import { CollaboratorError } from "../errors.js";
import { ChatCompletionResponseSchema, parseOrThrow } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import type { RateLimiter } from "../utils/rate-limiter.js";
import type { ChatClient, ChatRequest } from "./types.js";

const log = createLogger("http-client");

export type HttpChatClientOptions = {
  name?: string;
  /** Base URL of an OpenAI-compatible API, e.g. http://127.0.0.1:11434/v1 */
  url: string;
  model: string;
  apiKey?: string;
  headers?: Record<string, string>;
  temperature?: number;
  /** Timeout in ms (default: config `timeouts.chat`) */
  timeout?: number;
  rateLimiter?: RateLimiter;
};

/** Chat backend speaking the `/chat/completions` protocol over fetch. */
export class HttpChatClient implements ChatClient {
  readonly name: string;
  readonly type = "http" as const;

  private url: string;
  private model: string;
  private headers: Record<string, string>;
  private temperature?: number;
  private timeout: number;
  private rateLimiter?: RateLimiter;

  constructor(opts: HttpChatClientOptions) {
    this.name = opts.name ?? "http";
    this.url = opts.url.replace(/\/+$/, "");
    this.model = opts.model;
    this.headers = { ...opts.headers };
    if (opts.apiKey) this.headers.Authorization = `Bearer ${opts.apiKey}`;
    this.temperature = opts.temperature;
    this.timeout = opts.timeout ?? getConfig().timeouts.chat;
    this.rateLimiter = opts.rateLimiter;
  }

  async chat(request: ChatRequest): Promise<string> {
    await this.rateLimiter?.acquire(request.signal);

    const messages = request.system
      ? [{ role: "system", content: request.system }, { role: "user", content: request.message }]
      : [{ role: "user", content: request.message }];

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);
    const onAbort = () => controller.abort(request.signal?.reason);
    request.signal?.addEventListener("abort", onAbort, { once: true });
    const start = Date.now();

    try {
      log.debug(`[${this.name}] POST ${this.url}/chat/completions`, { model: this.model });
      const res = await fetch(`${this.url}/chat/completions`, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...this.headers },
        body: JSON.stringify({
          model: this.model,
          messages,
          ...(this.temperature !== undefined ? { temperature: this.temperature } : {}),
        }),
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text();
        throw new CollaboratorError(`HTTP ${res.status}: ${body.slice(0, 300)}`, { status: res.status });
      }

      const payload: unknown = await res.json();
      const parsed = parseOrThrow(ChatCompletionResponseSchema, payload, "chat completion response");
      log.debug(`[${this.name}] Completed`, { durationMs: Date.now() - start });
      return parsed.choices[0].message.content ?? "";
    } catch (err) {
      if (controller.signal.aborted && !request.signal?.aborted) {
        throw new CollaboratorError(`Chat request timed out after ${this.timeout}ms`, { timeout: this.timeout });
      }
      throw err;
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener("abort", onAbort);
    }
  }
}
