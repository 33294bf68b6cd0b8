import { getConfig, type TaskGraphConfig } from "../config.js";
import { GatewayChatClient } from "../gateway/client.js";
import { RateLimiter } from "../utils/rate-limiter.js";
import { HttpChatClient } from "./http-client.js";
import type { ChatClient } from "./types.js";

/** Build the chat backend named by `config.backend`, rate limited when enabled. */
export function createChatClient(config: TaskGraphConfig = getConfig()): ChatClient {
  const { backend, rateLimit, timeouts } = config;
  const rateLimiter = rateLimit.enabled
    ? new RateLimiter({
        maxRequests: rateLimit.maxRequests,
        windowMs: rateLimit.windowMs,
        maxQueueSize: rateLimit.maxQueueSize,
      })
    : undefined;

  if (backend.kind === "gateway") {
    return new GatewayChatClient(
      { name: "gateway", url: backend.url, token: backend.apiKey },
      { timeout: timeouts.chat, connectTimeout: timeouts.connect, rateLimiter },
    );
  }
  return new HttpChatClient({
    name: backend.model,
    url: backend.url,
    model: backend.model,
    apiKey: backend.apiKey,
    timeout: timeouts.chat,
    rateLimiter,
  });
}
