import type { z } from "zod";
import type { GatewayFrameSchema, HelloPayloadSchema } from "../schemas.js";

export type GatewayConfig = {
  name: string;
  /** `ws://host:port` */
  url: string;
  token?: string;
};

/** Frames are validated on receipt, so their types come from the schema. */
export type GatewayFrame = z.infer<typeof GatewayFrameSchema>;
export type RequestFrame = Extract<GatewayFrame, { type: "req" }>;
export type ResponseFrame = Extract<GatewayFrame, { type: "res" }>;
export type EventFrame = Extract<GatewayFrame, { type: "event" }>;

export type HelloPayload = z.infer<typeof HelloPayloadSchema>;

/** First request on every socket; the server answers with a {@link HelloPayload}. */
export type ConnectParams = {
  minProtocol: number;
  maxProtocol: number;
  client: { id: string; version: string; platform: string; mode: "cli" };
  auth?: { token?: string };
};

/** `chat.send` parameters. The reply arrives later as a `chat` event keyed by runId. */
export type ChatSendParams = {
  message: string;
  system?: string;
  sessionKey: string;
  idempotencyKey: string;
};
