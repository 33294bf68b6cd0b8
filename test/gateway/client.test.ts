import { afterEach, describe, expect, it, vi } from "vitest";
import { WebSocketServer } from "ws";
import { CollaboratorError } from "../../src/errors.js";
import { GatewayChatClient } from "../../src/gateway/client.js";

type Frame = { type: string; id: string; method: string; params?: Record<string, unknown> };

type ChatBehaviour = "final" | "error" | "early" | "silent" | "late";

let wss: WebSocketServer | undefined;
let client: GatewayChatClient | undefined;

/** Minimal in-process gateway: answers `connect` and `chat.send`, then emits the chat event. */
async function startGateway(opts: { token?: string; chat?: ChatBehaviour } = {}): Promise<{ url: string; frames: Frame[] }> {
  const frames: Frame[] = [];
  const server = new WebSocketServer({ port: 0, host: "127.0.0.1" });
  wss = server;
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));

  server.on("connection", (socket) => {
    const send = (frame: unknown) => socket.send(JSON.stringify(frame));

    socket.on("message", (raw) => {
      const frame: Frame = JSON.parse(String(raw));
      frames.push(frame);

      if (frame.method === "connect") {
        const auth = frame.params?.auth;
        const token = typeof auth === "object" && auth !== null && "token" in auth ? auth.token : undefined;
        if (opts.token && token !== opts.token) {
          send({ type: "res", id: frame.id, ok: false, error: { code: "UNAUTHORIZED", message: "bad token" } });
          return;
        }
        send({ type: "res", id: frame.id, ok: true, payload: { server: { version: "9.9.9" } } });
        return;
      }

      if (frame.method === "chat.send") {
        const runId = `run-${frames.length}`;
        const message = String(frame.params?.message ?? "");
        const final = {
          type: "event",
          event: "chat",
          payload: { runId, state: "final", message: { content: [{ text: "echo: " }, { text: message }] } },
        };
        const behaviour = opts.chat ?? "final";

        if (behaviour === "early") send(final);
        send({ type: "res", id: frame.id, ok: true, payload: { runId } });
        send({ type: "event", event: "chat", payload: { runId, state: "delta" } });
        if (behaviour === "final") send(final);
        if (behaviour === "late") setTimeout(() => send(final), 150);
        if (behaviour === "error") {
          send({ type: "event", event: "chat", payload: { runId, state: "error", error: "model crashed" } });
        }
      }
    });
  });

  const address = server.address();
  if (typeof address === "string" || address === null) throw new Error("gateway is not listening on a port");
  return { url: `ws://127.0.0.1:${address.port}`, frames };
}

afterEach(async () => {
  client?.close();
  client = undefined;
  const server = wss;
  wss = undefined;
  if (server) {
    for (const socket of server.clients) socket.terminate();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
});

describe("GatewayChatClient", () => {
  it("connects with its token", async () => {
    const { url, frames } = await startGateway({ token: "test-secret" });
    client = new GatewayChatClient({ name: "gw", url, token: "test-secret" }, { timeout: 2_000, connectTimeout: 2_000 });

    const hello = await client.connect();

    expect(hello.server?.version).toBe("9.9.9");
    expect(client.connected).toBe(true);
    expect(client.serverVersion).toBe("9.9.9");
    expect(client.type).toBe("gateway");
    expect(frames[0].method).toBe("connect");
    expect(frames[0].params).toMatchObject({ auth: { token: "test-secret" }, client: { id: "dynamic-taskgraph" } });
  });

  it("fails to connect with a wrong token", async () => {
    const { url } = await startGateway({ token: "test-secret" });
    client = new GatewayChatClient({ name: "gw", url, token: "wrong" }, { timeout: 2_000, connectTimeout: 2_000 });

    await expect(client.connect()).rejects.toThrow("UNAUTHORIZED: bad token");
  });

  it("resolves chat with the joined final text", async () => {
    const { url, frames } = await startGateway();
    client = new GatewayChatClient({ name: "gw", url }, { timeout: 2_000, connectTimeout: 2_000 });

    const text = await client.chat({ system: "be brief", message: "hello", sessionKey: "actor-t1" });

    expect(text).toBe("echo: hello");
    const send = frames.find((f) => f.method === "chat.send");
    expect(send?.params).toMatchObject({ message: "hello", system: "be brief", sessionKey: "actor-t1" });
    expect(typeof send?.params?.idempotencyKey).toBe("string");
  });

  it("handles a reply that arrives before the acknowledgement", async () => {
    const { url } = await startGateway({ chat: "early" });
    client = new GatewayChatClient({ name: "gw", url }, { timeout: 2_000, connectTimeout: 2_000 });

    await expect(client.chat({ message: "quick" })).resolves.toBe("echo: quick");
  });

  it("rejects on a chat error event", async () => {
    const { url } = await startGateway({ chat: "error" });
    client = new GatewayChatClient({ name: "gw", url }, { timeout: 2_000, connectTimeout: 2_000 });

    await expect(client.chat({ message: "hello" })).rejects.toThrow("model crashed");
  });

  it("times out when no reply arrives", async () => {
    const { url } = await startGateway({ chat: "silent" });
    client = new GatewayChatClient({ name: "gw", url }, { timeout: 50, connectTimeout: 2_000 });

    await expect(client.chat({ message: "hello" })).rejects.toThrow("Chat response timed out after 50ms");
  });

  it("drops a late reply once it has waited as long as a chat may", async () => {
    const { url } = await startGateway({ chat: "late" });
    const gateway = new GatewayChatClient({ name: "gw", url }, { timeout: 50, connectTimeout: 2_000 });
    client = gateway;

    await expect(gateway.chat({ message: "hello" })).rejects.toThrow("Chat response timed out after 50ms");
    expect(gateway.bufferedReplies).toBe(0);

    await vi.waitFor(() => expect(gateway.bufferedReplies).toBe(1), { timeout: 1_000, interval: 5 });
    await vi.waitFor(() => expect(gateway.bufferedReplies).toBe(0), { timeout: 1_000, interval: 5 });
  });

  it("rejects pending chats when the connection closes", async () => {
    const { url } = await startGateway({ chat: "silent" });
    client = new GatewayChatClient({ name: "gw", url }, { timeout: 5_000, connectTimeout: 2_000 });
    await client.connect();

    const pending = client.chat({ message: "hello" });
    setTimeout(() => {
      for (const socket of wss?.clients ?? []) socket.close(1001, "going away");
    }, 20);

    const err = await pending.catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CollaboratorError);
    expect(err).toMatchObject({ message: "Gateway connection closed (code=1001)" });
    expect(client.connected).toBe(false);
  });

  it("stops waiting when the caller aborts", async () => {
    const { url } = await startGateway({ chat: "silent" });
    client = new GatewayChatClient({ name: "gw", url }, { timeout: 5_000, connectTimeout: 2_000 });
    const controller = new AbortController();

    const pending = client.chat({ message: "hello", signal: controller.signal });
    setTimeout(() => controller.abort(new Error("user cancelled")), 50);

    await expect(pending).rejects.toThrow("user cancelled");
  });
});
