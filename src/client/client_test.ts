/**
 * Unit tests for ClientEngine
 *
 * Uses a stub channel so each test decides when (and whether) the
 * server answers, and fake timers for deadlines and backoff.
 */

import { afterEach, beforeEach, expect, test, vi } from "vitest";
import {
  ChannelClosedError,
  RemoteError,
  ThrottledError,
  TimeoutError,
} from "../errors.ts";
import type { WireMessage } from "../protocol/envelope.ts";
import type { ClientChannel } from "../transport/channel.ts";
import type { ClientOptions, DiagnosticCategory } from "../types.ts";
import { ClientEngine } from "./client.ts";

const SECRET = "ab".repeat(32);

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(1_700_000_000_000);
});

afterEach(() => {
  vi.useRealTimers();
});

function stubChannel() {
  const sent: WireMessage[] = [];
  let receiver: ((message: unknown) => void) | undefined;

  const channel: ClientChannel = {
    send: (message) => {
      sent.push(message);
    },
    onReceive: (callback) => {
      receiver = callback;
      return () => {
        receiver = undefined;
      };
    },
  };

  return {
    channel,
    sent,
    push(message: unknown) {
      receiver?.(message);
    },
    isSubscribed: () => receiver !== undefined,
  };
}

function requestIdOf(message: WireMessage | undefined): string {
  return message && "requestId" in message ? message.requestId : "";
}

function setup(options: Partial<ClientOptions> = {}) {
  const transport = stubChannel();
  const logs: Array<[DiagnosticCategory, string]> = [];
  const client = new ClientEngine({
    channel: transport.channel,
    sessionId: "session-1",
    requestTimeoutMs: 1000,
    logger: (category, message) => logs.push([category, message]),
    ...options,
  });
  client.init();

  const answerLast = (success: boolean, body?: unknown) => {
    const requestId = requestIdOf(transport.sent.at(-1));
    transport.push(
      success
        ? { requestId, success: true, data: body }
        : { requestId, success: false, error: body },
    );
  };

  return { client, transport, logs, answerLast };
}

/** Let pending promise chains run without moving the clock */
const flush = () => vi.advanceTimersByTimeAsync(0);

// ============================================
// Correlation
// ============================================

test("ClientEngine - sends a stamped request", async () => {
  const { client, transport } = setup();

  void client.request("move", { x: 1 });
  await flush();

  expect(transport.sent).toHaveLength(1);
  expect(transport.sent[0]).toMatchObject({
    action: "move",
    payload: { x: 1 },
    senderId: "session-1",
    timestamp: 1_700_000_000_000,
  });
  expect(client.getPendingCount()).toBe(1);
});

test("ClientEngine - resolves with the matching success response", async () => {
  const { client, transport, answerLast } = setup();

  const completion = client.request("echo", "msg");
  await flush();
  answerLast(true, "msg");

  await expect(completion).resolves.toEqual({
    requestId: requestIdOf(transport.sent[0]),
    success: true,
    data: "msg",
  });
  expect(client.getPendingCount()).toBe(0);
});

test("ClientEngine - failure response rejects with the server's message", async () => {
  const { client, answerLast } = setup();

  const completion = client.request("move");
  await flush();
  answerLast(false, "Unknown action");

  const error = await completion.then(
    () => null,
    (reason: unknown) => reason,
  );
  expect(error).toBeInstanceOf(RemoteError);
  expect(error).toMatchObject({
    message: "Unknown action",
    response: { success: false, error: "Unknown action" },
  });
});

test("ClientEngine - responses match by requestId, not arrival order", async () => {
  const { client, transport } = setup();

  const first = client.request("a");
  const second = client.request("b");
  await flush();

  const [idA, idB] = transport.sent.map(requestIdOf);
  transport.push({ requestId: idB, success: true, data: "B" });
  transport.push({ requestId: idA, success: true, data: "A" });

  expect((await first).data).toBe("A");
  expect((await second).data).toBe("B");
});

// ============================================
// Timeout
// ============================================

test("ClientEngine - times out exactly once and discards the late response", async () => {
  const { client, transport, logs } = setup();
  const onResolve = vi.fn();
  const onReject = vi.fn();

  client.request("slow").onResolve(onResolve).onReject(onReject);
  await flush();
  const requestId = requestIdOf(transport.sent[0]);

  await vi.advanceTimersByTimeAsync(999);
  expect(onReject).not.toHaveBeenCalled();

  await vi.advanceTimersByTimeAsync(1);
  expect(onReject).toHaveBeenCalledTimes(1);
  const [reason] = onReject.mock.calls[0];
  expect(reason).toBeInstanceOf(TimeoutError);
  expect(reason).toMatchObject({
    message: `Request ${requestId} timed out after 1000ms`,
  });
  expect(client.getPendingCount()).toBe(0);

  transport.push({ requestId, success: true, data: "late" });
  await flush();

  expect(onResolve).not.toHaveBeenCalled();
  expect(onReject).toHaveBeenCalledTimes(1);
  expect(logs).toContainEqual([
    "request",
    `Discarded response for unknown or settled request ${requestId}`,
  ]);
});

// ============================================
// Retry
// ============================================

test("ClientEngine - retry succeeds on the third attempt", async () => {
  const { client, transport, answerLast } = setup({
    retry: { maxAttempts: 3, baseDelayMs: 100 },
  });
  const onReject = vi.fn();

  const completion = client.request("flaky").onReject(onReject);
  await flush();
  answerLast(false, "Try again");

  await vi.advanceTimersByTimeAsync(100);
  expect(transport.sent).toHaveLength(2);
  answerLast(false, "Try again");

  await vi.advanceTimersByTimeAsync(199);
  expect(transport.sent).toHaveLength(2);
  await vi.advanceTimersByTimeAsync(1);
  expect(transport.sent).toHaveLength(3);
  answerLast(true, "finally");

  expect((await completion).data).toBe("finally");
  expect(onReject).not.toHaveBeenCalled();

  // Every attempt is a fresh request
  expect(new Set(transport.sent.map(requestIdOf)).size).toBe(3);
});

test("ClientEngine - retry surfaces one rejection after the last attempt", async () => {
  const { client, transport, answerLast } = setup({
    retry: { maxAttempts: 3, baseDelayMs: 100 },
  });
  const onReject = vi.fn();

  client.request("broken").onReject(onReject);
  await flush();
  answerLast(false, "Nope 1");
  await vi.advanceTimersByTimeAsync(100);
  answerLast(false, "Nope 2");
  await vi.advanceTimersByTimeAsync(200);
  answerLast(false, "Nope 3");
  await vi.advanceTimersByTimeAsync(10_000);

  expect(transport.sent).toHaveLength(3);
  expect(onReject).toHaveBeenCalledTimes(1);
  expect(onReject.mock.calls[0][0]).toMatchObject({ message: "Nope 3" });
});

test("ClientEngine - retry re-issues after timeouts", async () => {
  const { client, transport } = setup({
    retry: { maxAttempts: 3, baseDelayMs: 100 },
  });
  const onReject = vi.fn();

  client.request("silent").onReject(onReject);

  // 1000 timeout + 100 backoff + 1000 timeout + 200 backoff + 1000 timeout
  await vi.advanceTimersByTimeAsync(3299);
  expect(transport.sent).toHaveLength(3);
  expect(onReject).not.toHaveBeenCalled();

  await vi.advanceTimersByTimeAsync(1);
  expect(onReject).toHaveBeenCalledTimes(1);
  expect(onReject.mock.calls[0][0]).toBeInstanceOf(TimeoutError);
});

// ============================================
// Throttle
// ============================================

test("ClientEngine - reject-mode throttle refuses rapid repeats per action", async () => {
  const { client, transport } = setup({
    throttle: { intervalMs: 100, mode: "reject" },
  });

  void client.request("move");
  const repeat = client.request("move");
  void client.request("chat");

  await expect(repeat).rejects.toBeInstanceOf(ThrottledError);
  await expect(repeat).rejects.toThrow("Request throttled: move");
  expect(transport.sent.map((m) => "action" in m && m.action)).toEqual([
    "move",
    "chat",
  ]);

  await vi.advanceTimersByTimeAsync(100);
  void client.request("move");
  await flush();
  expect(transport.sent).toHaveLength(3);
});

test("ClientEngine - wait-mode throttle delays rapid repeats", async () => {
  const { client, transport } = setup({ throttle: { intervalMs: 100 } });

  void client.request("move");
  void client.request("move");
  void client.request("move");
  await flush();
  expect(transport.sent).toHaveLength(1);

  await vi.advanceTimersByTimeAsync(100);
  expect(transport.sent).toHaveLength(2);

  await vi.advanceTimersByTimeAsync(100);
  expect(transport.sent).toHaveLength(3);
});

test("ClientEngine - a request cancelled while throttled frees its slot", async () => {
  const { client, transport } = setup({ throttle: { intervalMs: 100 } });

  void client.request("move");
  await vi.advanceTimersByTimeAsync(10);
  const queued = client.request("move");
  await vi.advanceTimersByTimeAsync(10);
  queued.cancel();
  await vi.advanceTimersByTimeAsync(30);

  // Arrives at 50ms: spaced from the first request, not the cancelled one
  void client.request("move");
  await vi.advanceTimersByTimeAsync(49);
  expect(transport.sent).toHaveLength(1);

  await vi.advanceTimersByTimeAsync(1);
  expect(transport.sent).toHaveLength(2);
  expect(queued.state).toBe("cancelled");
});

// ============================================
// Cancellation & shutdown
// ============================================

test("ClientEngine - cancel removes the pending request without settling", async () => {
  const { client, transport } = setup();
  const onResolve = vi.fn();
  const onReject = vi.fn();
  const onCancel = vi.fn();

  const completion = client.request("move")
    .onResolve(onResolve)
    .onReject(onReject)
    .onCancel(onCancel);
  await flush();

  expect(completion.cancel()).toBe(true);
  expect(client.getPendingCount()).toBe(0);

  transport.push({
    requestId: requestIdOf(transport.sent[0]),
    success: true,
  });
  await vi.advanceTimersByTimeAsync(5000);

  expect(completion.state).toBe("cancelled");
  expect(onCancel).toHaveBeenCalledTimes(1);
  expect(onResolve).not.toHaveBeenCalled();
  expect(onReject).not.toHaveBeenCalled();
});

test("ClientEngine - cancel during retry backoff stops further attempts", async () => {
  const { client, transport, answerLast } = setup({
    retry: { maxAttempts: 3, baseDelayMs: 100 },
  });

  const completion = client.request("flaky");
  await flush();
  answerLast(false, "Try again");
  await flush();

  completion.cancel();
  await vi.advanceTimersByTimeAsync(10_000);

  expect(transport.sent).toHaveLength(1);
  expect(completion.state).toBe("cancelled");
});

test("ClientEngine - close rejects pending requests and later ones", async () => {
  const { client, transport } = setup();

  const pending = client.request("move");
  await flush();
  client.close();

  await expect(pending).rejects.toBeInstanceOf(ChannelClosedError);
  await expect(client.request("move")).rejects.toThrow("Channel closed");
  expect(client.getPendingCount()).toBe(0);
  expect(client.isClosed()).toBe(true);
  expect(transport.isSubscribed()).toBe(false);
  expect(() => client.init()).toThrow(ChannelClosedError);
});

// ============================================
// Server events
// ============================================

test("ClientEngine - event subscribers run in order despite failures", async () => {
  const { client, transport, logs } = setup();
  const calls: string[] = [];

  client.onServerMessage("chat", (payload) => {
    calls.push(`first:${String(payload)}`);
    throw new Error("subscriber bug");
  });
  client.onServerMessage("chat", () => {
    calls.push("second");
    return Promise.reject(new Error("async bug"));
  });
  client.onServerMessage("chat", () => {
    calls.push("third");
  });

  transport.push({ eventName: "chat", payload: "hello" });
  await flush();

  expect(calls).toEqual(["first:hello", "second", "third"]);
  const failures = logs.filter(([category]) => category === "event");
  expect(failures).toHaveLength(2);
  expect(failures[0][1]).toContain("subscriber bug");
  expect(failures[1][1]).toContain("async bug");
});

test("ClientEngine - unsubscribe stops delivery", () => {
  const { client, transport } = setup();
  const callback = vi.fn();

  const unsubscribe = client.onServerMessage("tick", callback);
  transport.push({ eventName: "tick", payload: 1 });
  unsubscribe();
  transport.push({ eventName: "tick", payload: 2 });

  expect(callback).toHaveBeenCalledTimes(1);
  expect(callback).toHaveBeenCalledWith(1);
});

test("ClientEngine - events never settle pending requests", async () => {
  const { client, transport } = setup();
  const onResolve = vi.fn();

  client.request("move").onResolve(onResolve);
  await flush();
  transport.push({ eventName: "move", payload: { ok: true } });
  await flush();

  expect(onResolve).not.toHaveBeenCalled();
  expect(client.getPendingCount()).toBe(1);
});

test("ClientEngine - malformed inbound messages are dropped", () => {
  const { transport, logs } = setup();

  transport.push({ requestId: 5, success: "maybe" });

  expect(logs).toContainEqual([
    "transport",
    "Discarded malformed message (invalid_request_id)",
  ]);
});

// ============================================
// Middleware & signing
// ============================================

test("ClientEngine - custom middleware sees every attempt", async () => {
  const { client, answerLast } = setup({
    retry: { maxAttempts: 2, baseDelayMs: 10 },
  });
  const attempts: number[] = [];
  client.use(async (ctx, next) => {
    attempts.push(ctx.attempt);
    await next();
  });

  const completion = client.request("flaky");
  await flush();
  answerLast(false, "Try again");
  await vi.advanceTimersByTimeAsync(10);
  answerLast(true, "ok");

  await completion;
  expect(attempts).toEqual([1, 2]);
});

test("ClientEngine - request logging is opt-in", async () => {
  const { client, logs, answerLast } = setup({ enableRequestLogging: true });

  const completion = client.request("ping");
  await flush();
  answerLast(true, "pong");
  await completion;

  expect(logs).toContainEqual(["request", "→ ping #1"]);
  expect(logs.some(([, message]) => message.startsWith("← ping ok"))).toBe(
    true,
  );
});

test("ClientEngine - signs outgoing requests when a secret is set", async () => {
  const { client, transport } = setup({ signingSecret: SECRET });

  void client.request("a");
  void client.request("b");
  await flush();

  expect(transport.sent[0]).toMatchObject({ _seq: 0 });
  expect(transport.sent[1]).toMatchObject({ _seq: 1 });
  expect(transport.sent[0]).toHaveProperty("_hmac");
});
