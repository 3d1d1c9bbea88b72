/**
 * Client Request Engine
 *
 * Untrusted end of the channel. Correlates requests with responses by
 * requestId, enforces a deadline per attempt, runs the client
 * middleware chain (throttle, retry, logging, custom) and fans
 * server-initiated events out to subscribers.
 *
 * @module bastion/client/client
 */

import {
  ChannelClosedError,
  describeError,
  RemoteError,
  RpcError,
  TimeoutError,
} from "../errors.ts";
import { createClientLoggingMiddleware } from "../middleware/logging.ts";
import { createMiddlewareRunner } from "../middleware/runner.ts";
import type { MiddlewareRunner } from "../middleware/types.ts";
import {
  buildRequest,
  type Response,
  type ServerEvent,
} from "../protocol/envelope.ts";
import { isServerEvent, validateResponseShape } from "../protocol/shape.ts";
import { MessageSigner } from "../security/message-signer.ts";
import type { Unsubscribe } from "../transport/channel.ts";
import type {
  ClientContext,
  ClientMiddleware,
  ClientOptions,
  DiagnosticCategory,
  EventCallback,
} from "../types.ts";
import { Completion } from "./completion.ts";
import { createRetryMiddleware } from "./retry.ts";
import { createThrottleMiddleware } from "./throttle.ts";

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * How one attempt ended
 */
type AttemptOutcome =
  | { kind: "response"; response: Response }
  | { kind: "timeout" }
  | { kind: "closed" }
  | { kind: "cancelled" }
  | { kind: "send_failed"; error: unknown };

/**
 * Outstanding attempt awaiting its Response
 */
interface PendingRequest {
  requestId: string;
  action: string;
  createdAt: number;
  deadline: number;
  timer: ReturnType<typeof setTimeout>;
  settle: (outcome: AttemptOutcome) => void;
}

/**
 * ClientEngine issues requests and routes responses and events
 *
 * @example
 * ```typescript
 * const client = new ClientEngine({
 *   channel,
 *   sessionId: "session-1",
 *   retry: { maxAttempts: 3 },
 * });
 * client.init();
 *
 * client.onServerMessage("chat", (msg) => console.log(msg));
 * const res = await client.request("ping");
 * ```
 */
export class ClientEngine {
  private readonly options: ClientOptions;
  private readonly name: string;
  private readonly timeoutMs: number;
  private pendingRequests = new Map<string, PendingRequest>();
  private customMiddlewares: ClientMiddleware[] = [];
  private runner: MiddlewareRunner<ClientContext> | null = null;
  private subscribers = new Map<string, EventCallback[]>();
  private readonly signer: MessageSigner | null;
  private unsubscribe: Unsubscribe | null = null;
  private closed = false;

  constructor(options: ClientOptions) {
    this.options = options;
    this.name = options.name ?? "bastion-client";
    this.timeoutMs = options.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.signer = options.signingSecret
      ? new MessageSigner(options.signingSecret)
      : null;
  }

  /**
   * Subscribe to the channel. Idempotent.
   *
   * @throws {ChannelClosedError} After close()
   */
  init(): void {
    if (this.closed) throw new ChannelClosedError();
    if (this.unsubscribe) return;
    this.unsubscribe = this.options.channel.onReceive((message) =>
      this.receive(message)
    );
    this.log("lifecycle", `Client initialized (session: ${this.options.sessionId})`);
  }

  /**
   * Append a middleware, run after the built-in ones.
   */
  use(middleware: ClientMiddleware): this {
    this.customMiddlewares.push(middleware);
    this.runner = null;
    return this;
  }

  /**
   * Send a request.
   *
   * The completion resolves with the Response on success, rejects with
   * `RemoteError` on a failure Response, `TimeoutError` when no Response
   * arrives in time (after any retries), `ThrottledError` from a
   * rejecting throttle, or `ChannelClosedError` after `close()`.
   */
  request(action: string, payload?: unknown): Completion<Response> {
    const controller = new AbortController();
    const ctx: ClientContext = {
      sessionId: this.options.sessionId,
      action,
      payload,
      attempt: 1,
      cancelled: false,
      signal: controller.signal,
      locals: {},
    };

    const { completion, resolve, reject } = Completion.create<Response>(() => {
      ctx.cancelled = true;
      controller.abort();
      this.abandon(ctx);
      this.log("request", `Cancelled ${action}`);
    });

    if (this.closed) {
      reject(new ChannelClosedError());
      return completion;
    }

    this.getRunner()(ctx).then(
      () => {
        if (ctx.failure) {
          reject(ctx.failure);
        } else if (ctx.response) {
          if (ctx.response.success) resolve(ctx.response);
          else reject(new RemoteError(ctx.response));
        } else if (!ctx.cancelled) {
          reject(new RpcError("rejected", "Request rejected"));
        }
      },
      (error: unknown) => reject(error),
    );

    return completion;
  }

  /**
   * Subscribe to a server-initiated event. Subscribers run in
   * registration order; one that throws does not stop the others.
   */
  onServerMessage(eventName: string, callback: EventCallback): Unsubscribe {
    const list = this.subscribers.get(eventName) ?? [];
    // Wrapped so the same callback can be subscribed twice and removed once
    const entry: EventCallback = (payload) => callback(payload);
    list.push(entry);
    this.subscribers.set(eventName, list);

    return () => {
      const current = this.subscribers.get(eventName);
      if (!current) return;
      const index = current.indexOf(entry);
      if (index !== -1) current.splice(index, 1);
      if (current.length === 0) this.subscribers.delete(eventName);
    };
  }

  /**
   * Stop listening and reject every pending request with ChannelClosedError.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.unsubscribe?.();
    this.unsubscribe = null;

    const pending = [...this.pendingRequests.values()];
    this.pendingRequests.clear();
    for (const entry of pending) {
      clearTimeout(entry.timer);
      entry.settle({ kind: "closed" });
    }
    this.log("lifecycle", `Client closed (${pending.length} pending rejected)`);
  }

  /**
   * Get count of pending requests
   */
  getPendingCount(): number {
    return this.pendingRequests.size;
  }

  isClosed(): boolean {
    return this.closed;
  }

  // ============================================
  // Pipeline
  // ============================================

  private getRunner(): MiddlewareRunner<ClientContext> {
    if (!this.runner) {
      const pipeline: ClientMiddleware[] = [];
      if (this.options.throttle) {
        pipeline.push(createThrottleMiddleware(this.options.throttle));
      }
      if (this.options.retry) {
        pipeline.push(createRetryMiddleware(this.options.retry));
      }
      if (this.options.enableRequestLogging) {
        pipeline.push(
          createClientLoggingMiddleware((msg) => this.log("request", msg)),
        );
      }
      pipeline.push(...this.customMiddlewares);

      this.runner = createMiddlewareRunner(pipeline, (ctx) => this.send(ctx));
    }
    return this.runner;
  }

  /**
   * Terminal action: build, sign and send one attempt, then wait for
   * its Response or deadline.
   */
  private async send(ctx: ClientContext): Promise<void> {
    if (this.closed) {
      ctx.failure = new ChannelClosedError();
      return;
    }

    const request = buildRequest(ctx.action, ctx.payload, this.options.sessionId);
    ctx.request = request;
    const { requestId } = request;
    const wire = this.signer ? this.signer.sign(request) : request;

    const outcome = await new Promise<AttemptOutcome>((settle) => {
      const createdAt = Date.now();
      const timer = setTimeout(() => {
        this.pendingRequests.delete(requestId);
        settle({ kind: "timeout" });
      }, this.timeoutMs);

      this.pendingRequests.set(requestId, {
        requestId,
        action: ctx.action,
        createdAt,
        deadline: createdAt + this.timeoutMs,
        timer,
        settle,
      });

      try {
        this.options.channel.send(wire);
      } catch (error) {
        clearTimeout(timer);
        this.pendingRequests.delete(requestId);
        settle({ kind: "send_failed", error });
      }
    });

    switch (outcome.kind) {
      case "response":
        ctx.response = outcome.response;
        break;
      case "timeout":
        this.log("request", `${ctx.action} [${requestId}] timed out`);
        ctx.failure = new TimeoutError(requestId, this.timeoutMs);
        break;
      case "closed":
        ctx.failure = new ChannelClosedError();
        break;
      case "send_failed":
        this.log("transport", `Send failed: ${describeError(outcome.error)}`);
        ctx.failure = outcome.error instanceof Error
          ? outcome.error
          : new Error(String(outcome.error));
        break;
      case "cancelled":
        ctx.cancelled = true;
        break;
    }
  }

  /**
   * Drop the in-flight attempt of a cancelled call.
   */
  private abandon(ctx: ClientContext): void {
    if (!ctx.request) return;
    const entry = this.pendingRequests.get(ctx.request.requestId);
    if (!entry) return;

    clearTimeout(entry.timer);
    this.pendingRequests.delete(entry.requestId);
    entry.settle({ kind: "cancelled" });
  }

  // ============================================
  // Inbound
  // ============================================

  private receive(message: unknown): void {
    if (isServerEvent(message)) {
      this.emit(message);
      return;
    }

    const shape = validateResponseShape(message);
    if (!shape.ok) {
      this.log("transport", `Discarded malformed message (${shape.reason})`);
      return;
    }

    const response = shape.value;
    const entry = this.pendingRequests.get(response.requestId);
    if (!entry) {
      this.log(
        "request",
        `Discarded response for unknown or settled request ${response.requestId}`,
      );
      return;
    }

    clearTimeout(entry.timer);
    this.pendingRequests.delete(entry.requestId);
    entry.settle({ kind: "response", response });
  }

  private emit(event: ServerEvent): void {
    const list = this.subscribers.get(event.eventName);
    if (!list || list.length === 0) {
      this.log("event", `No subscriber for event: ${event.eventName}`);
      return;
    }

    for (const callback of [...list]) {
      try {
        Promise.resolve(callback(event.payload)).catch((error: unknown) =>
          this.reportSubscriberError(event.eventName, error)
        );
      } catch (error) {
        this.reportSubscriberError(event.eventName, error);
      }
    }
  }

  private reportSubscriberError(eventName: string, error: unknown): void {
    this.log(
      "event",
      `Subscriber for "${eventName}" failed: ${describeError(error)}`,
    );
  }

  /**
   * Log through the diagnostics sink or stderr
   */
  private log(category: DiagnosticCategory, msg: string): void {
    if (this.options.logger) {
      this.options.logger(category, msg);
    } else {
      console.error(`[${this.name}] [${category}] ${msg}`);
    }
  }
}
