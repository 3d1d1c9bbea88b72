/**
 * Server Router
 *
 * Authoritative end of the channel. Owns the handler registry, the
 * global and per-action middleware, the per-sender rate limiter and
 * dispatch lanes, and answers every inbound request with exactly one
 * Response.
 *
 * Pipeline order per request:
 * lane → shape → signature → security → rate-limit → logging →
 * global middlewares → admin → per-action middlewares → schema → handler
 *
 * @module bastion/server/router
 */

import type { SchemaObject } from "ajv";
import { DispatchLanes } from "../concurrency/dispatch-lanes.ts";
import { RateLimiter } from "../concurrency/rate-limiter.ts";
import {
  AuthorizationError,
  describeError,
  HandlerError,
  ReplayError,
  RpcError,
  SenderMismatchError,
  ShapeError,
  SignatureError,
  UnknownActionError,
} from "../errors.ts";
import { createAdminMiddleware } from "../middleware/admin.ts";
import { createLoggingMiddleware } from "../middleware/logging.ts";
import { createRateLimitMiddleware } from "../middleware/rate-limit.ts";
import { createMiddlewareRunner } from "../middleware/runner.ts";
import { createSecurityMiddleware } from "../middleware/security.ts";
import type { MiddlewareRunner } from "../middleware/types.ts";
import { createValidationMiddleware } from "../middleware/validation.ts";
import {
  type ServerMetricsSnapshot,
  ServerMetrics,
} from "../observability/metrics.ts";
import {
  endDispatchSpan,
  isOtelEnabled,
  recordSecurityEvent,
  startDispatchSpan,
} from "../observability/otel.ts";
import {
  buildEvent,
  buildResponse,
  type Response,
} from "../protocol/envelope.ts";
import {
  extractRequestId,
  isPlainObject,
  validateRequestShape,
} from "../protocol/shape.ts";
import { MessageSigner, stripSignature } from "../security/message-signer.ts";
import { BROADCAST, type Unsubscribe } from "../transport/channel.ts";
import type {
  DiagnosticCategory,
  Handler,
  HandleOptions,
  HandlerRegistration,
  RouterOptions,
  ServerContext,
  ServerMiddleware,
} from "../types.ts";
import { SchemaValidator } from "../validation/schema-validator.ts";

const DEFAULTS = {
  name: "bastion",
  maxRequestRate: 30,
  rateLimitWindowMs: 1000,
  maxRequestAgeMs: 30_000,
  maxClockSkewMs: 5_000,
  maxQueuedPerSender: 64,
} as const;

/** Sentinel key for the runner used by unregistered actions */
const UNKNOWN_ACTION_RUNNER = Symbol("unknown-action");

/**
 * ServerRouter dispatches requests from many sessions to handlers
 *
 * @example
 * ```typescript
 * const router = new ServerRouter({ channel, isAdmin: (id) => admins.has(id) });
 *
 * router.handle("ping", () => ok("pong"));
 * router.handle("kick", (_sender, { target }) => kick(target), { admin: true });
 * router.use(async (ctx, next) => {
 *   ctx.locals.receivedAt = Date.now();
 *   await next();
 * });
 *
 * router.init();
 * ```
 */
export class ServerRouter {
  private readonly options: RouterOptions;
  private readonly name: string;
  private handlers = new Map<string, HandlerRegistration>();
  private globalMiddlewares: ServerMiddleware[] = [];
  private actionMiddlewares = new Map<string, ServerMiddleware[]>();
  private runners = new Map<string | symbol, MiddlewareRunner<ServerContext>>();
  private readonly rateLimiter: RateLimiter;
  private readonly lanes: DispatchLanes;
  private readonly schemaValidator = new SchemaValidator();
  private readonly verifiers = new Map<string, MessageSigner>();
  private readonly serverMetrics = new ServerMetrics();
  private subscriptions: Unsubscribe[] = [];
  private initialized = false;

  constructor(options: RouterOptions) {
    this.options = options;
    this.name = options.name ?? DEFAULTS.name;
    this.rateLimiter = new RateLimiter({
      maxRequests: options.maxRequestRate ?? DEFAULTS.maxRequestRate,
      windowMs: options.rateLimitWindowMs ?? DEFAULTS.rateLimitWindowMs,
    });
    this.lanes = new DispatchLanes({
      maxQueuedPerLane: options.maxQueuedPerSender ??
        DEFAULTS.maxQueuedPerSender,
    });
  }

  // ============================================
  // Lifecycle
  // ============================================

  /**
   * Subscribe to the channel. Idempotent; messages that arrive before
   * `init()` are never seen.
   */
  init(): void {
    if (this.initialized) return;
    const { channel } = this.options;

    this.subscriptions.push(
      channel.onReceive((senderId, message) => {
        this.dispatch(senderId, message).catch((error: unknown) => {
          this.log("dispatch", `Dispatch crashed: ${describeError(error)}`);
        });
      }),
    );
    if (channel.onDisconnect) {
      this.subscriptions.push(
        channel.onDisconnect((senderId) => this.disconnect(senderId)),
      );
    }

    this.initialized = true;
    this.log("lifecycle", `Router initialized (${this.handlers.size} actions)`);
  }

  /**
   * Unsubscribe from the channel. Registrations are kept.
   */
  shutdown(): void {
    for (const unsubscribe of this.subscriptions) unsubscribe();
    this.subscriptions = [];
    this.initialized = false;
    this.log("lifecycle", "Router shut down");
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Forget a session: rate-limit window and signature sequence state.
   * Called automatically when the channel reports a disconnect.
   */
  disconnect(senderId: string): void {
    this.rateLimiter.clear(senderId);
    this.verifiers.delete(senderId);
    this.serverMetrics.recordDisconnect();
    this.log("lifecycle", `Session disconnected: ${senderId}`);
  }

  // ============================================
  // Registration
  // ============================================

  /**
   * Register (or replace) the handler for an action.
   *
   * @throws {Error} If `options.admin` is set but no `isAdmin` predicate was configured
   * @throws {Error} If ajv cannot compile `options.schema`
   */
  handle<D = unknown>(
    action: string,
    handler: Handler<D>,
    options: HandleOptions = {},
  ): this {
    if (action.length === 0) {
      throw new Error("[ServerRouter] Action name must not be empty");
    }
    if (options.admin && !this.options.isAdmin) {
      throw new Error(
        `[ServerRouter] Action "${action}" is admin-only but no isAdmin predicate was configured`,
      );
    }

    // Compiled first: a schema ajv rejects leaves the registry untouched
    this.registerSchema(action, options.schema);

    const replaced = this.handlers.has(action);
    this.handlers.set(action, {
      action,
      handler,
      schema: options.schema,
      admin: options.admin ?? false,
    });
    this.runners.delete(action);

    this.log(
      "registry",
      `${replaced ? "Replaced" : "Registered"} action: ${action}` +
        (options.admin ? " (admin)" : ""),
    );
    return this;
  }

  /**
   * Remove an action's handler. Its per-action middleware is kept.
   */
  unhandle(action: string): boolean {
    const removed = this.handlers.delete(action);
    if (removed) {
      this.schemaValidator.removeSchema(action);
      this.runners.delete(action);
      this.log("registry", `Removed action: ${action}`);
    }
    return removed;
  }

  /**
   * Append a middleware that runs for every action.
   */
  use(middleware: ServerMiddleware): this {
    this.globalMiddlewares.push(middleware);
    this.runners.clear();
    return this;
  }

  /**
   * Append a middleware that runs only for one action, after the
   * global ones.
   */
  useForAction(action: string, middleware: ServerMiddleware): this {
    const list = this.actionMiddlewares.get(action) ?? [];
    list.push(middleware);
    this.actionMiddlewares.set(action, list);
    this.runners.delete(action);
    return this;
  }

  getActions(): string[] {
    return [...this.handlers.keys()];
  }

  // ============================================
  // Outbound events
  // ============================================

  /**
   * Push an event to every connected session.
   */
  broadcast(eventName: string, payload: unknown): void {
    if (!this.initialized) {
      this.log("event", `broadcast("${eventName}") before init() ignored`);
      return;
    }
    this.send(BROADCAST, eventName, payload);
  }

  /**
   * Push an event to one session.
   */
  sendToClient(senderId: string, eventName: string, payload: unknown): void {
    if (!this.initialized) {
      this.log("event", `sendToClient("${eventName}") before init() ignored`);
      return;
    }
    this.send(senderId, eventName, payload);
  }

  private send(
    target: string | typeof BROADCAST,
    eventName: string,
    payload: unknown,
  ): void {
    try {
      this.options.channel.send(target, buildEvent(eventName, payload));
      this.serverMetrics.recordEventSent();
    } catch (error) {
      this.log("transport", `Failed to send event "${eventName}": ${describeError(error)}`);
    }
  }

  // ============================================
  // Dispatch
  // ============================================

  /**
   * Process one raw inbound message from a session.
   *
   * Always produces a Response and sends it back to the sender; the
   * returned promise resolves with that Response.
   */
  async dispatch(senderId: string, raw: unknown): Promise<Response> {
    try {
      return await this.lanes.run(senderId, () => this.process(senderId, raw));
    } catch (error) {
      // Only reached when the lane itself refused the message
      const response = this.toFailureResponse(error, extractRequestId(raw), senderId);
      this.serverMetrics.recordDispatch(undefined, false, 0);
      this.reply(senderId, response);
      return response;
    }
  }

  private async process(senderId: string, raw: unknown): Promise<Response> {
    const start = performance.now();
    this.updateGauges();

    let action: string | undefined;
    let response: Response;
    const span = isOtelEnabled()
      ? startDispatchSpan(actionOf(raw), {
        "rpc.action": actionOf(raw),
        "rpc.router.name": this.name,
        "rpc.sender.id": senderId,
        "rpc.request.id": extractRequestId(raw),
      })
      : null;

    try {
      const ctx = this.prepareContext(senderId, raw);
      if (ctx.registration) action = ctx.request.action;

      await this.runnerFor(ctx.request.action)(ctx);

      const outcome = ctx.response ??
        buildResponse(false, undefined, "Request rejected", ctx.request.requestId);
      if (!ctx.response) this.serverMetrics.recordRejection("rejected");
      response = { ...outcome, requestId: ctx.request.requestId };
    } catch (error) {
      response = this.toFailureResponse(error, extractRequestId(raw), senderId);
    }

    const durationMs = performance.now() - start;
    this.serverMetrics.recordDispatch(action, response.success, durationMs);
    if (span) endDispatchSpan(span, response.success, durationMs, response.error);

    this.reply(senderId, response);
    return response;
  }

  /**
   * Shape check and signature verification, before any middleware runs.
   */
  private prepareContext(senderId: string, raw: unknown): ServerContext {
    const shape = validateRequestShape(raw);
    if (!shape.ok) {
      throw new ShapeError(shape.reason);
    }

    const secret = this.options.signing?.secretFor(senderId);
    if (secret !== undefined) {
      const result = this.verifierFor(senderId, secret).verify(shape.value);
      if (!result.valid) {
        throw new SignatureError(result.error);
      }
    }

    const request = stripSignature(shape.value);
    return {
      senderId,
      request,
      registration: this.handlers.get(request.action),
      cancelled: false,
      locals: {},
    };
  }

  private verifierFor(senderId: string, secret: string): MessageSigner {
    let verifier = this.verifiers.get(senderId);
    if (!verifier) {
      verifier = new MessageSigner(secret);
      this.verifiers.set(senderId, verifier);
    }
    return verifier;
  }

  /**
   * Get (or build and cache) the pipeline for an action.
   */
  private runnerFor(action: string): MiddlewareRunner<ServerContext> {
    const registration = this.handlers.get(action);
    const key = registration ? action : UNKNOWN_ACTION_RUNNER;

    let runner = this.runners.get(key);
    if (!runner) {
      runner = createMiddlewareRunner(
        this.buildPipeline(registration),
        (ctx) => this.invokeHandler(ctx),
      );
      this.runners.set(key, runner);
    }
    return runner;
  }

  private buildPipeline(
    registration: HandlerRegistration | undefined,
  ): ServerMiddleware[] {
    const pipeline: ServerMiddleware[] = [];

    // 1. Replay / sender binding (always)
    pipeline.push(createSecurityMiddleware({
      maxRequestAgeMs: this.options.maxRequestAgeMs ?? DEFAULTS.maxRequestAgeMs,
      maxClockSkewMs: this.options.maxClockSkewMs ?? DEFAULTS.maxClockSkewMs,
    }));

    // 2. Rate limiting
    if (this.options.enableRateLimiting ?? true) {
      pipeline.push(createRateLimitMiddleware(this.rateLimiter));
    }

    // 3. Request logging
    if (this.options.enableRequestLogging ?? false) {
      pipeline.push(
        createLoggingMiddleware((message) => this.log("dispatch", message)),
      );
    }

    // 4. Global middlewares
    pipeline.push(...this.globalMiddlewares);

    if (!registration) return pipeline;

    // 5. Admin gate
    if (registration.admin && this.options.isAdmin) {
      pipeline.push(createAdminMiddleware(this.options.isAdmin));
    }

    // 6. Per-action middlewares
    pipeline.push(...(this.actionMiddlewares.get(registration.action) ?? []));

    // 7. Payload schema
    if (registration.schema) {
      pipeline.push(createValidationMiddleware(this.schemaValidator));
    }

    return pipeline;
  }

  /**
   * Terminal action. Always leaves a Response on the context, so the
   * after-steps of every middleware see the outcome, failures included.
   */
  private async invokeHandler(ctx: ServerContext): Promise<void> {
    const { request, senderId } = ctx;
    try {
      ctx.response = await this.runHandler(ctx);
    } catch (error) {
      ctx.response = this.toFailureResponse(error, request.requestId, senderId);
    }
  }

  private async runHandler(ctx: ServerContext): Promise<Response> {
    const { registration, request, senderId } = ctx;
    if (!registration) {
      throw new UnknownActionError(request.action);
    }

    let outcome: unknown;
    try {
      outcome = await registration.handler(senderId, request.payload);
    } catch (error) {
      throw new HandlerError(error);
    }

    if (!isPlainObject(outcome)) {
      throw malformedOutcome(request.action);
    }
    const { success, data, error } = outcome;
    if (typeof success !== "boolean") {
      throw malformedOutcome(request.action);
    }

    return buildResponse(
      success,
      success ? data : undefined,
      typeof error === "string" && error.length > 0 ? error : undefined,
      request.requestId,
    );
  }

  /**
   * Map a thrown rejection to its client-safe Response and report it.
   */
  private toFailureResponse(
    error: unknown,
    requestId: string,
    senderId: string,
  ): Response {
    if (!(error instanceof RpcError)) {
      this.serverMetrics.recordHandlerError();
      this.log("dispatch", `Pipeline failure for ${senderId}: ${describeError(error)}`);
      return buildResponse(false, undefined, "Operation failed", requestId);
    }

    this.report(error, senderId, requestId);
    return buildResponse(false, undefined, error.message, requestId);
  }

  private report(error: RpcError, senderId: string, requestId: string): void {
    const from = `${senderId} [${requestId || "no id"}]`;

    if (error instanceof HandlerError) {
      this.serverMetrics.recordHandlerError();
      this.log("handler", `Handler failed for ${from}: ${describeError(error.cause)}`);
      return;
    }

    switch (error.code) {
      case "invalid_shape":
      case "replay":
      case "sender_mismatch":
      case "invalid_signature":
      case "rate_limited":
      case "busy":
      case "unauthorized":
      case "unknown_action":
        this.serverMetrics.recordRejection(error.code);
        break;
    }

    if (error instanceof ShapeError) {
      this.log("security", `Malformed request from ${from}: ${error.reason}`);
    } else if (error instanceof ReplayError) {
      this.log("security", `Expired request from ${from} (age ${error.ageMs}ms)`);
      this.traceSecurity("replay", senderId);
    } else if (error instanceof SenderMismatchError) {
      this.log("security", `Sender mismatch from ${from}`);
      this.traceSecurity("sender_mismatch", senderId);
    } else if (error instanceof SignatureError) {
      this.log("security", `Bad signature from ${from}: ${error.reason}`);
      this.traceSecurity("invalid_signature", senderId);
    } else if (error instanceof AuthorizationError) {
      this.log("security", `Unauthorized "${error.action}" from ${from}`);
      this.traceSecurity("unauthorized", senderId);
    } else if (error.code === "rate_limited") {
      this.log("rate-limit", `Rate limit exceeded by ${from}`);
    } else {
      this.log("dispatch", `${error.message} for ${from}`);
    }
  }

  private traceSecurity(
    event: "replay" | "sender_mismatch" | "invalid_signature" | "unauthorized",
    senderId: string,
  ): void {
    if (isOtelEnabled()) {
      recordSecurityEvent(event, { "rpc.sender.id": senderId });
    }
  }

  private reply(senderId: string, response: Response): void {
    try {
      this.options.channel.send(senderId, response);
    } catch (error) {
      this.log("transport", `Failed to reply to ${senderId}: ${describeError(error)}`);
    }
  }

  private registerSchema(action: string, schema: SchemaObject | undefined): void {
    if (schema) {
      this.schemaValidator.addSchema(action, schema);
    } else {
      this.schemaValidator.removeSchema(action);
    }
  }

  // ============================================
  // Metrics
  // ============================================

  private updateGauges(): void {
    const lanes = this.lanes.getMetrics();
    this.serverMetrics.setGauges({
      activeLanes: lanes.activeLanes,
      queuedDispatches: lanes.queued,
      rateLimiterKeys: this.rateLimiter.getMetrics().keys,
      registeredActions: this.handlers.size,
    });
  }

  /**
   * Get full router metrics (counters, histograms, gauges)
   */
  getMetrics(): ServerMetricsSnapshot {
    this.updateGauges();
    return this.serverMetrics.getSnapshot();
  }

  /**
   * Get Prometheus text format metrics
   */
  getPrometheusMetrics(): string {
    this.updateGauges();
    return this.serverMetrics.toPrometheusFormat();
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

function malformedOutcome(action: string): HandlerError {
  return new HandlerError(
    new TypeError(`Handler for "${action}" returned a malformed outcome`),
  );
}

function actionOf(raw: unknown): string {
  return isPlainObject(raw) && typeof raw.action === "string"
    ? raw.action.slice(0, 128)
    : "invalid";
}
