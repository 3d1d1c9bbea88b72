/**
 * Bastion RPC
 *
 * Server-authoritative request/response messaging over a bidirectional
 * channel. The server router validates, rate-limits and authorizes every
 * request before its handler runs; the client engine correlates
 * responses, enforces deadlines and retries, and receives server events.
 *
 * @example
 * ```typescript
 * import { ClientEngine, LocalHub, ok, ServerRouter } from "bastion-rpc";
 *
 * const hub = new LocalHub();
 *
 * const router = new ServerRouter({ channel: hub.server, maxRequestRate: 30 });
 * router.handle("echo", (_senderId, payload) => ok(payload), {
 *   schema: { type: "string" },
 * });
 * router.init();
 *
 * const client = new ClientEngine({
 *   channel: hub.connect("session-1"),
 *   sessionId: "session-1",
 *   retry: { maxAttempts: 3 },
 * });
 * client.init();
 *
 * const res = await client.request("echo", "msg");
 * ```
 *
 * @module bastion
 */

// Server
export { ServerRouter } from "./src/server/router.ts";

// Client
export { ClientEngine } from "./src/client/client.ts";
export {
  Completion,
  type CompletionSource,
  type CompletionState,
} from "./src/client/completion.ts";
export {
  backoffDelay,
  createRetryMiddleware,
  isRetryable,
} from "./src/client/retry.ts";
export { createThrottleMiddleware } from "./src/client/throttle.ts";

// Protocol
export {
  buildEvent,
  buildRequest,
  buildResponse,
  fail,
  generateRequestId,
  type HandlerOutcome,
  ok,
  type Payload,
  type Request,
  type Response,
  type ServerEvent,
  type WireMessage,
} from "./src/protocol/envelope.ts";
export {
  extractRequestId,
  isAllowedPayload,
  isServerEvent,
  type ShapeFailureReason,
  type ShapeResult,
  validateRequestShape,
  validateResponseShape,
} from "./src/protocol/shape.ts";

// Transport
export {
  BROADCAST,
  type ClientChannel,
  type SendTarget,
  type ServerChannel,
  type Unsubscribe,
} from "./src/transport/channel.ts";
export {
  LocalHub,
  type LocalHubOptions,
  type LocalSession,
} from "./src/transport/local-hub.ts";

// Concurrency primitives
export { RateLimiter } from "./src/concurrency/rate-limiter.ts";
export { DispatchLanes, type LaneMetrics } from "./src/concurrency/dispatch-lanes.ts";

// Channel signing
export { MessageSigner, type VerifyResult } from "./src/security/message-signer.ts";

// Schema validation
export { SchemaValidator } from "./src/validation/schema-validator.ts";
export type {
  ValidationError,
  ValidationResult,
} from "./src/validation/schema-validator.ts";

// Middleware
export * from "./src/middleware/mod.ts";

// Errors
export {
  AuthorizationError,
  BackpressureError,
  ChannelClosedError,
  describeError,
  HandlerError,
  RateLimitError,
  RemoteError,
  ReplayError,
  RpcError,
  type RpcErrorCode,
  SenderMismatchError,
  ShapeError,
  SignatureError,
  ThrottledError,
  TimeoutError,
  UnknownActionError,
} from "./src/errors.ts";

// Configuration
export {
  type ChannelConfig,
  DEFAULT_CHANNEL_CONFIG,
  loadChannelConfig,
  toClientOptions,
  toRouterOptions,
} from "./src/config/config.ts";

// Observability
export * from "./src/observability/mod.ts";

// Type exports
export type {
  AdminPredicate,
  ClientContext,
  ClientMiddleware,
  ClientOptions,
  DiagnosticCategory,
  DiagnosticsSink,
  EventCallback,
  Handler,
  HandleOptions,
  HandlerRegistration,
  RetryOptions,
  RouterOptions,
  ServerContext,
  ServerMiddleware,
  ThrottleOptions,
} from "./src/types.ts";
