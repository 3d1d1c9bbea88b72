/**
 * In-process channel hub
 *
 * Connects one server endpoint to any number of client sessions inside
 * a single process. Every message is copied through JSON, as a real
 * transport would serialize it, and delivered asynchronously.
 *
 * Used by tests and by hosts that run server and clients together.
 *
 * @module bastion/transport/local-hub
 */

import { describeError } from "../errors.ts";
import type { WireMessage } from "../protocol/envelope.ts";
import {
  BROADCAST,
  type ClientChannel,
  type SendTarget,
  type ServerChannel,
  type Unsubscribe,
} from "./channel.ts";

/**
 * Client end of a hub session
 */
export interface LocalSession extends ClientChannel {
  readonly sessionId: string;

  /** Tear the session down; the server sees a disconnect */
  disconnect(): void;
}

export interface LocalHubOptions {
  /** Receives delivery failures (default: console.error) */
  logger?: (msg: string) => void;
}

/**
 * LocalHub wires a ServerChannel to ClientChannels in memory
 *
 * @example
 * ```typescript
 * const hub = new LocalHub();
 * const router = new ServerRouter({ channel: hub.server });
 * const alice = hub.connect("alice");
 * const client = new ClientEngine({ channel: alice, sessionId: "alice" });
 * ```
 */
export class LocalHub {
  private clientReceivers = new Map<string, Set<(message: unknown) => void>>();
  private serverReceivers = new Set<(senderId: string, message: unknown) => void>();
  private disconnectListeners = new Set<(senderId: string) => void>();
  private readonly options: LocalHubOptions;

  /** Server end of the hub */
  readonly server: ServerChannel;

  constructor(options: LocalHubOptions = {}) {
    this.options = options;
    this.server = {
      send: (target, message) => this.sendFromServer(target, message),
      onReceive: (callback) => subscribe(this.serverReceivers, callback),
      onDisconnect: (callback) => subscribe(this.disconnectListeners, callback),
    };
  }

  /**
   * Open a client session.
   *
   * @throws {Error} If the session id is already connected
   */
  connect(sessionId: string): LocalSession {
    if (this.clientReceivers.has(sessionId)) {
      throw new Error(`[LocalHub] Session already connected: ${sessionId}`);
    }
    const receivers = new Set<(message: unknown) => void>();
    this.clientReceivers.set(sessionId, receivers);

    return {
      sessionId,
      send: (message) => this.inject(sessionId, message),
      onReceive: (callback) => subscribe(receivers, callback),
      disconnect: () => this.disconnect(sessionId),
    };
  }

  /**
   * Close a session and notify the server.
   */
  disconnect(sessionId: string): void {
    if (!this.clientReceivers.delete(sessionId)) return;
    for (const listener of this.disconnectListeners) {
      this.deliver(() => listener(sessionId));
    }
  }

  /**
   * Deliver an arbitrary value to the server as if `sessionId` sent it.
   * Messages from unknown sessions are dropped.
   */
  inject(sessionId: string, message: unknown): void {
    if (!this.clientReceivers.has(sessionId)) return;
    const copy = roundTrip(message);
    for (const receiver of this.serverReceivers) {
      this.deliver(() => receiver(sessionId, copy));
    }
  }

  /**
   * Connected session ids, in connection order
   */
  getSessionIds(): string[] {
    return [...this.clientReceivers.keys()];
  }

  private sendFromServer(target: SendTarget, message: WireMessage): void {
    const copy = roundTrip(message);
    const sessions = target === BROADCAST
      ? [...this.clientReceivers.values()]
      : [this.clientReceivers.get(target)];

    for (const receivers of sessions) {
      if (!receivers) continue;
      for (const receiver of receivers) {
        this.deliver(() => receiver(copy));
      }
    }
  }

  private deliver(task: () => void): void {
    Promise.resolve().then(task).catch((error: unknown) => {
      const msg = `[LocalHub] Delivery failed: ${describeError(error)}`;
      if (this.options.logger) {
        this.options.logger(msg);
      } else {
        console.error(msg);
      }
    });
  }
}

function subscribe<T>(set: Set<T>, callback: T): Unsubscribe {
  set.add(callback);
  return () => {
    set.delete(callback);
  };
}

function roundTrip(message: unknown): unknown {
  if (message === undefined) return undefined;
  const copy: unknown = JSON.parse(JSON.stringify(message));
  return copy;
}
