/**
 * Channel collaborator contracts.
 *
 * The physical transport is supplied by the host environment; the core
 * only needs an addressable send and a receive subscription on each side.
 *
 * @module bastion/transport/channel
 */

import type { WireMessage } from "../protocol/envelope.ts";

/** Target meaning "every connected session". */
export const BROADCAST: unique symbol = Symbol("bastion.broadcast");

export type SendTarget = string | typeof BROADCAST;

/** Removes a subscription. */
export type Unsubscribe = () => void;

/**
 * Server end: one endpoint talking to many sessions.
 */
export interface ServerChannel {
  send(target: SendTarget, message: WireMessage): void;

  /** Inbound messages, tagged with the sender's session id. */
  onReceive(callback: (senderId: string, message: unknown) => void): Unsubscribe;

  /** Session teardown notifications (optional). */
  onDisconnect?(callback: (senderId: string) => void): Unsubscribe;
}

/**
 * Client end: one session talking to the server.
 */
export interface ClientChannel {
  send(message: WireMessage): void;

  onReceive(callback: (message: unknown) => void): Unsubscribe;
}
