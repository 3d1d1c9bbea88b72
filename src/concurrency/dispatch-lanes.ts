/**
 * Per-sender dispatch lanes with backpressure
 *
 * Each sender gets a FIFO lane: its messages are dispatched one at a
 * time, in arrival order, while other senders' lanes interleave at
 * await points. A lane whose backlog is full rejects new work.
 *
 * @module bastion/concurrency/dispatch-lanes
 */

import { BackpressureError } from "../errors.ts";

/**
 * Lane metrics for monitoring
 */
export interface LaneMetrics {
  /** Senders with a dispatch in progress */
  activeLanes: number;

  /** Dispatches waiting behind an active one */
  queued: number;
}

interface Lane {
  waiters: Array<() => void>;
}

/**
 * DispatchLanes serializes work per key
 *
 * @example
 * ```typescript
 * const lanes = new DispatchLanes({ maxQueuedPerLane: 64 });
 *
 * await lanes.acquire(senderId);
 * try {
 *   // dispatch one message
 * } finally {
 *   lanes.release(senderId);
 * }
 * ```
 */
export class DispatchLanes {
  private lanes = new Map<string, Lane>();
  private readonly maxQueuedPerLane: number;

  constructor(options: { maxQueuedPerLane: number }) {
    this.maxQueuedPerLane = options.maxQueuedPerLane;
  }

  /**
   * Acquire the lane for a key. Resolves when every earlier holder of
   * the same key has released it.
   *
   * @throws {BackpressureError} If the lane's backlog is full
   */
  async acquire(key: string): Promise<void> {
    const lane = this.lanes.get(key);
    if (!lane) {
      this.lanes.set(key, { waiters: [] });
      return;
    }

    if (lane.waiters.length >= this.maxQueuedPerLane) {
      throw new BackpressureError();
    }
    // Ownership is handed over directly by release(), no re-check needed
    await new Promise<void>((resolve) => {
      lane.waiters.push(resolve);
    });
  }

  /**
   * Release the lane, waking the next waiter for the same key
   */
  release(key: string): void {
    const lane = this.lanes.get(key);
    if (!lane) return;

    const next = lane.waiters.shift();
    if (next) {
      next();
    } else {
      this.lanes.delete(key);
    }
  }

  /**
   * Run a task inside the key's lane
   */
  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    await this.acquire(key);
    try {
      return await task();
    } finally {
      this.release(key);
    }
  }

  /**
   * Get current lane metrics for monitoring
   */
  getMetrics(): LaneMetrics {
    let queued = 0;
    for (const lane of this.lanes.values()) {
      queued += lane.waiters.length;
    }
    return { activeLanes: this.lanes.size, queued };
  }

  /**
   * Check if a key currently holds its lane
   */
  isActive(key: string): boolean {
    return this.lanes.has(key);
  }
}
