/**
 * Completion handle for client requests
 *
 * A thenable with three terminal states. It settles at most once;
 * `cancel()` moves it to `cancelled` without calling any resolve or
 * reject continuation, so an `await` on a cancelled completion never
 * resumes.
 *
 * @module bastion/client/completion
 */

export type CompletionState = "pending" | "resolved" | "rejected" | "cancelled";

/**
 * Settlement side of a completion, kept by whoever produces the value
 */
export interface CompletionSource<T> {
  completion: Completion<T>;
  resolve(value: T): void;
  reject(reason: unknown): void;
}

type Outcome<T> =
  | { state: "pending" }
  | { state: "resolved"; value: T }
  | { state: "rejected"; reason: unknown }
  | { state: "cancelled" };

/**
 * Caller-facing completion
 *
 * @example
 * ```typescript
 * const pending = client.request("move", { x: 1, y: 2 })
 *   .onResolve((res) => render(res.data))
 *   .onReject((err) => toast(err))
 *   .onCancel(() => spinner.stop());
 *
 * pending.cancel();
 * ```
 */
export class Completion<T> implements PromiseLike<T> {
  private outcome: Outcome<T> = { state: "pending" };
  private resolveCallbacks: Array<(value: T) => void> = [];
  private rejectCallbacks: Array<(reason: unknown) => void> = [];
  private cancelCallbacks: Array<() => void> = [];
  private promise: Promise<T> | null = null;
  private settlePromise: {
    resolve: (value: T) => void;
    reject: (reason: unknown) => void;
  } | null = null;

  /**
   * @param canceller - Producer hook run once when the owner cancels
   */
  private constructor(private readonly canceller: () => void) {}

  /**
   * Create a completion and the functions that settle it.
   */
  static create<T>(canceller: () => void = () => {}): CompletionSource<T> {
    const completion = new Completion<T>(canceller);
    return {
      completion,
      resolve: (value) => completion.settle({ state: "resolved", value }),
      reject: (reason) => completion.settle({ state: "rejected", reason }),
    };
  }

  get state(): CompletionState {
    return this.outcome.state;
  }

  /**
   * Register a continuation for success. Runs immediately if already resolved.
   */
  onResolve(callback: (value: T) => void): this {
    const outcome = this.outcome;
    if (outcome.state === "resolved") {
      invoke(() => callback(outcome.value));
    } else if (outcome.state === "pending") {
      this.resolveCallbacks.push(callback);
    }
    return this;
  }

  /**
   * Register a continuation for failure. Runs immediately if already rejected.
   */
  onReject(callback: (reason: unknown) => void): this {
    const outcome = this.outcome;
    if (outcome.state === "rejected") {
      invoke(() => callback(outcome.reason));
    } else if (outcome.state === "pending") {
      this.rejectCallbacks.push(callback);
    }
    return this;
  }

  /**
   * Register a continuation for cancellation. Runs immediately if already cancelled.
   */
  onCancel(callback: () => void): this {
    if (this.outcome.state === "cancelled") {
      invoke(callback);
    } else if (this.outcome.state === "pending") {
      this.cancelCallbacks.push(callback);
    }
    return this;
  }

  /**
   * Cancel a pending completion.
   *
   * @returns false if it had already settled
   */
  cancel(): boolean {
    if (this.outcome.state !== "pending") return false;
    this.outcome = { state: "cancelled" };

    const callbacks = this.cancelCallbacks;
    this.clearCallbacks();
    this.canceller();
    for (const callback of callbacks) invoke(callback);
    return true;
  }

  then<R1 = T, R2 = never>(
    onfulfilled?: ((value: T) => R1 | PromiseLike<R1>) | null,
    onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null,
  ): Promise<R1 | R2> {
    return this.toPromise().then(onfulfilled, onrejected);
  }

  private toPromise(): Promise<T> {
    if (this.promise) return this.promise;

    const outcome = this.outcome;
    switch (outcome.state) {
      case "resolved":
        this.promise = Promise.resolve(outcome.value);
        break;
      case "rejected":
        this.promise = Promise.reject(outcome.reason);
        break;
      default:
        // Created lazily: a rejection nobody awaits is not reported as unhandled
        this.promise = new Promise<T>((resolve, reject) => {
          this.settlePromise = { resolve, reject };
        });
    }
    return this.promise;
  }

  private settle(outcome: Outcome<T>): void {
    if (this.outcome.state !== "pending") return;
    this.outcome = outcome;

    const resolveCallbacks = this.resolveCallbacks;
    const rejectCallbacks = this.rejectCallbacks;
    this.clearCallbacks();

    if (outcome.state === "resolved") {
      this.settlePromise?.resolve(outcome.value);
      for (const callback of resolveCallbacks) {
        invoke(() => callback(outcome.value));
      }
    } else if (outcome.state === "rejected") {
      this.settlePromise?.reject(outcome.reason);
      for (const callback of rejectCallbacks) {
        invoke(() => callback(outcome.reason));
      }
    }
    this.settlePromise = null;
  }

  private clearCallbacks(): void {
    this.resolveCallbacks = [];
    this.rejectCallbacks = [];
    this.cancelCallbacks = [];
  }
}

function invoke(callback: () => void): void {
  try {
    callback();
  } catch (error) {
    console.error("[Completion] Continuation threw:", error);
  }
}
