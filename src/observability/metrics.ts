/**
 * Dispatch metrics collector
 *
 * In-memory counters, histograms, and gauges with Prometheus text format export.
 * Embedded in ServerRouter.
 *
 * @module bastion/observability/metrics
 */

/**
 * Histogram bucket
 */
export interface HistogramBucket {
  le: number;
  count: number;
}

/**
 * Latency histogram with cumulative buckets
 */
export interface Histogram {
  buckets: HistogramBucket[];
  sum: number;
  count: number;
}

/**
 * Default histogram buckets (milliseconds)
 */
const DEFAULT_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

function createHistogram(buckets: number[] = DEFAULT_BUCKETS): Histogram {
  return {
    buckets: buckets.map((le) => ({ le, count: 0 })),
    sum: 0,
    count: 0,
  };
}

function observeHistogram(histogram: Histogram, value: number): void {
  histogram.sum += value;
  histogram.count++;
  for (const bucket of histogram.buckets) {
    if (value <= bucket.le) {
      bucket.count++;
    }
  }
}

/**
 * Rejection reasons tracked as separate counters
 */
export type RejectionReason =
  | "invalid_shape"
  | "replay"
  | "sender_mismatch"
  | "invalid_signature"
  | "rate_limited"
  | "busy"
  | "unauthorized"
  | "unknown_action"
  | "rejected";

const REJECTION_REASONS: readonly RejectionReason[] = [
  "invalid_shape",
  "replay",
  "sender_mismatch",
  "invalid_signature",
  "rate_limited",
  "busy",
  "unauthorized",
  "unknown_action",
  "rejected",
];

/**
 * Metrics snapshot returned by getMetrics()
 */
export interface ServerMetricsSnapshot {
  counters: {
    dispatch_total: number;
    dispatch_success: number;
    dispatch_failed: number;
    handler_errors: number;
    events_sent: number;
    sessions_disconnected: number;
  };
  rejections: Record<RejectionReason, number>;
  histograms: {
    dispatch_duration_ms: Histogram;
  };
  gauges: {
    active_lanes: number;
    queued_dispatches: number;
    rate_limiter_keys: number;
    registered_actions: number;
  };
  collected_at: number;
  uptime_seconds: number;
}

/**
 * Dispatch metrics by action name
 */
interface PerActionMetrics {
  calls: number;
  success: number;
  failed: number;
  totalDurationMs: number;
}

function emptyRejections(): Record<RejectionReason, number> {
  return {
    invalid_shape: 0,
    replay: 0,
    sender_mismatch: 0,
    invalid_signature: 0,
    rate_limited: 0,
    busy: 0,
    unauthorized: 0,
    unknown_action: 0,
    rejected: 0,
  };
}

/**
 * Server metrics collector.
 *
 * @example
 * ```typescript
 * const metrics = new ServerMetrics();
 * metrics.recordDispatch("move", true, 42);
 * console.log(metrics.toPrometheusFormat());
 * ```
 */
export class ServerMetrics {
  private startTime = Date.now();

  // Counters
  private dispatchTotal = 0;
  private dispatchSuccess = 0;
  private dispatchFailed = 0;
  private handlerErrors = 0;
  private eventsSent = 0;
  private sessionsDisconnected = 0;
  private rejections = emptyRejections();

  // Histogram
  private dispatchDuration = createHistogram();

  // Per-action breakdown (only registered actions, so cardinality is bounded)
  private perAction = new Map<string, PerActionMetrics>();

  // Gauges (set externally via setGauges)
  private activeLanes = 0;
  private queuedDispatches = 0;
  private rateLimiterKeys = 0;
  private registeredActions = 0;

  /**
   * Record a dispatch that produced a response.
   * Pass `action` only for registered actions.
   */
  recordDispatch(
    action: string | undefined,
    success: boolean,
    durationMs: number,
  ): void {
    this.dispatchTotal++;
    if (success) {
      this.dispatchSuccess++;
    } else {
      this.dispatchFailed++;
    }
    observeHistogram(this.dispatchDuration, durationMs);

    if (action === undefined) return;
    let pa = this.perAction.get(action);
    if (!pa) {
      pa = { calls: 0, success: 0, failed: 0, totalDurationMs: 0 };
      this.perAction.set(action, pa);
    }
    pa.calls++;
    if (success) pa.success++;
    else pa.failed++;
    pa.totalDurationMs += durationMs;
  }

  recordRejection(reason: RejectionReason): void {
    this.rejections[reason]++;
  }

  recordHandlerError(): void {
    this.handlerErrors++;
  }

  recordEventSent(count = 1): void {
    this.eventsSent += count;
  }

  recordDisconnect(): void {
    this.sessionsDisconnected++;
  }

  /**
   * Update gauge values (called on-demand)
   */
  setGauges(gauges: {
    activeLanes?: number;
    queuedDispatches?: number;
    rateLimiterKeys?: number;
    registeredActions?: number;
  }): void {
    if (gauges.activeLanes !== undefined) this.activeLanes = gauges.activeLanes;
    if (gauges.queuedDispatches !== undefined) {
      this.queuedDispatches = gauges.queuedDispatches;
    }
    if (gauges.rateLimiterKeys !== undefined) {
      this.rateLimiterKeys = gauges.rateLimiterKeys;
    }
    if (gauges.registeredActions !== undefined) {
      this.registeredActions = gauges.registeredActions;
    }
  }

  /**
   * Get current metrics snapshot
   */
  getSnapshot(): ServerMetricsSnapshot {
    return {
      counters: {
        dispatch_total: this.dispatchTotal,
        dispatch_success: this.dispatchSuccess,
        dispatch_failed: this.dispatchFailed,
        handler_errors: this.handlerErrors,
        events_sent: this.eventsSent,
        sessions_disconnected: this.sessionsDisconnected,
      },
      rejections: { ...this.rejections },
      histograms: {
        dispatch_duration_ms: {
          buckets: this.dispatchDuration.buckets.map((b) => ({ ...b })),
          sum: this.dispatchDuration.sum,
          count: this.dispatchDuration.count,
        },
      },
      gauges: {
        active_lanes: this.activeLanes,
        queued_dispatches: this.queuedDispatches,
        rate_limiter_keys: this.rateLimiterKeys,
        registered_actions: this.registeredActions,
      },
      collected_at: Date.now(),
      uptime_seconds: Math.floor((Date.now() - this.startTime) / 1000),
    };
  }

  /**
   * Prometheus text format export
   */
  toPrometheusFormat(prefix = "bastion"): string {
    const m = this.getSnapshot();
    const lines: string[] = [];

    // --- Counters ---
    const counter = (name: string, help: string, value: number) => {
      lines.push(`# HELP ${prefix}_${name} ${help}`);
      lines.push(`# TYPE ${prefix}_${name} counter`);
      lines.push(`${prefix}_${name} ${value}`);
    };

    counter("dispatch_total", "Total dispatched requests", m.counters.dispatch_total);
    counter(
      "dispatch_success_total",
      "Requests answered with success",
      m.counters.dispatch_success,
    );
    counter(
      "dispatch_failed_total",
      "Requests answered with failure",
      m.counters.dispatch_failed,
    );
    counter(
      "handler_errors_total",
      "Handlers that threw or returned a malformed outcome",
      m.counters.handler_errors,
    );
    counter("events_sent_total", "Server events sent", m.counters.events_sent);
    counter(
      "sessions_disconnected_total",
      "Sessions disconnected",
      m.counters.sessions_disconnected,
    );

    // --- Rejections ---
    lines.push(`# HELP ${prefix}_rejections_total Requests rejected before the handler`);
    lines.push(`# TYPE ${prefix}_rejections_total counter`);
    for (const reason of REJECTION_REASONS) {
      lines.push(
        `${prefix}_rejections_total{reason="${reason}"} ${m.rejections[reason]}`,
      );
    }

    // --- Per-action counters ---
    lines.push(`# HELP ${prefix}_dispatch_by_action Dispatches by action name`);
    lines.push(`# TYPE ${prefix}_dispatch_by_action counter`);
    for (const [name, pa] of this.perAction) {
      lines.push(
        `${prefix}_dispatch_by_action{action="${name}",status="success"} ${pa.success}`,
      );
      lines.push(
        `${prefix}_dispatch_by_action{action="${name}",status="failed"} ${pa.failed}`,
      );
    }

    // --- Histogram ---
    const h = m.histograms.dispatch_duration_ms;
    lines.push(
      `# HELP ${prefix}_dispatch_duration_ms Dispatch duration in milliseconds`,
    );
    lines.push(`# TYPE ${prefix}_dispatch_duration_ms histogram`);
    for (const bucket of h.buckets) {
      lines.push(
        `${prefix}_dispatch_duration_ms_bucket{le="${bucket.le}"} ${bucket.count}`,
      );
    }
    lines.push(`${prefix}_dispatch_duration_ms_bucket{le="+Inf"} ${h.count}`);
    lines.push(`${prefix}_dispatch_duration_ms_sum ${h.sum}`);
    lines.push(`${prefix}_dispatch_duration_ms_count ${h.count}`);

    // --- Gauges ---
    const gauge = (name: string, help: string, value: number) => {
      lines.push(`# HELP ${prefix}_${name} ${help}`);
      lines.push(`# TYPE ${prefix}_${name} gauge`);
      lines.push(`${prefix}_${name} ${value}`);
    };

    gauge("active_lanes", "Senders with a dispatch in progress", m.gauges.active_lanes);
    gauge(
      "queued_dispatches",
      "Dispatches waiting in a sender lane",
      m.gauges.queued_dispatches,
    );
    gauge(
      "rate_limiter_keys",
      "Tracked rate limiter keys",
      m.gauges.rate_limiter_keys,
    );
    gauge(
      "registered_actions",
      "Registered action handlers",
      m.gauges.registered_actions,
    );
    gauge("uptime_seconds", "Server uptime in seconds", m.uptime_seconds);

    return lines.join("\n") + "\n";
  }

  /**
   * Reset all metrics
   */
  reset(): void {
    this.dispatchTotal = 0;
    this.dispatchSuccess = 0;
    this.dispatchFailed = 0;
    this.handlerErrors = 0;
    this.eventsSent = 0;
    this.sessionsDisconnected = 0;
    this.rejections = emptyRejections();
    this.dispatchDuration = createHistogram();
    this.perAction.clear();
    this.activeLanes = 0;
    this.queuedDispatches = 0;
    this.rateLimiterKeys = 0;
    this.registeredActions = 0;
    this.startTime = Date.now();
  }
}
