import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from "prom-client";
import { getEnv } from "../config/environment";

export type PipelineOutcome = "processed" | "duplicate" | "rejected" | "failed";
export type AttemptOutcome =
  | "success"
  | "retryable_failure"
  | "permanent_failure";
export type RetryOutcome = "success" | "exhausted" | "aborted";
export type DeadLetterPath = "stream" | "fallback_log" | "lost";
export type DedupOperation = "check" | "mark";
export type StatusUpdateResult =
  | "applied"
  | "duplicate"
  | "illegal"
  | "unknown_message"
  | "invalid";
export type StatusPublishResult = "published" | "failed";
export type RateLimitSource = "redis" | "local";
export type IdentityLookupOutcome =
  | "resolved"
  | "not_found"
  | "empty"
  | "unavailable";

type MetricDescriptor = {
  readonly name: string;
  readonly labelNames: readonly string[];
};

const BASE_LABELS = ["environment", "instance"] as const;
const EVENT_DURATION_BUCKETS_MS = [
  5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000,
] as const;

class TelemetryMetricsRegistry {
  private static instance: TelemetryMetricsRegistry | null = null;

  private readonly registry: Registry;
  private readonly metricDescriptors: MetricDescriptor[] = [];

  private environmentLabel: string;
  private instanceLabel: string;

  private readonly pipelineEventsCounter: Counter<string>;
  private readonly pipelineDurationHistogram: Histogram<string>;
  private readonly deliveryAttemptsCounter: Counter<string>;
  private readonly retriesCounter: Counter<string>;
  private readonly retryOutcomesCounter: Counter<string>;
  private readonly fanoutPartialCounter: Counter<string>;
  private readonly deadLetterCounter: Counter<string>;
  private readonly dedupErrorCounter: Counter<string>;
  private readonly identityLookupCounter: Counter<string>;
  private readonly statusUpdatesCounter: Counter<string>;
  private readonly statusPublishCounter: Counter<string>;
  private readonly liveStreamsGauge: Gauge<string>;
  private readonly liveEventsCounter: Counter<string>;
  private readonly rateLimitCounter: Counter<string>;
  private readonly httpRequestsCounter: Counter<string>;

  private constructor() {
    this.registry = new Registry();
    collectDefaultMetrics({
      register: this.registry,
      prefix: "delivery_router_",
    });

    this.environmentLabel = this.resolveEnvironmentLabel();
    this.instanceLabel = this.resolveInstanceLabel();

    this.pipelineEventsCounter = this.counter(
      "pipeline_events_total",
      "Message events handled by the dispatcher, by outcome",
      ["outcome"],
    );
    this.pipelineDurationHistogram = new Histogram({
      name: "pipeline_event_duration_ms",
      help: "Time spent routing one message event",
      labelNames: [...BASE_LABELS, "outcome"],
      buckets: [...EVENT_DURATION_BUCKETS_MS],
      registers: [this.registry],
    });
    this.metricDescriptors.push({
      name: "pipeline_event_duration_ms",
      labelNames: [...BASE_LABELS, "outcome"],
    });
    this.deliveryAttemptsCounter = this.counter(
      "delivery_attempts_total",
      "Channel adapter send attempts",
      ["channel", "outcome"],
    );
    this.retriesCounter = this.counter(
      "delivery_retries_total",
      "Retries scheduled by the retry executor",
      ["operation"],
    );
    this.retryOutcomesCounter = this.counter(
      "delivery_retry_outcomes_total",
      "Terminal outcome of each retried operation",
      ["operation", "outcome"],
    );
    this.fanoutPartialCounter = this.counter(
      "delivery_fanout_partial_total",
      "Fan-out deliveries where some but not all targets succeeded",
      [],
    );
    this.deadLetterCounter = this.counter(
      "dead_letter_total",
      "Messages quarantined to dead-letter",
      ["reason", "path"],
    );
    this.dedupErrorCounter = this.counter(
      "dedup_store_errors_total",
      "Deduplication store failures that were failed open",
      ["operation"],
    );
    this.identityLookupCounter = this.counter(
      "identity_lookups_total",
      "User directory lookups by outcome",
      ["outcome"],
    );
    this.statusUpdatesCounter = this.counter(
      "status_updates_total",
      "Status updates consumed, by result",
      ["result"],
    );
    this.statusPublishCounter = this.counter(
      "status_publish_total",
      "Status updates emitted by the pipeline",
      ["result"],
    );
    this.liveStreamsGauge = new Gauge({
      name: "live_streams_active",
      help: "Users with an open live stream on this instance",
      labelNames: [...BASE_LABELS],
      registers: [this.registry],
    });
    this.metricDescriptors.push({
      name: "live_streams_active",
      labelNames: [...BASE_LABELS],
    });
    this.liveEventsCounter = this.counter(
      "live_events_total",
      "Live fan-out publications, split by whether a stream was open",
      ["delivered"],
    );
    this.rateLimitCounter = this.counter(
      "rate_limit_decisions_total",
      "Ingress admission decisions",
      ["decision", "source"],
    );
    this.httpRequestsCounter = this.counter(
      "http_requests_total",
      "HTTP requests served",
      ["method", "status_class"],
    );
  }

  private counter(
    name: string,
    help: string,
    extraLabels: readonly string[],
  ): Counter<string> {
    const labelNames = [...BASE_LABELS, ...extraLabels];
    const metric = new Counter({
      name,
      help,
      labelNames,
      registers: [this.registry],
    });
    this.metricDescriptors.push({ name, labelNames });
    return metric;
  }

  static getInstance(): TelemetryMetricsRegistry {
    if (!this.instance) {
      this.instance = new TelemetryMetricsRegistry();
    }
    return this.instance;
  }

  static refreshEnvironment(): void {
    const current = this.getInstance();
    current.environmentLabel = current.resolveEnvironmentLabel();
    current.instanceLabel = current.resolveInstanceLabel();
  }

  static describe(): MetricDescriptor[] {
    return this.getInstance().metricDescriptors.map((descriptor) => ({
      ...descriptor,
    }));
  }

  getRegistry(): Registry {
    return this.registry;
  }

  recordPipelineEvent(outcome: PipelineOutcome, durationMs: number): void {
    this.pipelineEventsCounter
      .labels(this.environmentLabel, this.instanceLabel, outcome)
      .inc();
    const safeDuration = Number.isFinite(durationMs)
      ? Math.max(0, durationMs)
      : 0;
    this.pipelineDurationHistogram
      .labels(this.environmentLabel, this.instanceLabel, outcome)
      .observe(safeDuration);
  }

  recordDeliveryAttempt(channel: string, outcome: AttemptOutcome): void {
    this.deliveryAttemptsCounter
      .labels(this.environmentLabel, this.instanceLabel, channel, outcome)
      .inc();
  }

  recordRetry(operation: string): void {
    this.retriesCounter
      .labels(this.environmentLabel, this.instanceLabel, operation)
      .inc();
  }

  recordRetryOutcome(operation: string, outcome: RetryOutcome): void {
    this.retryOutcomesCounter
      .labels(this.environmentLabel, this.instanceLabel, operation, outcome)
      .inc();
  }

  recordPartialFanout(): void {
    this.fanoutPartialCounter
      .labels(this.environmentLabel, this.instanceLabel)
      .inc();
  }

  recordDeadLetter(reason: string, path: DeadLetterPath): void {
    this.deadLetterCounter
      .labels(this.environmentLabel, this.instanceLabel, reason, path)
      .inc();
  }

  recordDedupError(operation: DedupOperation): void {
    this.dedupErrorCounter
      .labels(this.environmentLabel, this.instanceLabel, operation)
      .inc();
  }

  recordIdentityLookup(outcome: IdentityLookupOutcome): void {
    this.identityLookupCounter
      .labels(this.environmentLabel, this.instanceLabel, outcome)
      .inc();
  }

  recordStatusUpdate(result: StatusUpdateResult): void {
    this.statusUpdatesCounter
      .labels(this.environmentLabel, this.instanceLabel, result)
      .inc();
  }

  recordStatusPublish(result: StatusPublishResult): void {
    this.statusPublishCounter
      .labels(this.environmentLabel, this.instanceLabel, result)
      .inc();
  }

  setLiveStreams(count: number): void {
    const safeValue = Number.isFinite(count) ? Math.max(0, count) : 0;
    this.liveStreamsGauge
      .labels(this.environmentLabel, this.instanceLabel)
      .set(safeValue);
  }

  recordLiveEvent(delivered: boolean): void {
    this.liveEventsCounter
      .labels(this.environmentLabel, this.instanceLabel, String(delivered))
      .inc();
  }

  recordRateLimitDecision(allowed: boolean, source: RateLimitSource): void {
    this.rateLimitCounter
      .labels(
        this.environmentLabel,
        this.instanceLabel,
        allowed ? "allowed" : "rejected",
        source,
      )
      .inc();
  }

  recordHttpRequest(method: string, statusCode: number): void {
    this.httpRequestsCounter
      .labels(
        this.environmentLabel,
        this.instanceLabel,
        method,
        `${Math.floor(statusCode / 100)}xx`,
      )
      .inc();
  }

  private resolveEnvironmentLabel(): string {
    try {
      return getEnv().service.nodeEnv;
    } catch (error) {
      void error;
      return process.env.NODE_ENV ?? "development";
    }
  }

  private resolveInstanceLabel(): string {
    try {
      return getEnv().service.instanceId;
    } catch (error) {
      void error;
      return process.env.INSTANCE_ID ?? process.env.HOSTNAME ?? `pid-${process.pid}`;
    }
  }
}

export class TelemetryMetrics {
  static registry(): Registry {
    return TelemetryMetricsRegistry.getInstance().getRegistry();
  }

  static refreshEnvironment(): void {
    TelemetryMetricsRegistry.refreshEnvironment();
  }

  static describe(): MetricDescriptor[] {
    return TelemetryMetricsRegistry.describe();
  }

  static recordPipelineEvent(outcome: PipelineOutcome, durationMs: number): void {
    TelemetryMetricsRegistry.getInstance().recordPipelineEvent(
      outcome,
      durationMs,
    );
  }

  static recordDeliveryAttempt(channel: string, outcome: AttemptOutcome): void {
    TelemetryMetricsRegistry.getInstance().recordDeliveryAttempt(
      channel,
      outcome,
    );
  }

  static recordRetry(operation: string): void {
    TelemetryMetricsRegistry.getInstance().recordRetry(operation);
  }

  static recordRetryOutcome(operation: string, outcome: RetryOutcome): void {
    TelemetryMetricsRegistry.getInstance().recordRetryOutcome(
      operation,
      outcome,
    );
  }

  static recordPartialFanout(): void {
    TelemetryMetricsRegistry.getInstance().recordPartialFanout();
  }

  static recordDeadLetter(reason: string, path: DeadLetterPath): void {
    TelemetryMetricsRegistry.getInstance().recordDeadLetter(reason, path);
  }

  static recordDedupError(operation: DedupOperation): void {
    TelemetryMetricsRegistry.getInstance().recordDedupError(operation);
  }

  static recordIdentityLookup(outcome: IdentityLookupOutcome): void {
    TelemetryMetricsRegistry.getInstance().recordIdentityLookup(outcome);
  }

  static recordStatusUpdate(result: StatusUpdateResult): void {
    TelemetryMetricsRegistry.getInstance().recordStatusUpdate(result);
  }

  static recordStatusPublish(result: StatusPublishResult): void {
    TelemetryMetricsRegistry.getInstance().recordStatusPublish(result);
  }

  static setLiveStreams(count: number): void {
    TelemetryMetricsRegistry.getInstance().setLiveStreams(count);
  }

  static recordLiveEvent(delivered: boolean): void {
    TelemetryMetricsRegistry.getInstance().recordLiveEvent(delivered);
  }

  static recordRateLimitDecision(
    allowed: boolean,
    source: RateLimitSource,
  ): void {
    TelemetryMetricsRegistry.getInstance().recordRateLimitDecision(
      allowed,
      source,
    );
  }

  static recordHttpRequest(method: string, statusCode: number): void {
    TelemetryMetricsRegistry.getInstance().recordHttpRequest(
      method,
      statusCode,
    );
  }
}
