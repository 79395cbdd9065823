import { defaultClientOptions } from "../client/client-options";
import type { ClientOptions } from "../client/types";
import { allocateByAveragely } from "./allocate";
import type { AllocateStrategy } from "./allocate";
import type { Interceptor } from "./interceptor";

/** How a group shares messages among its members. */
export enum MessageModel {
  /** Each message goes to one member of the group. */
  CLUSTERING = "CLUSTERING",
  /** Each message goes to every member of the group. */
  BROADCASTING = "BROADCASTING",
}

/** Where a group with no committed offset starts reading. */
export enum ConsumeFromWhere {
  CONSUME_FROM_LAST_OFFSET = "CONSUME_FROM_LAST_OFFSET",
  CONSUME_FROM_FIRST_OFFSET = "CONSUME_FROM_FIRST_OFFSET",
  /** Start at `consumeTimestamp`. */
  CONSUME_FROM_TIMESTAMP = "CONSUME_FROM_TIMESTAMP",
}

const MESSAGE_MODELS: readonly string[] = Object.values(MessageModel);
const CONSUME_FROM_WHERE: readonly string[] = Object.values(ConsumeFromWhere);

export function isMessageModel(value: unknown): value is MessageModel {
  return typeof value === "string" && MESSAGE_MODELS.includes(value);
}

export function isConsumeFromWhere(value: unknown): value is ConsumeFromWhere {
  return typeof value === "string" && CONSUME_FROM_WHERE.includes(value);
}

/** A cache limit that may be switched off. */
export type Threshold =
  | { readonly kind: "unlimited" }
  | { readonly kind: "limited"; readonly value: number };

export const UNLIMITED: Threshold = Object.freeze({ kind: "unlimited" });

export function limited(value: number): Threshold {
  const threshold: Threshold = { kind: "limited", value };
  return Object.freeze(threshold);
}

/** Legacy encoding: any value `<= 0` means unlimited. */
export function thresholdFromLegacy(value: number): Threshold {
  return value > 0 ? limited(value) : UNLIMITED;
}

export function toLegacyThreshold(threshold: Threshold): number {
  return threshold.kind === "limited" ? threshold.value : -1;
}

/** How many times a failed message is redelivered before it is parked. */
export type ReconsumeLimit =
  | { readonly kind: "default" }
  | { readonly kind: "fixed"; readonly times: number };

export const DEFAULT_MAX_RECONSUME_TIMES = 16;

/** Legacy encoding: `-1` (or any negative value) means the fixed default. */
export function reconsumeLimitFromLegacy(times: number): ReconsumeLimit {
  const limit: ReconsumeLimit =
    times < 0 ? { kind: "default" } : { kind: "fixed", times };
  return Object.freeze(limit);
}

/** Full configuration of a push consumer. Frozen once built. */
export interface ConsumerOptions extends ClientOptions {
  /**
   * Start position for `CONSUME_FROM_TIMESTAMP`, second precision,
   * format `YYYYMMDDHHmmss` (UTC). Ignored for other start positions.
   */
  consumeTimestamp: string;
  /** Socket timeout of a single pull request, in ms. */
  pullTimeoutMs: number;
  /**
   * Max gap between the lowest unacknowledged offset and the highest delivered
   * offset in a queue. Has no effect on orderly consumption.
   */
  maxConcurrentSpan: number;
  /**
   * Max messages cached per queue. Given `pullBatchSize` the instantaneous value
   * may exceed it. Recomputed from `pullThresholdPerTopic` when that is limited.
   */
  pullThresholdPerQueue: number;
  /**
   * Max cached message bytes per queue, measured by message body only.
   * Recomputed from `pullThresholdSizePerTopic` when that is limited.
   */
  pullThresholdSizePerQueue: number;
  /**
   * Max messages cached per topic. For example 1000 with 10 queues assigned
   * gives each queue 100.
   */
  pullThresholdPerTopic: Threshold;
  /** Max cached message bytes per topic. */
  pullThresholdSizePerTopic: Threshold;
  pullIntervalMs: number;
  /** Max messages handed to a single consumption call. */
  consumeBatchMaxSize: number;
  /** Max messages requested by a single pull. */
  pullBatchSize: number;
  /** Resend the subscription with every pull. */
  postSubscriptionOnPull: boolean;
  /** Read through `resolveMaxReconsumeTimes`. */
  maxReconsumeTimes: ReconsumeLimit;
  /** How long a throttled queue stops pulling, in ms. */
  suspendTimeOnFlowControlMs: number;
  /** Max wall-clock time a single consumption call may run, in ms. */
  consumeTimeoutMs: number;
  consumerModel: MessageModel | undefined;
  allocateStrategy: AllocateStrategy;
  consumeOrderly: boolean;
  fromWhere: ConsumeFromWhere;
  /** Outer-to-inner in append order. */
  interceptors: readonly Interceptor[];
}

export const DEFAULT_CONSUMER_GROUP = "DEFAULT_CONSUMER";

export const DEFAULT_PULL_THRESHOLD_PER_QUEUE = 1000;
export const DEFAULT_PULL_THRESHOLD_SIZE_PER_QUEUE = 100 * 1024 * 1024;
export const DEFAULT_PULL_BATCH_SIZE = 32;
export const DEFAULT_CONSUME_BATCH_MAX_SIZE = 1;
export const DEFAULT_MAX_CONCURRENT_SPAN = 2000;
export const DEFAULT_PULL_TIMEOUT_MS = 30_000;
export const DEFAULT_SUSPEND_TIME_ON_FLOW_CONTROL_MS = 1000;
export const DEFAULT_CONSUME_TIMEOUT_MS = 15 * 60_000;

const HALF_AN_HOUR_MS = 30 * 60_000;

/** Format `date` as `YYYYMMDDHHmmss` in UTC. */
export function formatConsumeTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    String(date.getUTCFullYear()).padStart(4, "0") +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}

/**
 * Parse a `YYYYMMDDHHmmss` value (UTC). Returns `undefined` unless every
 * component denotes a real calendar instant.
 */
export function parseConsumeTimestamp(value: string): Date | undefined {
  const match = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/.exec(value);
  if (!match) return undefined;
  const [, y, mo, d, h, mi, s] = match.map(Number);
  const date = new Date(Date.UTC(y, mo - 1, d, h, mi, s));
  return formatConsumeTimestamp(date) === value ? date : undefined;
}

/**
 * Baseline consumer configuration: group `DEFAULT_CONSUMER`, consumer model
 * unset, average queue allocation, unlimited topic thresholds.
 *
 * @param now Reference time for the default `consumeTimestamp` (half an hour earlier).
 */
export function defaultConsumerOptions(now: Date = new Date()): ConsumerOptions {
  return {
    ...defaultClientOptions(),
    groupName: DEFAULT_CONSUMER_GROUP,
    consumeTimestamp: formatConsumeTimestamp(
      new Date(now.getTime() - HALF_AN_HOUR_MS),
    ),
    pullTimeoutMs: DEFAULT_PULL_TIMEOUT_MS,
    maxConcurrentSpan: DEFAULT_MAX_CONCURRENT_SPAN,
    pullThresholdPerQueue: DEFAULT_PULL_THRESHOLD_PER_QUEUE,
    pullThresholdSizePerQueue: DEFAULT_PULL_THRESHOLD_SIZE_PER_QUEUE,
    pullThresholdPerTopic: UNLIMITED,
    pullThresholdSizePerTopic: UNLIMITED,
    pullIntervalMs: 0,
    consumeBatchMaxSize: DEFAULT_CONSUME_BATCH_MAX_SIZE,
    pullBatchSize: DEFAULT_PULL_BATCH_SIZE,
    postSubscriptionOnPull: false,
    maxReconsumeTimes: reconsumeLimitFromLegacy(-1),
    suspendTimeOnFlowControlMs: DEFAULT_SUSPEND_TIME_ON_FLOW_CONTROL_MS,
    consumeTimeoutMs: DEFAULT_CONSUME_TIMEOUT_MS,
    consumerModel: undefined,
    allocateStrategy: allocateByAveragely,
    consumeOrderly: false,
    fromWhere: ConsumeFromWhere.CONSUME_FROM_LAST_OFFSET,
    interceptors: [],
  };
}

/** Effective redelivery limit: `16` for the default, the configured value otherwise. */
export function resolveMaxReconsumeTimes(
  options: Pick<ConsumerOptions, "maxReconsumeTimes">,
): number {
  const limit = options.maxReconsumeTimes;
  return limit.kind === "default" ? DEFAULT_MAX_RECONSUME_TIMES : limit.times;
}
