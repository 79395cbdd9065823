import type { ConsumerLogger } from "../client/types";
import type { ConsumerOptions, Threshold } from "./options";

/** Effective cache caps for each queue of one topic. */
export interface QueueThresholds {
  /** Max cached messages per queue. */
  readonly count: number;
  /** Max cached message bytes per queue. */
  readonly sizeBytes: number;
}

export interface TopicThresholds {
  readonly topicCount: Threshold;
  readonly topicSize: Threshold;
  /** Per-queue values configured on the consumer, used where the topic side is unlimited. */
  readonly configured: QueueThresholds;
}

function share(threshold: Threshold, assignedQueues: number, fallback: number): number {
  if (threshold.kind === "unlimited") return fallback;
  return Math.max(1, Math.floor(threshold.value / assignedQueues));
}

/**
 * Split topic-level caps over the queues assigned to this consumer.
 *
 * - Both topic caps unlimited: the configured per-queue values.
 * - Fewer than one whole queue (or `NaN`): `undefined`; keep whatever was in effect.
 * - Otherwise each limited side becomes `max(1, floor(T / N))`; an unlimited
 *   side keeps its configured per-queue value.
 *
 * Pure: the result depends only on the arguments.
 */
export function deriveQueueThresholds(
  thresholds: TopicThresholds,
  assignedQueues: number,
): QueueThresholds | undefined {
  const { topicCount, topicSize, configured } = thresholds;
  if (topicCount.kind === "unlimited" && topicSize.kind === "unlimited") {
    return configured;
  }
  const n = Math.floor(assignedQueues);
  if (!(n > 0)) return undefined;
  return {
    count: share(topicCount, n, configured.count),
    sizeBytes: share(topicSize, n, configured.sizeBytes),
  };
}

/** Topic-level and configured per-queue caps of a built configuration. */
export function topicThresholdsOf(
  options: Pick<
    ConsumerOptions,
    | "pullThresholdPerTopic"
    | "pullThresholdSizePerTopic"
    | "pullThresholdPerQueue"
    | "pullThresholdSizePerQueue"
  >,
): TopicThresholds {
  return {
    topicCount: options.pullThresholdPerTopic,
    topicSize: options.pullThresholdSizePerTopic,
    configured: Object.freeze({
      count: options.pullThresholdPerQueue,
      sizeBytes: options.pullThresholdSizePerQueue,
    }),
  };
}

/**
 * Per-topic snapshot cell for derived queue thresholds.
 *
 * The rebalance side calls `onQueuesAssigned` whenever a topic's assignment
 * changes; pull workers read `thresholdsFor`. Each snapshot is a frozen object
 * swapped in by reference, so a reader sees either the old or the new pair.
 */
export class FlowControl {
  private readonly thresholds: TopicThresholds;
  private readonly snapshots = new Map<string, QueueThresholds>();

  constructor(
    options: Parameters<typeof topicThresholdsOf>[0],
    private readonly logger?: ConsumerLogger,
  ) {
    this.thresholds = topicThresholdsOf(options);
  }

  /** `true` when at least one topic-level cap is limited. */
  get topicLimited(): boolean {
    return (
      this.thresholds.topicCount.kind === "limited" ||
      this.thresholds.topicSize.kind === "limited"
    );
  }

  /**
   * Recompute `topic`'s queue thresholds for `assignedQueues` queues.
   * With no queues assigned the previous snapshot stays in effect.
   *
   * @returns The thresholds now in effect for the topic.
   */
  onQueuesAssigned(topic: string, assignedQueues: number): QueueThresholds {
    const derived = deriveQueueThresholds(this.thresholds, assignedQueues);
    if (!derived) {
      this.logger?.debug?.(
        `No queues assigned for topic "${topic}" — queue thresholds unchanged`,
      );
      return this.thresholdsFor(topic);
    }
    const snapshot = Object.freeze({ ...derived });
    this.snapshots.set(topic, snapshot);
    if (this.topicLimited) {
      this.logger?.debug?.(
        `Queue thresholds for topic "${topic}" across ${assignedQueues} queue(s): ` +
          `count=${snapshot.count}, sizeBytes=${snapshot.sizeBytes}`,
      );
    }
    return snapshot;
  }

  /** Thresholds in effect for `topic`: the last snapshot, or the configured values. */
  thresholdsFor(topic: string): QueueThresholds {
    return this.snapshots.get(topic) ?? this.thresholds.configured;
  }

  /** Drop `topic`'s snapshot, e.g. after unsubscribing. */
  forget(topic: string): void {
    this.snapshots.delete(topic);
  }
}

/** Cache occupancy of one queue as seen by the pull loop. */
export interface QueueUsage {
  cachedMessageCount: number;
  cachedSizeBytes: number;
  /** Highest delivered offset minus lowest unacknowledged offset. */
  offsetSpan: number;
}

/**
 * Outcome of a flow-control check.
 * - `'count'` — too many cached messages.
 * - `'size'` — too many cached bytes.
 * - `'span'` — offset span too wide (concurrent consumption only).
 */
export type FlowControlDecision =
  | { throttled: false }
  | { throttled: true; reason: "count" | "size" | "span"; suspendMs: number };

/**
 * Decide whether the pull loop should back off a queue. Checks run in the
 * order count, size, span; the first exceeded cap wins.
 */
export function evaluateFlowControl(
  options: Pick<
    ConsumerOptions,
    "consumeOrderly" | "maxConcurrentSpan" | "suspendTimeOnFlowControlMs"
  >,
  thresholds: QueueThresholds,
  usage: QueueUsage,
): FlowControlDecision {
  const suspendMs = options.suspendTimeOnFlowControlMs;
  if (usage.cachedMessageCount > thresholds.count) {
    return { throttled: true, reason: "count", suspendMs };
  }
  if (usage.cachedSizeBytes > thresholds.sizeBytes) {
    return { throttled: true, reason: "size", suspendMs };
  }
  if (!options.consumeOrderly && usage.offsetSpan > options.maxConcurrentSpan) {
    return { throttled: true, reason: "span", suspendMs };
  }
  return { throttled: false };
}
