import { Kafka, logLevel } from "kafkajs";
import type { Consumer, ConsumerGroupJoinEvent } from "kafkajs";
import { createConsoleLogger } from "../client/logger";
import type { ConsumerLogger } from "../client/types";
import { FlowControl } from "./flow-control";
import {
  ConsumeFromWhere,
  ConsumerOptions,
  parseConsumeTimestamp,
} from "./options";

/** Partitions assigned to this member, per topic. */
export type TopicAssignment = Record<string, number[]>;

export interface KafkaBridgeDeps {
  logger?: ConsumerLogger;
  /** Called after flow control has been updated for a new assignment. */
  onRebalance?: (assignment: TopicAssignment) => void;
}

/** A consumer whose partition assignments drive per-queue flow-control thresholds. */
export interface FlowControlledConsumer {
  consumer: Consumer;
  flowControl: FlowControl;
  /** Partitions currently assigned for `topic`, ascending. */
  assignedPartitions(topic: string): number[];
  /** Subscribe with the start position taken from `fromWhere`. */
  subscribe(topics: string[]): Promise<void>;
  /** Start instant for `CONSUME_FROM_TIMESTAMP`; `undefined` for other start positions. */
  startFrom: Date | undefined;
  /** Stop listening for group joins. */
  detach(): void;
}

/** Create a Kafka client from the identity fields of `options`. */
export function createKafka(
  options: Pick<ConsumerOptions, "instanceName" | "nameServerAddrs">,
): Kafka {
  return new Kafka({
    clientId: options.instanceName,
    brokers: [...options.nameServerAddrs],
    logLevel: logLevel.ERROR,
  });
}

/**
 * Create a consumer for `options.groupName` and feed every group join into a
 * `FlowControl` cell: each topic's partition count becomes the number of
 * queues its topic-level thresholds are divided over. A topic that lost all
 * of its partitions keeps its last thresholds.
 *
 * Partitions play the role of queues. The bridge does not pull or commit.
 *
 * @param kafka Client the consumer is created on.
 * @param options Frozen consumer options.
 * @param deps Optional logger and rebalance notification.
 */
export function createFlowControlledConsumer(
  kafka: Kafka,
  options: Readonly<ConsumerOptions>,
  deps: KafkaBridgeDeps = {},
): FlowControlledConsumer {
  const logger =
    deps.logger ?? createConsoleLogger(`ConsumerOptions:${options.groupName}`);
  const flowControl = new FlowControl(options, logger);
  let assignment: TopicAssignment = {};

  const consumer = kafka.consumer({ groupId: options.groupName });

  const onGroupJoin = (event: ConsumerGroupJoinEvent) => {
    const next: TopicAssignment = {};
    for (const [topic, partitions] of Object.entries(
      event.payload.memberAssignment,
    )) {
      next[topic] = [...partitions].sort((a, b) => a - b);
    }
    const topics = new Set([...Object.keys(assignment), ...Object.keys(next)]);
    assignment = next;

    try {
      for (const topic of topics) {
        flowControl.onQueuesAssigned(topic, next[topic]?.length ?? 0);
      }
      deps.onRebalance?.(next);
    } catch (e) {
      logger.warn(
        `Rebalance handling threw: ${e instanceof Error ? e.message : String(e)}`,
      );
    }
  };

  const detach = consumer.on(consumer.events.GROUP_JOIN, onGroupJoin);

  return {
    consumer,
    flowControl,
    assignedPartitions: (topic) => [...(assignment[topic] ?? [])],
    subscribe: (topics) =>
      consumer.subscribe({
        topics,
        fromBeginning:
          options.fromWhere === ConsumeFromWhere.CONSUME_FROM_FIRST_OFFSET,
      }),
    startFrom:
      options.fromWhere === ConsumeFromWhere.CONSUME_FROM_TIMESTAMP
        ? parseConsumeTimestamp(options.consumeTimestamp)
        : undefined,
    detach,
  };
}
