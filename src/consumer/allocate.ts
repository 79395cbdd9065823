/** A queue of a topic hosted on a specific broker. */
export interface MessageQueue {
  topic: string;
  brokerName: string;
  queueId: number;
}

/**
 * Decides which queues of a topic this consumer instance owns.
 * Only the strategy is configured here; the rebalance that calls it lives in the runtime.
 */
export interface AllocateStrategy {
  /** Unique name identifying this strategy (e.g. `'AVG'`, `'AVG_BY_CIRCLE'`). */
  readonly name: string;

  /**
   * @param consumerGroup Group being rebalanced.
   * @param currentClientId Client ID of this consumer instance.
   * @param queues All queues of the topic, in a stable order.
   * @param clientIds All client IDs in the group, in a stable order.
   * @returns Queues assigned to `currentClientId`.
   */
  allocate(
    consumerGroup: string,
    currentClientId: string,
    queues: readonly MessageQueue[],
    clientIds: readonly string[],
  ): MessageQueue[];
}

function canAllocate(
  currentClientId: string,
  queues: readonly MessageQueue[],
  clientIds: readonly string[],
): number {
  if (!currentClientId || queues.length === 0 || clientIds.length === 0) {
    return -1;
  }
  return clientIds.indexOf(currentClientId);
}

/**
 * Contiguous blocks of queues per client. When queues do not divide evenly the
 * first `queues % clients` clients get one extra; surplus clients get nothing.
 */
export const allocateByAveragely: AllocateStrategy = {
  name: "AVG",
  allocate(_group, currentClientId, queues, clientIds) {
    const index = canAllocate(currentClientId, queues, clientIds);
    if (index < 0) return [];

    const total = queues.length;
    const clients = clientIds.length;
    const mod = total % clients;
    let averageSize: number;
    if (total <= clients) {
      averageSize = 1;
    } else if (mod > 0 && index < mod) {
      averageSize = Math.floor(total / clients) + 1;
    } else {
      averageSize = Math.floor(total / clients);
    }
    const startIndex =
      mod > 0 && index < mod ? index * averageSize : index * averageSize + mod;
    const range = Math.min(averageSize, total - startIndex);

    const result: MessageQueue[] = [];
    for (let i = 0; i < range; i++) {
      result.push(queues[(startIndex + i) % total]);
    }
    return result;
  },
};

/** Deals queues out one at a time, like cards around a table. */
export const allocateByAveragelyCircle: AllocateStrategy = {
  name: "AVG_BY_CIRCLE",
  allocate(_group, currentClientId, queues, clientIds) {
    const index = canAllocate(currentClientId, queues, clientIds);
    if (index < 0) return [];
    return queues.filter((_q, i) => i % clientIds.length === index);
  },
};
