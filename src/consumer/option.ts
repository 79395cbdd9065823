import type { Credentials } from "../client/types";
import type { AllocateStrategy } from "./allocate";
import type { Interceptor } from "./interceptor";
import {
  ConsumeFromWhere,
  ConsumerOptions,
  MessageModel,
  isConsumeFromWhere,
  isMessageModel,
  reconsumeLimitFromLegacy,
  thresholdFromLegacy,
} from "./options";

/**
 * Mutates the configuration being built. Applied in order; when two options
 * touch the same field the last one wins.
 *
 * Every option ignores a value that is empty or meaningless for its field,
 * leaving the previous value in place. Combinations are checked once at build time.
 */
export type ConsumerOption = (options: ConsumerOptions) => void;

const isCount = (n: number) => Number.isInteger(n) && n > 0;
const isDuration = (n: number) => Number.isFinite(n) && n >= 0;

/** Ignored unless `model` is a `MessageModel` value. */
export function withConsumerModel(model: MessageModel): ConsumerOption {
  return (options) => {
    if (!isMessageModel(model)) return;
    options.consumerModel = model;
  };
}

/** Ignored unless `where` is a `ConsumeFromWhere` value. */
export function withConsumeFromWhere(where: ConsumeFromWhere): ConsumerOption {
  return (options) => {
    if (!isConsumeFromWhere(where)) return;
    options.fromWhere = where;
  };
}

/**
 * Append interceptors to the chain. The first interceptor is the outermost,
 * the last one the innermost wrapper around the real call.
 *
 * Configured interceptors see every operation the consumer runs, so they are
 * typed on `unknown` request and reply and narrow what they need. A typed
 * `Interceptor<Req, Reply>` belongs in a chain built for one call site with
 * `chainInterceptors`.
 */
export function withInterceptor(
  ...interceptors: Interceptor[]
): ConsumerOption {
  return (options) => {
    options.interceptors = [...options.interceptors, ...interceptors];
  };
}

/** Set the group name. Ignored when empty. */
export function withGroupName(group: string): ConsumerOption {
  return (options) => {
    if (group === "") return;
    options.groupName = group;
  };
}

/** Replace the name-server list. Ignored when empty. */
export function withNameServer(nameServers: readonly string[]): ConsumerOption {
  return (options) => {
    if (nameServers.length > 0) {
      options.nameServerAddrs = [...nameServers];
    }
  };
}

export function withVIPChannel(enable: boolean): ConsumerOption {
  return (options) => {
    options.vipChannelEnabled = enable;
  };
}

export function withACL(enable: boolean): ConsumerOption {
  return (options) => {
    options.aclEnabled = enable;
  };
}

/** Set the retry count for client-level RPCs. Ignored when negative or fractional. */
export function withRetry(retries: number): ConsumerOption {
  return (options) => {
    if (!Number.isInteger(retries) || retries < 0) return;
    options.retryTimes = retries;
  };
}

/** Ignored when either key is empty. */
export function withCredentials(credentials: Credentials): ConsumerOption {
  return (options) => {
    if (!credentials.accessKey || !credentials.secretKey) return;
    options.credentials = { ...credentials };
  };
}

export function withInstanceName(name: string): ConsumerOption {
  return (options) => {
    if (name === "") return;
    options.instanceName = name;
  };
}

export function withNamespace(namespace: string): ConsumerOption {
  return (options) => {
    if (namespace === "") return;
    options.namespace = namespace;
  };
}

/** Set the start position for timestamp consumption. Ignored unless 14 digits. */
export function withConsumeTimestamp(timestamp: string): ConsumerOption {
  return (options) => {
    if (!/^\d{14}$/.test(timestamp)) return;
    options.consumeTimestamp = timestamp;
  };
}

export function withPullTimeout(ms: number): ConsumerOption {
  return (options) => {
    if (!isDuration(ms) || ms === 0) return;
    options.pullTimeoutMs = ms;
  };
}

export function withMaxConcurrentSpan(span: number): ConsumerOption {
  return (options) => {
    if (!isCount(span)) return;
    options.maxConcurrentSpan = span;
  };
}

/**
 * Set the per-queue message-count cap. Once a topic-level threshold is
 * limited the per-queue value is derived from it instead.
 */
export function withPullThresholdPerQueue(count: number): ConsumerOption {
  return (options) => {
    if (!isCount(count)) return;
    options.pullThresholdPerQueue = count;
  };
}

export function withPullThresholdSizePerQueue(bytes: number): ConsumerOption {
  return (options) => {
    if (!isCount(bytes)) return;
    options.pullThresholdSizePerQueue = bytes;
  };
}

/** Set the per-topic message-count cap. `<= 0` means unlimited. */
export function withPullThresholdPerTopic(count: number): ConsumerOption {
  return (options) => {
    if (!Number.isInteger(count)) return;
    options.pullThresholdPerTopic = thresholdFromLegacy(count);
  };
}

/** Set the per-topic cached-bytes cap. `<= 0` means unlimited. */
export function withPullThresholdSizePerTopic(bytes: number): ConsumerOption {
  return (options) => {
    if (!Number.isInteger(bytes)) return;
    options.pullThresholdSizePerTopic = thresholdFromLegacy(bytes);
  };
}

export function withPullInterval(ms: number): ConsumerOption {
  return (options) => {
    if (!isDuration(ms)) return;
    options.pullIntervalMs = ms;
  };
}

export function withConsumeBatchMaxSize(size: number): ConsumerOption {
  return (options) => {
    if (!isCount(size)) return;
    options.consumeBatchMaxSize = size;
  };
}

export function withPullBatchSize(size: number): ConsumerOption {
  return (options) => {
    if (!isCount(size)) return;
    options.pullBatchSize = size;
  };
}

export function withPostSubscriptionOnPull(enable: boolean): ConsumerOption {
  return (options) => {
    options.postSubscriptionOnPull = enable;
  };
}

/** Set the redelivery limit. `-1` selects the default of 16. */
export function withMaxReconsumeTimes(times: number): ConsumerOption {
  return (options) => {
    if (!Number.isInteger(times)) return;
    options.maxReconsumeTimes = reconsumeLimitFromLegacy(times);
  };
}

export function withSuspendTimeOnFlowControl(ms: number): ConsumerOption {
  return (options) => {
    if (!isDuration(ms)) return;
    options.suspendTimeOnFlowControlMs = ms;
  };
}

export function withConsumeTimeout(ms: number): ConsumerOption {
  return (options) => {
    if (!isDuration(ms) || ms === 0) return;
    options.consumeTimeoutMs = ms;
  };
}

export function withAllocateStrategy(strategy: AllocateStrategy): ConsumerOption {
  return (options) => {
    options.allocateStrategy = strategy;
  };
}

export function withConsumeOrderly(orderly: boolean): ConsumerOption {
  return (options) => {
    options.consumeOrderly = orderly;
  };
}
