import { isValidNameServerAddr } from "../client/client-options";
import { ConsumerConfigError } from "../client/errors";
import type { ConfigIssue } from "../client/errors";
import type { ConsumerOption } from "./option";
import {
  ConsumeFromWhere,
  ConsumerOptions,
  MessageModel,
  defaultConsumerOptions,
  isConsumeFromWhere,
  isMessageModel,
  parseConsumeTimestamp,
} from "./options";

const MiB = 1024 * 1024;

type NumericField =
  | "maxConcurrentSpan"
  | "pullThresholdPerQueue"
  | "pullThresholdSizePerQueue"
  | "pullIntervalMs"
  | "consumeBatchMaxSize"
  | "pullBatchSize";

const NUMERIC_RANGES: ReadonlyArray<[NumericField, number, number]> = [
  ["maxConcurrentSpan", 1, 65535],
  ["pullThresholdPerQueue", 1, 65535],
  ["pullThresholdSizePerQueue", 1, 1024 * MiB],
  ["pullIntervalMs", 0, 65535],
  ["consumeBatchMaxSize", 1, 1024],
  ["pullBatchSize", 1, 1024],
];

const TOPIC_THRESHOLD_RANGES: ReadonlyArray<
  ["pullThresholdPerTopic" | "pullThresholdSizePerTopic", number]
> = [
  ["pullThresholdPerTopic", 6_553_500],
  ["pullThresholdSizePerTopic", 102_400 * MiB],
];

/**
 * Check a fully assembled configuration. Returns every issue found, in a
 * stable order, or an empty array when the configuration is usable.
 */
export function validateConsumerOptions(options: ConsumerOptions): ConfigIssue[] {
  const issues: ConfigIssue[] = [];

  if (!options.groupName) {
    issues.push({
      code: "missing-group-name",
      field: "groupName",
      message: "group name is required",
    });
  }

  if (options.nameServerAddrs.length === 0) {
    issues.push({
      code: "missing-name-server",
      field: "nameServerAddrs",
      message: "at least one name-server address is required",
    });
  }
  for (const addr of options.nameServerAddrs) {
    if (!isValidNameServerAddr(addr)) {
      issues.push({
        code: "invalid-name-server",
        field: "nameServerAddrs",
        message: `name-server address "${addr}" is not in host:port form`,
      });
    }
  }

  if (options.consumerModel === undefined) {
    issues.push({
      code: "missing-consumer-model",
      field: "consumerModel",
      message: "consumer model must be set",
    });
  } else if (!isMessageModel(options.consumerModel)) {
    issues.push({
      code: "missing-consumer-model",
      field: "consumerModel",
      message: `consumer model "${options.consumerModel}" is not one of ${Object.values(MessageModel).join(", ")}`,
    });
  } else if (
    options.consumeOrderly &&
    options.consumerModel === MessageModel.BROADCASTING
  ) {
    issues.push({
      code: "orderly-broadcasting",
      field: "consumeOrderly",
      message: "orderly consumption requires the clustering model",
    });
  }

  if (options.aclEnabled && !options.credentials) {
    issues.push({
      code: "missing-credentials",
      field: "credentials",
      message: "ACL is enabled but no credentials are set",
    });
  }

  if (!isConsumeFromWhere(options.fromWhere)) {
    issues.push({
      code: "out-of-range",
      field: "fromWhere",
      message: `start position "${options.fromWhere}" is not one of ${Object.values(ConsumeFromWhere).join(", ")}`,
    });
  } else if (
    options.fromWhere === ConsumeFromWhere.CONSUME_FROM_TIMESTAMP &&
    !parseConsumeTimestamp(options.consumeTimestamp)
  ) {
    issues.push({
      code: "invalid-consume-timestamp",
      field: "consumeTimestamp",
      message: `consume timestamp "${options.consumeTimestamp}" is not a valid YYYYMMDDHHmmss value`,
    });
  }

  for (const [field, min, max] of NUMERIC_RANGES) {
    const value = options[field];
    if (!(value >= min && value <= max)) {
      issues.push({
        code: "out-of-range",
        field,
        message: `${field} must be within [${min}, ${max}], got ${value}`,
      });
    }
  }

  for (const [field, max] of TOPIC_THRESHOLD_RANGES) {
    const threshold = options[field];
    if (threshold.kind === "limited" && threshold.value > max) {
      issues.push({
        code: "out-of-range",
        field,
        message: `${field} must be unlimited or within [1, ${max}], got ${threshold.value}`,
      });
    }
  }

  return issues;
}

function freezeOptions(options: ConsumerOptions): Readonly<ConsumerOptions> {
  Object.freeze(options.nameServerAddrs);
  Object.freeze(options.interceptors);
  if (options.credentials) Object.freeze(options.credentials);
  return Object.freeze(options);
}

function emptyConsumerOptions(): ConsumerOptions {
  return { ...defaultConsumerOptions(), groupName: "" };
}

/**
 * Assembles a consumer configuration from a starting point and an ordered list
 * of option functions, then validates and freezes it.
 *
 * @example
 * ```ts
 * const options = ConsumerOptionsBuilder.withDefaults()
 *   .apply(
 *     withGroupName("orders-consumer"),
 *     withNameServer(["127.0.0.1:9876"]),
 *     withConsumerModel(MessageModel.CLUSTERING),
 *   )
 *   .build();
 * ```
 */
export class ConsumerOptionsBuilder {
  private draft: ConsumerOptions | undefined;

  private constructor(draft: ConsumerOptions) {
    this.draft = draft;
  }

  /** Start from `defaultConsumerOptions()`. */
  static withDefaults(now?: Date): ConsumerOptionsBuilder {
    return new ConsumerOptionsBuilder(defaultConsumerOptions(now));
  }

  /** Start without the default group name; everything else keeps its default. */
  static empty(): ConsumerOptionsBuilder {
    return new ConsumerOptionsBuilder(emptyConsumerOptions());
  }

  /** Apply option functions in order. */
  apply(...options: ConsumerOption[]): this {
    const draft = this.requireDraft();
    for (const option of options) option(draft);
    return this;
  }

  /**
   * Validate and freeze the configuration. The builder cannot be used afterwards.
   * @throws {ConsumerConfigError} listing every invalid field or combination.
   */
  build(): Readonly<ConsumerOptions> {
    const draft = this.requireDraft();
    const issues = validateConsumerOptions(draft);
    if (issues.length > 0) throw new ConsumerConfigError(issues);
    this.draft = undefined;
    return freezeOptions(draft);
  }

  private requireDraft(): ConsumerOptions {
    if (!this.draft) {
      throw new Error("ConsumerOptionsBuilder has already been built");
    }
    return this.draft;
  }
}

/** Build a frozen configuration from the defaults and `options`, in order. */
export function buildConsumerOptions(
  ...options: ConsumerOption[]
): Readonly<ConsumerOptions> {
  return ConsumerOptionsBuilder.withDefaults().apply(...options).build();
}
