import { allocateByAveragely } from "../allocate";
import {
  ConsumeFromWhere,
  DEFAULT_CONSUMER_GROUP,
  UNLIMITED,
  defaultConsumerOptions,
  formatConsumeTimestamp,
  limited,
  parseConsumeTimestamp,
  reconsumeLimitFromLegacy,
  resolveMaxReconsumeTimes,
  thresholdFromLegacy,
  toLegacyThreshold,
} from "../options";

describe("defaultConsumerOptions", () => {
  const now = new Date(Date.UTC(2024, 0, 1, 12, 0, 0));

  it("uses the reserved group name and leaves the consumer model unset", () => {
    const options = defaultConsumerOptions(now);
    expect(options.groupName).toBe(DEFAULT_CONSUMER_GROUP);
    expect(options.groupName).toBe("DEFAULT_CONSUMER");
    expect(options.consumerModel).toBeUndefined();
  });

  it("allocates queues averagely by default", () => {
    expect(defaultConsumerOptions(now).allocateStrategy).toBe(allocateByAveragely);
  });

  it("sets flow-control defaults", () => {
    const options = defaultConsumerOptions(now);
    expect(options.pullThresholdPerTopic).toEqual({ kind: "unlimited" });
    expect(options.pullThresholdSizePerTopic).toEqual({ kind: "unlimited" });
    expect(options.pullThresholdPerQueue).toBe(1000);
    expect(options.pullThresholdSizePerQueue).toBe(100 * 1024 * 1024);
    expect(options.pullIntervalMs).toBe(0);
    expect(options.pullBatchSize).toBe(32);
    expect(options.consumeBatchMaxSize).toBe(1);
    expect(options.maxConcurrentSpan).toBe(2000);
  });

  it("starts timestamp consumption half an hour before construction", () => {
    expect(defaultConsumerOptions(now).consumeTimestamp).toBe("20240101113000");
  });

  it("keeps the remaining defaults", () => {
    const options = defaultConsumerOptions(now);
    expect(options.fromWhere).toBe(ConsumeFromWhere.CONSUME_FROM_LAST_OFFSET);
    expect(options.consumeOrderly).toBe(false);
    expect(options.postSubscriptionOnPull).toBe(false);
    expect(options.maxReconsumeTimes).toEqual({ kind: "default" });
    expect(options.interceptors).toEqual([]);
    expect(options.suspendTimeOnFlowControlMs).toBe(1000);
    expect(options.consumeTimeoutMs).toBe(900_000);
    expect(options.pullTimeoutMs).toBe(30_000);
    expect(options.nameServerAddrs).toEqual([]);
    expect(options.retryTimes).toBe(3);
  });

  it("returns independent objects", () => {
    const a = defaultConsumerOptions(now);
    const b = defaultConsumerOptions(now);
    expect(a).not.toBe(b);
    expect(a.interceptors).not.toBe(b.interceptors);
  });
});

describe("thresholds", () => {
  it("maps legacy values <= 0 to unlimited", () => {
    expect(thresholdFromLegacy(-1)).toBe(UNLIMITED);
    expect(thresholdFromLegacy(0)).toBe(UNLIMITED);
    expect(thresholdFromLegacy(500)).toEqual({ kind: "limited", value: 500 });
  });

  it("maps back to the legacy encoding", () => {
    expect(toLegacyThreshold(UNLIMITED)).toBe(-1);
    expect(toLegacyThreshold(limited(42))).toBe(42);
  });
});

describe("resolveMaxReconsumeTimes", () => {
  it.each([
    [-1, 16],
    [5, 5],
    [0, 0],
  ])("resolves %i to %i", (configured, expected) => {
    expect(
      resolveMaxReconsumeTimes({
        maxReconsumeTimes: reconsumeLimitFromLegacy(configured),
      }),
    ).toBe(expected);
  });

  it("stores -1 as the default tag, not as 16", () => {
    expect(reconsumeLimitFromLegacy(-1)).toEqual({ kind: "default" });
  });
});

describe("consume timestamps", () => {
  it("formats in UTC with second precision", () => {
    expect(formatConsumeTimestamp(new Date(Date.UTC(2013, 11, 23, 17, 12, 1)))).toBe(
      "20131223171201",
    );
  });

  it("parses a valid value", () => {
    expect(parseConsumeTimestamp("20131223171201")?.toISOString()).toBe(
      "2013-12-23T17:12:01.000Z",
    );
  });

  it.each(["2013122317120", "20131323171201", "20130230120000", "2013-12-23"])(
    "rejects %s",
    (value) => {
      expect(parseConsumeTimestamp(value)).toBeUndefined();
    },
  );
});
