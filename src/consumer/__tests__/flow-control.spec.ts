import {
  FlowControl,
  deriveQueueThresholds,
  evaluateFlowControl,
  topicThresholdsOf,
} from "../flow-control";
import type { TopicThresholds } from "../flow-control";
import { UNLIMITED, limited } from "../options";

const configured = { count: 1000, sizeBytes: 100 * 1024 * 1024 };

function thresholds(
  topicCount: TopicThresholds["topicCount"],
  topicSize: TopicThresholds["topicSize"] = UNLIMITED,
): TopicThresholds {
  return { topicCount, topicSize, configured };
}

describe("deriveQueueThresholds", () => {
  it("divides a limited topic count evenly", () => {
    expect(deriveQueueThresholds(thresholds(limited(1000)), 10)).toEqual({
      count: 100,
      sizeBytes: configured.sizeBytes,
    });
  });

  it("clamps the per-queue count to 1", () => {
    expect(deriveQueueThresholds(thresholds(limited(5)), 10)?.count).toBe(1);
  });

  it("floors uneven divisions", () => {
    expect(deriveQueueThresholds(thresholds(limited(1000)), 3)?.count).toBe(333);
  });

  it("applies the same rule to the size threshold", () => {
    expect(
      deriveQueueThresholds(thresholds(UNLIMITED, limited(1000)), 3),
    ).toEqual({ count: 1000, sizeBytes: 333 });
    expect(
      deriveQueueThresholds(thresholds(UNLIMITED, limited(2)), 4)?.sizeBytes,
    ).toBe(1);
  });

  it("keeps configured values when both topic thresholds are unlimited", () => {
    for (const n of [0, 1, 10, 1000]) {
      expect(deriveQueueThresholds(thresholds(UNLIMITED), n)).toEqual(configured);
    }
  });

  it("defers when no queues are assigned", () => {
    expect(deriveQueueThresholds(thresholds(limited(1000)), 0)).toBeUndefined();
  });

  it("defers for a fractional or NaN queue count below one", () => {
    expect(deriveQueueThresholds(thresholds(limited(1000)), 0.5)).toBeUndefined();
    expect(deriveQueueThresholds(thresholds(limited(1000)), NaN)).toBeUndefined();
  });

  it("divides by the whole number of queues", () => {
    expect(deriveQueueThresholds(thresholds(limited(1000)), 2.7)?.count).toBe(500);
  });

  it("is idempotent for identical inputs", () => {
    const input = thresholds(limited(900), limited(9000));
    expect(deriveQueueThresholds(input, 9)).toEqual(deriveQueueThresholds(input, 9));
  });

  it("holds max(1, floor(T/N)) across a range of inputs", () => {
    for (const t of [1, 7, 100, 1000, 65535]) {
      for (const n of [1, 2, 3, 8, 64, 5000]) {
        expect(deriveQueueThresholds(thresholds(limited(t)), n)?.count).toBe(
          Math.max(1, Math.floor(t / n)),
        );
      }
    }
  });
});

describe("FlowControl", () => {
  const options = {
    pullThresholdPerTopic: limited(1000),
    pullThresholdSizePerTopic: UNLIMITED,
    pullThresholdPerQueue: 500,
    pullThresholdSizePerQueue: 4096,
  };

  it("returns the configured values before any assignment", () => {
    expect(new FlowControl(options).thresholdsFor("orders")).toEqual({
      count: 500,
      sizeBytes: 4096,
    });
  });

  it("overrides the explicit per-queue threshold once topic-limited", () => {
    const flow = new FlowControl(options);
    flow.onQueuesAssigned("orders", 4);
    expect(flow.thresholdsFor("orders")).toEqual({ count: 250, sizeBytes: 4096 });
  });

  it("recomputes from the configured values, not the previous snapshot", () => {
    const flow = new FlowControl(options);
    flow.onQueuesAssigned("orders", 4);
    flow.onQueuesAssigned("orders", 2);
    expect(flow.thresholdsFor("orders").count).toBe(500);
    flow.onQueuesAssigned("orders", 4);
    expect(flow.thresholdsFor("orders").count).toBe(250);
  });

  it("keeps the last snapshot when the assignment drops to zero", () => {
    const flow = new FlowControl(options);
    flow.onQueuesAssigned("orders", 5);
    expect(flow.onQueuesAssigned("orders", 0)).toEqual({ count: 200, sizeBytes: 4096 });
    expect(flow.thresholdsFor("orders").count).toBe(200);
  });

  it("tracks topics independently", () => {
    const flow = new FlowControl(options);
    flow.onQueuesAssigned("orders", 10);
    flow.onQueuesAssigned("payments", 2);
    expect(flow.thresholdsFor("orders").count).toBe(100);
    expect(flow.thresholdsFor("payments").count).toBe(500);
  });

  it("replaces snapshots instead of mutating them", () => {
    const flow = new FlowControl(options);
    const first = flow.onQueuesAssigned("orders", 10);
    const second = flow.onQueuesAssigned("orders", 5);
    expect(first).not.toBe(second);
    expect(first).toEqual({ count: 100, sizeBytes: 4096 });
    expect(Object.isFrozen(second)).toBe(true);
  });

  it("forgets a topic", () => {
    const flow = new FlowControl(options);
    flow.onQueuesAssigned("orders", 10);
    flow.forget("orders");
    expect(flow.thresholdsFor("orders").count).toBe(500);
  });

  it("reports whether a topic threshold is limited", () => {
    expect(new FlowControl(options).topicLimited).toBe(true);
    expect(
      new FlowControl({ ...options, pullThresholdPerTopic: UNLIMITED }).topicLimited,
    ).toBe(false);
  });

  it("logs recomputation at debug level", () => {
    const logger = { log: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
    new FlowControl(options, logger).onQueuesAssigned("orders", 4);
    expect(logger.debug).toHaveBeenCalledWith(
      'Queue thresholds for topic "orders" across 4 queue(s): count=250, sizeBytes=4096',
    );
  });

  it("builds from a full configuration", () => {
    expect(topicThresholdsOf(options).configured).toEqual({ count: 500, sizeBytes: 4096 });
  });
});

describe("evaluateFlowControl", () => {
  const options = {
    consumeOrderly: false,
    maxConcurrentSpan: 2000,
    suspendTimeOnFlowControlMs: 50,
  };
  const queue = { count: 100, sizeBytes: 1024 };

  it("does not throttle under every cap", () => {
    expect(
      evaluateFlowControl(options, queue, {
        cachedMessageCount: 100,
        cachedSizeBytes: 1024,
        offsetSpan: 2000,
      }),
    ).toEqual({ throttled: false });
  });

  it("throttles on cached message count first", () => {
    expect(
      evaluateFlowControl(options, queue, {
        cachedMessageCount: 101,
        cachedSizeBytes: 5000,
        offsetSpan: 5000,
      }),
    ).toEqual({ throttled: true, reason: "count", suspendMs: 50 });
  });

  it("throttles on cached size", () => {
    expect(
      evaluateFlowControl(options, queue, {
        cachedMessageCount: 1,
        cachedSizeBytes: 1025,
        offsetSpan: 0,
      }),
    ).toEqual({ throttled: true, reason: "size", suspendMs: 50 });
  });

  it("throttles on offset span only for concurrent consumption", () => {
    const usage = { cachedMessageCount: 1, cachedSizeBytes: 1, offsetSpan: 2001 };
    expect(evaluateFlowControl(options, queue, usage)).toEqual({
      throttled: true,
      reason: "span",
      suspendMs: 50,
    });
    expect(
      evaluateFlowControl({ ...options, consumeOrderly: true }, queue, usage),
    ).toEqual({ throttled: false });
  });
});
