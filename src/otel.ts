import { trace, context, SpanKind, SpanStatusCode } from "@opentelemetry/api";
import type { Interceptor } from "./consumer/interceptor";

/**
 * Create an interceptor that runs every invocation inside an OpenTelemetry
 * `CONSUMER` span named `<operation> <topic>`.
 *
 * Requires `@opentelemetry/api` as a peer dependency. Errors are recorded on
 * the span and rethrown unchanged.
 *
 * @example
 * ```ts
 * const options = buildConsumerOptions(
 *   withGroupName("orders"),
 *   withNameServer(["127.0.0.1:9876"]),
 *   withConsumerModel(MessageModel.CLUSTERING),
 *   withInterceptor(otelInterceptor()),
 * );
 * ```
 */
export function otelInterceptor(): Interceptor {
  const tracer = trace.getTracer("mq-consumer-options");

  return async (ctx, req, reply, next) => {
    const span = tracer.startSpan(
      ctx.topic ? `${ctx.operation} ${ctx.topic}` : ctx.operation,
      {
        kind: SpanKind.CONSUMER,
        attributes: {
          ...ctx.attributes,
          "messaging.operation": ctx.operation,
          ...(ctx.topic ? { "messaging.destination.name": ctx.topic } : {}),
          ...(ctx.groupName
            ? { "messaging.consumer.group.name": ctx.groupName }
            : {}),
        },
      },
    );
    const spanCtx = trace.setSpan(context.active(), span);
    try {
      await context.with(spanCtx, () => next(ctx, req, reply));
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      span.recordException(err);
      throw error;
    } finally {
      span.end();
    }
  };
}
