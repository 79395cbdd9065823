export * from "./client/types";
export * from "./client/errors";
export * from "./client/client-options";
export * from "./client/logger";
export * from "./consumer/options";
export * from "./consumer/option";
export * from "./consumer/builder";
export * from "./consumer/flow-control";
export * from "./consumer/interceptor";
export * from "./consumer/allocate";
export * from "./consumer/kafka-bridge";
export * from "./nest/consumer-options.module";
export * from "./nest/consumer-options.constants";
export * from "./nest/consumer-options.decorator";
