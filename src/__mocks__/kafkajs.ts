const mockConnect = jest.fn().mockResolvedValue(undefined);
const mockDisconnect = jest.fn().mockResolvedValue(undefined);
const mockSubscribe = jest.fn().mockResolvedValue(undefined);
const mockRun = jest.fn().mockResolvedValue(undefined);
const mockRemoveListener = jest.fn();
const mockOn = jest.fn().mockReturnValue(mockRemoveListener);

const mockConsumer = {
  connect: mockConnect,
  disconnect: mockDisconnect,
  subscribe: mockSubscribe,
  run: mockRun,
  on: mockOn,
  events: {
    GROUP_JOIN: "consumer.group_join",
  },
};

const mockConsumerFactory = jest.fn().mockReturnValue(mockConsumer);

const Kafka = jest.fn().mockImplementation(() => ({
  consumer: mockConsumerFactory,
}));

const logLevel = {
  NOTHING: 0,
  ERROR: 1,
  WARN: 2,
  INFO: 4,
  DEBUG: 5,
};

export {
  Kafka,
  logLevel,
  mockConsumer,
  mockConsumerFactory,
  mockConnect,
  mockDisconnect,
  mockSubscribe,
  mockRun,
  mockOn,
  mockRemoveListener,
};
