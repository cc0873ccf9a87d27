import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';

const {
  mockKafka,
  mockConsumerFactory,
  mockConsumerConnect,
  mockConsumerDisconnect,
  mockConsumerSubscribe,
  mockConsumerRun,
  mockConsumerOn,
} = vi.hoisted(() => {
  const mockConsumerConnect = vi.fn();
  const mockConsumerDisconnect = vi.fn();
  const mockConsumerSubscribe = vi.fn();
  const mockConsumerRun = vi.fn();
  const mockConsumerOn = vi.fn();
  const mockConsumerFactory = vi.fn(() => ({
    connect: mockConsumerConnect,
    disconnect: mockConsumerDisconnect,
    subscribe: mockConsumerSubscribe,
    run: mockConsumerRun,
    on: mockConsumerOn,
    events: { CRASH: 'consumer.crash' },
  }));
  return {
    // Invoked with `new`, so the implementation must be constructible
    mockKafka: vi.fn(function () {
      return { consumer: mockConsumerFactory };
    }),
    mockConsumerFactory,
    mockConsumerConnect,
    mockConsumerDisconnect,
    mockConsumerSubscribe,
    mockConsumerRun,
    mockConsumerOn,
  };
});

// Mock kafkajs module
vi.mock('kafkajs', () => ({
  Kafka: mockKafka,
  logLevel: { NOTHING: 0, ERROR: 1, WARN: 2, INFO: 4, DEBUG: 5 },
}));

// Import after mocks are set up
import { KafkaTransport, buildSubscriptionPattern } from '../kafka-transport';
import type { IngestSink } from '../traffic-transport';

const OPTIONS = {
  brokers: ['broker-1:9092', 'broker-2:9092'],
  clientId: 'test-client',
  groupId: 'test-group',
  baseTopic: 'zigbee2mqtt',
  separator: '/',
  clock: () => 42,
};

describe('buildSubscriptionPattern', () => {
  it('should match the base topic and everything beneath it', () => {
    const pattern = buildSubscriptionPattern('zigbee2mqtt', '/');
    expect(pattern.test('zigbee2mqtt')).toBe(true);
    expect(pattern.test('zigbee2mqtt/lamp/set')).toBe(true);
    expect(pattern.test('zigbee2mqtt2/lamp')).toBe(false);
    expect(pattern.test('other/zigbee2mqtt')).toBe(false);
  });

  it('should escape regex metacharacters in the base topic and separator', () => {
    const pattern = buildSubscriptionPattern('home.v1', '.');
    expect(pattern.test('home.v1.kitchen')).toBe(true);
    expect(pattern.test('homeXv1.kitchen')).toBe(false);
    expect(pattern.test('home.v1Xkitchen')).toBe(false);
  });
});

describe('KafkaTransport', () => {
  let sink: IngestSink;
  let onEvent: Mock<IngestSink['onEvent']>;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    mockConsumerConnect.mockResolvedValue(undefined);
    mockConsumerDisconnect.mockResolvedValue(undefined);
    mockConsumerSubscribe.mockResolvedValue(undefined);
    mockConsumerRun.mockResolvedValue(undefined);
    onEvent = vi.fn<IngestSink['onEvent']>(() => true);
    sink = { onEvent };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should create the client with the configured brokers and client id', () => {
    new KafkaTransport(sink, OPTIONS);
    expect(mockKafka).toHaveBeenCalledWith({
      brokers: ['broker-1:9092', 'broker-2:9092'],
      clientId: 'test-client',
      logLevel: 2,
    });
  });

  it('should connect without credentials when none are configured', () => {
    new KafkaTransport(sink, OPTIONS);
    expect(mockKafka).toHaveBeenCalledWith(
      expect.not.objectContaining({ sasl: expect.anything() })
    );
  });

  it('should authenticate with SASL/PLAIN when credentials are configured', async () => {
    const transport = new KafkaTransport(sink, {
      ...OPTIONS,
      sasl: { username: 'monitor', password: 'test-secret' },
    });
    expect(mockKafka).toHaveBeenCalledWith({
      brokers: ['broker-1:9092', 'broker-2:9092'],
      clientId: 'test-client',
      logLevel: 2,
      sasl: { mechanism: 'plain', username: 'monitor', password: 'test-secret' },
    });

    await transport.start();
    expect(console.log).toHaveBeenCalledWith(
      '[KafkaTransport] Connected to broker-1:9092,broker-2:9092 as monitor'
    );
  });

  it('should connect, subscribe by pattern and start consuming', async () => {
    const transport = new KafkaTransport(sink, OPTIONS);
    await transport.start();

    expect(mockConsumerFactory).toHaveBeenCalledWith({ groupId: 'test-group' });
    expect(mockConsumerConnect).toHaveBeenCalledTimes(1);
    expect(mockConsumerSubscribe).toHaveBeenCalledWith({
      topics: [expect.any(RegExp)],
      fromBeginning: false,
    });
    expect(mockConsumerRun).toHaveBeenCalledWith({ eachMessage: expect.any(Function) });
    expect(transport.name).toBe('kafka');
  });

  it('should forward topic and payload size with the receipt timestamp', async () => {
    const transport = new KafkaTransport(sink, OPTIONS);
    await transport.start();
    const { eachMessage } = mockConsumerRun.mock.calls[0][0];

    await eachMessage({ topic: 'zigbee2mqtt/lamp', partition: 0, message: { value: Buffer.from('hello') } });
    await eachMessage({ topic: 'zigbee2mqtt/lamp', partition: 0, message: { value: null } });

    expect(onEvent).toHaveBeenNthCalledWith(1, 'zigbee2mqtt/lamp', 5, 42);
    expect(onEvent).toHaveBeenNthCalledWith(2, 'zigbee2mqtt/lamp', 0, 42);
    expect(transport.messagesReceived).toBe(2);
  });

  it('should ignore a second start while running', async () => {
    const transport = new KafkaTransport(sink, OPTIONS);
    await transport.start();
    await transport.start();

    expect(mockConsumerFactory).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith('[KafkaTransport:warn] Already running');
  });

  it('should disconnect and rethrow when connecting fails', async () => {
    mockConsumerConnect.mockRejectedValueOnce(new Error('ECONNREFUSED'));
    const transport = new KafkaTransport(sink, OPTIONS);

    await expect(transport.start()).rejects.toThrow('ECONNREFUSED');
    expect(mockConsumerDisconnect).toHaveBeenCalledTimes(1);

    // A failed start leaves nothing to stop
    await transport.stop();
    expect(mockConsumerDisconnect).toHaveBeenCalledTimes(1);
  });

  it('should log consumer crashes', async () => {
    const transport = new KafkaTransport(sink, OPTIONS);
    await transport.start();

    expect(mockConsumerOn).toHaveBeenCalledWith('consumer.crash', expect.any(Function));
    const crashHandler = mockConsumerOn.mock.calls[0][1];
    const cause = new Error('broker gone');
    crashHandler({ payload: { error: cause, restart: true } });

    expect(console.error).toHaveBeenCalledWith(
      '[KafkaTransport:error] Consumer crashed (restart: true)',
      cause
    );
  });

  it('should disconnect on stop and allow a fresh start', async () => {
    const transport = new KafkaTransport(sink, OPTIONS);
    await transport.start();
    await transport.stop();

    expect(mockConsumerDisconnect).toHaveBeenCalledTimes(1);

    await transport.start();
    expect(mockConsumerFactory).toHaveBeenCalledTimes(2);
  });

  it('should do nothing when stopped before starting', async () => {
    const transport = new KafkaTransport(sink, OPTIONS);
    await transport.stop();
    expect(mockConsumerDisconnect).not.toHaveBeenCalled();
  });
});
