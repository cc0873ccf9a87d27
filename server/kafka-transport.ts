/**
 * Kafka Transport
 *
 * Consumes every topic under the base namespace from a Kafka/Redpanda bus and
 * feeds each message's topic and payload size to the monitor's ingest entry
 * point. Payloads are never parsed; only `message.value.length` is used.
 *
 * Messages are stamped with receipt time rather than the broker timestamp so
 * that the stream reaching the window aggregator is non-decreasing even when
 * partitions deliver out of order.
 */

import {
  Kafka,
  logLevel,
  type Consumer,
  type EachMessagePayload,
  type KafkaConfig,
} from 'kafkajs';
import { createLogger, errorMessage } from './lib/logger';
import { receiptClock, type IngestSink, type TrafficTransport } from './traffic-transport';

const log = createLogger('KafkaTransport');

export interface KafkaCredentials {
  username: string;
  password: string;
}

export interface KafkaTransportOptions {
  brokers: string[];
  clientId: string;
  groupId: string;
  /** Authenticate with SASL/PLAIN; connects anonymously when omitted. */
  sasl?: KafkaCredentials;
  baseTopic: string;
  separator: string;
  /** Epoch seconds; defaults to receipt time. */
  clock?: () => number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Subscription pattern for the base topic and everything beneath it,
 * e.g. `zigbee2mqtt` -> /^zigbee2mqtt(?:\/.*)?$/
 */
export function buildSubscriptionPattern(baseTopic: string, separator: string): RegExp {
  return new RegExp(`^${escapeRegExp(baseTopic)}(?:${escapeRegExp(separator)}.*)?$`);
}

export class KafkaTransport implements TrafficTransport {
  readonly name = 'kafka';

  private readonly kafka: Kafka;
  private readonly clock: () => number;
  private consumer: Consumer | null = null;
  private isRunning = false;
  private received = 0;

  constructor(
    private readonly sink: IngestSink,
    private readonly options: KafkaTransportOptions
  ) {
    this.clock = options.clock ?? receiptClock;
    const config: KafkaConfig = {
      brokers: options.brokers,
      clientId: options.clientId,
      logLevel: logLevel.WARN,
    };
    if (options.sasl) {
      config.sasl = {
        mechanism: 'plain',
        username: options.sasl.username,
        password: options.sasl.password,
      };
    }
    this.kafka = new Kafka(config);
  }

  /** Messages handed to the sink so far, counted or filtered. */
  get messagesReceived(): number {
    return this.received;
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      log.warn('Already running');
      return;
    }

    const consumer = this.kafka.consumer({ groupId: this.options.groupId });
    this.consumer = consumer;

    consumer.on(consumer.events.CRASH, (event) => {
      log.error(`Consumer crashed (restart: ${event.payload.restart})`, event.payload.error);
    });

    try {
      await consumer.connect();
      log.info(
        `Connected to ${this.options.brokers.join(',')}` +
          (this.options.sasl ? ` as ${this.options.sasl.username}` : '')
      );

      const pattern = buildSubscriptionPattern(this.options.baseTopic, this.options.separator);
      await consumer.subscribe({ topics: [pattern], fromBeginning: false });
      log.info(`Subscribed to ${pattern}`);

      await consumer.run({
        eachMessage: async (payload: EachMessagePayload) => {
          this.handleMessage(payload);
        },
      });
      this.isRunning = true;
    } catch (error) {
      log.error(`Failed to start consumer: ${errorMessage(error)}`);
      this.consumer = null;
      await consumer.disconnect().catch((disconnectError: unknown) => {
        log.warn(`Disconnect after failed start also failed: ${errorMessage(disconnectError)}`);
      });
      throw error;
    }
  }

  async stop(): Promise<void> {
    if (!this.consumer) return;
    const consumer = this.consumer;
    this.consumer = null;
    this.isRunning = false;
    await consumer.disconnect();
    log.info(`Disconnected after ${this.received} messages`);
  }

  private handleMessage({ topic, message }: EachMessagePayload): void {
    this.received++;
    this.sink.onEvent(topic, message.value?.length ?? 0, this.clock());
  }
}
