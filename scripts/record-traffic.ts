#!/usr/bin/env npx tsx
/* eslint-disable no-console */
/**
 * Traffic Recording Script
 *
 * Captures live bus traffic (topic and payload size only) to a JSONL file
 * that the monitor can replay with `--replay <file>`.
 *
 * Usage:
 *   npx tsx scripts/record-traffic.ts [options]
 *
 * Options:
 *   --duration <seconds>   Recording duration (default: 60)
 *   --output <file>        Output file path (default: recordings/traffic-{timestamp}.jsonl)
 *   --base-topic <name>    Base topic namespace (default: zigbee2mqtt)
 *   --separator <char>     Topic segment separator (default: /)
 *
 * Examples:
 *   npx tsx scripts/record-traffic.ts --duration 120
 *   npx tsx scripts/record-traffic.ts --base-topic home --separator .
 */

import { Kafka, type EachMessagePayload, type KafkaConfig } from 'kafkajs';
import * as fs from 'fs';
import * as path from 'path';
import 'dotenv/config';
import { buildSubscriptionPattern } from '../server/kafka-transport';
import { MONITOR_DEFAULTS } from '@shared/schemas/monitor-config';

const DEFAULT_DURATION_SECONDS = 60;

const KAFKA_BROKERS = (
  process.env.KAFKA_BROKERS ||
  process.env.KAFKA_BOOTSTRAP_SERVERS ||
  MONITOR_DEFAULTS.BROKERS.join(',')
).split(',');

interface RecordOptions {
  duration: number;
  output: string;
  baseTopic: string;
  separator: string;
}

function getArgValue(args: string[], index: number, flagName: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    console.error(`Error: ${flagName} requires a value`);
    process.exit(1);
  }
  return value;
}

function parseArgs(): RecordOptions {
  const args = process.argv.slice(2);
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
  const options: RecordOptions = {
    duration: DEFAULT_DURATION_SECONDS,
    output: `recordings/traffic-${timestamp}.jsonl`,
    baseTopic: process.env.MONITOR_BASE_TOPIC || MONITOR_DEFAULTS.BASE_TOPIC,
    separator: process.env.MONITOR_TOPIC_SEPARATOR || MONITOR_DEFAULTS.SEPARATOR,
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--duration': {
        const durationStr = getArgValue(args, i, '--duration');
        i++;
        const parsed = parseInt(durationStr, 10);
        if (!Number.isFinite(parsed) || parsed <= 0) {
          console.error(`Error: --duration must be a positive number, got: ${durationStr}`);
          process.exit(1);
        }
        options.duration = parsed;
        break;
      }
      case '--output':
        options.output = getArgValue(args, i, '--output');
        i++;
        break;
      case '--base-topic':
        options.baseTopic = getArgValue(args, i, '--base-topic');
        i++;
        break;
      case '--separator':
        options.separator = getArgValue(args, i, '--separator');
        i++;
        break;
      default:
        console.error(`Error: Unknown option: ${args[i]}`);
        console.error(
          'Valid options: --duration <seconds>, --output <file>, --base-topic <name>, --separator <char>'
        );
        process.exit(1);
    }
  }

  return options;
}

async function recordTraffic(): Promise<void> {
  const { duration, output, baseTopic, separator } = parseArgs();
  const pattern = buildSubscriptionPattern(baseTopic, separator);

  console.log('='.repeat(60));
  console.log('Traffic Recording');
  console.log('='.repeat(60));
  console.log(`Duration:    ${duration} seconds`);
  console.log(`Output:      ${output}`);
  console.log(`Topics:      ${pattern}`);
  console.log(`Brokers:     ${KAFKA_BROKERS.join(', ')}`);
  console.log('='.repeat(60));

  fs.mkdirSync(path.dirname(path.resolve(output)), { recursive: true });
  const writeStream = fs.createWriteStream(path.resolve(output), { flags: 'w', encoding: 'utf8' });

  const username = process.env.KAFKA_SASL_USERNAME;
  const password = process.env.KAFKA_SASL_PASSWORD;
  const config: KafkaConfig = { clientId: 'bus-traffic-recorder', brokers: KAFKA_BROKERS };
  if (username && password) {
    config.sasl = { mechanism: 'plain', username, password };
  }
  const kafka = new Kafka(config);
  const consumer = kafka.consumer({ groupId: `bus-traffic-recorder-${Date.now()}` });

  let eventCount = 0;
  let isShuttingDown = false;
  const startTime = Date.now();

  let resolveShutdown: () => void = () => {};
  const shutdownComplete = new Promise<void>((resolve) => {
    resolveShutdown = resolve;
  });

  const shutdown = async (reason: string): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    console.log(`\n\n${reason}`);

    await new Promise<void>((resolve, reject) => {
      writeStream.end((err?: Error | null) => (err ? reject(err) : resolve()));
    });
    await consumer.disconnect();
    console.log(`Recorded ${eventCount} messages to ${output}`);
    resolveShutdown();
  };

  await consumer.connect();
  await consumer.subscribe({ topics: [pattern], fromBeginning: false });

  const durationTimer = setTimeout(() => {
    shutdown('Duration reached, stopping...').catch(console.error);
  }, duration * 1000);

  process.once('SIGINT', () => {
    clearTimeout(durationTimer);
    shutdown('Received SIGINT, stopping...').catch(console.error);
  });

  // consumer.run() resolves once the group is joined; messages arrive in the background
  await consumer.run({
    eachMessage: async ({ topic, message }: EachMessagePayload) => {
      if (isShuttingDown) return;
      const now = Date.now();
      const line = {
        timestamp: new Date(now).toISOString(),
        relativeMs: now - startTime,
        topic,
        size: message.value?.length ?? 0,
      };
      writeStream.write(`${JSON.stringify(line)}\n`);
      eventCount++;
      if (eventCount % 100 === 0) process.stdout.write(`\rRecorded ${eventCount} messages`);
    },
  });

  await shutdownComplete;
}

recordTraffic().catch((error: unknown) => {
  console.error('Recording failed:', error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
