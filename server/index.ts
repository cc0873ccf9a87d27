// Load environment variables from .env file FIRST before any other imports
import { config as loadEnv } from 'dotenv';
loadEnv();

import type { Server } from 'http';
import { ConfigError, parseArgs, resolveConfig, USAGE, type MonitorConfig } from './config';
import { createLogger, errorMessage, setLogLevel } from './lib/logger';
import { TrafficMonitor } from './traffic-monitor';
import { ReportDriver } from './report-driver';
import { TerminalRenderer } from './terminal-renderer';
import { KafkaTransport } from './kafka-transport';
import { PlaybackTransport } from './playback-transport';
import { registerRoutes } from './routes';
import type { TrafficTransport } from './traffic-transport';

const log = createLogger('Monitor');

function createTransport(monitor: TrafficMonitor, config: MonitorConfig): TrafficTransport {
  if (config.replayFile !== undefined) {
    return new PlaybackTransport(monitor, config.replayFile, {
      speed: config.replaySpeed,
      loop: config.replayLoop,
    });
  }
  return new KafkaTransport(monitor, {
    brokers: config.brokers,
    clientId: config.clientId,
    groupId: config.groupId,
    sasl:
      config.username !== undefined && config.password !== undefined
        ? { username: config.username, password: config.password }
        : undefined,
    baseTopic: config.baseTopic,
    separator: config.separator,
  });
}

async function listen(server: Server, port: number): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

async function close(server: Server): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function main(): Promise<void> {
  const { help, values } = parseArgs(process.argv.slice(2));
  if (help) {
    console.log(USAGE);
    return;
  }

  const config = resolveConfig(values);
  setLogLevel(config.logLevel);

  const monitor = new TrafficMonitor({
    baseTopic: config.baseTopic,
    detailDepth: config.detailDepth,
    separator: config.separator,
    ignored: config.ignored,
    retentionSeconds: config.retentionSeconds,
  });
  const transport = createTransport(monitor, config);
  const renderer = new TerminalRenderer(
    process.stdout,
    `Bus Traffic Monitor [${config.baseTopic}]`
  );
  const driver = new ReportDriver({
    source: monitor,
    render: (report) => renderer.render(report),
    reportIntervalSeconds: config.reportIntervalSeconds,
    rateIntervals: config.rateIntervals,
    maxDisplayRows: () => renderer.maxDisplayRows(config.rateIntervals.length),
  });

  const controller = new AbortController();
  const shutdown = (): void => {
    if (controller.signal.aborted) return;
    console.log('\nStopping monitor...');
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  let server: Server | null = null;
  try {
    if (config.httpPort !== undefined) {
      server = registerRoutes(driver, { transport: transport.name, startedAt: monitor.startedAt });
      await listen(server, config.httpPort);
      log.info(`Serving report at http://localhost:${config.httpPort}/api/traffic/report`);
    }

    await transport.start();
    await driver.run(controller.signal);
  } finally {
    await transport.stop();
    if (server) await close(server);
  }
}

main().catch((error: unknown) => {
  console.error(errorMessage(error));
  if (error instanceof ConfigError) {
    console.error('Use --help to see valid options.');
  }
  process.exitCode = 1;
});
