/**
 * Transport contract shared by the Kafka consumer and the capture replayer.
 */

/** The ingest entry point a transport feeds. Implemented by TrafficMonitor. */
export interface IngestSink {
  onEvent(topic: string, payloadSizeBytes: number, timestamp: number): boolean;
}

export interface TrafficTransport {
  readonly name: string;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/** Receipt time in epoch seconds; non-decreasing for a single consumer. */
export const receiptClock = (): number => Date.now() / 1000;
