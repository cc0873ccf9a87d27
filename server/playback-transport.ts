/**
 * Playback Transport
 *
 * Replays a recorded traffic capture (JSONL) through the monitor's ingest
 * entry point, so the dashboard can run without a broker. Events are
 * replayed with their original spacing (or scaled by `speed`) and stamped
 * with the replay clock, so the window rates describe the replay as it runs.
 *
 * Events emitted:
 * - 'event':    after each replayed line (RecordedTraffic)
 * - 'loop':     when a looping replay wraps around
 * - 'complete': when a non-looping replay has emitted its last line
 */

import * as fs from 'fs';
import * as path from 'path';
import { EventEmitter } from 'events';
import {
  PLAYBACK_CONFIG,
  RecordedTrafficSchema,
  isValidSpeed,
  type RecordedTraffic,
} from '@shared/schemas/playback-config';
import { createLogger } from './lib/logger';
import { receiptClock, type IngestSink, type TrafficTransport } from './traffic-transport';

const log = createLogger('Playback');

export interface PlaybackOptions {
  /** Speed multiplier (1 = real-time, 2 = 2x speed, 0 = instant) */
  speed?: number;
  /** Loop playback continuously */
  loop?: boolean;
  /** Epoch seconds; defaults to wall-clock time at emission. */
  clock?: () => number;
}

export interface ParsedRecording {
  events: RecordedTraffic[];
  skippedLines: number;
}

/**
 * Parse JSONL capture content. Blank lines are ignored; lines that are not
 * JSON or do not match the capture schema are counted and skipped.
 * Events are ordered by relativeMs.
 */
export function parseRecording(content: string): ParsedRecording {
  const events: RecordedTraffic[] = [];
  let skippedLines = 0;

  content.split('\n').forEach((line, index) => {
    if (line.trim() === '') return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      log.warn(`Skipping line ${index + 1}: not valid JSON`);
      skippedLines++;
      return;
    }

    const result = RecordedTrafficSchema.safeParse(parsed);
    if (!result.success) {
      log.warn(`Skipping line ${index + 1}: ${result.error.issues[0]?.message ?? 'invalid'}`);
      skippedLines++;
      return;
    }
    events.push(result.data);
  });

  events.sort((a, b) => a.relativeMs - b.relativeMs);
  return { events, skippedLines };
}

export class PlaybackTransport extends EventEmitter implements TrafficTransport {
  readonly name = 'playback';

  private readonly speed: number;
  private readonly loop: boolean;
  private readonly clock: () => number;
  private events: RecordedTraffic[] = [];
  private currentIndex = 0;
  private isPlaying = false;
  private currentTimeout: NodeJS.Timeout | null = null;
  private currentImmediate: NodeJS.Immediate | null = null;

  constructor(
    private readonly sink: IngestSink,
    private readonly filePath: string,
    options: PlaybackOptions = {}
  ) {
    super();
    const speed = options.speed ?? PLAYBACK_CONFIG.DEFAULT_SPEED;
    if (!isValidSpeed(speed)) {
      throw new RangeError(
        `Invalid playback speed ${speed}: must be ${PLAYBACK_CONFIG.INSTANT_SPEED} (instant) ` +
          `or in (${PLAYBACK_CONFIG.MIN_SPEED}, ${PLAYBACK_CONFIG.MAX_SPEED}]`
      );
    }
    this.speed = speed;
    this.loop = options.loop ?? false;
    this.clock = options.clock ?? receiptClock;
  }

  /**
   * Read and parse the capture file.
   * @throws Error when the file does not exist or holds no valid events
   */
  loadRecording(): RecordedTraffic[] {
    if (!fs.existsSync(this.filePath)) {
      throw new Error(`Recording file not found: ${this.filePath}`);
    }

    const { events, skippedLines } = parseRecording(fs.readFileSync(this.filePath, 'utf-8'));
    if (events.length === 0) {
      throw new Error(`Recording contains no valid events: ${path.basename(this.filePath)}`);
    }

    this.events = events;
    log.info(
      `Loaded ${events.length} events from ${path.basename(this.filePath)}` +
        (skippedLines > 0 ? ` (${skippedLines} lines skipped)` : '')
    );
    return events;
  }

  async start(): Promise<void> {
    if (this.isPlaying) {
      log.warn('Already playing');
      return;
    }

    this.loadRecording();
    this.currentIndex = 0;
    this.isPlaying = true;
    log.info(`Starting playback at ${this.speed === 0 ? 'instant' : `${this.speed}x`} speed`);

    this.playNextEvent();
  }

  async stop(): Promise<void> {
    if (!this.isPlaying) return;
    this.isPlaying = false;
    this.clearScheduled();
    log.info(`Stopped at event ${this.currentIndex}/${this.events.length}`);
  }

  getStatus(): { isPlaying: boolean; currentIndex: number; totalEvents: number } {
    return {
      isPlaying: this.isPlaying,
      currentIndex: this.currentIndex,
      totalEvents: this.events.length,
    };
  }

  // --------------------------------------------------------------------------
  // Scheduling
  // --------------------------------------------------------------------------

  private playNextEvent(): void {
    if (!this.isPlaying) return;

    if (this.currentIndex >= this.events.length) {
      if (!this.loop) {
        this.isPlaying = false;
        log.info('Playback complete');
        this.emit('complete');
        return;
      }
      log.debug('Looping...');
      this.currentIndex = 0;
      this.emit('loop');
      // A 'loop' listener may have stopped playback
      if (!this.isPlaying) return;
    }

    const event = this.events[this.currentIndex];
    this.sink.onEvent(event.topic, event.size, this.clock());
    this.emit('event', event);
    this.currentIndex++;

    const nextEvent = this.events[this.currentIndex];
    if (nextEvent !== undefined && this.speed !== PLAYBACK_CONFIG.INSTANT_SPEED) {
      const delay = Math.max(0, (nextEvent.relativeMs - event.relativeMs) / this.speed);
      this.currentTimeout = setTimeout(() => this.playNextEvent(), delay);
    } else if (this.currentIndex % PLAYBACK_CONFIG.INSTANT_BATCH === 0) {
      // Yield to timers (report cycles) every batch in instant mode
      this.currentTimeout = setTimeout(() => this.playNextEvent(), 0);
    } else {
      this.currentImmediate = setImmediate(() => this.playNextEvent());
    }
  }

  private clearScheduled(): void {
    if (this.currentTimeout) {
      clearTimeout(this.currentTimeout);
      this.currentTimeout = null;
    }
    if (this.currentImmediate) {
      clearImmediate(this.currentImmediate);
      this.currentImmediate = null;
    }
  }
}
