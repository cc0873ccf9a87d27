import { z } from 'zod';

// Playback configuration constants - single source of truth
export const PLAYBACK_CONFIG = {
  /** Maximum allowed playback speed multiplier */
  MAX_SPEED: 100,
  /** Default playback speed */
  DEFAULT_SPEED: 1,
  /** Speed value representing instant playback */
  INSTANT_SPEED: 0,
  /** Minimum speed (for validation) */
  MIN_SPEED: 0,
  /** Events emitted back-to-back in instant mode before yielding to the event loop */
  INSTANT_BATCH: 50,
} as const;

/**
 * One line of a traffic capture (JSONL).
 *
 * `size` is the payload length in bytes. Captures written by older recorders
 * carry the payload itself in `value` instead; its serialized length is used.
 */
export const RecordedTrafficSchema = z
  .object({
    relativeMs: z.number().finite().nonnegative(),
    topic: z.string().min(1),
    size: z.number().int().nonnegative().optional(),
    value: z.unknown().optional(),
  })
  .transform(({ relativeMs, topic, size, value }) => ({
    relativeMs,
    topic,
    size: size ?? payloadSize(value),
  }));
export type RecordedTraffic = z.output<typeof RecordedTrafficSchema>;

function payloadSize(value: unknown): number {
  if (value === undefined || value === null) return 0;
  const text = typeof value === 'string' ? value : JSON.stringify(value);
  return Buffer.byteLength(text, 'utf8');
}

/**
 * Validates playback speed value.
 *
 * Valid values:
 * - 0: Instant mode (all events replayed as fast as the event loop allows)
 * - (0, 100]: Speed multiplier applied to the recorded inter-event delays
 */
export function isValidSpeed(speed: number): boolean {
  return (
    Number.isFinite(speed) &&
    (speed === PLAYBACK_CONFIG.INSTANT_SPEED ||
      (speed > PLAYBACK_CONFIG.MIN_SPEED && speed <= PLAYBACK_CONFIG.MAX_SPEED))
  );
}
