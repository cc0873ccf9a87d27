/**
 * Topic Filtering & Display Key Extraction
 *
 * Decides which bus topics are counted and how a full topic path collapses
 * into the display key (device or category) that the dashboard groups by.
 *
 * - extractDisplayKey: topic path + detail depth -> display key
 * - createTopicFilter: predicate over base namespace and ignored sub-namespaces
 */

/** Segment separator used by MQTT-style topic paths. */
export const DEFAULT_TOPIC_SEPARATOR = '/';

// ============================================================================
// Display Key Extraction
// ============================================================================

/**
 * Map a full topic path to its display key.
 *
 * The first segment is the namespace and is dropped; the next `detailDepth`
 * segments are joined back together. When nothing is left (the topic is the
 * bare namespace, or depth is 0) the original topic is returned unchanged.
 *
 * @example
 * extractDisplayKey('zigbee2mqtt/bridge/state', 1) // 'bridge'
 * extractDisplayKey('zigbee2mqtt/bridge/state', 2) // 'bridge/state'
 * extractDisplayKey('zigbee2mqtt', 1)              // 'zigbee2mqtt'
 * extractDisplayKey('home.kitchen.lamp', 1, '.')   // 'kitchen'
 */
export function extractDisplayKey(
  topic: string,
  detailDepth: number,
  separator: string = DEFAULT_TOPIC_SEPARATOR
): string {
  const parts = topic.split(separator);
  const end = Math.min(parts.length, detailDepth + 1);
  const key = parts.slice(1, end).join(separator);
  return key === '' ? topic : key;
}

// ============================================================================
// Topic Filtering
// ============================================================================

export interface TopicFilterOptions {
  baseTopic: string;
  /** Sub-namespaces directly under the base topic to drop (e.g. `bridge`). */
  ignored?: readonly string[];
  separator?: string;
}

export type TopicFilter = (topic: string) => boolean;

/**
 * Build the predicate that decides whether a topic is counted.
 *
 * A topic passes when it is the base topic itself or lies under it, and is
 * not inside one of the ignored sub-namespaces. Matching is by whole
 * segment, so ignoring `bridge` drops `base/bridge` and `base/bridge/state`
 * but keeps `base/bridge_lamp`.
 *
 * @example
 * const filter = createTopicFilter({ baseTopic: 'zigbee2mqtt', ignored: ['bridge'] });
 * filter('zigbee2mqtt/lamp')         // true
 * filter('zigbee2mqtt/bridge/state') // false
 * filter('other/lamp')               // false
 */
export function createTopicFilter(options: TopicFilterOptions): TopicFilter {
  const separator = options.separator ?? DEFAULT_TOPIC_SEPARATOR;
  const basePrefix = `${options.baseTopic}${separator}`;
  const ignoredPrefixes = (options.ignored ?? []).map((sub) => `${basePrefix}${sub}`);

  return (topic: string): boolean => {
    if (topic !== options.baseTopic && !topic.startsWith(basePrefix)) return false;
    for (const prefix of ignoredPrefixes) {
      if (topic === prefix || topic.startsWith(`${prefix}${separator}`)) return false;
    }
    return true;
  };
}
