import {
  DistanceMetric,
  DistanceMetricName,
  NormalizedItem,
} from '../types/radar.types';
import { contentTokens } from './text.util';

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) {
    return 0;
  }

  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) {
      intersection += 1;
    }
  }

  const union = a.size + b.size - intersection;
  return union > 0 ? intersection / union : 0;
}

// Character n-grams with whitespace and hyphens removed.
export function shingles(value: string, n = 2): Set<string> {
  const compact = value.toLowerCase().replace(/[-\s]+/g, '');
  const out = new Set<string>();
  for (let i = 0; i <= compact.length - n; i += 1) {
    out.add(compact.slice(i, i + n));
  }
  return out;
}

// Each call returns a fresh metric with its own per-item cache, so a metric
// instance should live for one build only.
function cachedSetMetric(
  name: DistanceMetricName,
  toSet: (item: NormalizedItem) => Set<string>,
): DistanceMetric {
  const cache = new Map<string, Set<string>>();
  const setOf = (item: NormalizedItem): Set<string> => {
    let value = cache.get(item.eventUid);
    if (!value) {
      value = toSet(item);
      cache.set(item.eventUid, value);
    }
    return value;
  };

  return {
    name,
    distance(a, b) {
      if (a.eventUid === b.eventUid) {
        return 0;
      }
      return 1 - jaccard(setOf(a), setOf(b));
    },
  };
}

const METRIC_FACTORIES: Record<DistanceMetricName, () => DistanceMetric> = {
  'token-jaccard': () =>
    cachedSetMetric('token-jaccard', (item) =>
      contentTokens(`${item.title} ${item.summary}`),
    ),
  'shingle-jaccard': () =>
    cachedSetMetric('shingle-jaccard', (item) => shingles(item.title, 2)),
};

export function createDistanceMetric(name: DistanceMetricName): DistanceMetric {
  return METRIC_FACTORIES[name]();
}
