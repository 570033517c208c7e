import {
  ACCELERATION_WINDOW_DAYS,
  PERSISTENCE_MIN_SCORE,
  PERSISTENCE_WINDOW,
  SIGNAL_BUCKET_WEIGHTS,
  SIGNAL_TYPE_BUCKETS,
  SignalBucket,
  SOURCE_TIER_WEIGHTS,
} from '../config/radar.constants';
import {
  MovementCluster,
  NormalizedItem,
  RadarConfig,
} from '../types/radar.types';
import { clamp01 } from './score.util';
import { containsKeyword } from './text.util';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface FactorContext {
  asOfMs: number;
  config: RadarConfig;
  itemsById: ReadonlyMap<string, NormalizedItem>;
  /** Committed scores per movement id, oldest first. */
  priorScores?: ReadonlyMap<string, readonly number[]>;
}

export interface MovementFactor {
  readonly name: string;
  compute(movement: MovementCluster, context: FactorContext): number;
}

function membersOf(
  movement: MovementCluster,
  context: FactorContext,
): NormalizedItem[] {
  return movement.memberIds
    .map((id) => context.itemsById.get(id))
    .filter((item): item is NormalizedItem => item !== undefined);
}

export function matchesAnyThemeKeyword(
  text: string,
  config: RadarConfig,
): boolean {
  return config.themes.some((theme) =>
    theme.keywords.some((keyword) => containsKeyword(text, keyword)),
  );
}

const recency: MovementFactor = {
  name: 'recency',
  compute(movement, context) {
    const lastSeenMs = Date.parse(movement.lastSeen);
    const ageDays = Math.max(0, context.asOfMs - lastSeenMs) / DAY_MS;
    return clamp01(1 - ageDays / context.config.recencyHorizonDays);
  },
};

const trust: MovementFactor = {
  name: 'trust',
  compute(movement, context) {
    const members = membersOf(movement, context);
    if (members.length === 0) {
      return 0;
    }
    const total = members.reduce(
      (sum, item) => sum + SOURCE_TIER_WEIGHTS[item.sourceTier],
      0,
    );
    return clamp01(total / members.length);
  },
};

const size: MovementFactor = {
  name: 'size',
  compute(movement, context) {
    return clamp01(movement.memberIds.length / context.config.sizeSaturation);
  },
};

const relevance: MovementFactor = {
  name: 'relevance',
  compute(movement, context) {
    const members = membersOf(movement, context);
    if (members.length === 0) {
      return 0;
    }
    const hits = members.filter((item) =>
      matchesAnyThemeKeyword(`${item.title} ${item.summary}`, context.config),
    ).length;
    return clamp01(hits / members.length);
  },
};

const diversity: MovementFactor = {
  name: 'diversity',
  compute(movement, context) {
    return clamp01(
      movement.sources.length / context.config.diversitySaturation,
    );
  },
};

// Signal mix: share of members per signal bucket, weighted by bucket impact.
const momentum: MovementFactor = {
  name: 'momentum',
  compute(movement, context) {
    const members = membersOf(movement, context);
    if (members.length === 0) {
      return 0;
    }
    const counts = new Map<SignalBucket, number>();
    for (const item of members) {
      const bucket =
        SIGNAL_TYPE_BUCKETS.get(item.signalType ?? '') ?? 'crossAdoption';
      counts.set(bucket, (counts.get(bucket) ?? 0) + 1);
    }
    let impact = 0;
    for (const [bucket, count] of counts) {
      impact += SIGNAL_BUCKET_WEIGHTS[bucket] * (count / members.length);
    }
    return clamp01(impact);
  },
};

/**
 * Members in the last window against the window before it, relative to asOf.
 * (recent + 1) / (baseline + 1) maps to 0.5 + 0.25 * (ratio - 1).
 */
const acceleration: MovementFactor = {
  name: 'acceleration',
  compute(movement, context) {
    const windowMs = ACCELERATION_WINDOW_DAYS * DAY_MS;
    const recentCutoff = context.asOfMs - windowMs;
    const baselineCutoff = context.asOfMs - 2 * windowMs;
    let recent = 0;
    let baseline = 0;
    for (const item of membersOf(movement, context)) {
      if (item.dateMs >= recentCutoff) {
        recent += 1;
      } else if (item.dateMs >= baselineCutoff) {
        baseline += 1;
      }
    }
    const ratio = (recent + 1) / (baseline + 1);
    return clamp01(0.5 + 0.25 * (ratio - 1));
  },
};

// Share of the last committed scores at or above the persistence bar.
const persistence: MovementFactor = {
  name: 'persistence',
  compute(movement, context) {
    const scores = context.priorScores?.get(movement.id) ?? [];
    const hits = scores
      .slice(-PERSISTENCE_WINDOW)
      .filter((score) => score >= PERSISTENCE_MIN_SCORE).length;
    return clamp01(hits / PERSISTENCE_WINDOW);
  },
};

export const MOVEMENT_FACTORS: ReadonlyMap<string, MovementFactor> = new Map(
  [
    recency,
    trust,
    size,
    relevance,
    diversity,
    momentum,
    acceleration,
    persistence,
  ].map((factor) => [factor.name, factor]),
);
