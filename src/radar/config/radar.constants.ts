import path from 'node:path';
import {
  ClusterLinkage,
  DistanceMetricName,
  ThemeAggregator,
} from '../types/radar.types';

export const SERVICE_NAME = 'movement-radar';

function numberEnv(envName: string, fallback: number, min = 0): number {
  const raw = Number(process.env[envName] ?? fallback);
  return Number.isFinite(raw) ? Math.max(min, raw) : fallback;
}

function integerEnv(envName: string, fallback: number, min = 0): number {
  return Math.floor(numberEnv(envName, fallback, min));
}

function choiceEnv<T extends string>(
  envName: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const raw = (process.env[envName] ?? '').trim().toLowerCase();
  return allowed.find((choice) => choice === raw) ?? fallback;
}

// "recency:0.3,trust:0.25" -> { recency: 0.3, trust: 0.25 }
export function parseWeightsCsv(raw: string): Record<string, number> {
  const weights: Record<string, number> = {};
  raw
    .split(',')
    .map((pair) => pair.trim())
    .filter(Boolean)
    .forEach((pair) => {
      const [name, value] = pair.split(':').map((part) => part.trim());
      if (name) {
        weights[name.toLowerCase()] = Number(value);
      }
    });
  return weights;
}

export const DISTANCE_METRIC_NAMES: readonly DistanceMetricName[] = [
  'token-jaccard',
  'shingle-jaccard',
];
export const CLUSTER_LINKAGES: readonly ClusterLinkage[] = [
  'single',
  'average',
  'complete',
];
export const THEME_AGGREGATORS: readonly ThemeAggregator[] = [
  'max',
  'mean',
  'top-k-mean',
  'weighted-top',
];

export const SCORING_VERSION = (
  process.env.RADAR_SCORING_VERSION ?? 'v1'
).trim();

const DEFAULT_FACTOR_WEIGHTS: Record<string, number> = {
  recency: 0.25,
  trust: 0.25,
  size: 0.2,
  relevance: 0.15,
  diversity: 0.15,
};

const weightsEnv = (process.env.RADAR_FACTOR_WEIGHTS ?? '').trim();
export const FACTOR_WEIGHTS: Record<string, number> = weightsEnv
  ? parseWeightsCsv(weightsEnv)
  : DEFAULT_FACTOR_WEIGHTS;

export const DISTANCE_THRESHOLD = numberEnv('RADAR_DISTANCE_THRESHOLD', 0.55);
export const DISTANCE_METRIC = choiceEnv(
  'RADAR_DISTANCE_METRIC',
  DISTANCE_METRIC_NAMES,
  'token-jaccard',
);
export const CLUSTER_LINKAGE = choiceEnv(
  'RADAR_CLUSTER_LINKAGE',
  CLUSTER_LINKAGES,
  'single',
);
export const DAY_WINDOW = numberEnv('RADAR_DAY_WINDOW', 30, 1);
const temporalWeightRaw = numberEnv('RADAR_TEMPORAL_WEIGHT', 0.1);
export const TEMPORAL_WEIGHT = Math.min(1, temporalWeightRaw);

export const THEME_AGGREGATOR = choiceEnv(
  'RADAR_THEME_AGGREGATOR',
  THEME_AGGREGATORS,
  'weighted-top',
);
export const THEME_TOP_K = integerEnv('RADAR_THEME_TOP_K', 3, 1);
export const TREND_EPSILON = numberEnv('RADAR_TREND_EPSILON', 2);
export const MIN_MOVEMENT_COUNT = integerEnv('RADAR_MIN_MOVEMENT_COUNT', 3, 1);
export const MIN_SOURCE_DIVERSITY = integerEnv(
  'RADAR_MIN_SOURCE_DIVERSITY',
  3,
  1,
);

export const RECENCY_HORIZON_DAYS = numberEnv(
  'RADAR_RECENCY_HORIZON_DAYS',
  180,
  1,
);
export const SIZE_SATURATION = integerEnv('RADAR_SIZE_SATURATION', 10, 1);
export const DIVERSITY_SATURATION = integerEnv(
  'RADAR_DIVERSITY_SATURATION',
  6,
  1,
);

export const ACCELERATION_WINDOW_DAYS = numberEnv(
  'RADAR_ACCELERATION_WINDOW_DAYS',
  90,
  1,
);
export const PERSISTENCE_WINDOW = 4;
export const PERSISTENCE_MIN_SCORE = 50;

export const SUMMARY_MAX_CHARS = 240;

export const SOURCE_TIER_WEIGHTS: Record<1 | 2 | 3, number> = {
  1: 1.0,
  2: 0.6,
  3: 0.3,
};

export type SignalBucket =
  | 'research'
  | 'capital'
  | 'regulatory'
  | 'infrastructure'
  | 'crossAdoption';

// Unlisted or missing signal types count as cross adoption.
export const SIGNAL_TYPE_BUCKETS: ReadonlyMap<string, SignalBucket> = new Map<
  string,
  SignalBucket
>([
  ['research', 'research'],
  ['research_standards', 'research'],
  ['capital', 'capital'],
  ['capital_flows_markets', 'capital'],
  ['markets', 'capital'],
  ['regulatory', 'regulatory'],
  ['regulatory_policy', 'regulatory'],
  ['policy', 'regulatory'],
  ['infra', 'infrastructure'],
  ['technology', 'infrastructure'],
  ['technology_ai_infra', 'infrastructure'],
  ['cyber', 'infrastructure'],
  ['cyber_fraud_resilience', 'infrastructure'],
]);

export const SIGNAL_BUCKET_WEIGHTS: Record<SignalBucket, number> = {
  research: 0.2,
  capital: 0.25,
  regulatory: 0.25,
  infrastructure: 0.2,
  crossAdoption: 0.1,
};

export const SOURCE_TIER_1 = new Set([
  'bis',
  'ecb',
  'eba',
  'esma',
  'federal reserve',
  'bank of england',
  'imf',
  'fsb',
  'reuters',
  'financial times',
  'bloomberg',
]);

export const SOURCE_TIER_2 = new Set([
  'arxiv',
  'a16z',
  'techcrunch',
  'the block',
  'coindesk',
  'finextra',
  'mit technology review',
]);

export const STOPWORDS = new Set([
  'the',
  'a',
  'an',
  'to',
  'for',
  'of',
  'and',
  'or',
  'in',
  'on',
  'with',
  'is',
  'are',
  'by',
  'as',
  'at',
  'from',
  'this',
  'that',
  'its',
  'new',
]);

const dataDir = process.env.RADAR_DATA_DIR ?? path.join(process.cwd(), 'data');
export const ITEMS_JSON =
  process.env.RADAR_ITEMS_JSON ?? path.join(dataDir, 'raw_items.json');
export const LATEST_BUILD_JSON =
  process.env.RADAR_LATEST_BUILD_JSON ?? path.join(dataDir, 'latest_build.json');
export const SNAPSHOTS_DIR =
  process.env.RADAR_SNAPSHOTS_DIR ?? path.join(dataDir, 'snapshots');

export const SNAPSHOT_STORE_DIR = Symbol('SNAPSHOT_STORE_DIR');
export const BUILD_STORE_PATHS = Symbol('BUILD_STORE_PATHS');
