import {
  CLUSTER_LINKAGE,
  CLUSTER_LINKAGES,
  DAY_WINDOW,
  DISTANCE_METRIC,
  DISTANCE_METRIC_NAMES,
  DISTANCE_THRESHOLD,
  DIVERSITY_SATURATION,
  FACTOR_WEIGHTS,
  MIN_MOVEMENT_COUNT,
  MIN_SOURCE_DIVERSITY,
  RECENCY_HORIZON_DAYS,
  SCORING_VERSION,
  SIZE_SATURATION,
  TEMPORAL_WEIGHT,
  THEME_AGGREGATOR,
  THEME_AGGREGATORS,
  THEME_TOP_K,
  TREND_EPSILON,
} from './radar.constants';
import themeTable from './themes.json';
import { ConfigurationError } from '../errors/radar.errors';
import { RadarConfig, RadarConfigOverrides } from '../types/radar.types';
import { shortHash } from '../utils/hash.util';
import { MOVEMENT_FACTORS } from '../utils/movement-factors.util';

export function defaultRadarConfig(): RadarConfig {
  return {
    scoringVersion: SCORING_VERSION,
    factors: Object.keys(FACTOR_WEIGHTS),
    weights: { ...FACTOR_WEIGHTS },
    distanceThreshold: DISTANCE_THRESHOLD,
    distanceMetric: DISTANCE_METRIC,
    linkage: CLUSTER_LINKAGE,
    dayWindow: DAY_WINDOW,
    temporalWeight: TEMPORAL_WEIGHT,
    aggregator: THEME_AGGREGATOR,
    topK: THEME_TOP_K,
    trendEpsilon: TREND_EPSILON,
    minMovementCount: MIN_MOVEMENT_COUNT,
    minSourceDiversity: MIN_SOURCE_DIVERSITY,
    recencyHorizonDays: RECENCY_HORIZON_DAYS,
    sizeSaturation: SIZE_SATURATION,
    diversitySaturation: DIVERSITY_SATURATION,
    themes: themeTable.themes.map((theme) => ({
      name: theme.name,
      keywords: [...theme.keywords],
    })),
    fallbackTheme: themeTable.fallbackTheme,
  };
}

/**
 * Merges request overrides over the env defaults and validates the result.
 * Overriding `weights` also redeclares the factor set to the given keys.
 */
export function resolveRadarConfig(
  overrides: RadarConfigOverrides = {},
  base: RadarConfig = defaultRadarConfig(),
): RadarConfig {
  const config: RadarConfig = {
    ...base,
    scoringVersion: overrides.scoringVersion ?? base.scoringVersion,
    distanceThreshold: overrides.distanceThreshold ?? base.distanceThreshold,
    distanceMetric: overrides.distanceMetric ?? base.distanceMetric,
    linkage: overrides.linkage ?? base.linkage,
    dayWindow: overrides.dayWindow ?? base.dayWindow,
    temporalWeight: overrides.temporalWeight ?? base.temporalWeight,
    aggregator: overrides.aggregator ?? base.aggregator,
    topK: overrides.topK ?? base.topK,
  };
  if (overrides.weights) {
    config.weights = { ...overrides.weights };
    config.factors = Object.keys(overrides.weights);
  }
  validateRadarConfig(config);
  return config;
}

export function validateRadarConfig(config: RadarConfig): void {
  if (!config.scoringVersion || !config.scoringVersion.trim()) {
    throw new ConfigurationError('scoringVersion must be a non-empty string');
  }
  if (
    !Number.isFinite(config.distanceThreshold) ||
    config.distanceThreshold < 0 ||
    config.distanceThreshold > 1
  ) {
    throw new ConfigurationError('distanceThreshold must be within [0,1]', {
      distanceThreshold: config.distanceThreshold,
    });
  }
  if (!Number.isFinite(config.dayWindow) || config.dayWindow <= 0) {
    throw new ConfigurationError('dayWindow must be a positive number', {
      dayWindow: config.dayWindow,
    });
  }
  if (
    !Number.isFinite(config.temporalWeight) ||
    config.temporalWeight < 0 ||
    config.temporalWeight > 1
  ) {
    throw new ConfigurationError('temporalWeight must be within [0,1]', {
      temporalWeight: config.temporalWeight,
    });
  }
  if (!DISTANCE_METRIC_NAMES.includes(config.distanceMetric)) {
    throw new ConfigurationError('unknown distance metric', {
      distanceMetric: config.distanceMetric,
    });
  }
  if (!CLUSTER_LINKAGES.includes(config.linkage)) {
    throw new ConfigurationError('unknown cluster linkage', {
      linkage: config.linkage,
    });
  }
  if (!THEME_AGGREGATORS.includes(config.aggregator)) {
    throw new ConfigurationError('unknown theme aggregator', {
      aggregator: config.aggregator,
    });
  }
  if (!Number.isInteger(config.topK) || config.topK < 1) {
    throw new ConfigurationError('topK must be a positive integer', {
      topK: config.topK,
    });
  }
  if (!Number.isFinite(config.trendEpsilon) || config.trendEpsilon < 0) {
    throw new ConfigurationError('trendEpsilon must be non-negative', {
      trendEpsilon: config.trendEpsilon,
    });
  }
  const counts: Array<[string, number]> = [
    ['minMovementCount', config.minMovementCount],
    ['minSourceDiversity', config.minSourceDiversity],
    ['recencyHorizonDays', config.recencyHorizonDays],
    ['sizeSaturation', config.sizeSaturation],
    ['diversitySaturation', config.diversitySaturation],
  ];
  for (const [name, value] of counts) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigurationError(`${name} must be a positive number`, {
        [name]: value,
      });
    }
  }
  if (config.themes.length === 0 || !config.fallbackTheme) {
    throw new ConfigurationError('theme table must not be empty');
  }

  if (config.factors.length === 0) {
    throw new ConfigurationError('at least one scoring factor is required');
  }
  for (const factor of config.factors) {
    if (!MOVEMENT_FACTORS.has(factor)) {
      throw new ConfigurationError('unknown scoring factor', { factor });
    }
    const weight = config.weights[factor];
    if (weight === undefined) {
      throw new ConfigurationError('missing weight for declared factor', {
        factor,
      });
    }
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ConfigurationError('factor weight must be non-negative', {
        factor,
        weight,
      });
    }
  }
  for (const factor of Object.keys(config.weights)) {
    if (!config.factors.includes(factor)) {
      throw new ConfigurationError('weight given for undeclared factor', {
        factor,
      });
    }
  }
}

export function weightsFingerprint(config: RadarConfig): string {
  const canonical = [...config.factors]
    .sort()
    .map((factor) => `${factor}:${config.weights[factor]}`)
    .join('|');
  return shortHash(canonical);
}
