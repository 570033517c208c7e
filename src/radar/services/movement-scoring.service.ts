import { Injectable } from '@nestjs/common';
import { ConfigurationError } from '../errors/radar.errors';
import {
  ConfidenceLabel,
  FactorContribution,
  Movement,
  MovementCluster,
  MovementConfidence,
  NormalizedItem,
  RadarConfig,
  Score,
  Theme,
  ThemeAggregator,
  TrendArrow,
} from '../types/radar.types';
import {
  FactorContext,
  MOVEMENT_FACTORS,
} from '../utils/movement-factors.util';
import {
  clamp01,
  contributionOf,
  roundTo,
  scoreFromContributions,
} from '../utils/score.util';
import { slugify } from '../utils/text.util';

export type PreviousThemeScore = (themeName: string) => number | null;

interface RankedMovement {
  id: string;
  value: number;
}

function byScoreThenId(a: RankedMovement, b: RankedMovement): number {
  if (a.value !== b.value) {
    return b.value - a.value;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

@Injectable()
export class MovementScoringService {
  /**
   * Fixed-weight score: round(100 * Σ weight_i * factor_i), clamped to
   * [0,100]. The breakdown keeps the declared factor order.
   */
  computeScore(
    factorValues: Record<string, number>,
    weights: Record<string, number>,
    factors: readonly string[] = Object.keys(weights),
  ): Score {
    const breakdown: FactorContribution[] = factors.map((factor) => {
      const weight = weights[factor];
      if (weight === undefined) {
        throw new ConfigurationError('missing weight for declared factor', {
          factor,
        });
      }
      const rawValue = roundTo(clamp01(factorValues[factor] ?? 0), 4);
      return {
        factor,
        rawValue,
        weight,
        contribution: contributionOf(weight, rawValue),
      };
    });
    return { value: scoreFromContributions(breakdown), breakdown };
  }

  factorValues(
    movement: MovementCluster,
    context: FactorContext,
  ): Record<string, number> {
    const values: Record<string, number> = {};
    for (const name of context.config.factors) {
      const factor = MOVEMENT_FACTORS.get(name);
      if (!factor) {
        throw new ConfigurationError('unknown scoring factor', {
          factor: name,
        });
      }
      values[name] = factor.compute(movement, context);
    }
    return values;
  }

  scoreMovement(movement: MovementCluster, context: FactorContext): Movement {
    const { config } = context;
    return {
      ...movement,
      score: this.computeScore(
        this.factorValues(movement, context),
        config.weights,
        config.factors,
      ),
      confidence: this.movementConfidence(movement, context.itemsById),
    };
  }

  // Source diversity, tier-1 presence and volume, each saturating.
  movementConfidence(
    movement: MovementCluster,
    itemsById: ReadonlyMap<string, NormalizedItem>,
  ): MovementConfidence {
    const members = movement.memberIds
      .map((id) => itemsById.get(id))
      .filter((item): item is NormalizedItem => item !== undefined);
    const n = members.length;
    const uniqueSources = new Set(members.map((item) => item.sourceTag)).size;
    const tier1 = members.filter((item) => item.sourceTier === 1).length;

    const sourceDiversity = Math.min(1, uniqueSources / 6);
    const tier1Share = n > 0 ? tier1 / n : 0;
    const volume = Math.min(1, n / 25);
    const score = roundTo(
      100 * (0.45 * sourceDiversity + 0.4 * tier1Share + 0.15 * volume),
      2,
    );
    const label: ConfidenceLabel =
      score >= 70 ? 'high' : score >= 45 ? 'medium' : 'low';

    return {
      score,
      label,
      uniqueSources,
      tier1Share: roundTo(tier1Share, 3),
    };
  }

  /**
   * Aggregates member movement scores into a theme score. Each contributing
   * movement becomes one `movement:<id>` factor so the theme score can be
   * recomputed from its audit entries. Input order does not matter.
   */
  aggregateTheme(
    movements: ReadonlyArray<Pick<Movement, 'id' | 'score'>>,
    aggregator: ThemeAggregator,
    topK: number,
  ): Score {
    const ranked = movements
      .map((movement) => ({ id: movement.id, value: movement.score.value }))
      .sort(byScoreThenId);
    const weights = this.rankWeights(ranked.length, aggregator, topK);

    const breakdown: FactorContribution[] = [];
    ranked.forEach((movement, rank) => {
      const weight = weights[rank] ?? 0;
      if (weight <= 0) {
        return;
      }
      const rawValue = roundTo(movement.value / 100, 4);
      const roundedWeight = roundTo(weight, 6);
      breakdown.push({
        factor: `movement:${movement.id}`,
        rawValue,
        weight: roundedWeight,
        contribution: contributionOf(roundedWeight, rawValue),
      });
    });
    return { value: scoreFromContributions(breakdown), breakdown };
  }

  trendArrow(
    current: number,
    previous: number | null,
    epsilon: number,
  ): TrendArrow {
    if (previous == null) {
      return 'flat';
    }
    const delta = current - previous;
    if (Math.abs(delta) <= epsilon) {
      return 'flat';
    }
    return delta > 0 ? 'up' : 'down';
  }

  themeConfidence(
    movementCount: number,
    sourceCount: number,
    config: Pick<RadarConfig, 'minMovementCount' | 'minSourceDiversity'>,
  ): ConfidenceLabel {
    if (movementCount < config.minMovementCount) {
      return 'low';
    }
    return sourceCount >= config.minSourceDiversity ? 'high' : 'medium';
  }

  scoreThemes(
    movements: readonly Movement[],
    config: RadarConfig,
    previousScore: PreviousThemeScore,
  ): Theme[] {
    const byTheme = new Map<string, Movement[]>();
    for (const movement of movements) {
      for (const name of movement.themes) {
        const members = byTheme.get(name) ?? [];
        members.push(movement);
        byTheme.set(name, members);
      }
    }

    const themes: Theme[] = [];
    for (const [name, members] of byTheme) {
      const score = this.aggregateTheme(members, config.aggregator, config.topK);
      const previous = previousScore(name);
      const sourceCount = new Set(members.flatMap((m) => m.sources)).size;
      themes.push({
        id: `theme-${slugify(name)}`,
        name,
        score,
        arrow: this.trendArrow(score.value, previous, config.trendEpsilon),
        previousScore: previous,
        confidence: this.themeConfidence(members.length, sourceCount, config),
        movementIds: members
          .map((m) => ({ id: m.id, value: m.score.value }))
          .sort(byScoreThenId)
          .map((m) => m.id),
        movementCount: members.length,
        sourceCount,
      });
    }

    return themes.sort(
      (a, b) =>
        b.score.value - a.score.value ||
        (a.name < b.name ? -1 : a.name > b.name ? 1 : 0),
    );
  }

  private rankWeights(
    count: number,
    aggregator: ThemeAggregator,
    topK: number,
  ): number[] {
    if (count === 0) {
      return [];
    }
    switch (aggregator) {
      case 'max':
        return [1];
      case 'mean':
        return new Array<number>(count).fill(1 / count);
      case 'top-k-mean': {
        const top = Math.min(topK, count);
        return new Array<number>(top).fill(1 / top);
      }
      case 'weighted-top': {
        const top = Math.min(3, count);
        const next = Math.min(7, count - top);
        return [
          ...new Array<number>(top).fill(0.6 / top),
          ...new Array<number>(next).fill(next > 0 ? 0.4 / next : 0),
        ];
      }
    }
  }
}
