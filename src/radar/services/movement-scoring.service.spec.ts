import { defaultRadarConfig } from '../config/radar-config';
import { ConfigurationError } from '../errors/radar.errors';
import { makeItem } from '../testing/radar.fixtures';
import { Movement, MovementCluster, RadarConfig } from '../types/radar.types';
import { MovementScoringService } from './movement-scoring.service';

function ranked(id: string, value: number): Pick<Movement, 'id' | 'score'> {
  return { id, score: { value, breakdown: [] } };
}

function makeMovement(
  id: string,
  value: number,
  themes: string[],
  sources: string[],
): Movement {
  return {
    id,
    title: id,
    memberIds: [id],
    items: [],
    firstSeen: '2026-03-01T00:00:00.000Z',
    lastSeen: '2026-03-01T00:00:00.000Z',
    themes,
    sources,
    score: { value, breakdown: [] },
    confidence: { score: 0, label: 'low', uniqueSources: 0, tier1Share: 0 },
  };
}

describe('MovementScoringService', () => {
  let service: MovementScoringService;

  beforeEach(() => {
    service = new MovementScoringService();
  });

  it('computes a fixed-weight score from factor values', () => {
    const score = service.computeScore(
      { recency: 1.0, trust: 0.6, size: 0.4 },
      { recency: 0.5, trust: 0.3, size: 0.2 },
    );

    expect(score.value).toBe(76);
    expect(score.breakdown).toEqual([
      { factor: 'recency', rawValue: 1, weight: 0.5, contribution: 0.5 },
      { factor: 'trust', rawValue: 0.6, weight: 0.3, contribution: 0.18 },
      { factor: 'size', rawValue: 0.4, weight: 0.2, contribution: 0.08 },
    ]);
  });

  it('clamps factor values into [0,1]', () => {
    const score = service.computeScore(
      { recency: 1.7, trust: -0.2 },
      { recency: 0.5, trust: 0.5 },
    );

    expect(score.breakdown.map((entry) => entry.rawValue)).toEqual([1, 0]);
    expect(score.value).toBe(50);
  });

  it('throws when a declared factor has no weight', () => {
    expect(() =>
      service.computeScore({ recency: 1 }, { recency: 1 }, ['recency', 'trust']),
    ).toThrow(ConfigurationError);
  });

  it('computes movement factors from member items', () => {
    const config = defaultRadarConfig();
    const first = makeItem('e-1', '2026-03-01', {
      title: 'ECB stablecoin guidance',
      sourceTag: 'Reuters',
      sourceTier: 1,
    });
    const second = makeItem('e-2', '2026-03-03', {
      title: 'Quarterly earnings recap',
      sourceTag: 'blog.example',
    });
    const cluster: MovementCluster = {
      id: 'mv-test',
      title: first.title,
      memberIds: ['e-1', 'e-2'],
      items: [],
      firstSeen: first.date,
      lastSeen: second.date,
      themes: ['Money & Deposit Architecture'],
      sources: ['Reuters', 'blog.example'],
    };
    const context = {
      asOfMs: second.dateMs,
      config,
      itemsById: new Map([
        [first.eventUid, first],
        [second.eventUid, second],
      ]),
    };

    const values = service.factorValues(cluster, context);

    expect(values.recency).toBe(1);
    expect(values.trust).toBeCloseTo(0.65, 10);
    expect(values.size).toBeCloseTo(0.2, 10);
    expect(values.relevance).toBe(0.5);
    expect(values.diversity).toBeCloseTo(2 / 6, 10);

    const movement = service.scoreMovement(cluster, context);
    expect(movement.score.value).toBe(58);
    expect(movement.score.breakdown.map((entry) => entry.factor)).toEqual(
      config.factors,
    );
    expect(movement.confidence).toEqual({
      score: 36.2,
      label: 'low',
      uniqueSources: 2,
      tier1Share: 0.5,
    });
  });

  it('aggregates theme scores with each aggregator', () => {
    const movements = [
      ranked('m-c', 40),
      ranked('m-a', 80),
      ranked('m-d', 20),
      ranked('m-b', 60),
    ];

    expect(service.aggregateTheme(movements, 'max', 3).value).toBe(80);
    expect(service.aggregateTheme(movements, 'mean', 3).value).toBe(50);
    expect(service.aggregateTheme(movements, 'top-k-mean', 2).value).toBe(70);
    expect(service.aggregateTheme(movements, 'weighted-top', 3).value).toBe(44);
  });

  it('records one movement factor per contributing movement', () => {
    const score = service.aggregateTheme(
      [ranked('m-b', 60), ranked('m-a', 80)],
      'top-k-mean',
      1,
    );

    expect(score.breakdown).toEqual([
      { factor: 'movement:m-a', rawValue: 0.8, weight: 1, contribution: 0.8 },
    ]);
  });

  it('gives a single movement 60% of its score under weighted-top', () => {
    expect(
      service.aggregateTheme([ranked('m-a', 90)], 'weighted-top', 3).value,
    ).toBe(54);
  });

  it('does not depend on movement order and breaks ties by id', () => {
    const movements = [ranked('m-b', 50), ranked('m-a', 50), ranked('m-c', 70)];

    const forward = service.aggregateTheme(movements, 'weighted-top', 3);
    const reversed = service.aggregateTheme(
      [...movements].reverse(),
      'weighted-top',
      3,
    );

    expect(reversed).toEqual(forward);
    expect(forward.breakdown.map((entry) => entry.factor)).toEqual([
      'movement:m-c',
      'movement:m-a',
      'movement:m-b',
    ]);
  });

  it('derives the trend arrow within epsilon', () => {
    expect(service.trendArrow(50, null, 2)).toBe('flat');
    expect(service.trendArrow(53, 50, 2)).toBe('up');
    expect(service.trendArrow(48, 50, 2)).toBe('flat');
    expect(service.trendArrow(47, 50, 2)).toBe('down');
  });

  it('labels theme confidence by movement count and source diversity', () => {
    const thresholds = { minMovementCount: 3, minSourceDiversity: 3 };

    expect(service.themeConfidence(2, 5, thresholds)).toBe('low');
    expect(service.themeConfidence(3, 2, thresholds)).toBe('medium');
    expect(service.themeConfidence(3, 3, thresholds)).toBe('high');
  });

  it('scores themes against previous committed scores', () => {
    const config: RadarConfig = {
      ...defaultRadarConfig(),
      aggregator: 'max',
      minMovementCount: 2,
      minSourceDiversity: 2,
    };
    const movements = [
      makeMovement('mv-a', 70, ['Money', 'Agents'], ['s1']),
      makeMovement('mv-b', 50, ['Money'], ['s2']),
    ];

    const themes = service.scoreThemes(movements, config, (name) =>
      name === 'Money' ? 60 : null,
    );

    expect(themes.map((theme) => theme.id)).toEqual([
      'theme-agents',
      'theme-money',
    ]);
    const [agents, money] = themes;
    expect(agents.score.value).toBe(70);
    expect(agents.arrow).toBe('flat');
    expect(agents.previousScore).toBeNull();
    expect(agents.confidence).toBe('low');
    expect(money.score.value).toBe(70);
    expect(money.arrow).toBe('up');
    expect(money.previousScore).toBe(60);
    expect(money.confidence).toBe('high');
    expect(money.movementIds).toEqual(['mv-a', 'mv-b']);
    expect(money.sourceCount).toBe(2);
  });
});
