import { makeItem } from '../testing/radar.fixtures';
import {
  createDistanceMetric,
  jaccard,
  shingles,
} from './distance-metrics.util';

describe('distance metrics', () => {
  it('computes jaccard similarity of token sets', () => {
    expect(jaccard(new Set(['a', 'b']), new Set(['b', 'c']))).toBeCloseTo(
      1 / 3,
      10,
    );
    expect(jaccard(new Set(), new Set(['a']))).toBe(0);
  });

  it('builds character shingles without whitespace', () => {
    expect([...shingles('ab-c d')]).toEqual(['ab', 'bc', 'cd']);
    expect(shingles('a').size).toBe(0);
  });

  it('measures token jaccard distance over title and summary', () => {
    const metric = createDistanceMetric('token-jaccard');
    const a = makeItem('a', '2026-01-01', {
      title: 'ECB publishes stablecoin guidance',
    });
    const b = makeItem('b', '2026-01-02', {
      title: 'ECB stablecoin guidance update',
    });

    expect(metric.name).toBe('token-jaccard');
    expect(metric.distance(a, b)).toBeCloseTo(0.4, 10);
    expect(metric.distance(a, a)).toBe(0);
  });

  it('measures shingle distance over titles', () => {
    const metric = createDistanceMetric('shingle-jaccard');
    const a = makeItem('a', '2026-01-01', { title: 'abcd' });
    const b = makeItem('b', '2026-01-01', { title: 'abce' });

    // {ab, bc, cd} vs {ab, bc, ce}: 2 shared of 4
    expect(metric.distance(a, b)).toBeCloseTo(0.5, 10);
  });
});
