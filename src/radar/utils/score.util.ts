import { FactorContribution } from '../types/radar.types';

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(1, value));
}

export function roundTo(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}

export function contributionOf(weight: number, rawValue: number): number {
  return roundTo(weight * rawValue, 6);
}

/**
 * round(100 * Σ contribution), clamped to [0,100]. The product is snapped to
 * six places first so float noise cannot move a .5 across the rounding edge.
 */
export function scoreFromContributions(
  entries: ReadonlyArray<Pick<FactorContribution, 'contribution'>>,
): number {
  const raw = entries.reduce((sum, entry) => sum + entry.contribution, 0);
  return Math.max(0, Math.min(100, Math.round(roundTo(100 * raw, 6))));
}
