const DAY_MS = 24 * 60 * 60 * 1000;

export function parseDateToIso(value: string): string {
  if (!value) {
    return '';
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return '';
  }
  return date.toISOString();
}

export function daysBetween(aMs: number, bMs: number): number {
  return Math.abs(aMs - bMs) / DAY_MS;
}

export function quarterLabel(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    return '';
  }
  const quarter = Math.floor(date.getUTCMonth() / 3) + 1;
  return `${date.getUTCFullYear()}Q${quarter}`;
}
