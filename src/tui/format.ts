export function formatMae(value: number | null | undefined): string {
  return typeof value === 'number' && Number.isFinite(value) ? value.toFixed(3) : 'n/a';
}

export function formatDelta(value: number | null): string {
  if (value === null || !Number.isFinite(value)) return 'n/a';
  const sign = value > 0 ? '+' : value < 0 ? '-' : '±';
  return `${sign}${Math.abs(value).toFixed(3)}`;
}

export function formatPValue(value: number | null): string {
  if (value === null) return 'n/a';
  if (value < 0.001) return '<0.001';
  return value.toFixed(3);
}

export function formatStatistic(value: number | null): string {
  if (value === null) return 'n/a';
  if (!Number.isFinite(value)) return value > 0 ? '∞' : '-∞';
  return value.toFixed(2);
}

export function formatPace(mean: number, interval: [number, number]): string {
  return `${mean.toFixed(2)} [${interval[0].toFixed(1)}, ${interval[1].toFixed(1)}]`;
}
