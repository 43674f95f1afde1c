const DASH = '—';

export function formatPercent(
  value: number | null | undefined,
  decimals = 1
): string {
  if (value == null || !Number.isFinite(value)) return DASH;
  return `${value.toFixed(decimals)}%`;
}

/** 0..1 ratio rendered as a percentage. */
export function formatRatio(
  ratio: number | null | undefined,
  decimals = 1
): string {
  if (ratio == null) return DASH;
  return formatPercent(ratio * 100, decimals);
}

export function formatCount(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
