// backend/services/market/src/snapshots/format.ts

export const DASH = "—";

function grouped(n: number, digits: number): string {
  return new Intl.NumberFormat("en-US", {
    minimumFractionDigits: digits,
    maximumFractionDigits: digits,
  }).format(n);
}

/** $1.2B / $43.8M / $68,819 / $12.50 */
export function fmtUsd(n: number | null): string {
  if (n === null) return DASH;
  const abs = Math.abs(n);
  if (abs >= 1_000_000_000) return `$${(n / 1_000_000_000).toFixed(1)}B`;
  if (abs >= 1_000_000) return `$${(n / 1_000_000).toFixed(1)}M`;
  if (abs >= 1_000) return `$${grouped(n, 0)}`;
  return `$${grouped(n, 2)}`;
}

/** +1.25% / -2.06%; `signed=false` drops the leading plus. */
export function fmtPct(p: number | null, digits = 2, signed = true): string {
  if (p === null) return DASH;
  const sign = signed && p > 0 ? "+" : "";
  return `${sign}${p.toFixed(digits)}%`;
}
