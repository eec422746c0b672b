/**
 * Chip amount helpers
 * All amounts are integer chips (bigint). No floating point ever.
 */

/**
 * Parse a printed chip amount ("12,500" -> 12500n).
 * Anything that is not an integer after stripping separators parses to 0n.
 */
export function parseChips(raw: string | undefined): bigint {
  if (!raw) return 0n;
  const cleaned = raw.replace(/[,\s]/g, '');
  if (!/^-?\d+$/.test(cleaned)) return 0n;
  return BigInt(cleaned);
}

export function minChips(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function sumChips(values: Iterable<bigint>): bigint {
  let total = 0n;
  for (const v of values) total += v;
  return total;
}

/** Ascending comparator for bigint sort() */
export function compareChips(a: bigint, b: bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Stack expressed in big blinds, rounded to one decimal
 */
export function toBigBlinds(stack: bigint, bigBlind: bigint): number {
  if (bigBlind <= 0n) return 0;
  return Math.round((Number(stack) / Number(bigBlind)) * 10) / 10;
}

/**
 * Format chips for display
 */
export function formatChips(amount: bigint): string {
  const num = Number(amount);
  if (num >= 1_000_000) return `${(num / 1_000_000).toFixed(1)}M`;
  if (num >= 1_000) return `${(num / 1_000).toFixed(0)}K`;
  return num.toString();
}
