/**
 * Side-pot reconstruction for recorded hands
 * Rebuilds the main pot + side pots from what each player committed,
 * then works out who took each pot from the amounts they collected.
 */

import { compareChips, minChips, sumChips } from './chips.js';

/** One level of the pot ladder */
export interface Pot {
  readonly size: bigint;
  readonly eligible: readonly string[];  // Seating order
  readonly winners: readonly string[];   // Empty until assignWinners()
}

/**
 * Build the pot ladder from net contributions
 *
 * Algorithm:
 * 1. Find all distinct positive contribution levels, sorted ascending
 * 2. For each level, pot = (level - previous level) × (players at or above it)
 * 3. Players are eligible only for levels their contribution reaches
 */
export function buildPots(contrib: ReadonlyMap<string, bigint>): Pot[] {
  const levels = [...new Set([...contrib.values()].filter(v => v > 0n))]
    .sort(compareChips);

  const pots: Pot[] = [];
  let previousLevel = 0n;

  for (const level of levels) {
    const eligible = [...contrib.entries()]
      .filter(([, amount]) => amount >= level)
      .map(([player]) => player);

    pots.push({
      size: (level - previousLevel) * BigInt(eligible.length),
      eligible,
      winners: [],
    });

    previousLevel = level;
  }

  return pots;
}

/**
 * Assign winners to each pot from the collected amounts
 *
 * Pots with the fewest eligible players are settled first (ties keep ladder
 * order), draining a working copy of `collects`. Within a pot, eligible
 * players are visited in lexicographic order. A pot nobody can be shown to
 * have collected goes to the lexicographically first eligible player.
 */
export function assignWinners(
  pots: readonly Pot[],
  collects: ReadonlyMap<string, bigint>
): Pot[] {
  const remaining = new Map(collects);
  const winners: string[][] = pots.map(() => []);

  const order = pots
    .map((pot, index) => ({ pot, index }))
    .sort((a, b) => a.pot.eligible.length - b.pot.eligible.length || a.index - b.index);

  for (const { pot, index } of order) {
    const potWinners = winners[index] ?? [];
    const contenders = [...pot.eligible].sort();
    let potLeft = pot.size;

    for (const player of contenders) {
      if (potLeft <= 0n) break;
      const share = minChips(remaining.get(player) ?? 0n, potLeft);
      if (share <= 0n) continue;

      potWinners.push(player);
      remaining.set(player, (remaining.get(player) ?? 0n) - share);
      potLeft -= share;
    }

    // Uncontested pot with no "collected" line
    const fallback = contenders[0];
    if (potWinners.length === 0 && pot.size > 0n && fallback !== undefined) {
      potWinners.push(fallback);
    }

    winners[index] = potWinners;
  }

  return pots.map((pot, i) => ({
    ...pot,
    winners: pot.eligible.filter(p => winners[i]?.includes(p)),
  }));
}

/**
 * Total chips across the ladder
 */
export function totalPot(pots: readonly Pot[]): bigint {
  return sumChips(pots.map(p => p.size));
}

/**
 * The most exclusive pot a player contested: smallest eligible set among the
 * pots they are eligible for. Returns its ladder index, or -1.
 */
export function findPlayerPot(pots: readonly Pot[], player: string): number {
  let best = -1;
  pots.forEach((pot, i) => {
    if (!pot.eligible.includes(player)) return;
    const current = pots[best];
    if (current === undefined || pot.eligible.length < current.eligible.length) {
      best = i;
    }
  });
  return best;
}

/**
 * Pot label for display ("main pot", "side pot 1", ...)
 */
export function describePot(index: number): string {
  return index === 0 ? 'main pot' : `side pot ${index}`;
}
