/**
 * Knockout attribution
 * Decides how many of a hand's eliminations Hero is responsible for.
 *
 * A bust counts for Hero only when:
 * 1. The hand is at or above the minimum big blind
 * 2. Hero won the most exclusive pot the busted player contested
 * 3. Hero's starting stack covered the busted player's starting stack
 */

import { formatChips } from './chips.js';
import { type Hand } from './parser.js';
import { describePot, findPlayerPot } from './pot.js';

export interface KnockoutOptions {
  readonly heroName: string;
  readonly minBigBlind: bigint;
  /** Log every credited knockout */
  readonly diagnostics: boolean;
}

/** One knockout credited to Hero */
export interface KnockoutCredit {
  readonly player: string;
  readonly potIndex: number;
  readonly potSize: bigint;
  readonly heroStack: bigint;
  readonly bustStack: bigint;
}

export interface KnockoutResult {
  readonly count: number;
  readonly credits: readonly KnockoutCredit[];
}

const NONE: KnockoutResult = { count: 0, credits: [] };

/**
 * Count Hero's knockouts in one hand
 */
export function countKnockouts(
  hand: Hand,
  eliminated: readonly string[],
  options: KnockoutOptions
): KnockoutResult {
  const { heroName, minBigBlind, diagnostics } = options;
  const heroStack = hand.seats.get(heroName);

  if (hand.bb < minBigBlind || heroStack === undefined) return NONE;

  const busted = eliminated.filter(p => p !== heroName);
  if (busted.length === 0) return NONE;

  if (hand.duplicateSeats.length > 0) {
    console.warn(`[knockout] Hand ${hand.handId ?? '?'}: duplicate seat names, no knockouts credited`);
    return NONE;
  }

  const credits: KnockoutCredit[] = [];

  for (const player of busted) {
    const bustStack = hand.seats.get(player);
    if (bustStack === undefined) continue;

    const potIndex = findPlayerPot(hand.pots, player);
    const pot = hand.pots[potIndex];
    if (!pot) continue;

    if (pot.winners.includes(heroName) && heroStack >= bustStack) {
      credits.push({ player, potIndex, potSize: pot.size, heroStack, bustStack });

      if (diagnostics) {
        console.log(
          `[knockout] Hand ${hand.handId ?? '?'}: ${heroName} (${formatChips(heroStack)}) knocked out ` +
          `${player} (${formatChips(bustStack)}) via ${describePot(potIndex)} of ${formatChips(pot.size)}`
        );
      }
    }
  }

  return { count: credits.length, credits };
}
