/**
 * Hand history analysis for one file
 *
 * Flow:
 * 1. Split the log into hands and parse each one
 * 2. Reverse to chronological order (logs are stored newest hand first)
 * 3. Detect eliminations between adjacent hands
 * 4. Attribute knockouts and sum them for the file
 * 5. Locate the final table and split its knockouts by stage
 */

import { toBigBlinds } from './chips.js';
import { findEliminated } from './elimination.js';
import { type KnockoutCredit, type KnockoutOptions, countKnockouts } from './knockout.js';
import { type Hand, parseHand } from './parser.js';
import { splitHands, toLines } from './splitter.js';

export interface AnalyzeOptions extends KnockoutOptions {
  /** Seats at the final table ("9-max") */
  readonly finalTableSize: number;
  /** Used to recover the tournament id when no hand carries one */
  readonly fileName?: string;
}

/** Knockout outcome of one hand */
export interface HandOutcome {
  readonly handId: string | null;
  readonly handNumber: number;          // 1-based, chronological
  readonly bb: bigint;
  readonly tableSize: number | null;
  readonly seated: number;
  readonly finalTable: boolean;
  readonly heroStack: bigint | null;
  readonly eliminated: readonly string[];
  readonly knockouts: number;
  readonly credits: readonly KnockoutCredit[];
}

/** Hero's arrival at the final table */
export interface FinalTableInfo {
  readonly reached: boolean;
  readonly handId: string | null;
  readonly heroStack: bigint | null;
  readonly heroStackBb: number | null;
  readonly handCount: number;
  /** Knockouts in final-table hands */
  readonly knockouts: number;
  /** Knockouts at the final table while 6 or more players were seated */
  readonly earlyKnockouts: number;
  /** Knockouts in the hand right before the final table formed */
  readonly preKnockouts: number;
}

export interface HandHistoryResult {
  readonly tournamentId: string | null;
  readonly startedAt: string | null;
  readonly handCount: number;
  readonly knockouts: number;
  readonly hands: readonly HandOutcome[];
  readonly finalTable: FinalTableInfo;
}

const RE_FILE_TOURNAMENT = /Tournament #(\d+)/;
const EARLY_FINAL_TABLE_SEATS = 6;

function sum(outcomes: readonly HandOutcome[]): number {
  return outcomes.reduce((total, o) => total + o.knockouts, 0);
}

/**
 * Parse every hand in a file, oldest first. Hands that fail to parse are
 * logged and dropped.
 */
export function parseHandHistory(content: string, options: Pick<AnalyzeOptions, 'minBigBlind' | 'fileName'>): Hand[] {
  const lines = toLines(content);
  const hands: Hand[] = [];

  for (const range of splitHands(lines)) {
    try {
      const { hand } = parseHand(lines, { defaultBigBlind: options.minBigBlind }, range.start, range.end);
      hands.push(hand);
    } catch (err) {
      console.warn(`[parser] Skipping hand at line ${range.start + 1} of ${options.fileName ?? 'input'}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return hands.reverse();
}

/**
 * Analyze a full hand history file
 */
export function analyzeHandHistory(content: string, options: AnalyzeOptions): HandHistoryResult {
  const hands = parseHandHistory(content, options);

  const outcomes: HandOutcome[] = hands.map((hand, i) => {
    const eliminated = findEliminated(hand, hands[i + 1] ?? null);
    const { count, credits } = countKnockouts(hand, eliminated, options);

    return {
      handId: hand.handId,
      handNumber: i + 1,
      bb: hand.bb,
      tableSize: hand.tableSize,
      seated: hand.seats.size,
      finalTable: isFinalTableHand(hand, options),
      heroStack: hand.seats.get(options.heroName) ?? null,
      eliminated,
      knockouts: count,
      credits,
    };
  });

  const tournamentId =
    hands.find(h => h.tournamentId !== null)?.tournamentId ??
    options.fileName?.match(RE_FILE_TOURNAMENT)?.[1] ??
    null;

  return {
    tournamentId,
    startedAt: hands[0]?.startedAt ?? null,
    handCount: hands.length,
    knockouts: sum(outcomes),
    hands: outcomes,
    finalTable: findFinalTable(hands, outcomes, options),
  };
}

function isFinalTableHand(hand: Hand, options: AnalyzeOptions): boolean {
  return hand.tableSize === options.finalTableSize && hand.bb >= options.minBigBlind;
}

function findFinalTable(
  hands: readonly Hand[],
  outcomes: readonly HandOutcome[],
  options: AnalyzeOptions
): FinalTableInfo {
  const firstIndex = outcomes.findIndex(o => o.finalTable);
  const first = hands[firstIndex];

  if (firstIndex < 0 || !first) {
    return {
      reached: false,
      handId: null,
      heroStack: null,
      heroStackBb: null,
      handCount: 0,
      knockouts: 0,
      earlyKnockouts: 0,
      preKnockouts: 0,
    };
  }

  const ftOutcomes = outcomes.filter(o => o.finalTable);
  const early = ftOutcomes.filter(
    o => o.seated >= EARLY_FINAL_TABLE_SEATS && o.seated <= options.finalTableSize
  );
  const heroStack = first.seats.get(options.heroName) ?? null;

  return {
    reached: true,
    handId: first.handId,
    heroStack,
    heroStackBb: heroStack === null ? null : toBigBlinds(heroStack, first.bb),
    handCount: ftOutcomes.length,
    knockouts: sum(ftOutcomes),
    earlyKnockouts: sum(early),
    preKnockouts: outcomes[firstIndex - 1]?.knockouts ?? 0,
  };
}
