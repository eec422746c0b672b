/**
 * Hand record parser
 * Turns one hand's lines into seat stacks, net contributions, collections
 * and the reconstructed pot ladder.
 */

import { parseChips } from './chips.js';
import { type Pot, buildPots, assignWinners } from './pot.js';

/** One played-out hand, read-only once parsed */
export interface Hand {
  readonly handId: string | null;
  readonly tournamentId: string | null;
  readonly startedAt: string | null;
  readonly tableSize: number | null;
  readonly bb: bigint;
  readonly seats: ReadonlyMap<string, bigint>;     // name -> starting stack, seating order
  readonly contrib: ReadonlyMap<string, bigint>;   // name -> net chips committed
  readonly collects: ReadonlyMap<string, bigint>;  // name -> chips collected
  readonly pots: readonly Pot[];
  readonly duplicateSeats: readonly string[];
}

export interface ParseOptions {
  /** Big blind used when the header carries none */
  readonly defaultBigBlind: bigint;
}

/** Parsed hand plus the first line after it (trailing blanks skipped) */
export interface ParsedHand {
  readonly hand: Hand;
  readonly next: number;
}

const RE_HAND_ID = /Hand #([A-Za-z0-9-]+)/;
const RE_TOURNAMENT = /Tournament #(\d+)/;
// Big blind from "(200/400)" or "(200/400(50))"; the parentheses keep "2025/01/01" out
const RE_BLINDS = /\(([\d,]+)\/([\d,]+)(?:\([\d,]+\))?\)/;
const RE_DATE = /(\d{4}\/\d{2}\/\d{2} \d{1,2}:\d{2}:\d{2})/;
const RE_TABLE = /^Table '[^']*' (\d+)-max/;
const RE_SEAT = /^Seat \d+: (.+?) \(([-\d,]+) in chips/;
const RE_HOLE_CARDS = /^\*\*\* HOLE CARDS \*\*\*/;
const RE_STREET = /^\*\*\* (?:FLOP|TURN|RIVER) \*\*\*/;
const RE_SUMMARY = /^\*\*\* SUMMARY \*\*\*/;
const RE_ACTION = /^([^:]+): (posts|bets|calls|raises|all-in)\b(.*)$/;
const RE_RAISE_TO = /raises ([\d,]+) to ([\d,]+)/;
const RE_AMOUNT = /(\d[\d,]*)/;
const RE_UNCALLED = /^Uncalled bet \(([\d,]+)\) returned to (.+)$/;
const RE_COLLECTED = /^(.+?) collected ([\d,]+) from (?:main |side )?pot/;

const name = (raw: string): string => raw.trim();

function add(map: Map<string, bigint>, key: string, amount: bigint): void {
  map.set(key, (map.get(key) ?? 0n) + amount);
}

/**
 * Parse the hand whose lines are lines[start, end)
 */
export function parseHand(
  lines: readonly string[],
  options: ParseOptions,
  start = 0,
  end = lines.length
): ParsedHand {
  const header = lines[start] ?? '';

  let handId = header.match(RE_HAND_ID)?.[1] ?? null;
  let tournamentId = header.match(RE_TOURNAMENT)?.[1] ?? null;
  let startedAt = header.match(RE_DATE)?.[1] ?? null;
  let tableSize: number | null = null;
  let bb: bigint | null = null;

  const seats = new Map<string, bigint>();
  const duplicateSeats: string[] = [];
  const contrib = new Map<string, bigint>();
  const committed = new Map<string, bigint>();  // This street only
  const collects = new Map<string, bigint>();

  let inSeats = true;
  let inSummary = false;
  let idx = start;

  for (; idx < end; idx++) {
    const line = (lines[idx] ?? '').trim();
    if (line === '') break;

    // --- Header block: ids, blinds, table size ---
    if (inSeats && seats.size === 0) {
      handId ??= line.match(RE_HAND_ID)?.[1] ?? null;
      tournamentId ??= line.match(RE_TOURNAMENT)?.[1] ?? null;
      startedAt ??= line.match(RE_DATE)?.[1] ?? null;

      const blinds = bb === null ? line.match(RE_BLINDS) : null;
      if (blinds) bb = parseChips(blinds[2]);

      const table = line.match(RE_TABLE);
      if (table) tableSize = parseInt(table[1] ?? '', 10) || null;
    }

    if (RE_HOLE_CARDS.test(line)) {
      inSeats = false;
      continue;
    }
    if (RE_SUMMARY.test(line)) {
      inSummary = true;
      continue;
    }
    if (inSummary) continue;

    if (inSeats) {
      const seat = line.match(RE_SEAT);
      if (seat) {
        const player = name(seat[1] ?? '');
        if (seats.has(player)) {
          duplicateSeats.push(player);
          console.warn(`[parser] Hand ${handId ?? '?'}: "${player}" is seated twice, keeping the first stack`);
        } else {
          seats.set(player, parseChips(seat[2]));
        }
        continue;
      }
    }

    if (RE_STREET.test(line)) {
      committed.clear();
      continue;
    }

    // --- Refund of an unmatched bet ---
    const uncalled = line.match(RE_UNCALLED);
    if (uncalled) {
      const player = name(uncalled[2] ?? '');
      const amount = parseChips(uncalled[1]);
      add(contrib, player, -amount);
      add(committed, player, -amount);
      continue;
    }

    // --- Pot collection ---
    const collected = line.match(RE_COLLECTED);
    if (collected) {
      add(collects, name(collected[1] ?? ''), parseChips(collected[2]));
      continue;
    }

    // --- Player actions ---
    const action = line.match(RE_ACTION);
    if (!action) continue;

    const player = name(action[1] ?? '');
    const verb = action[2];
    const rest = action[3] ?? '';
    const stated = parseChips(rest.match(RE_AMOUNT)?.[1]);

    switch (verb) {
      case 'posts':
        add(contrib, player, stated);
        // Antes are dead money and don't count toward the street bet
        if (!/\bante\b/.test(rest)) add(committed, player, stated);
        break;

      case 'bets':
      case 'calls':
      case 'all-in':
        add(contrib, player, stated);
        add(committed, player, stated);
        break;

      case 'raises': {
        const raiseTo = line.match(RE_RAISE_TO);
        if (raiseTo) {
          const total = parseChips(raiseTo[2]);
          add(contrib, player, total - (committed.get(player) ?? 0n));
          committed.set(player, total);
        } else {
          add(contrib, player, stated);
          add(committed, player, stated);
        }
        break;
      }
    }
  }

  // Skip trailing blank lines
  let next = idx;
  while (next < lines.length && (lines[next] ?? '').trim() === '') next++;

  // Seating order first, then anyone who acted without a seat line
  const ordered = new Map<string, bigint>();
  for (const player of [...seats.keys(), ...contrib.keys()]) {
    const amount = contrib.get(player);
    if (amount !== undefined) ordered.set(player, amount);
  }

  const pots = assignWinners(buildPots(ordered), collects);

  return {
    hand: {
      handId,
      tournamentId,
      startedAt,
      tableSize,
      bb: bb ?? options.defaultBigBlind,
      seats,
      contrib: ordered,
      collects,
      pots,
      duplicateSeats,
    },
    next,
  };
}
