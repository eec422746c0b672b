import { describe, it, expect } from 'vitest';
import {
  assignWinners,
  buildPots,
  describePot,
  findPlayerPot,
  totalPot,
} from '../../src/engine/pot.js';

const chips = (entries: Array<[string, number]>) =>
  new Map(entries.map(([k, v]) => [k, BigInt(v)]));

describe('Pot reconstruction', () => {
  describe('buildPots', () => {
    it('should build one pot per all-in level (100/50/20)', () => {
      const pots = buildPots(chips([['A', 100], ['B', 50], ['C', 20]]));

      expect(pots.map(p => p.size)).toEqual([60n, 60n, 50n]);
      expect(pots.map(p => p.eligible)).toEqual([['A', 'B', 'C'], ['A', 'B'], ['A']]);
      expect(pots.every(p => p.winners.length === 0)).toBe(true);
    });

    it('should collapse equal contributions into a single pot', () => {
      const pots = buildPots(chips([['A', 100], ['B', 100], ['C', 100]]));

      expect(pots).toHaveLength(1);
      expect(pots[0]!.size).toBe(300n);
      expect(pots[0]!.eligible).toEqual(['A', 'B', 'C']);
    });

    it('should ignore players who committed nothing', () => {
      const pots = buildPots(chips([['A', 100], ['B', 0]]));

      expect(pots).toEqual([{ size: 100n, eligible: ['A'], winners: [] }]);
    });

    it('should build no pots from no contributions', () => {
      expect(buildPots(new Map())).toEqual([]);
    });

    it('should conserve every committed chip', () => {
      const cases = [
        chips([['A', 100], ['B', 50], ['C', 20]]),
        chips([['A', 480], ['B', 5400], ['C', 5400]]),
        chips([['A', 25], ['B', 50], ['C', 100], ['D', 100], ['E', 7]]),
        chips([['A', 1]]),
      ];

      for (const contrib of cases) {
        const committed = [...contrib.values()].reduce((a, b) => a + b, 0n);
        expect(totalPot(buildPots(contrib))).toBe(committed);
      }
    });

    it('should shrink eligibility as the level rises', () => {
      const pots = buildPots(chips([['A', 25], ['B', 50], ['C', 100], ['D', 100]]));
      const sizes = pots.map(p => p.eligible.length);

      expect(sizes).toEqual([4, 3, 2]);
      for (let i = 1; i < pots.length; i++) {
        for (const p of pots[i]!.eligible) {
          expect(pots[i - 1]!.eligible).toContain(p);
        }
      }
    });
  });

  describe('assignWinners', () => {
    it('should give each pot to the player who collected it', () => {
      const pots = buildPots(chips([['A', 100], ['B', 50], ['C', 20]]));
      const result = assignWinners(pots, chips([['C', 60], ['B', 60], ['A', 50]]));

      expect(result.map(p => p.winners)).toEqual([['C'], ['B'], ['A']]);
    });

    it('should credit one player with every pot they swept', () => {
      const pots = buildPots(chips([['A', 100], ['B', 50], ['C', 20]]));
      const result = assignWinners(pots, chips([['A', 170]]));

      expect(result.map(p => p.winners)).toEqual([['A'], ['A'], ['A']]);
    });

    it('should settle the most exclusive pot first', () => {
      // Short wins the main pot, Hero the side pot. Draining Hero's 160
      // against the main pot first would wrongly make Hero its winner.
      const pots = buildPots(chips([['Hero', 100], ['Short', 20], ['Big', 100]]));
      const result = assignWinners(pots, chips([['Short', 60], ['Hero', 160]]));

      expect(result[0]!.size).toBe(60n);
      expect(result[0]!.winners).toEqual(['Short']);
      expect(result[1]!.size).toBe(160n);
      expect(result[1]!.winners).toEqual(['Hero']);
    });

    it('should list every player sharing a split pot', () => {
      const pots = buildPots(chips([['A', 100], ['B', 100]]));
      const result = assignWinners(pots, chips([['A', 100], ['B', 100]]));

      expect(result[0]!.winners).toEqual(['A', 'B']);
    });

    it('should fall back to the lexicographically first eligible player', () => {
      const pots = buildPots(chips([['Zed', 50], ['Amy', 50]]));
      const result = assignWinners(pots, new Map());

      expect(result[0]!.winners).toEqual(['Amy']);
    });

    it('should not add a fallback winner when the pot was partly collected', () => {
      const pots = buildPots(chips([['Amy', 500], ['Zed', 500]]));
      const result = assignWinners(pots, chips([['Zed', 990]]));

      expect(result[0]!.winners).toEqual(['Zed']);
    });

    it('should produce the same winners on every run', () => {
      const pots = buildPots(chips([['A', 300], ['B', 300], ['C', 120], ['D', 40]]));
      const collects = chips([['D', 160], ['C', 240], ['A', 180], ['B', 180]]);

      const first = assignWinners(pots, collects).map(p => p.winners);
      for (let i = 0; i < 5; i++) {
        expect(assignWinners(pots, collects).map(p => p.winners)).toEqual(first);
      }
      expect(first).toEqual([['D'], ['C'], ['A', 'B']]);
    });

    it('should leave its inputs untouched', () => {
      const pots = buildPots(chips([['A', 100], ['B', 50]]));
      const collects = chips([['A', 150]]);

      assignWinners(pots, collects);

      expect(pots.every(p => p.winners.length === 0)).toBe(true);
      expect(collects.get('A')).toBe(150n);
    });

    it('should keep winners within the eligible players', () => {
      const pots = buildPots(chips([['A', 100], ['B', 50], ['C', 20]]));
      const result = assignWinners(pots, chips([['C', 500]]));

      for (const pot of result) {
        for (const w of pot.winners) expect(pot.eligible).toContain(w);
      }
      // C only contests the main pot; the others fall back to A
      expect(result.map(p => p.winners)).toEqual([['C'], ['A'], ['A']]);
    });
  });

  describe('findPlayerPot', () => {
    it('should pick the pot with the fewest eligible players', () => {
      const pots = buildPots(chips([['A', 100], ['B', 50], ['C', 20]]));

      expect(findPlayerPot(pots, 'C')).toBe(0);
      expect(findPlayerPot(pots, 'B')).toBe(1);
      expect(findPlayerPot(pots, 'A')).toBe(2);
      expect(findPlayerPot(pots, 'X')).toBe(-1);
    });
  });

  describe('describePot', () => {
    it('should name the main pot and number the side pots', () => {
      expect(describePot(0)).toBe('main pot');
      expect(describePot(2)).toBe('side pot 2');
    });
  });
});
