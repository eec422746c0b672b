import { describe, it, expect, vi, afterEach } from 'vitest';
import { analyzeHandHistory, parseHandHistory, type AnalyzeOptions } from '../../src/engine/history.js';
import { fixture } from '../helpers.js';

const OPTS: AnalyzeOptions = {
  heroName: 'Hero',
  minBigBlind: 100n,
  diagnostics: false,
  finalTableSize: 9,
};

const singleHand = (blinds: string) => `Poker Hand #HS1: Tournament #777, Hold'em No Limit - ${blinds} - 2025/03/01 12:00:00
Table '1' 6-max Seat #1 is the button
Seat 1: Hero (1,000 in chips)
Seat 2: Villain (500 in chips)
*** HOLE CARDS ***
Hero: bets 500
Villain: calls 500 and is all-in
*** SHOWDOWN ***
Hero collected 1,500 from pot
*** SUMMARY ***
Total pot 1,000 | Rake 0`;

describe('Hand history analysis', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('parseHandHistory', () => {
    it('should return hands oldest first', () => {
      const hands = parseHandHistory(fixture('hh-555001.txt'), OPTS);

      expect(hands.map(h => h.handId)).toEqual(['HA1001', 'HA1002']);
    });

    it('should return nothing for empty content', () => {
      expect(parseHandHistory('', OPTS)).toEqual([]);
    });
  });

  describe('analyzeHandHistory', () => {
    it('should count every knockout in the file', () => {
      const result = analyzeHandHistory(fixture('hh-555001.txt'), OPTS);

      expect(result.tournamentId).toBe('555001');
      expect(result.startedAt).toBe('2025/01/01 16:38:15');
      expect(result.handCount).toBe(2);
      expect(result.knockouts).toBe(2);
    });

    it('should report each hand in chronological order', () => {
      const { hands } = analyzeHandHistory(fixture('hh-555001.txt'), OPTS);

      expect(hands.map(h => [h.handId, h.handNumber, h.eliminated, h.knockouts])).toEqual([
        ['HA1001', 1, ['Victim'], 1],
        ['HA1002', 2, ['Player3'], 1],
      ]);
      expect(hands.map(h => [h.tableSize, h.seated, h.finalTable])).toEqual([
        [9, 3, true],
        [9, 2, true],
      ]);
      expect(hands[0]?.credits).toEqual([
        { player: 'Victim', potIndex: 1, potSize: 9840n, heroStack: 15000n, bustStack: 5400n },
      ]);
      expect(hands[1]?.credits).toEqual([
        { player: 'Player3', potIndex: 0, potSize: 19040n, heroStack: 20880n, bustStack: 9520n },
      ]);
    });

    it('should find the final table entry', () => {
      const { finalTable } = analyzeHandHistory(fixture('hh-555001.txt'), OPTS);

      expect(finalTable).toEqual({
        reached: true,
        handId: 'HA1001',
        heroStack: 15000n,
        heroStackBb: 37.5,
        handCount: 2,
        knockouts: 2,
        earlyKnockouts: 0,
        preKnockouts: 0,
      });
    });

    it('should split final-table knockouts by stage', () => {
      const result = analyzeHandHistory(fixture('hh-888-staged.txt'), OPTS);

      expect(result.hands.map(h => [h.handId, h.seated, h.finalTable, h.knockouts])).toEqual([
        ['HP1', 3, false, 1],
        ['HP2', 6, true, 1],
        ['HP3', 5, true, 1],
      ]);
      expect(result.finalTable).toEqual({
        reached: true,
        handId: 'HP2',
        heroStack: 6000n,
        heroStackBb: 30,
        handCount: 2,
        knockouts: 2,
        earlyKnockouts: 1,
        preKnockouts: 1,
      });
    });

    it('should drop everything under a higher minimum big blind', () => {
      const result = analyzeHandHistory(fixture('hh-555001.txt'), { ...OPTS, minBigBlind: 500n });

      expect(result.knockouts).toBe(0);
      expect(result.finalTable.reached).toBe(false);
      expect(result.finalTable.handCount).toBe(0);
    });

    it('should take the tournament id from the file name when hands carry none', () => {
      const content = [
        "Poker Hand #HN1: Hold'em No Limit - Level1(10/20) - 2025/01/01 10:00:00",
        'Seat 1: Hero (1,000 in chips)',
      ].join('\n');

      const result = analyzeHandHistory(content, { ...OPTS, fileName: 'GG20250101 - Tournament #4242 - Daily.txt' });

      expect(result.tournamentId).toBe('4242');
    });

    it('should report an empty file as zero hands', () => {
      const result = analyzeHandHistory('', OPTS);

      expect(result.tournamentId).toBeNull();
      expect(result.handCount).toBe(0);
      expect(result.knockouts).toBe(0);
      expect(result.finalTable.reached).toBe(false);
    });

    it('should credit a covered all-in won by Hero in a single-hand file', () => {
      const result = analyzeHandHistory(singleHand('Level8(100/200)'), OPTS);

      expect(result.knockouts).toBe(1);
      expect(result.hands[0]?.eliminated).toEqual(['Villain']);
    });

    it('should ignore the same hand below the minimum big blind', () => {
      const result = analyzeHandHistory(singleHand('Level3(25/50)'), OPTS);

      expect(result.knockouts).toBe(0);
    });
  });
});
