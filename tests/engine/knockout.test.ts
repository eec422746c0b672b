import { describe, it, expect, vi, afterEach } from 'vitest';
import { countKnockouts, type KnockoutOptions } from '../../src/engine/knockout.js';
import { makeHand } from '../helpers.js';

const OPTS: KnockoutOptions = { heroName: 'Hero', minBigBlind: 100n, diagnostics: false };

const headsUpBust = (bb = 400) => makeHand({
  bb,
  seats: { Hero: 1000, Villain: 500 },
  contrib: { Hero: 500, Villain: 500 },
  collects: { Hero: 1500 },
});

describe('countKnockouts', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should credit Hero for covering and busting a player', () => {
    const hand = headsUpBust();
    const result = countKnockouts(hand, ['Villain'], OPTS);

    expect(hand.pots).toEqual([{ size: 1000n, eligible: ['Hero', 'Villain'], winners: ['Hero'] }]);
    expect(result.count).toBe(1);
    expect(result.credits).toEqual([
      { player: 'Villain', potIndex: 0, potSize: 1000n, heroStack: 1000n, bustStack: 500n },
    ]);
  });

  it('should credit nothing below the minimum big blind', () => {
    expect(countKnockouts(headsUpBust(50), ['Villain'], OPTS).count).toBe(0);
  });

  it('should credit nothing when Hero did not cover the busted player', () => {
    const hand = makeHand({
      seats: { Hero: 400, Villain: 500 },
      contrib: { Hero: 400, Villain: 400 },
      collects: { Hero: 800 },
    });

    expect(countKnockouts(hand, ['Villain'], OPTS).count).toBe(0);
  });

  it('should credit nothing when Hero is not seated', () => {
    expect(countKnockouts(headsUpBust(), ['Villain'], { ...OPTS, heroName: 'Nobody' }).count).toBe(0);
  });

  it('should credit nothing when someone else won the pot', () => {
    const hand = makeHand({
      seats: { Hero: 1000, Villain: 500, Other: 2000 },
      contrib: { Hero: 500, Villain: 500, Other: 500 },
      collects: { Other: 1500 },
    });

    expect(countKnockouts(hand, ['Villain'], OPTS).count).toBe(0);
  });

  it('should never credit Hero for their own elimination', () => {
    const hand = makeHand({
      seats: { Hero: 500, Villain: 1000 },
      contrib: { Hero: 500, Villain: 500 },
      collects: { Villain: 1000 },
    });

    expect(countKnockouts(hand, ['Hero'], OPTS)).toEqual({ count: 0, credits: [] });
  });

  it('should skip eliminated players who were not seated or contested no pot', () => {
    const hand = makeHand({
      seats: { Hero: 1000, Villain: 500, Sitter: 300 },
      contrib: { Hero: 500, Villain: 500 },
      collects: { Hero: 1000 },
    });

    const result = countKnockouts(hand, ['Ghost', 'Sitter', 'Villain'], OPTS);

    expect(result.credits.map(c => c.player)).toEqual(['Villain']);
  });

  it('should not credit Hero for a side pot when another player won the bust pot', () => {
    const hand = makeHand({
      seats: { Hero: 5000, Short: 1000, Mid: 4000 },
      contrib: { Hero: 3000, Short: 1000, Mid: 3000 },
      collects: { Mid: 3000, Hero: 4000 },
    });

    expect(hand.pots.map(p => p.winners)).toEqual([['Mid'], ['Hero']]);
    expect(countKnockouts(hand, ['Short'], OPTS).count).toBe(0);
  });

  it('should credit nothing in a hand with duplicate seat names', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const hand = makeHand({
      seats: { Hero: 1000, Villain: 500 },
      contrib: { Hero: 500, Villain: 500 },
      collects: { Hero: 1000 },
      duplicateSeats: ['Villain'],
    });

    expect(countKnockouts(hand, ['Villain'], OPTS).count).toBe(0);
    expect(warn).toHaveBeenCalledWith('[knockout] Hand H1: duplicate seat names, no knockouts credited');
  });

  it('should log each credit when diagnostics are on', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    countKnockouts(headsUpBust(), ['Villain'], { ...OPTS, diagnostics: true });

    expect(log).toHaveBeenCalledWith('[knockout] Hand H1: Hero (1K) knocked out Villain (500) via main pot of 1K');
  });

  it('should stay quiet when diagnostics are off', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    countKnockouts(headsUpBust(), ['Villain'], OPTS);

    expect(log).not.toHaveBeenCalled();
  });
});
