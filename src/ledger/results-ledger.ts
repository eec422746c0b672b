/**
 * Results Ledger: one record per imported tournament
 *
 * A record merges what the hand history says (knockouts, final table) with
 * what the tournament summary says (place, payout, buy-in). Re-importing a
 * tournament whose hand history is already recorded is refused, so the same
 * knockouts are never counted twice.
 *
 * Optionally persists to a JSON file via JsonStore.
 */

import { EventEmitter } from 'events';
import { type HandHistoryResult } from '../engine/history.js';
import { type TournamentSummary } from '../engine/summary.js';
import { JsonStore, type StoreData, type StoredTournament } from './store.js';

/** Knockout credit as kept in the ledger */
export interface RecordedCredit {
  readonly handId: string | null;
  readonly player: string;
  readonly potIndex: number;
  readonly potSize: bigint;
  readonly heroStack: bigint;
  readonly bustStack: bigint;
}

export interface RecordedFinalTable {
  readonly handId: string | null;
  readonly heroStack: bigint | null;
  readonly heroStackBb: number | null;
  readonly handCount: number;
  readonly knockouts: number;
  readonly earlyKnockouts: number;
  readonly preKnockouts: number;
}

export interface TournamentRecord {
  readonly key: string;
  readonly tournamentId: string | null;
  readonly startedAt: string | null;
  readonly hasHandHistory: boolean;
  readonly handCount: number;
  readonly knockouts: number;
  readonly credits: readonly RecordedCredit[];
  readonly finalTable: RecordedFinalTable | null;
  readonly place: number | null;
  readonly payout: number | null;
  readonly buyIn: number | null;
  readonly sourceFiles: readonly string[];
  readonly importedAt: number;
}

export interface LedgerStats {
  readonly tournaments: number;
  readonly knockouts: number;
  readonly avgKnockoutsPerTournament: number;
  readonly finalTables: number;
  readonly finalTableReachPercent: number;
  readonly avgFinalTableStackBb: number | null;
  readonly finalTableKnockouts: number;
  readonly earlyFinalTableKnockouts: number;
  readonly earlyFinalTableKnockoutsPerFinalTable: number;
  readonly preFinalTableKnockouts: number;
  // Money stats cover records with a known buy-in
  readonly totalBuyIn: number;
  readonly totalPrize: number;
  readonly profit: number;
  readonly roiPercent: number;
  // Place stats cover records with a known place
  readonly avgPlace: number | null;
  readonly itmPercent: number;
  readonly placeDistribution: Record<number, number>;  // place 1-9 -> finishes
}

/** Result of a ledger mutation */
export type LedgerResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/** Records are keyed by tournament id, or by file when the id is unknown */
export function recordKey(tournamentId: string | null, file: string): string {
  return tournamentId ?? `file:${file}`;
}

function emptyRecord(key: string, tournamentId: string | null): TournamentRecord {
  return {
    key,
    tournamentId,
    startedAt: null,
    hasHandHistory: false,
    handCount: 0,
    knockouts: 0,
    credits: [],
    finalTable: null,
    place: null,
    payout: null,
    buyIn: null,
    sourceFiles: [],
    importedAt: Date.now(),
  };
}

const round2 = (n: number): number => Math.round(n * 100) / 100;

const ITM_PLACES = 3;
const DISTRIBUTION_PLACES = 9;

function total(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

function percent(part: number, whole: number): number {
  return whole === 0 ? 0 : round2((part / whole) * 100);
}

function average(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return round2(total(values) / values.length);
}

export class ResultsLedger extends EventEmitter {
  private records: Map<string, TournamentRecord> = new Map();

  /** Persistence store (null = in-memory only, used by tests) */
  private store: JsonStore | null;

  constructor(opts: { storePath?: string } = {}) {
    super();

    if (opts.storePath) {
      this.store = new JsonStore(opts.storePath);
      this.restoreFromStore();
    } else {
      this.store = null;
    }
  }

  // --- Persistence ---

  private persist(): void {
    if (!this.store) return;

    const tournaments: Record<string, StoredTournament> = {};
    for (const r of this.records.values()) {
      tournaments[r.key] = {
        key: r.key,
        tournamentId: r.tournamentId,
        startedAt: r.startedAt,
        hasHandHistory: r.hasHandHistory,
        handCount: r.handCount,
        knockouts: r.knockouts,
        credits: r.credits.map(c => ({
          handId: c.handId,
          player: c.player,
          potIndex: c.potIndex,
          potSize: c.potSize.toString(),
          heroStack: c.heroStack.toString(),
          bustStack: c.bustStack.toString(),
        })),
        finalTable: r.finalTable && {
          ...r.finalTable,
          heroStack: r.finalTable.heroStack?.toString() ?? null,
        },
        place: r.place,
        payout: r.payout,
        buyIn: r.buyIn,
        sourceFiles: [...r.sourceFiles],
        importedAt: r.importedAt,
      };
    }

    const data: StoreData = { version: 1, tournaments };
    this.store.setData(data);
  }

  private restoreFromStore(): void {
    if (!this.store) return;
    const data = this.store.getData();

    for (const t of Object.values(data.tournaments)) {
      this.records.set(t.key, {
        key: t.key,
        tournamentId: t.tournamentId,
        startedAt: t.startedAt,
        hasHandHistory: t.hasHandHistory,
        handCount: t.handCount,
        knockouts: t.knockouts,
        credits: t.credits.map(c => ({
          handId: c.handId,
          player: c.player,
          potIndex: c.potIndex,
          potSize: BigInt(c.potSize),
          heroStack: BigInt(c.heroStack),
          bustStack: BigInt(c.bustStack),
        })),
        finalTable: t.finalTable && {
          ...t.finalTable,
          heroStack: t.finalTable.heroStack === null ? null : BigInt(t.finalTable.heroStack),
        },
        place: t.place,
        payout: t.payout,
        buyIn: t.buyIn,
        sourceFiles: t.sourceFiles,
        importedAt: t.importedAt,
      });
    }
  }

  // --- Queries ---

  /** True once a hand history for this tournament has been recorded */
  has(tournamentId: string): boolean {
    return this.records.get(tournamentId)?.hasHandHistory ?? false;
  }

  get(key: string): TournamentRecord | null {
    return this.records.get(key) ?? null;
  }

  list(): TournamentRecord[] {
    return Array.from(this.records.values())
      .sort((a, b) => (a.startedAt ?? '').localeCompare(b.startedAt ?? '') || a.key.localeCompare(b.key));
  }

  getStats(): LedgerStats {
    const records = this.list();
    const withHistory = records.filter(r => r.hasHandHistory);
    const knockouts = total(withHistory.map(r => r.knockouts));

    const finalTables = withHistory
      .map(r => r.finalTable)
      .filter((ft): ft is RecordedFinalTable => ft !== null);
    const ftStacks = finalTables
      .map(ft => ft.heroStackBb)
      .filter((bb): bb is number => bb !== null);
    const earlyKnockouts = total(finalTables.map(ft => ft.earlyKnockouts));

    const paid = records.filter(r => r.buyIn !== null);
    const totalBuyIn = round2(total(paid.map(r => r.buyIn ?? 0)));
    const totalPrize = round2(total(paid.map(r => r.payout ?? 0)));
    const profit = round2(totalPrize - totalBuyIn);

    const places = records
      .map(r => r.place)
      .filter((p): p is number => p !== null);
    const placeDistribution: Record<number, number> = {};
    for (let place = 1; place <= DISTRIBUTION_PLACES; place++) {
      placeDistribution[place] = places.filter(p => p === place).length;
    }

    return {
      tournaments: withHistory.length,
      knockouts,
      avgKnockoutsPerTournament: withHistory.length === 0 ? 0 : round2(knockouts / withHistory.length),
      finalTables: finalTables.length,
      finalTableReachPercent: percent(finalTables.length, withHistory.length),
      avgFinalTableStackBb: average(ftStacks),
      finalTableKnockouts: total(finalTables.map(ft => ft.knockouts)),
      earlyFinalTableKnockouts: earlyKnockouts,
      earlyFinalTableKnockoutsPerFinalTable: finalTables.length === 0 ? 0 : round2(earlyKnockouts / finalTables.length),
      preFinalTableKnockouts: total(finalTables.map(ft => ft.preKnockouts)),
      totalBuyIn,
      totalPrize,
      profit,
      roiPercent: percent(profit, totalBuyIn),
      avgPlace: average(places),
      itmPercent: percent(places.filter(p => p <= ITM_PLACES).length, places.length),
      placeDistribution,
    };
  }

  // --- Mutations ---

  recordHandHistory(result: HandHistoryResult, file: string): LedgerResult<TournamentRecord> {
    const key = recordKey(result.tournamentId, file);
    const existing = this.records.get(key);

    if (existing?.hasHandHistory) {
      return { success: false, error: `Tournament ${key} already imported` };
    }

    const base = existing ?? emptyRecord(key, result.tournamentId);
    const ft = result.finalTable;
    const record: TournamentRecord = {
      ...base,
      startedAt: result.startedAt ?? base.startedAt,
      hasHandHistory: true,
      handCount: result.handCount,
      knockouts: result.knockouts,
      credits: result.hands.flatMap(h => h.credits.map(c => ({ handId: h.handId, ...c }))),
      finalTable: ft.reached
        ? {
            handId: ft.handId,
            heroStack: ft.heroStack,
            heroStackBb: ft.heroStackBb,
            handCount: ft.handCount,
            knockouts: ft.knockouts,
            earlyKnockouts: ft.earlyKnockouts,
            preKnockouts: ft.preKnockouts,
          }
        : null,
      sourceFiles: [...base.sourceFiles, file],
      importedAt: Date.now(),
    };

    this.records.set(key, record);
    this.persist();

    this.emit('tournament_recorded', record);
    return { success: true, data: record };
  }

  recordSummary(summary: TournamentSummary, file: string): LedgerResult<TournamentRecord> {
    if (summary.tournamentId === null) {
      return { success: false, error: `No tournament id in summary ${file}` };
    }

    const key = summary.tournamentId;
    const base = this.records.get(key) ?? emptyRecord(key, key);
    if (base.sourceFiles.includes(file)) {
      return { success: false, error: `Summary ${file} already imported` };
    }

    const record: TournamentRecord = {
      ...base,
      startedAt: base.startedAt ?? summary.startedAt,
      place: summary.place,
      payout: summary.payout,
      buyIn: summary.buyIn,
      sourceFiles: [...base.sourceFiles, file],
    };

    this.records.set(key, record);
    this.persist();

    this.emit('tournament_recorded', record);
    return { success: true, data: record };
  }

  clear(): number {
    const removed = this.records.size;
    this.records.clear();
    this.persist();
    this.emit('ledger_cleared', { removed });
    return removed;
  }
}
