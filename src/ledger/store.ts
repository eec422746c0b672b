/**
 * Persistent JSON file store for the results ledger.
 *
 * Writes a single JSON file to disk after every mutation.
 * Loads it on startup. If the file doesn't exist, starts fresh.
 *
 * All bigint values are serialized as strings and restored on load.
 */

import { readFileSync, writeFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

/** Shape of one persisted knockout credit */
export interface StoredCredit {
  handId: string | null;
  player: string;
  potIndex: number;
  potSize: string;
  heroStack: string;
  bustStack: string;
}

/** Shape of one persisted tournament record */
export interface StoredTournament {
  key: string;
  tournamentId: string | null;
  startedAt: string | null;
  hasHandHistory: boolean;
  handCount: number;
  knockouts: number;
  credits: StoredCredit[];
  finalTable: {
    handId: string | null;
    heroStack: string | null;
    heroStackBb: number | null;
    handCount: number;
    knockouts: number;
    earlyKnockouts: number;
    preKnockouts: number;
  } | null;
  place: number | null;
  payout: number | null;
  buyIn: number | null;
  sourceFiles: string[];
  importedAt: number;
}

/** Shape of the persisted data */
export interface StoreData {
  version: 1;
  tournaments: Record<string, StoredTournament>;  // key -> record
}

function emptyStore(): StoreData {
  return { version: 1, tournaments: {} };
}

const RE_CHIPS = /^-?\d+$/;

const isObject = (value: unknown): value is object =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isChips = (value: unknown): boolean => typeof value === 'string' && RE_CHIPS.test(value);

const isNullable = (value: unknown, type: 'string' | 'number'): boolean =>
  value === null || typeof value === type;

function field(value: object, key: string): unknown {
  return Reflect.get(value, key);
}

function isStoredCredit(value: unknown): boolean {
  return (
    isObject(value) &&
    isNullable(field(value, 'handId'), 'string') &&
    typeof field(value, 'player') === 'string' &&
    typeof field(value, 'potIndex') === 'number' &&
    isChips(field(value, 'potSize')) &&
    isChips(field(value, 'heroStack')) &&
    isChips(field(value, 'bustStack'))
  );
}

function isStoredFinalTable(value: unknown): boolean {
  if (value === null) return true;
  if (!isObject(value)) return false;
  const heroStack = field(value, 'heroStack');
  return (
    isNullable(field(value, 'handId'), 'string') &&
    (heroStack === null || isChips(heroStack)) &&
    isNullable(field(value, 'heroStackBb'), 'number') &&
    ['handCount', 'knockouts', 'earlyKnockouts', 'preKnockouts']
      .every(key => typeof field(value, key) === 'number')
  );
}

function isStoredTournament(value: unknown): boolean {
  if (!isObject(value)) return false;
  const credits = field(value, 'credits');
  const sourceFiles = field(value, 'sourceFiles');
  return (
    typeof field(value, 'key') === 'string' &&
    isNullable(field(value, 'tournamentId'), 'string') &&
    isNullable(field(value, 'startedAt'), 'string') &&
    typeof field(value, 'hasHandHistory') === 'boolean' &&
    typeof field(value, 'handCount') === 'number' &&
    typeof field(value, 'knockouts') === 'number' &&
    Array.isArray(credits) && credits.every(isStoredCredit) &&
    isStoredFinalTable(field(value, 'finalTable')) &&
    ['place', 'payout', 'buyIn'].every(key => isNullable(field(value, key), 'number')) &&
    Array.isArray(sourceFiles) && sourceFiles.every(f => typeof f === 'string') &&
    typeof field(value, 'importedAt') === 'number'
  );
}

function isStoreData(value: unknown): value is StoreData {
  if (!isObject(value)) return false;
  const tournaments = field(value, 'tournaments');
  return isObject(tournaments) && Object.values(tournaments).every(isStoredTournament);
}

export class JsonStore {
  private filePath: string;
  private data: StoreData;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.data = this.load();
  }

  private load(): StoreData {
    let raw: string;
    try {
      raw = readFileSync(this.filePath, 'utf-8');
    } catch {
      console.log(`[store] No existing results at ${this.filePath}, starting fresh`);
      return emptyStore();
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isStoreData(parsed)) {
      throw new Error(`Results file ${this.filePath} is not a results ledger`);
    }
    console.log(`[store] Loaded results from ${this.filePath} (${Object.keys(parsed.tournaments).length} tournaments)`);
    return parsed;
  }

  save(): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify(this.data, null, 2), 'utf-8');
  }

  getData(): StoreData {
    return this.data;
  }

  setData(data: StoreData): void {
    this.data = data;
    this.save();
  }
}
