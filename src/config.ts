/**
 * Runtime configuration, read from the environment (.env via dotenv)
 */

import { join } from 'path';

export interface AppConfig {
  readonly heroName: string;
  readonly minBigBlind: bigint;
  readonly finalTableSize: number;
  readonly diagnostics: boolean;
  readonly inputPaths: readonly string[];
  readonly extensions: readonly string[];
  readonly dataDir: string;
  readonly ledgerPath: string;
  readonly port: number;
  readonly operatorKey: string;
  readonly importOnStart: boolean;
}

export const DEFAULTS = {
  heroName: 'Hero',
  minBigBlind: 100n,
  finalTableSize: 9,
  extensions: ['.txt'],
  dataDir: './data',
  port: 3002,
} as const;

type Env = Record<string, string | undefined>;

function list(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

function flag(raw: string | undefined): boolean {
  return raw !== undefined && ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function int(raw: string | undefined, fallback: number): number {
  const n = parseInt(raw ?? '', 10);
  return Number.isNaN(n) || n <= 0 ? fallback : n;
}

function chips(raw: string | undefined, fallback: bigint): bigint {
  const cleaned = (raw ?? '').replace(/,/g, '').trim();
  return /^\d+$/.test(cleaned) ? BigInt(cleaned) : fallback;
}

function extension(ext: string): string {
  const lower = ext.toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const dataDir = env.DATA_DIR?.trim() || DEFAULTS.dataDir;
  const extensions = list(env.HH_EXTENSIONS).map(extension);

  return {
    heroName: env.HERO_NAME?.trim() || DEFAULTS.heroName,
    minBigBlind: chips(env.MIN_BIG_BLIND, DEFAULTS.minBigBlind),
    finalTableSize: int(env.FINAL_TABLE_SIZE, DEFAULTS.finalTableSize),
    diagnostics: flag(env.KO_DIAGNOSTICS),
    inputPaths: list(env.HH_PATHS),
    extensions: extensions.length > 0 ? extensions : [...DEFAULTS.extensions],
    dataDir,
    ledgerPath: join(dataDir, 'results.json'),
    port: int(env.PORT, DEFAULTS.port),
    operatorKey: env.OPERATOR_KEY?.trim() ?? '',
    importOnStart: flag(env.IMPORT_ON_START),
  };
}
