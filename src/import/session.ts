/**
 * KnockoutSession - runs an import over files and directories
 *
 * Each file is read whole, classified, analyzed and recorded in the ledger
 * before the next one is read. Tournaments already in the ledger are
 * skipped. Progress is emitted as events for the API's WebSocket feed.
 */

import { EventEmitter } from 'events';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import { type AppConfig } from '../config.js';
import { analyzeHandHistory } from '../engine/history.js';
import { type KnockoutCredit } from '../engine/knockout.js';
import { parseTournamentSummary } from '../engine/summary.js';
import { type ResultsLedger, recordKey } from '../ledger/results-ledger.js';
import { type FileKind, NoInputError, classifyContent, findInputFiles } from './discovery.js';

export type SessionConfig = Pick<
  AppConfig,
  'heroName' | 'minBigBlind' | 'finalTableSize' | 'diagnostics' | 'inputPaths' | 'extensions'
>;

/** Outcome of one file */
export interface FileReport {
  readonly file: string;
  readonly kind: FileKind;
  readonly status: 'imported' | 'skipped';
  readonly reason: string | null;
  readonly tournamentId: string | null;
  readonly knockouts: number;
}

export interface ImportSummary {
  readonly files: readonly FileReport[];
  readonly imported: number;
  readonly skipped: number;
  readonly knockouts: number;
}

/** Events emitted by the session */
export interface SessionEvents {
  file_processed: FileReport;
  file_skipped: FileReport;
  knockout: { file: string; tournamentId: string | null; handId: string | null; credit: KnockoutCredit };
  import_complete: ImportSummary;
}

export class KnockoutSession extends EventEmitter {
  private readonly config: SessionConfig;
  private readonly ledger: ResultsLedger;

  constructor(config: SessionConfig, ledger: ResultsLedger) {
    super();
    this.config = config;
    this.ledger = ledger;
  }

  /**
   * Import every matching file under `paths`.
   * Throws NoInputError when nothing matches.
   */
  async importPaths(paths: readonly string[] = this.config.inputPaths): Promise<ImportSummary> {
    const files = await findInputFiles(paths, this.config.extensions);
    if (files.length === 0) {
      throw new NoInputError(paths);
    }

    console.log(`[session] Importing ${files.length} file(s)`);
    const reports: FileReport[] = [];

    for (const file of files) {
      reports.push(await this.importFile(file));
    }

    const summary: ImportSummary = {
      files: reports,
      imported: reports.filter(r => r.status === 'imported').length,
      skipped: reports.filter(r => r.status === 'skipped').length,
      knockouts: reports.reduce((sum, r) => sum + r.knockouts, 0),
    };

    console.log(`[session] Done: ${summary.imported} imported, ${summary.skipped} skipped, ${summary.knockouts} knockout(s)`);
    this.emit('import_complete', summary);
    return summary;
  }

  /**
   * Read and process one file. Read failures skip the file.
   */
  async importFile(file: string): Promise<FileReport> {
    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch (err) {
      const reason = `Cannot read file: ${err instanceof Error ? err.message : String(err)}`;
      return this.skip({ file, kind: 'unknown', tournamentId: null }, reason);
    }

    return this.processContent(content, file);
  }

  /**
   * Classify, analyze and record one file's content
   */
  processContent(content: string, file: string): FileReport {
    const kind = classifyContent(content);
    const fileName = basename(file);

    if (kind === 'tournament_summary') {
      const summary = parseTournamentSummary(content, fileName);
      const result = this.ledger.recordSummary(summary, file);
      if (!result.success) {
        return this.skip({ file, kind, tournamentId: summary.tournamentId }, result.error);
      }
      return this.done({ file, kind, status: 'imported', reason: null, tournamentId: summary.tournamentId, knockouts: 0 });
    }

    if (kind === 'unknown') {
      return this.skip({ file, kind, tournamentId: null }, 'Not a hand history or tournament summary');
    }

    const analysis = analyzeHandHistory(content, { ...this.config, fileName });
    const { tournamentId } = analysis;

    if (analysis.handCount === 0) {
      return this.skip({ file, kind, tournamentId }, 'No hands found');
    }
    if (this.ledger.has(recordKey(tournamentId, file))) {
      return this.skip({ file, kind, tournamentId }, `Tournament ${tournamentId ?? file} already imported`);
    }

    const result = this.ledger.recordHandHistory(analysis, file);
    if (!result.success) {
      return this.skip({ file, kind, tournamentId }, result.error);
    }

    for (const hand of analysis.hands) {
      for (const credit of hand.credits) {
        this.emit('knockout', { file, tournamentId, handId: hand.handId, credit });
      }
    }

    return this.done({ file, kind, status: 'imported', reason: null, tournamentId, knockouts: analysis.knockouts });
  }

  private done(report: FileReport): FileReport {
    console.log(`[session] ${basename(report.file)}: ${report.knockouts} knockout(s)`);
    this.emit('file_processed', report);
    return report;
  }

  private skip(
    base: { file: string; kind: FileKind; tournamentId: string | null },
    reason: string
  ): FileReport {
    const report: FileReport = { ...base, status: 'skipped', reason, knockouts: 0 };
    console.warn(`[session] Skipped ${basename(base.file)}: ${reason}`);
    this.emit('file_skipped', report);
    return report;
  }
}
