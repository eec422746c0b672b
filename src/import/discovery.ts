/**
 * Input discovery
 * Expands the configured paths into hand history and summary files.
 */

import { readdir, stat } from 'fs/promises';
import { extname, join, resolve } from 'path';
import { HAND_START, toLines } from '../engine/splitter.js';

export type FileKind = 'hand_history' | 'tournament_summary' | 'unknown';

/** Raised when an import finds nothing to read */
export class NoInputError extends Error {
  constructor(readonly paths: readonly string[]) {
    super(paths.length === 0
      ? 'No input paths configured'
      : `No matching files found in: ${paths.join(', ')}`);
    this.name = 'NoInputError';
  }
}

async function walk(dir: string, extensions: readonly string[], out: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(full, extensions, out);
    } else if (entry.isFile() && extensions.includes(extname(entry.name).toLowerCase())) {
      out.push(full);
    }
  }
}

/**
 * Files named directly are taken as is; directories are walked recursively
 * for matching extensions. Missing paths are logged and skipped.
 */
export async function findInputFiles(
  paths: readonly string[],
  extensions: readonly string[]
): Promise<string[]> {
  const found: string[] = [];

  for (const path of paths) {
    const full = resolve(path);
    try {
      const info = await stat(full);
      if (info.isDirectory()) {
        await walk(full, extensions, found);
      } else if (info.isFile()) {
        found.push(full);
      }
    } catch (err) {
      console.warn(`[import] Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return [...new Set(found)].sort();
}

/**
 * Decide what a file holds from its first couple of thousand characters
 */
export function classifyContent(content: string): FileKind {
  const head = content.slice(0, 2000);

  if (
    head.includes('Tournament #') &&
    /buy-?in/i.test(head) &&
    /\d+(?:st|nd|rd|th) place/.test(head)
  ) {
    return 'tournament_summary';
  }

  if (toLines(head).some(line => HAND_START.test(line))) {
    return 'hand_history';
  }

  return 'unknown';
}
