/**
 * Hand splitting for raw hand history logs
 * Finds hand-start markers and delimits the line range of every hand
 */

/** Line that opens a new hand record */
export const HAND_START = /^(?:Poker|PokerStars) Hand #/;

/** Line range of one hand: [start, end) */
export interface HandRange {
  readonly start: number;
  readonly end: number;
}

/**
 * Index of every hand-start marker, in file order
 */
export function findHandStarts(lines: readonly string[]): number[] {
  const starts: number[] = [];
  lines.forEach((line, i) => {
    if (HAND_START.test(line)) starts.push(i);
  });
  return starts;
}

/**
 * Split a file into hand ranges. Each range runs from its marker to the line
 * before the next marker (or end of file). No markers -> no hands.
 */
export function splitHands(lines: readonly string[]): HandRange[] {
  const starts = findHandStarts(lines);

  return starts.map((start, i) => ({
    start,
    end: starts[i + 1] ?? lines.length,
  }));
}

/**
 * Split raw text into lines, tolerating CRLF and a UTF-8 BOM
 */
export function toLines(content: string): string[] {
  return content.replace(/^\uFEFF/, '').split(/\r?\n/);
}
