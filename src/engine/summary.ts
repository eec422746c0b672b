/**
 * Tournament summary parser
 * Reads Hero's finishing place, payout and buy-in from a summary file.
 * Buy-in is taken from the title line, not the "Buy-in:" line.
 */

export interface TournamentSummary {
  readonly tournamentId: string | null;
  readonly place: number | null;
  readonly payout: number | null;
  readonly buyIn: number | null;
  readonly startedAt: string | null;
}

const RE_TOURNAMENT = /Tournament #(\d+)/;
const RE_BUYIN_TITLE = /[$€]([\d,]+(?:\.\d+)?)/;
const RE_PLACE = /You finished the tournament in (\d+)(?:st|nd|rd|th) place/;
const RE_PAYOUT = /You received a total of [$€]?([\d,]+(?:\.\d+)?)/;
const RE_DATE = /(\d{4}\/\d{2}\/\d{2} \d{1,2}:\d{2}:\d{2})/;

function toNumber(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const n = Number(raw.replace(/,/g, ''));
  return Number.isFinite(n) ? n : null;
}

export function parseTournamentSummary(content: string, fileName = ''): TournamentSummary {
  const firstLine = content.split(/\r?\n/, 1)[0] ?? '';

  return {
    tournamentId: content.match(RE_TOURNAMENT)?.[1] ?? fileName.match(RE_TOURNAMENT)?.[1] ?? null,
    place: toNumber(content.match(RE_PLACE)?.[1]),
    payout: toNumber(content.match(RE_PAYOUT)?.[1]),
    buyIn: toNumber(firstLine.match(RE_BUYIN_TITLE)?.[1]),
    startedAt: content.match(RE_DATE)?.[1] ?? null,
  };
}
