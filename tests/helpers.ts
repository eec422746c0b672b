import { readFileSync } from 'fs';
import { type Server } from 'http';
import { type Hand } from '../src/engine/parser.js';
import { assignWinners, buildPots } from '../src/engine/pot.js';

export function fixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf-8');
}

/** Base URL of a server listening on 127.0.0.1 */
export function baseUrl(server: Server): string {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return `http://127.0.0.1:${address.port}`;
}

type Chips = Record<string, number>;

const toMap = (chips: Chips = {}): Map<string, bigint> =>
  new Map(Object.entries(chips).map(([k, v]) => [k, BigInt(v)]));

/** Build a Hand directly from stacks, contributions and collections */
export function makeHand(shape: {
  handId?: string;
  bb?: number;
  seats: Chips;
  contrib?: Chips;
  collects?: Chips;
  duplicateSeats?: string[];
}): Hand {
  const contrib = toMap(shape.contrib);
  const collects = toMap(shape.collects);

  return {
    handId: shape.handId ?? 'H1',
    tournamentId: null,
    startedAt: null,
    tableSize: 9,
    bb: BigInt(shape.bb ?? 400),
    seats: toMap(shape.seats),
    contrib,
    collects,
    pots: assignWinners(buildPots(contrib), collects),
    duplicateSeats: shape.duplicateSeats ?? [],
  };
}
