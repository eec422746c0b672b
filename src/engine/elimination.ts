/**
 * Elimination tracking between chronologically adjacent hands
 *
 * Hand histories never say who busted. A player seated in one hand and
 * missing from the next is taken to be out. The last hand of a file has no
 * successor, so anyone who collected nothing in it is treated as busted.
 * That last rule can't tell a bust from a player who folded and survived.
 */

import { type Hand } from './parser.js';

/**
 * Players eliminated in `current`, in seating order
 *
 * @param next - The following hand, or null when `current` is the last one
 */
export function findEliminated(current: Hand, next: Hand | null): string[] {
  const players = [...current.seats.keys()];

  if (next) {
    return players.filter(p => !next.seats.has(p));
  }

  return players.filter(p => !current.collects.has(p));
}
