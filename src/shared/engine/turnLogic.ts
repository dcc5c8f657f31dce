/**
 * Shared turn-order resolution.
 *
 * The side to move is not simply the parity of the turn counter: a side
 * with no legal move forfeits its turn without a recorded pass. The decision
 * depends only on the parity and two independently computed facts, so it is
 * kept as a pure function the GameState feeds.
 */

export type TurnSide = 'first' | 'second';

/**
 * Decide which side moves at `turn`.
 *
 * - Even turn: first side if it can move, else second side if it can move.
 * - Odd turn: second side if it can move, else first side if it can move.
 * - Neither can move: `undefined` (terminal).
 */
export function resolveTurnSide(
  turn: number,
  firstHasMove: boolean,
  secondHasMove: boolean
): TurnSide | undefined {
  const preferFirst = turn % 2 === 0;
  const [preferred, fallback]: [TurnSide, TurnSide] = preferFirst
    ? ['first', 'second']
    : ['second', 'first'];
  const canMove = (side: TurnSide): boolean => (side === 'first' ? firstHasMove : secondHasMove);

  if (canMove(preferred)) {
    return preferred;
  }
  if (canMove(fallback)) {
    return fallback;
  }
  return undefined;
}

/** Round number for a turn counter: each round is one turn per side. */
export function roundForTurn(turn: number): number {
  return Math.floor((turn + 1) / 2);
}
