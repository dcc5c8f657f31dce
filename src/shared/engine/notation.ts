import type { HexCoordinate, Move } from '../types/game';
import { hexToOffset } from './coordinates';
import type { GameState } from './GameState';
import type { Team } from './team';

/**
 * Shared move-notation helpers.
 *
 * A lightweight, human-readable notation for logs, error contexts and test
 * failure output. Not meant to be parsed back.
 */

export interface MoveNotationOptions {
  /**
   * Coordinate system to print. Defaults to axial `(q,r)`; 'offset' prints
   * grid indices as `[x,y]`.
   */
  coordinates?: 'axial' | 'offset';
}

export function formatCoordinate(coord: HexCoordinate, options: MoveNotationOptions = {}): string {
  if (options.coordinates === 'offset') {
    const { x, y } = hexToOffset(coord);
    return `[${x},${y}]`;
  }
  return `(${coord.q},${coord.r})`;
}

/**
 * Format a move into a one-line notation string.
 *
 * Examples:
 *   ONE: P (3,2)
 *   TWO: S (1,0)→(4,0)
 */
export function formatMove(move: Move, options: MoveNotationOptions = {}): string {
  const prefix = `${move.team}:`;
  switch (move.kind) {
    case 'place':
      return `${prefix} P ${formatCoordinate(move.to, options)}`;
    case 'slide': {
      const from = formatCoordinate(move.from, options);
      return `${prefix} S ${from}→${formatCoordinate(move.to, options)}`;
    }
  }
}

/**
 * Render a list of moves as numbered notation lines.
 */
export function formatMoveList(
  moves: readonly Move[],
  options: MoveNotationOptions = {}
): string[] {
  return moves.map((m, idx) => `${idx + 1}. ${formatMove(m, options)}`);
}

function describeTeam(team: Team): string {
  const counts = `fish=${team.fish}, penguins=${team.penguins.length}, moves=${team.moves.length}`;
  return `${team.name}[${counts}]`;
}

/**
 * One-line summary of a game state, e.g.
 * `GameState(turn=3, round=2, first=ONE[...], second=TWO[...], lastMove=ONE: P (0,1),
 * current=TWO)`.
 */
export function describeGameState(state: GameState): string {
  const lastMove = state.lastMove ? formatMove(state.lastMove) : 'none';
  const current = state.currentTeam?.name ?? 'none';
  return (
    `GameState(turn=${state.turn}, round=${state.round}, ` +
    `first=${describeTeam(state.firstTeam)}, second=${describeTeam(state.secondTeam)}, ` +
    `lastMove=${lastMove}, current=${current})`
  );
}
