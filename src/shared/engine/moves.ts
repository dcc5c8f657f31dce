import type { HexCoordinate, Move, PlaceMove, SlideMove, TeamName } from '../types/game';
import { hexEquals, hexKey } from './coordinates';

export function createPlaceMove(team: TeamName, to: HexCoordinate): PlaceMove {
  return { kind: 'place', team, to: { q: to.q, r: to.r } };
}

export function createSlideMove(team: TeamName, from: HexCoordinate, to: HexCoordinate): SlideMove {
  return { kind: 'slide', team, from: { q: from.q, r: from.r }, to: { q: to.q, r: to.r } };
}

/**
 * Source coordinate of a move; `undefined` for placements.
 */
export function moveSource(move: Move): HexCoordinate | undefined {
  switch (move.kind) {
    case 'place':
      return undefined;
    case 'slide':
      return move.from;
  }
}

/**
 * Structural equality over the tagged variant: same kind, team and
 * endpoints.
 */
export function movesEqual(a: Move, b: Move): boolean {
  if (a.team !== b.team || !hexEquals(a.to, b.to)) {
    return false;
  }
  switch (a.kind) {
    case 'place':
      return b.kind === 'place';
    case 'slide':
      return b.kind === 'slide' && hexEquals(a.from, b.from);
  }
}

/**
 * Stable string key, e.g. `ONE:place:3,2` or `TWO:slide:1,0>4,0`.
 */
export function moveKey(move: Move): string {
  switch (move.kind) {
    case 'place':
      return `${move.team}:place:${hexKey(move.to)}`;
    case 'slide':
      return `${move.team}:slide:${hexKey(move.from)}>${hexKey(move.to)}`;
  }
}

export function containsMove(moves: readonly Move[], move: Move): boolean {
  return moves.some((candidate) => movesEqual(candidate, move));
}
