/**
 * Core value types for the ice-floe penguin game.
 *
 * The board is a hex grid of floes addressed two ways: offset grid indices
 * ({@link OffsetCoordinate}, odd rows shifted right) and axial hex indices
 * ({@link HexCoordinate}). Board queries and move endpoints use axial
 * coordinates; offset coordinates are used to walk the grid row by row.
 */

export type TeamName = 'ONE' | 'TWO';

export const TEAM_NAMES: readonly TeamName[] = ['ONE', 'TWO'];

/** Number of penguins each team places before the movement phase starts. */
export const PENGUINS_PER_TEAM = 4;

/** Axial hex coordinate. `q` runs along a row, `r` is the row index. */
export interface HexCoordinate {
  readonly q: number;
  readonly r: number;
}

/** Offset grid coordinate: `x` is the column, `y` the row. */
export interface OffsetCoordinate {
  readonly x: number;
  readonly y: number;
}

export interface Penguin {
  readonly coordinate: HexCoordinate;
  readonly team: TeamName;
}

/**
 * A single floe. `fish` is 0 once harvested (or if the floe never carried
 * any); `penguin` is the occupant, if any.
 */
export interface Field {
  readonly fish: number;
  readonly penguin: Penguin | null;
}

/** Placement of a new penguin; only legal while a team has fewer than four. */
export interface PlaceMove {
  readonly kind: 'place';
  readonly team: TeamName;
  readonly to: HexCoordinate;
}

/** Slide of an existing penguin along a straight hex line. */
export interface SlideMove {
  readonly kind: 'slide';
  readonly team: TeamName;
  readonly from: HexCoordinate;
  readonly to: HexCoordinate;
}

export type Move = PlaceMove | SlideMove;

export const otherTeamName = (name: TeamName): TeamName => (name === 'ONE' ? 'TWO' : 'ONE');
