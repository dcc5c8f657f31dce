import type { HexCoordinate, OffsetCoordinate } from '../types/game';

/**
 * Coordinate helpers for the floe grid.
 *
 * The grid uses the "odd-r" offset layout: every odd row is shifted half a
 * floe to the right. Axial coordinates keep `r` equal to the row and fold
 * the shift into `q`, so straight hex lines become constant steps.
 */

export type HexDirection = 'RIGHT' | 'DOWN_RIGHT' | 'DOWN_LEFT' | 'LEFT' | 'UP_LEFT' | 'UP_RIGHT';

/**
 * The six axial direction vectors, clockwise from RIGHT.
 */
export const HEX_DIRECTIONS: Readonly<Record<HexDirection, HexCoordinate>> = {
  RIGHT: { q: 1, r: 0 },
  DOWN_RIGHT: { q: 0, r: 1 },
  DOWN_LEFT: { q: -1, r: 1 },
  LEFT: { q: -1, r: 0 },
  UP_LEFT: { q: 0, r: -1 },
  UP_RIGHT: { q: 1, r: -1 },
};

export const HEX_DIRECTION_ORDER: readonly HexDirection[] = [
  'RIGHT',
  'DOWN_RIGHT',
  'DOWN_LEFT',
  'LEFT',
  'UP_LEFT',
  'UP_RIGHT',
];

// Half the row index rounded towards negative infinity for odd rows, so the
// mapping stays lossless for negative rows as well.
const rowShift = (row: number): number => (row - (row & 1)) / 2;

export function offsetToHex(coord: OffsetCoordinate): HexCoordinate {
  return { q: coord.x - rowShift(coord.y), r: coord.y };
}

export function hexToOffset(coord: HexCoordinate): OffsetCoordinate {
  return { x: coord.q + rowShift(coord.r), y: coord.r };
}

export function addHex(a: HexCoordinate, b: HexCoordinate): HexCoordinate {
  return { q: a.q + b.q, r: a.r + b.r };
}

export function hexEquals(a: HexCoordinate, b: HexCoordinate): boolean {
  return a.q === b.q && a.r === b.r;
}

export function neighbour(coord: HexCoordinate, direction: HexDirection): HexCoordinate {
  return addHex(coord, HEX_DIRECTIONS[direction]);
}

export const hexKey = (coord: HexCoordinate): string => `${coord.q},${coord.r}`;
