import type { Field, HexCoordinate, Move, Penguin, SlideMove, TeamName } from '../types/game';
import { HEX_DIRECTIONS, HEX_DIRECTION_ORDER, addHex, hexKey, hexToOffset } from './coordinates';
import { BoardConstraintViolation, EngineErrorCode, InvalidState } from './errors';
import { createSlideMove } from './moves';

const EMPTY_FIELD: Field = { fish: 0, penguin: null };

const copyField = (field: Field): Field => ({
  fish: field.fish,
  penguin: field.penguin
    ? {
        coordinate: { q: field.penguin.coordinate.q, r: field.penguin.coordinate.r },
        team: field.penguin.team,
      }
    : null,
});

/**
 * Immutable grid of floes.
 *
 * Rows are stored in offset order (`fields[y][x]`); every public query and
 * move endpoint takes axial {@link HexCoordinate}s. The constructor keeps its
 * own copy of the grid, and {@link Board.move} returns a new board without
 * touching the receiver.
 */
export class Board {
  private readonly fields: ReadonlyArray<ReadonlyArray<Field>>;

  constructor(fields: ReadonlyArray<ReadonlyArray<Field>>) {
    if (fields.length === 0 || fields[0].length === 0) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_GRID,
        'Board must not be empty'
      );
    }
    const width = fields[0].length;
    fields.forEach((row, y) => {
      if (row.length !== width) {
        throw new BoardConstraintViolation(
          EngineErrorCode.BOARD_INVALID_GRID,
          'Board rows must all have the same width',
          { row: y, expected: width, actual: row.length }
        );
      }
      row.forEach((field, x) => {
        if (!Number.isInteger(field.fish) || field.fish < 0) {
          throw new BoardConstraintViolation(
            EngineErrorCode.BOARD_INVALID_GRID,
            'Fish counts must be non-negative integers',
            { x, y, fish: field.fish }
          );
        }
      });
    });
    this.fields = fields.map((row) => row.map(copyField));
  }

  /**
   * Build a board with no penguins from a grid of fish counts
   * (`fish[y][x]`, offset order).
   */
  static fromFish(fish: ReadonlyArray<ReadonlyArray<number>>): Board {
    return new Board(fish.map((row) => row.map((count) => ({ fish: count, penguin: null }))));
  }

  width(): number {
    return this.fields[0].length;
  }

  height(): number {
    return this.fields.length;
  }

  isOnBoard(coord: HexCoordinate): boolean {
    if (!Number.isInteger(coord.q) || !Number.isInteger(coord.r)) {
      return false;
    }
    const { x, y } = hexToOffset(coord);
    return x >= 0 && x < this.width() && y >= 0 && y < this.height();
  }

  getField(coord: HexCoordinate): Field {
    this.assertOnBoard(coord);
    const { x, y } = hexToOffset(coord);
    return this.fields[y][x];
  }

  /**
   * Penguins of one team, in row-major offset order.
   */
  getTeamsPenguins(team: TeamName): Penguin[] {
    const penguins: Penguin[] = [];
    for (const row of this.fields) {
      for (const field of row) {
        if (field.penguin && field.penguin.team === team) {
          penguins.push(field.penguin);
        }
      }
    }
    return penguins;
  }

  /**
   * Every slide available from `coord`: in each of the six directions, walk
   * while the next floe is on the board, unoccupied and still carries fish.
   */
  possibleSlidesFrom(coord: HexCoordinate, team: TeamName): SlideMove[] {
    const moves: SlideMove[] = [];
    for (const direction of HEX_DIRECTION_ORDER) {
      let next = addHex(coord, HEX_DIRECTIONS[direction]);
      while (this.isOnBoard(next)) {
        const field = this.getField(next);
        if (field.penguin || field.fish === 0) {
          break;
        }
        moves.push(createSlideMove(team, coord, next));
        next = addHex(next, HEX_DIRECTIONS[direction]);
      }
    }
    return moves;
  }

  /**
   * Apply a move: the destination floe is harvested and occupied by the
   * moving penguin; a slide also vacates its source. Legality is the
   * caller's concern.
   */
  move(move: Move): Board {
    this.assertOnBoard(move.to);

    const rows = this.fields.slice();
    const writeField = (coord: HexCoordinate, field: Field): void => {
      const { x, y } = hexToOffset(coord);
      const row = [...rows[y]];
      row[x] = field;
      rows[y] = row;
    };

    if (move.kind === 'slide') {
      const source = this.getField(move.from);
      if (!source.penguin || source.penguin.team !== move.team) {
        throw new InvalidState(
          EngineErrorCode.STATE_PENGUIN_NOT_FOUND,
          `No penguin of team ${move.team} at ${hexKey(move.from)}`,
          { from: move.from, team: move.team },
          'Board'
        );
      }
      writeField(move.from, EMPTY_FIELD);
    }

    writeField(move.to, {
      fish: 0,
      penguin: { coordinate: { q: move.to.q, r: move.to.r }, team: move.team },
    });

    return new Board(rows);
  }

  private assertOnBoard(coord: HexCoordinate): void {
    if (!this.isOnBoard(coord)) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_POSITION,
        `Coordinate ${hexKey(coord)} is outside the board`,
        { coordinate: coord, width: this.width(), height: this.height() }
      );
    }
  }

  /**
   * Fish grid in offset order, for serialization and display.
   */
  fishGrid(): number[][] {
    return this.fields.map((row) => row.map((field) => field.fish));
  }
}
