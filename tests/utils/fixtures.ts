/**
 * Test Fixtures and Utilities
 * Common boards and helper functions for engine tests
 */

import type { HexCoordinate, Move, TeamName } from '../../src/shared/types/game';
import { offsetToHex } from '../../src/shared/engine/coordinates';
import type { GameState } from '../../src/shared/engine/GameState';
import {
  deserializeGameState,
  serializeGameState,
  type SerializedGameState,
  type SerializedTeam,
} from '../../src/shared/engine/serialization';

/**
 * Axial coordinate helper
 */
export function hex(q: number, r: number): HexCoordinate {
  return { q, r };
}

/**
 * Axial coordinate of an offset grid cell
 */
export function at(x: number, y: number): HexCoordinate {
  return offsetToHex({ x, y });
}

export interface TestStateOptions {
  turn?: number;
  first?: Partial<SerializedTeam>;
  second?: Partial<SerializedTeam>;
  lastMove?: Move | null;
}

function team(name: TeamName, overrides: Partial<SerializedTeam> = {}): SerializedTeam {
  return { name, penguins: [], fish: 0, moves: [], ...overrides };
}

/**
 * Build a GameState from a fish grid (`fish[y][x]`) and per-team overrides.
 * The first team defaults to 'ONE', the second to 'TWO'.
 */
export function createTestState(fish: number[][], options: TestStateOptions = {}): GameState {
  return deserializeGameState({
    turn: options.turn ?? 0,
    fish,
    firstTeam: team('ONE', options.first),
    secondTeam: team('TWO', options.second),
    lastMove: options.lastMove ?? null,
  });
}

/**
 * Plain snapshot used to assert that a state was not mutated.
 */
export function snapshotOf(state: GameState): SerializedGameState {
  return serializeGameState(state);
}

/**
 * Movement-phase board, 5 wide and 2 tall. Team ONE fills x = 0..3 of row 0
 * and team TWO fills x = 0..3 of row 1; the only floes left carry 2 fish at
 * (4,0) and 3 fish at (4,1).
 *
 * - ONE can only slide (3,0) → (4,0).
 * - TWO can slide (3,1) → (4,1) or (3,1) → (4,0).
 */
export function createMovementPhaseState(turn: number = 8): GameState {
  return createTestState(
    [
      [0, 0, 0, 0, 2],
      [0, 0, 0, 0, 3],
    ],
    {
      turn,
      first: { penguins: [at(0, 0), at(1, 0), at(2, 0), at(3, 0)], fish: 5 },
      second: { penguins: [at(0, 1), at(1, 1), at(2, 1), at(3, 1)], fish: 4 },
    }
  );
}

/**
 * 4 wide, 3 tall. Row 0 carries one fish on every floe, row 1 is empty
 * water, and row 2 holds the four penguins of `blockedTeam`, none of which
 * can slide. The other team has no penguins and four placements.
 */
export function createBlockedTeamState(blockedTeam: 'first' | 'second', turn: number): GameState {
  const blocked = { penguins: [at(0, 2), at(1, 2), at(2, 2), at(3, 2)] };
  return createTestState(
    [
      [1, 1, 1, 1],
      [0, 0, 0, 0],
      [0, 0, 0, 0],
    ],
    {
      turn,
      first: blockedTeam === 'first' ? blocked : {},
      second: blockedTeam === 'second' ? blocked : {},
    }
  );
}
