/**
 * Test suite for src/shared/engine/serialization.ts
 */

import {
  BoardConstraintViolation,
  EngineErrorCode,
  InvalidState,
} from '../../../src/shared/engine/errors';
import { createPlaceMove, createSlideMove } from '../../../src/shared/engine/moves';
import {
  deserializeGameState,
  serializeGameState,
  type SerializedGameState,
} from '../../../src/shared/engine/serialization';
import { createMovementPhaseState, hex } from '../../utils/fixtures';

function snapshot(overrides: Partial<SerializedGameState> = {}): SerializedGameState {
  return {
    turn: 0,
    fish: [
      [1, 1],
      [1, 1],
    ],
    firstTeam: { name: 'ONE', penguins: [], fish: 0, moves: [] },
    secondTeam: { name: 'TWO', penguins: [], fish: 0, moves: [] },
    lastMove: null,
    ...overrides,
  };
}

describe('serialization', () => {
  describe('serializeGameState', () => {
    it('should produce a plain snapshot', () => {
      expect(serializeGameState(createMovementPhaseState())).toEqual({
        turn: 8,
        fish: [
          [0, 0, 0, 0, 2],
          [0, 0, 0, 0, 3],
        ],
        firstTeam: {
          name: 'ONE',
          penguins: [hex(0, 0), hex(1, 0), hex(2, 0), hex(3, 0)],
          fish: 5,
          moves: [],
        },
        secondTeam: {
          name: 'TWO',
          penguins: [hex(0, 1), hex(1, 1), hex(2, 1), hex(3, 1)],
          fish: 4,
          moves: [],
        },
        lastMove: null,
      });
    });

    it('should record the last move and team histories', () => {
      const move = createSlideMove('ONE', hex(3, 0), hex(4, 0));
      const data = serializeGameState(createMovementPhaseState().performMove(move));

      expect(data.lastMove).toEqual(move);
      expect(data.firstTeam.moves).toEqual([move]);
      expect(data.firstTeam.fish).toBe(7);
      expect(data.fish[0]).toEqual([0, 0, 0, 0, 0]);
    });
  });

  describe('deserializeGameState', () => {
    it('should restore a state that serializes identically', () => {
      const state = createMovementPhaseState().performMove(
        createSlideMove('ONE', hex(3, 0), hex(4, 0))
      );
      const json = JSON.stringify(serializeGameState(state));

      const restored = deserializeGameState(JSON.parse(json));

      expect(serializeGameState(restored)).toEqual(serializeGameState(state));
      expect(restored.currentTeam?.name).toBe('TWO');
      expect(restored.possibleMoves).toEqual(state.possibleMoves);
      expect(restored.firstTeam.opponent).toBe(restored.secondTeam);
    });

    it('should place the penguins of both teams on the board', () => {
      const state = deserializeGameState(
        snapshot({
          firstTeam: { name: 'ONE', penguins: [hex(0, 0)], fish: 1, moves: [] },
          secondTeam: { name: 'TWO', penguins: [hex(0, 1)], fish: 1, moves: [] },
        })
      );

      expect(state.board.getField(hex(0, 0)).penguin).toEqual({
        coordinate: hex(0, 0),
        team: 'ONE',
      });
      expect(state.board.getField(hex(0, 1)).penguin).toEqual({
        coordinate: hex(0, 1),
        team: 'TWO',
      });
      expect(state.firstTeam.penguins).toEqual([{ coordinate: hex(0, 0), team: 'ONE' }]);
    });

    it('should keep a second team that starts the game', () => {
      const state = deserializeGameState(
        snapshot({
          firstTeam: { name: 'TWO', penguins: [], fish: 0, moves: [] },
          secondTeam: { name: 'ONE', penguins: [], fish: 0, moves: [] },
        })
      );

      expect(state.currentTeam?.name).toBe('TWO');
      expect(state.possibleMoves[0]).toEqual(createPlaceMove('TWO', hex(0, 0)));
    });

    it('should reject values that are not snapshots', () => {
      expect(() => deserializeGameState('not a state')).toThrow(InvalidState);
      expect(() => deserializeGameState(null)).toThrow('Game state snapshot failed validation');
    });

    it('should list schema issues in the error context', () => {
      expect(() => deserializeGameState(snapshot({ turn: -1 }))).toThrow(
        expect.objectContaining({
          code: EngineErrorCode.STATE_MALFORMED_SNAPSHOT,
          domain: 'Serialization',
          context: {
            issues: [{ path: 'turn', message: 'Number must be greater than or equal to 0' }],
          },
        })
      );
    });

    it('should reject two teams with the same name', () => {
      const data = snapshot({
        secondTeam: { name: 'ONE', penguins: [], fish: 0, moves: [] },
      });

      expect(() => deserializeGameState(data)).toThrow(
        expect.objectContaining({
          context: {
            issues: [{ path: 'secondTeam.name', message: 'Teams must have different names' }],
          },
        })
      );
    });

    it('should reject a team with more than four penguins', () => {
      const data = snapshot({
        fish: [[1, 1, 1, 1, 1]],
        firstTeam: {
          name: 'ONE',
          penguins: [hex(0, 0), hex(1, 0), hex(2, 0), hex(3, 0), hex(4, 0)],
          fish: 0,
          moves: [],
        },
      });

      expect(() => deserializeGameState(data)).toThrow(
        expect.objectContaining({
          context: {
            issues: [{ path: 'firstTeam.penguins', message: 'A team owns at most 4 penguins' }],
          },
        })
      );
    });

    it('should reject a penguin outside the board', () => {
      const data = snapshot({
        firstTeam: { name: 'ONE', penguins: [hex(5, 0)], fish: 0, moves: [] },
      });

      expect(() => deserializeGameState(data)).toThrow(BoardConstraintViolation);
      expect(() => deserializeGameState(data)).toThrow(
        'Penguin of team ONE at 5,0 is outside the board'
      );
    });

    it('should reject two penguins on one floe', () => {
      const data = snapshot({
        firstTeam: { name: 'ONE', penguins: [hex(0, 0)], fish: 0, moves: [] },
        secondTeam: { name: 'TWO', penguins: [hex(0, 0)], fish: 0, moves: [] },
      });

      expect(() => deserializeGameState(data)).toThrow('Two penguins share the floe 0,0');
    });

    it('should reject a ragged fish grid', () => {
      expect(() => deserializeGameState(snapshot({ fish: [[1, 1], [1]] }))).toThrow(
        expect.objectContaining({ code: EngineErrorCode.BOARD_INVALID_GRID })
      );
    });
  });
});
