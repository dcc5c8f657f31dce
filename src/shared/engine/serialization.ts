/**
 * ═══════════════════════════════════════════════════════════════════════════
 * Serialization Utilities for Game Snapshots
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Converts a GameState to and from a plain JSON-safe snapshot. Deserializing
 * is the construction entrypoint for states supplied from outside the engine
 * (a game server, a fixture file): the snapshot is validated with the zod
 * schemas in `validation/schemas.ts` before a GameState is built from it.
 */

import type { Field, HexCoordinate, Move, TeamName } from '../types/game';
import {
  GameStateSnapshotSchema,
  type GameStateSnapshotInput,
  type TeamSnapshotInput,
} from '../validation/schemas';
import { Board } from './board';
import { hexKey, hexToOffset } from './coordinates';
import { BoardConstraintViolation, EngineErrorCode, InvalidState } from './errors';
import { GameState } from './GameState';
import { Team, type TeamInit } from './team';

export type SerializedTeam = TeamSnapshotInput;

export type SerializedGameState = GameStateSnapshotInput;

const copyMove = (move: Move): Move =>
  move.kind === 'place'
    ? { kind: 'place', team: move.team, to: { ...move.to } }
    : { kind: 'slide', team: move.team, from: { ...move.from }, to: { ...move.to } };

function serializeTeam(team: Team): SerializedTeam {
  return {
    name: team.name,
    penguins: team.penguins.map((penguin) => ({ ...penguin.coordinate })),
    fish: team.fish,
    moves: team.moves.map(copyMove),
  };
}

/**
 * Serialize a GameState to a plain object.
 */
export function serializeGameState(state: GameState): SerializedGameState {
  return {
    turn: state.turn,
    fish: state.board.fishGrid(),
    firstTeam: serializeTeam(state.firstTeam),
    secondTeam: serializeTeam(state.secondTeam),
    lastMove: state.lastMove ? copyMove(state.lastMove) : null,
  };
}

function buildBoard(
  fish: number[][],
  teams: ReadonlyArray<{ name: TeamName; penguins: HexCoordinate[] }>
): Board {
  const bounds = Board.fromFish(fish);
  const fields: Field[][] = fish.map((row) =>
    row.map((count) => ({ fish: count, penguin: null }))
  );

  for (const team of teams) {
    for (const coordinate of team.penguins) {
      if (!bounds.isOnBoard(coordinate)) {
        throw new BoardConstraintViolation(
          EngineErrorCode.BOARD_INVALID_POSITION,
          `Penguin of team ${team.name} at ${hexKey(coordinate)} is outside the board`,
          { team: team.name, coordinate }
        );
      }
      const { x, y } = hexToOffset(coordinate);
      if (fields[y][x].penguin) {
        throw new InvalidState(
          EngineErrorCode.STATE_MALFORMED_SNAPSHOT,
          `Two penguins share the floe ${hexKey(coordinate)}`,
          { coordinate },
          'Serialization'
        );
      }
      fields[y][x] = { fish: fields[y][x].fish, penguin: { coordinate, team: team.name } };
    }
  }

  return new Board(fields);
}

/**
 * Validate and deserialize a plain snapshot into a GameState.
 *
 * @throws InvalidState when the snapshot does not match the schema or
 *   places two penguins on one floe.
 * @throws BoardConstraintViolation when a penguin lies outside the board.
 */
export function deserializeGameState(data: unknown): GameState {
  const parsed = GameStateSnapshotSchema.safeParse(data);
  if (!parsed.success) {
    throw new InvalidState(
      EngineErrorCode.STATE_MALFORMED_SNAPSHOT,
      'Game state snapshot failed validation',
      {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      },
      'Serialization'
    );
  }

  const snapshot = parsed.data;
  const board = buildBoard(snapshot.fish, [snapshot.firstTeam, snapshot.secondTeam]);
  const [firstTeam, secondTeam] = Team.createPair(
    toTeamInit(snapshot.firstTeam),
    toTeamInit(snapshot.secondTeam)
  );

  return new GameState(board, snapshot.turn, firstTeam, secondTeam, snapshot.lastMove);
}

function toTeamInit(team: SerializedTeam): TeamInit {
  return {
    name: team.name,
    penguins: team.penguins.map((coordinate) => ({ coordinate, team: team.name })),
    fish: team.fish,
    moves: team.moves,
  };
}
