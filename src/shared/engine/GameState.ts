import {
  PENGUINS_PER_TEAM,
  type Move,
  type Penguin,
  type PlaceMove,
  type TeamName,
} from '../types/game';
import { logger } from '../utils/logger';
import type { Board } from './board';
import { hexEquals, offsetToHex } from './coordinates';
import { EngineErrorCode, InvalidMoveError, InvalidState } from './errors';
import { containsMove, createPlaceMove } from './moves';
import { describeGameState, formatMove } from './notation';
import { Team } from './team';
import { resolveTurnSide, roundForTurn } from './turnLogic';

function penguinsMatchBoard(board: Board, team: Team): boolean {
  const onBoard = board.getTeamsPenguins(team.name);
  const owned = team.penguins;
  return (
    onBoard.length === owned.length &&
    owned.every((penguin) => onBoard.some((p) => hexEquals(p.coordinate, penguin.coordinate))) &&
    onBoard.every((penguin) => owned.some((p) => hexEquals(p.coordinate, penguin.coordinate)))
  );
}

/**
 * A snapshot of the game between two moves: the board, both teams, the
 * turn counter and the last move made.
 *
 * GameState is immutable. {@link GameState.performMove} returns a brand-new
 * state whose board and teams are independent of this one, so a search can
 * expand several branches from a shared ancestor (in parallel, too) without
 * copying it first.
 *
 * The constructor rejects teams that are not linked to each other or whose
 * penguins disagree with the board.
 *
 * The side to move is derived, never stored: see {@link GameState.currentTeam}.
 * A state in which neither team can move is terminal; `currentTeam` is then
 * `undefined` and `possibleMoves` is empty.
 */
export class GameState {
  readonly board: Board;
  readonly turn: number;
  readonly firstTeam: Team;
  readonly secondTeam: Team;
  readonly lastMove: Move | null;

  constructor(
    board: Board,
    turn: number,
    firstTeam: Team,
    secondTeam: Team,
    lastMove: Move | null = null
  ) {
    if (!Number.isInteger(turn) || turn < 0) {
      throw new InvalidState(
        EngineErrorCode.STATE_MALFORMED_SNAPSHOT,
        'Turn must be a non-negative integer',
        { turn },
        'GameState'
      );
    }
    if (firstTeam.name === secondTeam.name) {
      throw new InvalidState(
        EngineErrorCode.STATE_MALFORMED_SNAPSHOT,
        `Both teams are named ${firstTeam.name}`,
        { team: firstTeam.name },
        'GameState'
      );
    }
    if (firstTeam.opponent !== secondTeam || secondTeam.opponent !== firstTeam) {
      throw new InvalidState(
        EngineErrorCode.STATE_TEAMS_NOT_LINKED,
        'Teams of a game state must be linked to each other',
        { first: firstTeam.name, second: secondTeam.name },
        'GameState'
      );
    }

    for (const team of [firstTeam, secondTeam]) {
      if (!penguinsMatchBoard(board, team)) {
        throw new InvalidState(
          EngineErrorCode.STATE_PENGUINS_OUT_OF_SYNC,
          `Penguins of team ${team.name} do not match the board`,
          {
            team: team.name,
            owned: team.penguins.map((penguin) => penguin.coordinate),
            onBoard: board.getTeamsPenguins(team.name).map((penguin) => penguin.coordinate),
          },
          'GameState'
        );
      }
    }

    this.board = board;
    this.turn = turn;
    this.firstTeam = firstTeam;
    this.secondTeam = secondTeam;
    this.lastMove = lastMove;
  }

  get round(): number {
    return roundForTurn(this.turn);
  }

  /** The team to move, or `undefined` when neither team can move. */
  get currentTeam(): Team | undefined {
    return this.currentTeamFromTurn(this.turn);
  }

  get otherTeam(): Team | undefined {
    return this.currentTeam?.opponent;
  }

  get isTerminal(): boolean {
    return this.currentTeam === undefined;
  }

  /** Penguins on the board belonging to the team to move. */
  get currentPenguins(): Penguin[] {
    const current = this.currentTeam;
    return current ? this.board.getTeamsPenguins(current.name) : [];
  }

  /** Legal moves for the team to move; empty in a terminal state. */
  get possibleMoves(): Move[] {
    const current = this.currentTeam;
    return current ? this.getPossibleMoves(current) : [];
  }

  teamByName(name: TeamName): Team {
    return this.firstTeam.name === name ? this.firstTeam : this.secondTeam;
  }

  /**
   * All legal moves for `team` in this state, regardless of whose turn it
   * is.
   *
   * While the team has fewer than four penguins on the board, these are
   * placements on every free floe carrying exactly one fish. Afterwards,
   * the union of the slides available to each of its penguins.
   */
  getPossibleMoves(team: Team): Move[] {
    const penguins = this.board.getTeamsPenguins(team.name);

    if (penguins.length < PENGUINS_PER_TEAM) {
      const placements: PlaceMove[] = [];
      for (let x = 0; x < this.board.width(); x++) {
        for (let y = 0; y < this.board.height(); y++) {
          const coordinate = offsetToHex({ x, y });
          const field = this.board.getField(coordinate);
          if (!field.penguin && field.fish === 1) {
            placements.push(createPlaceMove(team.name, coordinate));
          }
        }
      }
      return placements;
    }

    return penguins.flatMap((penguin) =>
      this.board.possibleSlidesFrom(penguin.coordinate, team.name)
    );
  }

  /**
   * The team to move at `turn`, evaluated against this state's board.
   * A team without legal moves is skipped; `undefined` when neither team
   * can move.
   */
  currentTeamFromTurn(turn: number): Team | undefined {
    const side = resolveTurnSide(
      turn,
      this.getPossibleMoves(this.firstTeam).length > 0,
      this.getPossibleMoves(this.secondTeam).length > 0
    );
    switch (side) {
      case 'first':
        return this.firstTeam;
      case 'second':
        return this.secondTeam;
      case undefined:
        return undefined;
    }
  }

  /**
   * A move is valid when it is one of the current team's legal moves and
   * is declared by that team.
   */
  isValidMove(move: Move): boolean {
    const current = this.currentTeam;
    if (!current || move.team !== current.name) {
      return false;
    }
    return containsMove(this.getPossibleMoves(current), move);
  }

  /**
   * Returns the team linked as opponent of `team` (default: the team to
   * move), or `undefined` when the state is terminal and no team is given.
   */
  opponent(team?: Team): Team | undefined {
    return (team ?? this.currentTeam)?.opponent;
  }

  /**
   * Apply `move` and return the successor state. This state is not
   * modified.
   *
   * @throws InvalidMoveError when the move is not legal for the team to
   *   move or is declared by another team.
   */
  performMove(move: Move): GameState {
    const current = this.currentTeam;
    this.assertValidMove(move, current);

    const harvestedFish = this.board.getField(move.to).fish;
    const newBoard = this.board.move(move);

    const newFirstTeam = this.firstTeam.clone();
    const newSecondTeam = this.secondTeam.clone();
    const mover = newFirstTeam.name === current.name ? newFirstTeam : newSecondTeam;
    mover.applyMove(move, harvestedFish);
    Team.link(newFirstTeam, newSecondTeam);

    logger.debug('Applied move', {
      move: formatMove(move),
      turn: this.turn,
      fish: harvestedFish,
    });

    return new GameState(newBoard, this.turn + 1, newFirstTeam, newSecondTeam, move);
  }

  toString(): string {
    return describeGameState(this);
  }

  private assertValidMove(move: Move, current: Team | undefined): asserts current is Team {
    let error: InvalidMoveError | null = null;
    const context = {
      move: formatMove(move),
      turn: this.turn,
      currentTeam: current?.name ?? null,
    };

    if (!current) {
      error = new InvalidMoveError(
        EngineErrorCode.RULES_INVALID_MOVE,
        `No team can move; invalid move attempted: ${formatMove(move)}`,
        context
      );
    } else if (move.team !== current.name) {
      error = new InvalidMoveError(
        EngineErrorCode.RULES_NOT_YOUR_TURN,
        `Move declared by ${move.team} but ${current.name} is to move: ${formatMove(move)}`,
        context
      );
    } else if (!containsMove(this.getPossibleMoves(current), move)) {
      error = new InvalidMoveError(
        EngineErrorCode.RULES_INVALID_MOVE,
        `Invalid move attempted: ${formatMove(move)}`,
        context
      );
    }

    if (error) {
      logger.error('Performed invalid move while simulating', {
        error,
        state: describeGameState(this),
      });
      throw error;
    }
  }
}
