/**
 * Team aggregate
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * One side of the game: its identity, the penguins it owns, the fish it has
 * harvested so far, the moves it has made, and its opponent within the same
 * GameState.
 *
 * Teams are read-only to every caller. The only mutations happen inside
 * `GameState.performMove`, on copies produced by {@link Team.clone} that no
 * other holder can see yet. A clone never carries an opponent link; the pair
 * is re-linked with {@link Team.link} so no link crosses generations.
 *
 * @module team
 */

import { PENGUINS_PER_TEAM, type Move, type Penguin, type TeamName } from '../types/game';
import { hexEquals, hexKey } from './coordinates';
import { EngineErrorCode, InvalidState } from './errors';

export interface TeamInit {
  name: TeamName;
  penguins?: readonly Penguin[];
  fish?: number;
  moves?: readonly Move[];
}

const copyPenguin = (penguin: Penguin): Penguin => ({
  coordinate: { q: penguin.coordinate.q, r: penguin.coordinate.r },
  team: penguin.team,
});

export class Team {
  readonly name: TeamName;
  private readonly ownedPenguins: Penguin[];
  private readonly history: Move[];
  private harvested: number;
  private linkedOpponent: Team | null = null;

  constructor(init: TeamInit) {
    const penguins = init.penguins ?? [];
    if (penguins.length > PENGUINS_PER_TEAM) {
      throw new InvalidState(
        EngineErrorCode.STATE_MALFORMED_SNAPSHOT,
        `Team ${init.name} cannot own more than ${PENGUINS_PER_TEAM} penguins`,
        { team: init.name, penguins: penguins.length },
        'Team'
      );
    }
    this.name = init.name;
    this.ownedPenguins = penguins.map(copyPenguin);
    this.history = [...(init.moves ?? [])];
    this.harvested = init.fish ?? 0;
  }

  /**
   * Build both teams of a game and link them to each other.
   */
  static createPair(first: TeamInit, second: TeamInit): [Team, Team] {
    const firstTeam = new Team(first);
    const secondTeam = new Team(second);
    Team.link(firstTeam, secondTeam);
    return [firstTeam, secondTeam];
  }

  static link(first: Team, second: Team): void {
    first.linkedOpponent = second;
    second.linkedOpponent = first;
  }

  get penguins(): readonly Penguin[] {
    return this.ownedPenguins;
  }

  /** Cumulative fish harvested by this team. */
  get fish(): number {
    return this.harvested;
  }

  get moves(): readonly Move[] {
    return this.history;
  }

  get opponent(): Team {
    if (!this.linkedOpponent) {
      throw new InvalidState(
        EngineErrorCode.STATE_TEAMS_NOT_LINKED,
        `Team ${this.name} has no linked opponent`,
        { team: this.name },
        'Team'
      );
    }
    return this.linkedOpponent;
  }

  /**
   * Value copy of identity, penguins, fish and history. The copy is
   * unlinked.
   */
  clone(): Team {
    return new Team({
      name: this.name,
      penguins: this.ownedPenguins,
      fish: this.harvested,
      moves: this.history,
    });
  }

  /**
   * Record a move made by this team: append it to the history, place or
   * relocate the penguin, and credit the harvested fish.
   *
   * Only `GameState.performMove` calls this, on a fresh clone.
   */
  applyMove(move: Move, harvestedFish: number): void {
    switch (move.kind) {
      case 'place': {
        if (this.ownedPenguins.length >= PENGUINS_PER_TEAM) {
          throw new InvalidState(
            EngineErrorCode.STATE_MALFORMED_SNAPSHOT,
            `Team ${this.name} has already placed ${PENGUINS_PER_TEAM} penguins`,
            { team: this.name },
            'Team'
          );
        }
        this.ownedPenguins.push({ coordinate: { q: move.to.q, r: move.to.r }, team: this.name });
        break;
      }
      case 'slide': {
        const index = this.ownedPenguins.findIndex((penguin) =>
          hexEquals(penguin.coordinate, move.from)
        );
        if (index === -1) {
          throw new InvalidState(
            EngineErrorCode.STATE_PENGUIN_NOT_FOUND,
            `Team ${this.name} owns no penguin at ${hexKey(move.from)}`,
            { team: this.name, from: move.from },
            'Team'
          );
        }
        this.ownedPenguins[index] = { coordinate: { q: move.to.q, r: move.to.r }, team: this.name };
        break;
      }
    }

    this.history.push(move);
    this.harvested += harvestedFish;
  }
}
