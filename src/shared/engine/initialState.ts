import { otherTeamName, type TeamName } from '../types/game';
import { Board } from './board';
import { GameState } from './GameState';
import { Team } from './team';

/**
 * Creates a pristine initial GameState: turn 0, no penguins placed, no fish
 * harvested.
 *
 * @param fish - Fish count per floe in offset order (`fish[y][x]`)
 * @param startingTeam - Team that moves first (default 'ONE')
 */
export function createInitialGameState(
  fish: ReadonlyArray<ReadonlyArray<number>>,
  startingTeam: TeamName = 'ONE'
): GameState {
  const board = Board.fromFish(fish);
  const [firstTeam, secondTeam] = Team.createPair(
    { name: startingTeam },
    { name: otherTeamName(startingTeam) }
  );
  return new GameState(board, 0, firstTeam, secondTeam, null);
}
