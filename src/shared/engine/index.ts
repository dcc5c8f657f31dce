// =============================================================================
// FLOE RULES ENGINE - PUBLIC API
// =============================================================================
// Hosts (search routines, protocol clients, tools) should only import from
// this file.
// =============================================================================

// =============================================================================
// CORE TYPES
// =============================================================================

export type {
  TeamName,
  HexCoordinate,
  OffsetCoordinate,
  Penguin,
  Field,
  Move,
  PlaceMove,
  SlideMove,
} from '../types/game';
export {
  TEAM_NAMES,
  PENGUINS_PER_TEAM,
  otherTeamName,
} from '../types/game';

// =============================================================================
// GAME STATE
// =============================================================================

export { GameState } from './GameState';
export { Team, type TeamInit } from './team';
export { Board } from './board';
export { createInitialGameState } from './initialState';
export { resolveTurnSide, roundForTurn, type TurnSide } from './turnLogic';

// =============================================================================
// COORDINATES & MOVES
// =============================================================================

export {
  HEX_DIRECTIONS,
  HEX_DIRECTION_ORDER,
  type HexDirection,
  offsetToHex,
  hexToOffset,
  addHex,
  hexEquals,
  neighbour,
  hexKey,
} from './coordinates';
export {
  createPlaceMove,
  createSlideMove,
  moveSource,
  movesEqual,
  moveKey,
  containsMove,
} from './moves';
export {
  formatCoordinate,
  formatMove,
  formatMoveList,
  describeGameState,
  type MoveNotationOptions,
} from './notation';

// =============================================================================
// SERIALIZATION
// =============================================================================

export {
  serializeGameState,
  deserializeGameState,
  type SerializedGameState,
  type SerializedTeam,
} from './serialization';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineError,
  EngineErrorCode,
  InvalidMoveError,
  InvalidState,
  BoardConstraintViolation,
  isEngineError,
  isInvalidMoveError,
  isInvalidState,
  isBoardConstraintViolation,
  type EngineErrorJSON,
} from './errors';
