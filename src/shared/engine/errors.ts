/**
 * Engine Domain Errors - Structured error types for the rules engine layer
 *
 * Error Categories:
 * - **InvalidMoveError**: A proposed move is not legal for the side to move
 * - **InvalidState**: Malformed snapshot or a broken internal invariant
 * - **BoardConstraintViolation**: Off-board coordinates, malformed grids
 *
 * Usage:
 * ```typescript
 * import { InvalidMoveError, EngineErrorCode } from './errors';
 *
 * throw new InvalidMoveError(EngineErrorCode.RULES_INVALID_MOVE, 'Move is not legal', {
 *   move: formatMove(move),
 * });
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine error codes.
 *
 * Error codes are prefixed by category:
 * - RULES_*: Game rule violations
 * - STATE_*: Game state corruption/inconsistency
 * - BOARD_*: Board geometry issues
 */
export enum EngineErrorCode {
  /** Move is not among the legal moves of the side to move */
  RULES_INVALID_MOVE = 'RULES_INVALID_MOVE',
  /** Move was declared by a team other than the side to move */
  RULES_NOT_YOUR_TURN = 'RULES_NOT_YOUR_TURN',

  /** Teams of a GameState are not linked to each other */
  STATE_TEAMS_NOT_LINKED = 'STATE_TEAMS_NOT_LINKED',
  /** Slide source holds no penguin of the moving team */
  STATE_PENGUIN_NOT_FOUND = 'STATE_PENGUIN_NOT_FOUND',
  /** Penguins a team owns differ from the penguins the board shows for it */
  STATE_PENGUINS_OUT_OF_SYNC = 'STATE_PENGUINS_OUT_OF_SYNC',
  /** Snapshot failed schema validation */
  STATE_MALFORMED_SNAPSHOT = 'STATE_MALFORMED_SNAPSHOT',

  /** Coordinate outside the board */
  BOARD_INVALID_POSITION = 'BOARD_INVALID_POSITION',
  /** Fish grid is empty, ragged or carries negative counts */
  BOARD_INVALID_GRID = 'BOARD_INVALID_GRID',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  RULES_: 'Game rule violation',
  STATE_: 'Corrupted or unexpected game state',
  BOARD_: 'Board geometry constraint violation',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'GameState', 'Board') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Thrown by `GameState.performMove` when the move is not legal for the side
 * to move, or is declared by the wrong team. The receiving state is left
 * untouched.
 */
export class InvalidMoveError extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'GameState'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidMoveError';
    Object.setPrototypeOf(this, InvalidMoveError.prototype);
  }
}

/**
 * Error for corrupted or unexpected game state.
 *
 * Examples:
 * - Teams handed to a GameState that are not linked to each other
 * - A snapshot that fails schema validation
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

/**
 * Error for board geometry violations (off-board coordinates, malformed
 * fish grids).
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isInvalidMoveError(error: unknown): error is InvalidMoveError {
  return error instanceof InvalidMoveError;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}
