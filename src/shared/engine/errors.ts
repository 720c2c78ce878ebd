/**
 * Engine Domain Errors - Structured error types for the rules engine layer
 *
 * Expected move failures (occupied cell, game already over, malformed
 * coordinate) are reported by {@link GameEngine.playMove} as `MOVE_REJECTED`
 * values and never thrown. The classes here cover the places where an
 * exception is the contract:
 *
 * - `playMoveOrThrow`, used by scripted play, converts a rejection into a
 *   {@link RulesViolation} or {@link BoardConstraintViolation}.
 * - Rules options are validated eagerly and throw on bad values.
 * - Internal assertions throw {@link InvalidState}.
 *
 * Usage:
 * ```typescript
 * import { RulesViolation, EngineErrorCode } from './errors';
 *
 * throw new RulesViolation(
 *   EngineErrorCode.RULES_CELL_OCCUPIED,
 *   'Cell (0,0) is already occupied',
 *   { coordinate: { row: 0, col: 0 } }
 * );
 * ```
 *
 * @module EngineErrors
 */

import type { RejectedMoveEvent } from '../types/game';

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - RULES_*: Game rule violations
 * - STATE_*: Game state corruption/inconsistency
 * - BOARD_*: Coordinate/board issues
 * - INTERNAL_*: Bugs
 */
export enum EngineErrorCode {
  /** Target cell already holds a mark */
  RULES_CELL_OCCUPIED = 'RULES_CELL_OCCUPIED',
  /** A move was submitted after the game reached a terminal state */
  RULES_GAME_ALREADY_OVER = 'RULES_GAME_ALREADY_OVER',
  /** Rules options outside their allowed range */
  RULES_INVALID_OPTIONS = 'RULES_INVALID_OPTIONS',

  /** Engine status and board disagree */
  STATE_INCONSISTENT = 'STATE_INCONSISTENT',

  /** Coordinate components are not safe integers */
  BOARD_INVALID_COORDINATE = 'BOARD_INVALID_COORDINATE',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  RULES_: 'Game rule violation',
  STATE_: 'Corrupted or unexpected game state',
  BOARD_: 'Board coordinate violation',
  INTERNAL_: 'Internal engine error (bug)',
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

  /** Domain that generated the error (e.g., 'GameEngine', 'Rules') */
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
    return getErrorCategory(this.code);
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

/**
 * JSON representation of an EngineError.
 */
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
 * Error for game rule violations: occupied cells, moves after the game
 * ended, and out-of-range rules options.
 */
export class RulesViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Rules'
  ) {
    super(code, message, context, domain);
    this.name = 'RulesViolation';
    Object.setPrototypeOf(this, RulesViolation.prototype);
  }
}

/**
 * Error for corrupted or unexpected game state. Seeing one of these means
 * the engine has a bug.
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
 * Error for coordinates the board cannot address (non-integer or beyond
 * the safe integer range).
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

export function isRulesViolation(error: unknown): error is RulesViolation {
  return error instanceof RulesViolation;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

// =============================================================================
// UTILITIES
// =============================================================================

export function getErrorCategory(code: EngineErrorCode): string {
  const prefix = code.split('_')[0] + '_';
  return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
}

/**
 * Convert a rejected move into the matching error class. Board-level
 * rejections become {@link BoardConstraintViolation}; everything else is a
 * {@link RulesViolation}.
 */
export function rejectionToError(
  rejection: RejectedMoveEvent,
  domain: string = 'GameEngine'
): EngineError {
  const code = EngineErrorCode[rejection.code];
  const context = { coordinate: rejection.coordinate };

  if (code === EngineErrorCode.BOARD_INVALID_COORDINATE) {
    return new BoardConstraintViolation(code, rejection.reason, context, domain);
  }
  return new RulesViolation(code, rejection.reason, context, domain);
}

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    { ...context, originalStack: stack },
    domain
  );
}

/**
 * Throw an {@link InvalidState} when `condition` is false.
 */
export function assertEngineState(
  condition: boolean,
  message: string,
  context: Record<string, unknown> = {}
): asserts condition {
  if (!condition) {
    throw new InvalidState(EngineErrorCode.STATE_INCONSISTENT, message, context, 'GameEngine');
  }
}
