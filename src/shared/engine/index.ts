// =============================================================================
// FIRST-TO-FIVE RULES ENGINE - PUBLIC API
// =============================================================================
// Hosts (the terminal CLI, tests) import from this file only.
// =============================================================================

// =============================================================================
// CORE TYPES (from src/shared/types/game.ts)
// =============================================================================

export type {
  Coordinate,
  Mark,
  LineAxis,
  LineDirection,
  WinningLine,
  BoardBounds,
  DrawReason,
  GameStatus,
  TerminalStatus,
  PlayedMove,
  MoveEvent,
  MoveRejectionCode,
  AcceptedMoveEvent,
  RejectedMoveEvent,
} from '../types/game';

export {
  MARK_SYMBOLS,
  MARK_LABELS,
  LINE_AXES,
  LINE_DIRECTIONS,
  otherMark,
  coordinateToKey,
  keyToCoordinate,
  isValidCoordinate,
  formatCoordinate,
  isTerminalStatus,
} from '../types/game';

// =============================================================================
// BOARD
// =============================================================================

export { Board } from './Board';
export type { ReadonlyBoard, BoardPlacementResult } from './Board';

// =============================================================================
// RULES & LINE DETECTION
// =============================================================================

export {
  DEFAULT_RULES,
  DEFAULT_WIN_LENGTH,
  MIN_WIN_LENGTH,
  MAX_WIN_LENGTH,
  resolveRulesOptions,
  getScanRadius,
} from './rulesConfig';
export type { RulesOptions } from './rulesConfig';

export { findRunThrough, findWinningLine } from './lineDetection';

// =============================================================================
// ENGINE
// =============================================================================

export { GameEngine } from './GameEngine';
export type { GameEngineOptions } from './GameEngine';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineErrorCode,
  EngineError,
  RulesViolation,
  InvalidState,
  BoardConstraintViolation,
  isEngineError,
  isRulesViolation,
  isInvalidState,
  isBoardConstraintViolation,
  getErrorCategory,
  rejectionToError,
  wrapEngineError,
} from './errors';
export type { EngineErrorJSON } from './errors';
