/**
 * Shared game types for the first-to-five engine.
 *
 * The board has no fixed extent: a {@link Coordinate} is any pair of safe
 * integers, and cells are identified by their string key (see
 * {@link coordinateToKey}) in the sparse board map.
 */

/** A cell on the unbounded grid. Rows grow downwards, columns to the right. */
export interface Coordinate {
  row: number;
  col: number;
}

/**
 * Ownership tag placed in a cell. There is deliberately no "empty" mark:
 * an empty cell is simply absent from the board.
 */
export type Mark = 'player_one' | 'player_two';

/** Single-character symbols used by text renderers. */
export const MARK_SYMBOLS: Record<Mark, string> = {
  player_one: 'x',
  player_two: 'o',
};

/** Human-facing names used in prompts and log output. */
export const MARK_LABELS: Record<Mark, string> = {
  player_one: 'Player One (x)',
  player_two: 'Player Two (o)',
};

/**
 * Unit step along one of the four line axes, expressed as
 * `(dRow, dCol)`.
 */
export interface LineDirection {
  dRow: -1 | 0 | 1;
  dCol: -1 | 0 | 1;
}

export type LineAxis = 'horizontal' | 'vertical' | 'diagonal' | 'anti_diagonal';

export const LINE_DIRECTIONS: Record<LineAxis, LineDirection> = {
  horizontal: { dRow: 0, dCol: 1 },
  vertical: { dRow: 1, dCol: 0 },
  diagonal: { dRow: 1, dCol: 1 },
  anti_diagonal: { dRow: 1, dCol: -1 },
};

/** Axes in the order the win check examines them. */
export const LINE_AXES: readonly LineAxis[] = [
  'horizontal',
  'vertical',
  'diagonal',
  'anti_diagonal',
] as const;

/**
 * A completed line. `coordinates` is the full contiguous run through the
 * winning move, ordered from the `-direction` end to the `+direction` end.
 */
export interface WinningLine {
  mark: Mark;
  axis: LineAxis;
  direction: LineDirection;
  coordinates: Coordinate[];
  length: number;
}

/** Inclusive rectangle covering every occupied cell. */
export interface BoardBounds {
  minRow: number;
  maxRow: number;
  minCol: number;
  maxCol: number;
}

export type DrawReason = 'move_limit';

export type GameStatus =
  | { kind: 'in_progress'; currentMark: Mark }
  | { kind: 'won'; winner: Mark; line: WinningLine }
  | { kind: 'draw'; reason: DrawReason; moveCount: number };

export type TerminalStatus = Exclude<GameStatus, { kind: 'in_progress' }>;

export interface PlayedMove {
  coordinate: Coordinate;
  mark: Mark;
  moveNumber: number;
}

export type MoveRejectionCode =
  | 'RULES_GAME_ALREADY_OVER'
  | 'RULES_CELL_OCCUPIED'
  | 'BOARD_INVALID_COORDINATE';

/**
 * Result of {@link GameEngine.playMove}. Rejections are ordinary values;
 * the engine state is untouched when one is returned.
 */
export type MoveEvent =
  | {
      type: 'MOVE_ACCEPTED';
      coordinate: Coordinate;
      mark: Mark;
      moveNumber: number;
      status: GameStatus;
    }
  | {
      type: 'MOVE_REJECTED';
      coordinate: Coordinate;
      code: MoveRejectionCode;
      reason: string;
    };

export type AcceptedMoveEvent = Extract<MoveEvent, { type: 'MOVE_ACCEPTED' }>;
export type RejectedMoveEvent = Extract<MoveEvent, { type: 'MOVE_REJECTED' }>;

export const otherMark = (mark: Mark): Mark =>
  mark === 'player_one' ? 'player_two' : 'player_one';

export const coordinateToKey = (coordinate: Coordinate): string =>
  `${coordinate.row},${coordinate.col}`;

export const keyToCoordinate = (key: string): Coordinate => {
  const [row, col] = key.split(',');
  return { row: Number(row), col: Number(col) };
};

export const isValidCoordinate = (coordinate: Coordinate): boolean =>
  Number.isSafeInteger(coordinate.row) && Number.isSafeInteger(coordinate.col);

export const formatCoordinate = (coordinate: Coordinate): string =>
  `(${coordinate.row},${coordinate.col})`;

export const isTerminalStatus = (status: GameStatus): status is TerminalStatus =>
  status.kind !== 'in_progress';
