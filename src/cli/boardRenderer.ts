import type { ReadonlyBoard } from '../shared/engine';
import {
  BoardBounds,
  Coordinate,
  GameStatus,
  MARK_LABELS,
  MARK_SYMBOLS,
  coordinateToKey,
  formatCoordinate,
} from '../shared/types/game';

export interface RenderOptions {
  /** Area to draw. Defaults to the board bounds. */
  viewport?: BoardBounds | null;
  /** Empty cells added on every side of the viewport. */
  padding?: number;
  /** Cells drawn with an upper-case symbol, e.g. the winning line. */
  highlight?: readonly Coordinate[];
}

const FRAME = {
  topLeft: '⌜',
  topRight: '⌝',
  top: '⎺',
  bottomLeft: '⌞',
  bottomRight: '⌟',
  bottom: '⎽',
  side: '|',
  empty: ' ',
};

/** Grow `bounds` by `padding` on every side, staying inside the safe integer range. */
export function padBounds(bounds: BoardBounds, padding: number): BoardBounds {
  return {
    minRow: Math.max(bounds.minRow - padding, Number.MIN_SAFE_INTEGER),
    maxRow: Math.min(bounds.maxRow + padding, Number.MAX_SAFE_INTEGER),
    minCol: Math.max(bounds.minCol - padding, Number.MIN_SAFE_INTEGER),
    maxCol: Math.min(bounds.maxCol + padding, Number.MAX_SAFE_INTEGER),
  };
}

/**
 * Narrow `[min, max]` to at most `size` cells, centred on `centre` where
 * the span allows it and shifted inwards where it does not.
 */
function clampSpan(min: number, max: number, centre: number, size: number): [number, number] {
  if (max - min + 1 <= size) return [min, max];
  const start = Math.min(Math.max(centre - Math.floor((size - 1) / 2), min), max - size + 1);
  return [start, start + size - 1];
}

export interface ViewportLimit {
  /** Most rows, and most columns, the viewport may span. */
  maxSize: number;
  /** Cell kept in view when the occupied area is larger than `maxSize`. */
  focus?: Coordinate | null;
}

/**
 * Viewport the terminal shows: the occupied area plus `padding`, or a
 * square around the origin before the first move. With a `limit`, each
 * axis is cut down to `limit.maxSize` cells around the focus (by default
 * the middle of the area), so marks played far apart never produce a
 * drawing larger than the limit.
 */
export function viewportFor(
  board: ReadonlyBoard,
  padding: number,
  limit?: ViewportLimit
): BoardBounds {
  const bounds = board.getBounds() ?? { minRow: 0, maxRow: 0, minCol: 0, maxCol: 0 };
  const padded = padBounds(bounds, padding);
  if (!limit) return padded;

  const focus = limit.focus ?? {
    row: padded.minRow + Math.floor((padded.maxRow - padded.minRow) / 2),
    col: padded.minCol + Math.floor((padded.maxCol - padded.minCol) / 2),
  };
  const [minRow, maxRow] = clampSpan(padded.minRow, padded.maxRow, focus.row, limit.maxSize);
  const [minCol, maxCol] = clampSpan(padded.minCol, padded.maxCol, focus.col, limit.maxSize);
  return { minRow, maxRow, minCol, maxCol };
}

/**
 * Draw a finite window of the board inside a frame:
 *
 * ```
 * ⌜⎺⎺⌝
 * |oo|
 * |xx|
 * ⌞⎽⎽⌟
 * ```
 *
 * An empty board with no explicit viewport draws an empty frame.
 */
export function renderBoard(board: ReadonlyBoard, options: RenderOptions = {}): string {
  const base = options.viewport === undefined ? board.getBounds() : options.viewport;
  const viewport = base ? padBounds(base, options.padding ?? 0) : null;
  const highlighted = new Set((options.highlight ?? []).map(coordinateToKey));

  const width = viewport ? viewport.maxCol - viewport.minCol + 1 : 0;
  const lines: string[] = [FRAME.topLeft + FRAME.top.repeat(width) + FRAME.topRight];

  if (viewport) {
    for (let row = viewport.minRow; row <= viewport.maxRow; row++) {
      let line = FRAME.side;
      for (let col = viewport.minCol; col <= viewport.maxCol; col++) {
        const mark = board.getMark({ row, col });
        if (!mark) {
          line += FRAME.empty;
          continue;
        }
        const symbol = MARK_SYMBOLS[mark];
        line += highlighted.has(coordinateToKey({ row, col })) ? symbol.toUpperCase() : symbol;
      }
      lines.push(line + FRAME.side);
    }
  }

  lines.push(FRAME.bottomLeft + FRAME.bottom.repeat(width) + FRAME.bottomRight);
  return lines.join('\n');
}

export function describeViewport(viewport: BoardBounds): string {
  return `rows ${viewport.minRow}..${viewport.maxRow}, cols ${viewport.minCol}..${viewport.maxCol}`;
}

const AXIS_PHRASES = {
  horizontal: 'a horizontal',
  vertical: 'a vertical',
  diagonal: 'a diagonal',
  anti_diagonal: 'an anti-diagonal',
} as const;

export function describeStatus(status: GameStatus): string {
  switch (status.kind) {
    case 'in_progress':
      return `${MARK_LABELS[status.currentMark]} to move`;
    case 'won': {
      const { line } = status;
      const first = line.coordinates[0];
      const last = line.coordinates[line.coordinates.length - 1];
      const span =
        first && last ? ` from ${formatCoordinate(first)} to ${formatCoordinate(last)}` : '';
      return `${MARK_LABELS[status.winner]} wins with ${AXIS_PHRASES[line.axis]} line of ${line.length}${span}`;
    }
    case 'draw':
      return `Draw after ${status.moveCount} moves (move limit reached)`;
  }
}
