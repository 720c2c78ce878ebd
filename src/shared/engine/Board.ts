import {
  BoardBounds,
  Coordinate,
  Mark,
  coordinateToKey,
  keyToCoordinate,
} from '../types/game';

/**
 * Read-only view of a board, handed to presentation code and to the line
 * detector. Nothing holding a `ReadonlyBoard` can place marks.
 */
export interface ReadonlyBoard {
  readonly size: number;
  isOccupied(coordinate: Coordinate): boolean;
  getMark(coordinate: Coordinate): Mark | undefined;
  getBounds(): BoardBounds | null;
  entries(): IterableIterator<[Coordinate, Mark]>;
}

export type BoardPlacementResult =
  | { success: true }
  | { success: false; code: 'RULES_CELL_OCCUPIED'; reason: string };

/**
 * Sparse, unbounded grid. Cells live in a `Map` keyed by `"row,col"`, so
 * lookups and placements cost the same however far play has spread.
 * There is no removal: a board only grows during a game.
 */
export class Board implements ReadonlyBoard {
  private readonly cells = new Map<string, Mark>();
  private bounds: BoardBounds | null = null;

  get size(): number {
    return this.cells.size;
  }

  isOccupied(coordinate: Coordinate): boolean {
    return this.cells.has(coordinateToKey(coordinate));
  }

  getMark(coordinate: Coordinate): Mark | undefined {
    return this.cells.get(coordinateToKey(coordinate));
  }

  place(coordinate: Coordinate, mark: Mark): BoardPlacementResult {
    // `-0 + 0` is `0`; keeps stored coordinates free of negative zero.
    const normalized: Coordinate = { row: coordinate.row + 0, col: coordinate.col + 0 };
    const key = coordinateToKey(normalized);

    if (this.cells.has(key)) {
      return {
        success: false,
        code: 'RULES_CELL_OCCUPIED',
        reason: `Cell (${key}) is already occupied`,
      };
    }

    this.cells.set(key, mark);
    this.extendBounds(normalized);
    return { success: true };
  }

  getBounds(): BoardBounds | null {
    return this.bounds ? { ...this.bounds } : null;
  }

  *entries(): IterableIterator<[Coordinate, Mark]> {
    for (const [key, mark] of this.cells) {
      yield [keyToCoordinate(key), mark];
    }
  }

  private extendBounds({ row, col }: Coordinate): void {
    if (!this.bounds) {
      this.bounds = { minRow: row, maxRow: row, minCol: col, maxCol: col };
      return;
    }
    this.bounds.minRow = Math.min(this.bounds.minRow, row);
    this.bounds.maxRow = Math.max(this.bounds.maxRow, row);
    this.bounds.minCol = Math.min(this.bounds.minCol, col);
    this.bounds.maxCol = Math.max(this.bounds.maxCol, col);
  }
}
