import { Board } from '../../src/shared/engine/Board';
import { pos } from '../utils/fixtures';

describe('Board', () => {
  test('an empty board has no occupied cells and no bounds', () => {
    const board = new Board();

    expect(board.size).toBe(0);
    expect(board.isOccupied(pos(0, 0))).toBe(false);
    expect(board.getMark(pos(0, 0))).toBeUndefined();
    expect(board.getBounds()).toBeNull();
    expect([...board.entries()]).toEqual([]);
  });

  test('place stores the mark and answers occupancy queries', () => {
    const board = new Board();

    expect(board.place(pos(3, -4), 'player_one')).toEqual({ success: true });
    expect(board.isOccupied(pos(3, -4))).toBe(true);
    expect(board.getMark(pos(3, -4))).toBe('player_one');
    expect(board.isOccupied(pos(-4, 3))).toBe(false);
    expect(board.size).toBe(1);
  });

  test('placing on an occupied cell fails and leaves the original mark', () => {
    const board = new Board();
    board.place(pos(3, -4), 'player_one');

    const result = board.place(pos(3, -4), 'player_two');

    expect(result).toEqual({
      success: false,
      code: 'RULES_CELL_OCCUPIED',
      reason: 'Cell (3,-4) is already occupied',
    });
    expect(board.getMark(pos(3, -4))).toBe('player_one');
    expect(board.size).toBe(1);
  });

  test('cells far from the origin behave like cells near it', () => {
    const board = new Board();
    const far = pos(1_000_000_000_000, -1_000_000_000_000);

    board.place(far, 'player_two');

    expect(board.getMark(far)).toBe('player_two');
    expect(board.isOccupied(pos(1_000_000_000_000, -999_999_999_999))).toBe(false);
    expect(board.getBounds()).toEqual({
      minRow: 1_000_000_000_000,
      maxRow: 1_000_000_000_000,
      minCol: -1_000_000_000_000,
      maxCol: -1_000_000_000_000,
    });
  });

  test('bounds grow in every direction as marks are placed', () => {
    const board = new Board();
    const origin = pos(-6, 9);

    board.place(origin, 'player_one');
    expect(board.getBounds()).toEqual({ minRow: -6, maxRow: -6, minCol: 9, maxCol: 9 });

    board.place(pos(origin.row, origin.col + 1), 'player_two');
    expect(board.getBounds()).toEqual({ minRow: -6, maxRow: -6, minCol: 9, maxCol: 10 });

    board.place(pos(origin.row, origin.col - 3), 'player_one');
    expect(board.getBounds()).toEqual({ minRow: -6, maxRow: -6, minCol: 6, maxCol: 10 });

    board.place(pos(origin.row - 4, origin.col), 'player_two');
    expect(board.getBounds()).toEqual({ minRow: -10, maxRow: -6, minCol: 6, maxCol: 10 });

    board.place(pos(origin.row + 2, origin.col + 1), 'player_one');
    expect(board.getBounds()).toEqual({ minRow: -10, maxRow: -4, minCol: 6, maxCol: 10 });
  });

  test('getBounds returns a copy', () => {
    const board = new Board();
    board.place(pos(0, 0), 'player_one');

    const bounds = board.getBounds();
    if (bounds) bounds.maxRow = 100;

    expect(board.getBounds()).toEqual({ minRow: 0, maxRow: 0, minCol: 0, maxCol: 0 });
  });

  test('negative zero addresses the same cell as zero', () => {
    const board = new Board();
    board.place(pos(-0, -0), 'player_one');

    expect(board.isOccupied(pos(0, 0))).toBe(true);
    expect(board.place(pos(0, 0), 'player_two').success).toBe(false);
    expect(board.getBounds()?.minRow).toBe(0);
    expect(board.getBounds()?.minCol).toBe(0);
  });

  test('entries lists every occupied cell with its mark', () => {
    const board = new Board();
    board.place(pos(0, 0), 'player_one');
    board.place(pos(-2, 5), 'player_two');

    const entries = [...board.entries()].sort(([a], [b]) => a.row - b.row);

    expect(entries).toEqual([
      [pos(-2, 5), 'player_two'],
      [pos(0, 0), 'player_one'],
    ]);
  });
});
