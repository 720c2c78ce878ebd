import {
  Coordinate,
  LINE_AXES,
  LINE_DIRECTIONS,
  LineDirection,
  Mark,
  WinningLine,
} from '../types/game';
import type { ReadonlyBoard } from './Board';
import { getScanRadius } from './rulesConfig';

/**
 * Collect the run of `mark` cells through `origin` along `direction`.
 *
 * The origin itself is always included (the caller has just placed it).
 * From there the scan walks forward (`+direction`) and then backward
 * (`-direction`), stopping at the first empty cell, the first cell owned
 * by the other mark, or after `maxSteps` cells on that side.
 *
 * The returned coordinates are ordered from the backward end to the
 * forward end.
 */
export function findRunThrough(
  board: ReadonlyBoard,
  origin: Coordinate,
  mark: Mark,
  direction: LineDirection,
  maxSteps: number
): Coordinate[] {
  const run: Coordinate[] = [{ row: origin.row, col: origin.col }];

  const step = (current: Coordinate, sign: 1 | -1): Coordinate => ({
    row: current.row + sign * direction.dRow,
    col: current.col + sign * direction.dCol,
  });

  // Check forward direction
  let current = origin;
  for (let i = 0; i < maxSteps; i++) {
    const next = step(current, 1);
    if (board.getMark(next) !== mark) break;
    run.push(next);
    current = next;
  }

  // Check backward direction
  current = origin;
  for (let i = 0; i < maxSteps; i++) {
    const prev = step(current, -1);
    if (board.getMark(prev) !== mark) break;
    run.unshift(prev);
    current = prev;
  }

  return run;
}

/**
 * Origin-centred win check for the move just played at `origin`.
 *
 * Only the newly placed cell can complete a new line, so examining the four
 * axes through it is sufficient; the cost is at most
 * `8 * (winLength - 1)` lookups regardless of board size.
 *
 * Axes are examined in {@link LINE_AXES} order and the first qualifying run
 * is returned. Because no line of `winLength` existed before this move,
 * each side of the origin holds fewer than `winLength` cells, so the
 * bounded scan always yields the complete run.
 */
export function findWinningLine(
  board: ReadonlyBoard,
  origin: Coordinate,
  mark: Mark,
  winLength: number
): WinningLine | null {
  const radius = getScanRadius({ winLength });

  for (const axis of LINE_AXES) {
    const direction = LINE_DIRECTIONS[axis];
    const coordinates = findRunThrough(board, origin, mark, direction, radius);
    if (coordinates.length >= winLength) {
      return { mark, axis, direction, coordinates, length: coordinates.length };
    }
  }

  return null;
}

