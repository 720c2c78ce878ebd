/**
 * Test Fixtures and Utilities
 * Common test data and helper functions for first-to-five tests
 */

import { Board, ReadonlyBoard } from '../../src/shared/engine/Board';
import { GameEngine } from '../../src/shared/engine/GameEngine';
import {
  Coordinate,
  LINE_AXES,
  LINE_DIRECTIONS,
  Mark,
  MoveEvent,
  coordinateToKey,
} from '../../src/shared/types/game';
import type { GameIO } from '../../src/cli/playGame';

/**
 * Coordinate helper
 */
export function pos(row: number, col: number): Coordinate {
  return { row, col };
}

/**
 * Build a board from rows of template characters:
 * `.` empty, `x` player_one, `o` player_two.
 *
 * Row `i`, column `j` of the template lands at
 * `(origin.row + i, origin.col + j)`.
 *
 * @example
 * createBoardFromTemplate([
 *   '.x..',
 *   '.x..',
 *   '.x..',
 * ]);
 */
export function createBoardFromTemplate(rows: string[], origin: Coordinate = pos(0, 0)): Board {
  const board = new Board();
  const width = rows[0]?.length ?? 0;

  rows.forEach((line, i) => {
    if (line.length !== width) {
      throw new Error(
        `All template rows should have the same width. Row ${i + 1} has ${line.length}, expected ${width}`
      );
    }
    [...line].forEach((character, j) => {
      const coordinate = pos(origin.row + i, origin.col + j);
      switch (character) {
        case '.':
          break;
        case 'x':
          board.place(coordinate, 'player_one');
          break;
        case 'o':
          board.place(coordinate, 'player_two');
          break;
        default:
          throw new Error(`Invalid template character: '${character}'`);
      }
    });
  });

  return board;
}

/**
 * Play every coordinate in order, returning each event.
 */
export function playMoves(engine: GameEngine, moves: Coordinate[]): MoveEvent[] {
  return moves.map((move) => engine.playMove(move));
}

/**
 * Interleave two players' moves: first[0], second[0], first[1], ...
 * Extra moves of the longer list are appended at the end.
 */
export function interleave(first: Coordinate[], second: Coordinate[]): Coordinate[] {
  const result: Coordinate[] = [];
  for (let i = 0; i < Math.max(first.length, second.length); i++) {
    const a = first[i];
    const b = second[i];
    if (a) result.push(a);
    if (b) result.push(b);
  }
  return result;
}

/**
 * Exhaustive reference check: is there any run of `winLength` same-mark
 * cells anywhere on the board? Scans forward from every occupied cell, so
 * it is only suitable for the small boards tests build.
 */
export function hasAnyLine(board: ReadonlyBoard, winLength: number): Mark | null {
  for (const [origin, mark] of board.entries()) {
    for (const axis of LINE_AXES) {
      const { dRow, dCol } = LINE_DIRECTIONS[axis];
      let length = 1;
      while (
        length < winLength &&
        board.getMark(pos(origin.row + dRow * length, origin.col + dCol * length)) === mark
      ) {
        length++;
      }
      if (length >= winLength) return mark;
    }
  }
  return null;
}

export function keysOf(coordinates: Coordinate[]): string[] {
  return coordinates.map(coordinateToKey);
}

/**
 * Scripted stand-in for the terminal. Each `readLine` consumes the next
 * scripted input; once the script runs out it reports end of input.
 */
export class ScriptedIO implements GameIO {
  readonly prompts: string[] = [];
  private readonly output: string[] = [];
  private readonly inputs: string[];

  constructor(inputs: string[]) {
    this.inputs = [...inputs];
  }

  async readLine(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    return this.inputs.shift() ?? null;
  }

  write(text: string): void {
    this.output.push(text);
  }

  get text(): string {
    return this.output.join('');
  }

  get remainingInputs(): number {
    return this.inputs.length;
  }
}
