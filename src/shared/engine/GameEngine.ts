import {
  AcceptedMoveEvent,
  Coordinate,
  GameStatus,
  Mark,
  MoveEvent,
  PlayedMove,
  RejectedMoveEvent,
  formatCoordinate,
  isTerminalStatus,
  isValidCoordinate,
  otherMark,
} from '../types/game';
import { debugLog, isEngineDebugEnabled } from '../utils/envFlags';
import { Board, ReadonlyBoard } from './Board';
import { assertEngineState, rejectionToError } from './errors';
import { findWinningLine } from './lineDetection';
import { RulesOptions, resolveRulesOptions } from './rulesConfig';

export interface GameEngineOptions {
  rules?: Partial<RulesOptions>;
}

/**
 * Owns one game: the board, whose turn it is, and whether the game has
 * ended. Callers drive it one move at a time through {@link playMove} and
 * read everything else through the query methods; nothing outside the
 * engine can mutate its board.
 *
 * `playMove` is synchronous and runs validate → place → win-check →
 * transition to completion, so a placed-but-unevaluated cell is never
 * observable.
 */
export class GameEngine {
  private readonly board = new Board();
  private readonly rules: RulesOptions;
  private status: GameStatus;
  private moveCount = 0;
  private lastMove: PlayedMove | null = null;

  constructor(options: GameEngineOptions = {}) {
    this.rules = resolveRulesOptions(options.rules);
    this.status = { kind: 'in_progress', currentMark: this.rules.startingMark };
  }

  public getStatus(): GameStatus {
    return this.status;
  }

  /** Mark to move, or null once the game is over. */
  public getCurrentMark(): Mark | null {
    return this.status.kind === 'in_progress' ? this.status.currentMark : null;
  }

  public isGameOver(): boolean {
    return isTerminalStatus(this.status);
  }

  public getBoard(): ReadonlyBoard {
    return this.board;
  }

  public getRules(): Readonly<RulesOptions> {
    return this.rules;
  }

  public getMoveCount(): number {
    return this.moveCount;
  }

  public getLastMove(): PlayedMove | null {
    return this.lastMove;
  }

  public playMove(coordinate: Coordinate): MoveEvent {
    // 1. Validate
    const status = this.status;
    if (status.kind !== 'in_progress') {
      return this.reject(
        coordinate,
        'RULES_GAME_ALREADY_OVER',
        'The game is over; no further moves are accepted'
      );
    }
    if (!isValidCoordinate(coordinate)) {
      return this.reject(
        coordinate,
        'BOARD_INVALID_COORDINATE',
        `Coordinate ${formatCoordinate(coordinate)} must be a pair of safe integers`
      );
    }
    if (this.board.isOccupied(coordinate)) {
      return this.reject(
        coordinate,
        'RULES_CELL_OCCUPIED',
        `Cell ${formatCoordinate(coordinate)} is already occupied`
      );
    }

    // 2. Place. The engine keeps its own copy; `+ 0` turns -0 into 0.
    const target: Coordinate = { row: coordinate.row + 0, col: coordinate.col + 0 };
    const mark = status.currentMark;
    const placement = this.board.place(target, mark);
    assertEngineState(placement.success, 'Placement failed after occupancy check passed', {
      coordinate: target,
    });

    this.moveCount += 1;
    this.lastMove = { coordinate: { ...target }, mark, moveNumber: this.moveCount };

    // 3. Win check rooted at the placed cell
    const line = findWinningLine(this.board, target, mark, this.rules.winLength);

    // 4. Transition
    if (line) {
      this.status = { kind: 'won', winner: mark, line };
    } else if (this.rules.maxMoves !== undefined && this.moveCount >= this.rules.maxMoves) {
      this.status = { kind: 'draw', reason: 'move_limit', moveCount: this.moveCount };
    } else {
      this.status = { kind: 'in_progress', currentMark: otherMark(mark) };
    }

    const event: AcceptedMoveEvent = {
      type: 'MOVE_ACCEPTED',
      coordinate: { ...target },
      mark,
      moveNumber: this.moveCount,
      status: this.status,
    };
    debugLog(isEngineDebugEnabled(), '[GameEngine] move accepted', event);
    return event;
  }

  /**
   * Scripted-play variant of {@link playMove}: returns the accepted event or
   * throws the {@link EngineError} matching the rejection.
   */
  public playMoveOrThrow(coordinate: Coordinate): AcceptedMoveEvent {
    const event = this.playMove(coordinate);
    if (event.type === 'MOVE_REJECTED') {
      throw rejectionToError(event);
    }
    return event;
  }

  private reject(
    coordinate: Coordinate,
    code: RejectedMoveEvent['code'],
    reason: string
  ): RejectedMoveEvent {
    const event: RejectedMoveEvent = { type: 'MOVE_REJECTED', coordinate, code, reason };
    debugLog(isEngineDebugEnabled(), '[GameEngine] move rejected', event);
    return event;
  }
}
