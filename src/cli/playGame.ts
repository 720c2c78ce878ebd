import { GameEngine } from '../shared/engine';
import type { Coordinate, GameStatus } from '../shared/types/game';
import { MARK_LABELS, formatCoordinate, isTerminalStatus } from '../shared/types/game';
import { describeStatus, describeViewport, renderBoard, viewportFor } from './boardRenderer';
import { parseCoordinate } from './coordinateParser';
import { logger } from './utils/logger';

/**
 * Line-oriented terminal, abstracted so the loop runs against readline in
 * production and a scripted fake in tests.
 */
export interface GameIO {
  /** Resolve with the next line, or null once input has ended. */
  readLine(prompt: string): Promise<string | null>;
  write(text: string): void;
}

export interface PlayGameOptions {
  viewportPadding: number;
  /** Most rows and columns drawn per turn; the view follows the last move. */
  maxViewportSize: number;
}

export interface GameSessionResult {
  /** `finished` when the engine reached a terminal state. */
  outcome: 'finished' | 'abandoned';
  status: GameStatus;
  moves: number;
}

const QUIT_COMMANDS = new Set(['quit', 'exit', 'q']);

export const HELP_TEXT = [
  'Enter a move as "row,col" (for example "0,0" or "-3,12").',
  'The board is unbounded; rows grow downwards and columns to the right.',
  'Commands: help, quit',
].join('\n');

/**
 * Board, visible area and status line for the current position. The
 * winning line, once there is one, is drawn in upper case.
 */
export function renderTurn(engine: GameEngine, options: PlayGameOptions): string {
  const board = engine.getBoard();
  const status = engine.getStatus();
  const viewport = viewportFor(board, options.viewportPadding, {
    maxSize: options.maxViewportSize,
    focus: engine.getLastMove()?.coordinate ?? null,
  });
  const highlight = status.kind === 'won' ? status.line.coordinates : [];

  return [
    renderBoard(board, { viewport, highlight }),
    describeViewport(viewport),
    describeStatus(status),
    '',
  ].join('\n');
}

function finish(engine: GameEngine, outcome: GameSessionResult['outcome']): GameSessionResult {
  const status = engine.getStatus();
  const result: GameSessionResult = { outcome, status, moves: engine.getMoveCount() };

  if (status.kind === 'won') {
    logger.info('Game won', {
      winner: status.winner,
      axis: status.line.axis,
      line: status.line.coordinates.map(formatCoordinate),
      moves: result.moves,
    });
  } else if (status.kind === 'draw') {
    logger.info('Game drawn', { reason: status.reason, moves: result.moves });
  } else {
    logger.info('Game abandoned', { moves: result.moves });
  }

  return result;
}

/**
 * Interactive loop: render, prompt the player to move, apply the move,
 * repeat until the game ends or input runs out. Rejected and unparsable
 * moves are reported and the same player is asked again.
 */
export async function playGame(
  engine: GameEngine,
  io: GameIO,
  options: PlayGameOptions
): Promise<GameSessionResult> {
  logger.info('Game started', { rules: engine.getRules() });
  io.write(renderTurn(engine, options));

  while (!isTerminalStatus(engine.getStatus())) {
    const mark = engine.getCurrentMark();
    if (!mark) break;

    const input = await io.readLine(`${MARK_LABELS[mark]} > `);
    if (input === null) {
      return finish(engine, 'abandoned');
    }

    const command = input.trim().toLowerCase();
    if (command === '') continue;
    if (QUIT_COMMANDS.has(command)) {
      return finish(engine, 'abandoned');
    }
    if (command === 'help' || command === '?') {
      io.write(`${HELP_TEXT}\n`);
      continue;
    }

    const parsed = parseCoordinate(input);
    if (!parsed.ok) {
      io.write(`${parsed.error}\n`);
      continue;
    }

    const event = engine.playMove(parsed.coordinate);
    if (event.type === 'MOVE_REJECTED') {
      logger.warn('Move rejected', {
        code: event.code,
        coordinate: formatCoordinate(event.coordinate),
      });
      io.write(`${event.reason}\n`);
      continue;
    }

    logger.debug('Move accepted', {
      mark: event.mark,
      coordinate: formatCoordinate(event.coordinate),
      moveNumber: event.moveNumber,
    });
    io.write(renderTurn(engine, options));
  }

  return finish(engine, 'finished');
}

/**
 * Sample game: Player One completes row 0 on the ninth move while Player
 * Two is building a broken diagonal.
 */
export const DEMO_MOVES: readonly Coordinate[] = [
  { row: 0, col: 0 },
  { row: 1, col: 2 },
  { row: 0, col: 1 },
  { row: 2, col: 3 },
  { row: 0, col: 4 },
  { row: 5, col: 6 },
  { row: 0, col: 3 },
  { row: 3, col: 4 },
  { row: 0, col: 2 },
];

/**
 * Replay {@link DEMO_MOVES}, printing the position after each one. Every
 * scripted move must be legal, so a rejection surfaces as an EngineError.
 */
export function runDemo(
  engine: GameEngine,
  io: Pick<GameIO, 'write'>,
  options: PlayGameOptions
): GameSessionResult {
  logger.info('Demo started', { moves: DEMO_MOVES.length });

  for (const coordinate of DEMO_MOVES) {
    if (engine.isGameOver()) break;
    const event = engine.playMoveOrThrow(coordinate);
    io.write(`Move ${event.moveNumber}: ${MARK_LABELS[event.mark]} plays ${formatCoordinate(coordinate)}\n`);
    io.write(renderTurn(engine, options));
  }

  return finish(engine, engine.isGameOver() ? 'finished' : 'abandoned');
}
