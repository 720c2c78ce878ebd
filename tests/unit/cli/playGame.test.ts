import { GameEngine } from '../../../src/shared/engine/GameEngine';
import { RulesViolation } from '../../../src/shared/engine/errors';
import { DEMO_MOVES, HELP_TEXT, playGame, renderTurn, runDemo } from '../../../src/cli/playGame';
import { ScriptedIO, pos } from '../../utils/fixtures';

const OPTIONS = { viewportPadding: 1, maxViewportSize: 21 };

const EMPTY_TURN = [
  '⌜⎺⎺⎺⌝',
  '|   |',
  '|   |',
  '|   |',
  '⌞⎽⎽⎽⌟',
  'rows -1..1, cols -1..1',
  'Player One (x) to move',
  '',
].join('\n');

const AFTER_ORIGIN = [
  '⌜⎺⎺⎺⌝',
  '|   |',
  '| x |',
  '|   |',
  '⌞⎽⎽⎽⌟',
  'rows -1..1, cols -1..1',
  'Player Two (o) to move',
  '',
].join('\n');

describe('renderTurn', () => {
  test('shows the padded board, the visible area and the player to move', () => {
    const engine = new GameEngine();

    expect(renderTurn(engine, OPTIONS)).toBe(EMPTY_TURN);

    engine.playMove(pos(0, 0));
    expect(renderTurn(engine, OPTIONS)).toBe(AFTER_ORIGIN);
  });
});

describe('playGame', () => {
  test('plays moves until input ends and reports the game as abandoned', async () => {
    const engine = new GameEngine();
    const io = new ScriptedIO(['0,0']);

    const result = await playGame(engine, io, OPTIONS);

    expect(result).toEqual({
      outcome: 'abandoned',
      status: { kind: 'in_progress', currentMark: 'player_two' },
      moves: 1,
    });
    expect(io.prompts).toEqual(['Player One (x) > ', 'Player Two (o) > ']);
    expect(io.text).toBe(EMPTY_TURN + AFTER_ORIGIN);
  });

  test('a rejected move is reported and the same player is asked again', async () => {
    const engine = new GameEngine();
    const io = new ScriptedIO(['0,0', '0,0', 'quit']);

    const result = await playGame(engine, io, OPTIONS);

    expect(result.outcome).toBe('abandoned');
    expect(io.prompts).toEqual(['Player One (x) > ', 'Player Two (o) > ', 'Player Two (o) > ']);
    expect(io.text).toBe(EMPTY_TURN + AFTER_ORIGIN + 'Cell (0,0) is already occupied\n');
  });

  test('unparsable input is reported without reaching the engine', async () => {
    const engine = new GameEngine();
    const io = new ScriptedIO(['hello', 'q']);

    await playGame(engine, io, OPTIONS);

    expect(io.text).toBe(EMPTY_TURN + 'Expected "row,col" (for example "3,-2"), got "hello"\n');
    expect(engine.getMoveCount()).toBe(0);
  });

  test('blank lines re-prompt and help prints the help text', async () => {
    const engine = new GameEngine();
    const io = new ScriptedIO(['', '  ', 'HELP', '?', 'exit']);

    await playGame(engine, io, OPTIONS);

    expect(io.prompts).toHaveLength(5);
    expect(io.text).toBe(EMPTY_TURN + `${HELP_TEXT}\n` + `${HELP_TEXT}\n`);
  });

  test('stops as soon as a player wins', async () => {
    const engine = new GameEngine({ rules: { winLength: 3 } });
    const io = new ScriptedIO(['0,0', '5,5', '0,1', '5,6', '0,2', '9,9']);

    const result = await playGame(engine, io, OPTIONS);

    expect(result.outcome).toBe('finished');
    expect(result.moves).toBe(5);
    expect(result.status.kind).toBe('won');
    expect(io.remainingInputs).toBe(1);
    expect(io.text).toContain('\n| XXX     |\n');
    expect(io.text).toContain('\n|      oo |\n');
    expect(io.text.endsWith(
      'rows -1..6, cols -1..7\nPlayer One (x) wins with a horizontal line of 3 from (0,0) to (0,2)\n'
    )).toBe(true);
  });

  test('moves far apart on one axis draw a view limited to the size cap', async () => {
    const engine = new GameEngine();
    const io = new ScriptedIO(['0,0', '0,1000000000']);

    const result = await playGame(engine, io, { viewportPadding: 1, maxViewportSize: 5 });

    expect(result.outcome).toBe('abandoned');
    expect(result.moves).toBe(2);
    const farTurn = [
      '⌜⎺⎺⎺⎺⎺⌝',
      '|     |',
      '|   o |',
      '|     |',
      '⌞⎽⎽⎽⎽⎽⌟',
      'rows -1..1, cols 999999997..1000000001',
      'Player One (x) to move',
      '',
    ].join('\n');
    expect(io.text).toBe(EMPTY_TURN + AFTER_ORIGIN + farTurn);
  });

  test('moves far apart on both axes keep the view around the last move', async () => {
    const engine = new GameEngine();
    const io = new ScriptedIO(['0,0', '1000000000,-1000000000']);

    await playGame(engine, io, { viewportPadding: 1, maxViewportSize: 3 });

    const farTurn = [
      '⌜⎺⎺⎺⌝',
      '|   |',
      '| o |',
      '|   |',
      '⌞⎽⎽⎽⌟',
      'rows 999999999..1000000001, cols -1000000001..-999999999',
      'Player One (x) to move',
      '',
    ].join('\n');
    expect(io.text).toBe(EMPTY_TURN + AFTER_ORIGIN + farTurn);
  });

  test('a move-limit draw finishes the game', async () => {
    const engine = new GameEngine({ rules: { maxMoves: 2 } });
    const io = new ScriptedIO(['0,0', '3,3']);

    const result = await playGame(engine, io, OPTIONS);

    expect(result).toEqual({
      outcome: 'finished',
      status: { kind: 'draw', reason: 'move_limit', moveCount: 2 },
      moves: 2,
    });
    expect(io.text.endsWith('Draw after 2 moves (move limit reached)\n')).toBe(true);
  });
});

describe('runDemo', () => {
  test('replays the sample game to a win for player one', () => {
    const engine = new GameEngine();
    const io = new ScriptedIO([]);

    const result = runDemo(engine, io, OPTIONS);

    expect(result.outcome).toBe('finished');
    expect(result.moves).toBe(DEMO_MOVES.length);
    expect(io.text.startsWith('Move 1: Player One (x) plays (0,0)\n')).toBe(true);
    expect(io.text).toContain('Move 9: Player One (x) plays (0,2)\n');
    expect(io.text.match(/^Move \d+:/gm)).toHaveLength(9);
    expect(io.text.endsWith(
      'Player One (x) wins with a horizontal line of 5 from (0,0) to (0,4)\n'
    )).toBe(true);
  });

  test('an illegal scripted move surfaces as an engine error', () => {
    const engine = new GameEngine();
    engine.playMove(pos(0, 0));

    expect(() => runDemo(engine, new ScriptedIO([]), OPTIONS)).toThrow(RulesViolation);
  });
});
