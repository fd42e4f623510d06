import { GameState, type GameSnapshot } from 'hjkl-snake';
import { describe, expect, it } from 'vitest';
import { composeFrame, renderBoard, renderFrame, renderMode, statusLine, tickIntervalMs } from './frame.js';

function gameWith(config: ConstructorParameters<typeof GameState>[0], snapshot: Partial<GameSnapshot>): GameState {
  const game = new GameState(config, { seed: 1 });
  const applied = game.applySnapshot({
    snake: [{ x: 0, y: 0 }],
    food: [],
    direction: 'right',
    pendingDirection: null,
    status: 'running',
    score: 0,
    ...snapshot,
  });
  expect(applied).toBe(true);
  return game;
}

describe('renderMode', () => {
  it('should pick braille when the board packs into whole glyphs', () => {
    const game = new GameState({ width: 4, height: 8, initialLength: 1 }, { seed: 1 });
    expect(renderMode(game.getConfig())).toBe('braille');
  });

  it('should fall back to ascii for odd sizes or when braille is off', () => {
    expect(renderMode(new GameState({ width: 5, height: 8, initialLength: 1 }, { seed: 1 }).getConfig())).toBe('ascii');
    expect(renderMode(new GameState({ width: 4, height: 6, initialLength: 1 }, { seed: 1 }).getConfig())).toBe('ascii');
    expect(
      renderMode(new GameState({ width: 4, height: 8, initialLength: 1, brailleFriendly: false }, { seed: 1 }).getConfig()),
    ).toBe('ascii');
  });
});

describe('renderBoard', () => {
  it('should draw braille glyphs', () => {
    const game = gameWith({ width: 4, height: 4, initialLength: 1 }, { snake: [{ x: 0, y: 1 }] });
    expect(renderBoard(game)).toBe('⠂⠀');
  });

  it('should draw ascii cells', () => {
    const game = gameWith({ width: 3, height: 2, initialLength: 1 }, { snake: [{ x: 1, y: 1 }], food: [{ x: 2, y: 0 }] });
    expect(renderBoard(game)).toBe('..8\n.8.');
  });
});

describe('statusLine', () => {
  it('should show the score', () => {
    const game = gameWith({ width: 4, height: 4, initialLength: 1 }, { score: 3 });
    expect(statusLine(game)).toBe('Score: 3');
  });

  it('should add restart hints after game over', () => {
    const game = gameWith({ width: 4, height: 4, initialLength: 1 }, { score: 2, status: 'dead' });
    expect(statusLine(game)).toBe('Score: 2 | GAME OVER (r: restart, q: quit)');
  });
});

describe('composeFrame', () => {
  it('should centre lines in the viewport', () => {
    expect(composeFrame(['ab', 'c'], { columns: 10, rows: 6 })).toBe('\n\n    ab\n    c ');
  });

  it('should not pad when the viewport is too small', () => {
    expect(composeFrame(['abc', 'd'], { columns: 2, rows: 1 })).toBe('abc\nd  ');
  });
});

describe('renderFrame', () => {
  it('should put the status line under the board', () => {
    const game = gameWith({ width: 4, height: 4, initialLength: 1 }, { snake: [{ x: 0, y: 1 }] });
    expect(renderFrame(game, { columns: 0, rows: 0 })).toBe('⠂⠀      \n        \nScore: 0');
  });
});

describe('tickIntervalMs', () => {
  it('should shorten the tick as the score grows', () => {
    expect(tickIntervalMs(150, 0)).toBe(150);
    expect(tickIntervalMs(150, 4)).toBe(130);
  });

  it('should not go below the floor', () => {
    expect(tickIntervalMs(150, 100)).toBe(50);
    expect(tickIntervalMs(30, 0)).toBe(50);
  });
});
