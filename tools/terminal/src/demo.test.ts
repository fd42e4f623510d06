import { GameState } from 'hjkl-snake';
import { describe, expect, it } from 'vitest';
import { runDemo } from './demo.js';

describe('runDemo', () => {
  it('should print the board before each tick and the result after', () => {
    const game = new GameState({ width: 10, height: 8, initialLength: 3 }, { random: { nextInt: () => 0 } });
    const lines: string[] = [];

    const results = runDemo(game, 2, (line) => lines.push(line));

    const rule = '='.repeat(31);
    const board = (row: string): string =>
      ['8.........', '..........', '..........', '..........', row, '..........', '..........', '..........'].join('\n');

    expect(lines).toEqual([
      rule,
      board('...888....'),
      rule,
      'ateFood=false status=running score=0',
      rule,
      board('....888...'),
      rule,
      'ateFood=false status=running score=0',
    ]);
    expect(results).toHaveLength(2);
    expect(game.head()).toEqual({ x: 7, y: 4 });
  });

  it('should report death and keep going without moving', () => {
    const game = new GameState({ width: 4, height: 4, initialLength: 1 }, { random: { nextInt: () => 0 } });
    const results = runDemo(game, 3, () => {});
    expect(results.map((r) => r.status)).toEqual(['running', 'dead', 'dead']);
  });

  it('should print nothing for zero ticks', () => {
    const game = new GameState({ width: 4, height: 4, initialLength: 1 }, { seed: 3 });
    const lines: string[] = [];
    expect(runDemo(game, 0, (line) => lines.push(line))).toEqual([]);
    expect(lines).toEqual([]);
  });
});
