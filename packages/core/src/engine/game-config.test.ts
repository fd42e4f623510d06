import { describe, expect, it } from 'vitest';
import { SnakeError } from '../errors/index.js';
import { DEFAULT_GAME_CONFIG, type GameConfig, resolveGameConfig } from './game-config.js';

describe('resolveGameConfig', () => {
  it('should fill missing fields from defaults', () => {
    expect(resolveGameConfig()).toEqual({
      width: 40,
      height: 24,
      wrapEdges: false,
      initialLength: 4,
      brailleFriendly: true,
    });
  });

  it('should keep overrides', () => {
    const config = resolveGameConfig({ width: 10, height: 8, wrapEdges: true, initialLength: 3 });
    expect(config.width).toBe(10);
    expect(config.height).toBe(8);
    expect(config.wrapEdges).toBe(true);
    expect(config.initialLength).toBe(3);
    expect(config.brailleFriendly).toBe(DEFAULT_GAME_CONFIG.brailleFriendly);
  });

  it('should return a frozen config', () => {
    expect(Object.isFrozen(resolveGameConfig({ width: 12 }))).toBe(true);
  });

  const invalid: Array<[Partial<GameConfig>]> = [
    [{ width: 0 }],
    [{ width: -4 }],
    [{ width: 2.5 }],
    [{ height: 0 }],
    [{ height: Number.NaN }],
    [{ initialLength: 0 }],
    [{ initialLength: 1.5 }],
  ];

  it.each(invalid)('should reject %o', (overrides) => {
    expect(() => resolveGameConfig(overrides)).toThrow(SnakeError);
  });

  it('should report INVALID_CONFIG with context', () => {
    try {
      resolveGameConfig({ height: -1 });
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SnakeError);
      if (error instanceof SnakeError) {
        expect(error.code).toBe('INVALID_CONFIG');
        expect(error.context).toEqual({ height: -1 });
      }
    }
  });

  it('should reject an initial snake longer than half the board', () => {
    expect(() => resolveGameConfig({ width: 4, initialLength: 4 })).toThrow(/does not fit/);
    expect(resolveGameConfig({ width: 4, initialLength: 3 }).initialLength).toBe(3);
  });
});
