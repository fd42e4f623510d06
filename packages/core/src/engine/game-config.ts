import { SnakeError } from '../errors/index.js';

/** Board and start-up settings, fixed for the life of a game */
export interface GameConfig {
  readonly width: number;
  readonly height: number;
  /** Leaving one edge re-enters on the opposite edge instead of killing the snake */
  readonly wrapEdges: boolean;
  readonly initialLength: number;
  /** Rendering-density hint: front ends prefer 2x4 glyph packing when set. Ignored by the simulation. */
  readonly brailleFriendly: boolean;
}

export const DEFAULT_GAME_CONFIG: GameConfig = Object.freeze({
  width: 40,
  height: 24,
  wrapEdges: false,
  initialLength: 4,
  brailleFriendly: true,
});

/**
 * Merge overrides with the defaults and reject boards the engine cannot run on.
 *
 * The initial snake is laid out leftwards from the centre column, so it must
 * fit in `floor(width / 2) + 1` cells.
 *
 * @throws SnakeError INVALID_CONFIG
 */
export function resolveGameConfig(overrides: Partial<GameConfig> = {}): GameConfig {
  const config: GameConfig = {
    width: overrides.width ?? DEFAULT_GAME_CONFIG.width,
    height: overrides.height ?? DEFAULT_GAME_CONFIG.height,
    wrapEdges: overrides.wrapEdges ?? DEFAULT_GAME_CONFIG.wrapEdges,
    initialLength: overrides.initialLength ?? DEFAULT_GAME_CONFIG.initialLength,
    brailleFriendly: overrides.brailleFriendly ?? DEFAULT_GAME_CONFIG.brailleFriendly,
  };

  if (!Number.isInteger(config.width) || config.width <= 0) {
    throw new SnakeError('INVALID_CONFIG', `Board width must be a positive integer, got ${config.width}`, {
      width: config.width,
    });
  }
  if (!Number.isInteger(config.height) || config.height <= 0) {
    throw new SnakeError('INVALID_CONFIG', `Board height must be a positive integer, got ${config.height}`, {
      height: config.height,
    });
  }
  if (!Number.isInteger(config.initialLength) || config.initialLength < 1) {
    throw new SnakeError('INVALID_CONFIG', `Initial length must be at least 1, got ${config.initialLength}`, {
      initialLength: config.initialLength,
    });
  }

  const maxLength = Math.floor(config.width / 2) + 1;
  if (config.initialLength > maxLength) {
    throw new SnakeError(
      'INVALID_CONFIG',
      `Initial length ${config.initialLength} does not fit a board ${config.width} wide (max ${maxLength})`,
      { initialLength: config.initialLength, width: config.width },
    );
  }

  return Object.freeze(config);
}
