export const HJKL_SNAKE_VERSION = '0.1.0';

export {
  GameState,
  DEFAULT_GAME_CONFIG,
  resolveGameConfig,
  DIRECTIONS,
  directionVector,
  isDirection,
  isOppositeDirection,
  pointKey,
  pointsEqual,
  PointSet,
  SeededRandom,
  randomSeed,
} from './engine/index.js';
export type {
  GameConfig,
  GameEvents,
  GameSnapshot,
  GameStateOptions,
  GameStatus,
  TickResult,
  Direction,
  Point,
  RandomSource,
} from './engine/index.js';

export { Raster, rasterize, toAscii, packToGlyphs, brailleDotBit, BRAILLE_BLANK } from './render/index.js';
export { BRAILLE_CELL_HEIGHT, BRAILLE_CELL_WIDTH } from './render/index.js';

export { SnakeError, isSnakeError } from './errors/index.js';
export type { SnakeErrorCode } from './errors/index.js';
