export { GameState } from './game-state.js';
export type { GameStatus, TickResult, GameEvents, GameStateOptions, GameSnapshot } from './game-state.js';
export { DEFAULT_GAME_CONFIG, resolveGameConfig } from './game-config.js';
export type { GameConfig } from './game-config.js';
export { DIRECTIONS, directionVector, isDirection, isOppositeDirection, pointKey, pointsEqual } from './geometry.js';
export type { Direction, Point } from './geometry.js';
export { PointSet } from './point-set.js';
export { SeededRandom, randomSeed } from './seeded-random.js';
export type { RandomSource } from './seeded-random.js';
