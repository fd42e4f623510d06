/**
 * Snake Simulation Engine
 *
 * Single-player, UI-agnostic game state advanced one tick at a time.
 * Deterministic for a given seed and sequence of queued directions:
 * the random stream only moves when food is placed.
 *
 * Wall hits are fatal. Running into the body is not: the tick is rejected
 * and the snake stays where it was.
 */

import { SnakeError } from '../errors/index.js';
import { type GameConfig, resolveGameConfig } from './game-config.js';
import {
  type Direction,
  type Point,
  directionVector,
  isDirection,
  isOppositeDirection,
  pointKey,
  pointsEqual,
} from './geometry.js';
import { PointSet } from './point-set.js';
import { type RandomSource, SeededRandom, randomSeed } from './seeded-random.js';

export type GameStatus = 'running' | 'dead';

/** Outcome of one tick, always describing the state after it */
export interface TickResult {
  ateFood: boolean;
  status: GameStatus;
  score: number;
}

/** Game event callbacks */
export interface GameEvents {
  onTick?: (result: TickResult) => void;
  onGameOver?: (score: number) => void;
}

export interface GameStateOptions {
  /** Seed for the built-in generator. Ignored when `random` is given. */
  seed?: number;
  random?: RandomSource;
  events?: GameEvents;
}

/** Plain copy of everything except config and random stream */
export interface GameSnapshot {
  snake: Point[];
  food: Point[];
  direction: Direction;
  pendingDirection: Direction | null;
  status: GameStatus;
  score: number;
}

/** Smallest number of placement attempts, for tiny boards */
const MIN_SPAWN_ATTEMPTS = 8;

export class GameState {
  private readonly config: GameConfig;
  private readonly random: RandomSource;
  private readonly events: GameEvents;
  /** Head first, tail last */
  private snake: Point[] = [];
  private direction: Direction = 'right';
  /** Applied at the start of the next tick unless it is a 180° turn */
  private pendingDirection: Direction | null = null;
  private food = new PointSet();
  private status: GameStatus = 'running';
  private score = 0;

  /**
   * @throws SnakeError INVALID_CONFIG for unusable boards
   */
  constructor(config: Partial<GameConfig> = {}, options: GameStateOptions = {}) {
    this.config = resolveGameConfig(config);
    this.random = options.random ?? new SeededRandom(options.seed ?? randomSeed());
    this.events = options.events ?? {};
    this.reset();
  }

  static withSeed(config: Partial<GameConfig>, seed: number): GameState {
    return new GameState(config, { seed });
  }

  getConfig(): GameConfig {
    return this.config;
  }

  getStatus(): GameStatus {
    return this.status;
  }

  isGameOver(): boolean {
    return this.status === 'dead';
  }

  getScore(): number {
    return this.score;
  }

  getDirection(): Direction {
    return this.direction;
  }

  getPendingDirection(): Direction | null {
    return this.pendingDirection;
  }

  get snakeLength(): number {
    return this.snake.length;
  }

  get foodCount(): number {
    return this.food.size;
  }

  /** Snake segments, head first */
  *snakeSegments(): IterableIterator<Point> {
    for (const segment of this.snake) {
      yield { x: segment.x, y: segment.y };
    }
  }

  /** Food cells, in no particular order */
  *foodPositions(): IterableIterator<Point> {
    yield* this.food;
  }

  head(): Point {
    const head = this.snake[0];
    if (!head) {
      throw new SnakeError('INVARIANT_VIOLATION', 'Snake has no segments');
    }
    return { x: head.x, y: head.y };
  }

  /**
   * Request a turn for the next tick. Only the latest request counts;
   * reversals are dropped when the tick applies them.
   */
  queueDirection(direction: Direction): void {
    this.pendingDirection = direction;
  }

  /**
   * Put the snake back in the middle of the board heading right, with one
   * piece of food. The random stream carries on from where it was.
   */
  reset(): void {
    this.status = 'running';
    this.score = 0;
    this.snake = [];
    this.food.clear();
    this.direction = 'right';
    this.pendingDirection = null;

    const cx = Math.floor(this.config.width / 2);
    const cy = Math.floor(this.config.height / 2);
    for (let i = 0; i < this.config.initialLength; i++) {
      this.snake.push({ x: cx - i, y: cy });
    }

    this.spawnFood();
  }

  /**
   * Advance the game by one tick
   */
  tick(): TickResult {
    if (this.status === 'dead') {
      return this.result(false);
    }

    if (this.pendingDirection !== null) {
      if (!isOppositeDirection(this.pendingDirection, this.direction)) {
        this.direction = this.pendingDirection;
      }
      this.pendingDirection = null;
    }

    const candidate = this.nextHeadPosition();

    if (!this.config.wrapEdges && this.outOfBounds(candidate)) {
      this.status = 'dead';
      const result = this.result(false);
      this.events.onTick?.(result);
      this.events.onGameOver?.(this.score);
      return result;
    }

    const nextHead = this.config.wrapEdges ? this.wrap(candidate) : candidate;

    // Eating is decided first: it keeps the tail in place, so the tail cell becomes an obstacle
    const isEating = this.food.has(nextHead);
    if (this.collidesWithBody(nextHead, !isEating)) {
      const result = this.result(false);
      this.events.onTick?.(result);
      return result;
    }

    this.snake.unshift(nextHead);

    if (isEating) {
      this.food.delete(nextHead);
      this.score++;
      this.spawnFood();
    } else {
      this.snake.pop();
    }

    const result = this.result(isEating);
    this.events.onTick?.(result);
    return result;
  }

  /**
   * Get a deep copy of the current layout
   */
  getSnapshot(): GameSnapshot {
    return {
      snake: this.snake.map((p) => ({ x: p.x, y: p.y })),
      food: [...this.food],
      direction: this.direction,
      pendingDirection: this.pendingDirection,
      status: this.status,
      score: this.score,
    };
  }

  /**
   * Replace the layout with a snapshot, keeping config and random stream.
   * Snapshots that break the board invariants are rejected and logged.
   */
  applySnapshot(snapshot: GameSnapshot): boolean {
    const reason = this.validateSnapshot(snapshot);
    if (reason) {
      console.warn(`[GameState] Rejected snapshot: ${reason}`);
      return false;
    }

    this.snake = snapshot.snake.map((p) => ({ x: p.x, y: p.y }));
    this.food = new PointSet(snapshot.food);
    this.direction = snapshot.direction;
    this.pendingDirection = snapshot.pendingDirection;
    this.status = snapshot.status;
    this.score = snapshot.score;
    return true;
  }

  private validateSnapshot(snapshot: GameSnapshot): string | null {
    if (snapshot.snake.length === 0) {
      return 'snake is empty';
    }

    const onBoard = (p: Point): boolean =>
      Number.isInteger(p.x) &&
      Number.isInteger(p.y) &&
      p.x >= 0 &&
      p.x < this.config.width &&
      p.y >= 0 &&
      p.y < this.config.height;

    const body = new Set<string>();
    for (const segment of snapshot.snake) {
      if (!onBoard(segment)) return `snake segment ${pointKey(segment)} is off the board`;
      if (body.has(pointKey(segment))) return `snake overlaps itself at ${pointKey(segment)}`;
      body.add(pointKey(segment));
    }

    const food = new Set<string>();
    for (const item of snapshot.food) {
      if (!onBoard(item)) return `food ${pointKey(item)} is off the board`;
      if (body.has(pointKey(item))) return `food ${pointKey(item)} lies on the snake`;
      if (food.has(pointKey(item))) return `food ${pointKey(item)} is listed twice`;
      food.add(pointKey(item));
    }

    if (!isDirection(snapshot.direction)) return 'invalid direction';
    if (snapshot.pendingDirection !== null && !isDirection(snapshot.pendingDirection)) {
      return 'invalid pending direction';
    }
    if (snapshot.status !== 'running' && snapshot.status !== 'dead') return 'invalid status';
    if (!Number.isInteger(snapshot.score) || snapshot.score < 0) return 'invalid score';

    return null;
  }

  private result(ateFood: boolean): TickResult {
    return { ateFood, status: this.status, score: this.score };
  }

  private nextHeadPosition(): Point {
    const { x: dx, y: dy } = directionVector(this.direction);
    const head = this.head();
    return { x: head.x + dx, y: head.y + dy };
  }

  private outOfBounds(p: Point): boolean {
    return p.x < 0 || p.x >= this.config.width || p.y < 0 || p.y >= this.config.height;
  }

  /**
   * A tick moves one cell, so one correction per axis is enough
   */
  private wrap(p: Point): Point {
    let { x, y } = p;
    if (x < 0) {
      x = this.config.width - 1;
    } else if (x >= this.config.width) {
      x = 0;
    }
    if (y < 0) {
      y = this.config.height - 1;
    } else if (y >= this.config.height) {
      y = 0;
    }
    return { x, y };
  }

  /**
   * Body hit test. The tail is skipped when it leaves its cell this tick.
   */
  private collidesWithBody(p: Point, tailWillMoveOff: boolean): boolean {
    const end = tailWillMoveOff ? this.snake.length - 1 : this.snake.length;
    for (let i = 0; i < end; i++) {
      if (pointsEqual(this.snake[i], p)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Place one food item on a free cell, giving up quietly when the board is
   * (nearly) full
   */
  private spawnFood(): void {
    const maxAttempts = Math.max(this.config.width * this.config.height * 2, MIN_SPAWN_ATTEMPTS);
    const occupied = new PointSet(this.snake);

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const x = this.random.nextInt(this.config.width);
      const y = this.random.nextInt(this.config.height);
      const candidate = { x, y };
      if (!occupied.has(candidate) && !this.food.has(candidate)) {
        this.food.add(candidate);
        return;
      }
    }
  }
}
