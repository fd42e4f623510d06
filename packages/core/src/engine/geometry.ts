/** Integer cell coordinate on the board (not a pixel) */
export interface Point {
  x: number;
  y: number;
}

/** Heading of the snake */
export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

const VECTORS: Record<Direction, Point> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

const OPPOSITES: Record<Direction, Direction> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left',
};

/**
 * Unit step for a direction. y grows downwards.
 */
export function directionVector(direction: Direction): Point {
  const { x, y } = VECTORS[direction];
  return { x, y };
}

/**
 * True when turning from `a` to `b` would reverse the snake onto itself
 */
export function isOppositeDirection(a: Direction, b: Direction): boolean {
  return OPPOSITES[a] === b;
}

export function isDirection(value: unknown): value is Direction {
  return value === 'up' || value === 'down' || value === 'left' || value === 'right';
}

/** Hash key used for set membership */
export function pointKey(p: Point): string {
  return `${p.x},${p.y}`;
}

export function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}
