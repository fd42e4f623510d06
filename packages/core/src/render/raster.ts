import type { GameState } from '../engine/index.js';

/**
 * Width x height grid of on/off cells, row-major.
 * Derived from a game each time it is needed; never fed back into it.
 */
export class Raster {
  readonly width: number;
  readonly height: number;
  private readonly cells: boolean[];

  constructor(width: number, height: number) {
    this.width = Math.max(0, width);
    this.height = Math.max(0, height);
    this.cells = new Array<boolean>(this.width * this.height).fill(false);
  }

  /** `undefined` outside the grid, including `x == width` and `y == height` */
  get(x: number, y: number): boolean | undefined {
    const index = this.index(x, y);
    return index === null ? undefined : this.cells[index];
  }

  /** Writes outside the grid are dropped */
  set(x: number, y: number, on: boolean): void {
    const index = this.index(x, y);
    if (index !== null) {
      this.cells[index] = on;
    }
  }

  private index(x: number, y: number): number | null {
    if (!Number.isInteger(x) || !Number.isInteger(y)) return null;
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return null;
    return y * this.width + x;
  }
}

/**
 * Mark every snake segment and food item of `state` on a fresh raster
 */
export function rasterize(state: GameState): Raster {
  const { width, height } = state.getConfig();
  const raster = new Raster(width, height);
  for (const p of state.snakeSegments()) {
    raster.set(p.x, p.y, true);
  }
  for (const p of state.foodPositions()) {
    raster.set(p.x, p.y, true);
  }
  return raster;
}
