import { type Point, pointKey } from './geometry.js';

/**
 * Set of board cells keyed by coordinate value.
 */
export class PointSet implements Iterable<Point> {
  private points = new Map<string, Point>();

  constructor(points: Iterable<Point> = []) {
    for (const p of points) {
      this.add(p);
    }
  }

  get size(): number {
    return this.points.size;
  }

  has(p: Point): boolean {
    return this.points.has(pointKey(p));
  }

  /** Returns false if the point was already present */
  add(p: Point): boolean {
    const key = pointKey(p);
    if (this.points.has(key)) return false;
    this.points.set(key, { x: p.x, y: p.y });
    return true;
  }

  delete(p: Point): boolean {
    return this.points.delete(pointKey(p));
  }

  clear(): void {
    this.points.clear();
  }

  *[Symbol.iterator](): IterableIterator<Point> {
    for (const p of this.points.values()) {
      yield { x: p.x, y: p.y };
    }
  }
}
