/**
 * Braille glyph packing
 *
 * Each output character covers a block 2 cells wide and 4 tall. The Unicode
 * braille block (U+2800..U+28FF) gives every block its own code point: the
 * low byte is a bit mask of the 8 dots.
 *
 *   col 0  col 1
 *   bit 0  bit 3   row 0
 *   bit 1  bit 4   row 1
 *   bit 2  bit 5   row 2
 *   bit 6  bit 7   row 3
 */

import { SnakeError } from '../errors/index.js';
import type { Raster } from './raster.js';

export const BRAILLE_CELL_WIDTH = 2;
export const BRAILLE_CELL_HEIGHT = 4;

const BRAILLE_BASE = 0x2800;

/** Glyph with no dots raised; not a space */
export const BRAILLE_BLANK = String.fromCodePoint(BRAILLE_BASE);

/** Dot bit by [row][column] inside a block */
const DOT_BITS: readonly (readonly number[])[] = [
  [0, 3],
  [1, 4],
  [2, 5],
  [6, 7],
];

/**
 * Bit controlling the dot at (row, col) of a block.
 *
 * @throws SnakeError INVARIANT_VIOLATION for positions outside the 4x2 block
 */
export function brailleDotBit(row: number, col: number): number {
  const bit = DOT_BITS[row]?.[col];
  if (bit === undefined) {
    throw new SnakeError('INVARIANT_VIOLATION', `Unexpected braille sub-position (${row}, ${col})`, { row, col });
  }
  return bit;
}

/**
 * Pack a raster into lines of braille glyphs, one line per 4 rows.
 *
 * @throws SnakeError DIMENSION_MISMATCH unless width is even and height a multiple of 4
 */
export function packToGlyphs(raster: Raster): string {
  if (raster.width % BRAILLE_CELL_WIDTH !== 0) {
    throw new SnakeError('DIMENSION_MISMATCH', `Cannot pack a raster ${raster.width} wide: width must be even`, {
      width: raster.width,
      height: raster.height,
    });
  }
  if (raster.height % BRAILLE_CELL_HEIGHT !== 0) {
    throw new SnakeError(
      'DIMENSION_MISMATCH',
      `Cannot pack a raster ${raster.height} tall: height must be a multiple of 4`,
      { width: raster.width, height: raster.height },
    );
  }

  const columns = raster.width / BRAILLE_CELL_WIDTH;
  const rows = raster.height / BRAILLE_CELL_HEIGHT;
  const masks: number[][] = Array.from({ length: rows }, () => new Array<number>(columns).fill(0));

  for (let y = 0; y < raster.height; y++) {
    const line = masks[Math.floor(y / BRAILLE_CELL_HEIGHT)];
    for (let x = 0; x < raster.width; x++) {
      if (raster.get(x, y)) {
        line[Math.floor(x / BRAILLE_CELL_WIDTH)] |= 1 << brailleDotBit(y % BRAILLE_CELL_HEIGHT, x % BRAILLE_CELL_WIDTH);
      }
    }
  }

  return masks.map((line) => line.map((mask) => String.fromCodePoint(BRAILLE_BASE | mask)).join('')).join('\n');
}
