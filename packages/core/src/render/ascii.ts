import type { Raster } from './raster.js';

const ON = '8';
const OFF = '.';

/**
 * One character per cell. Works for any raster size.
 */
export function toAscii(raster: Raster): string {
  const lines: string[] = [];
  for (let y = 0; y < raster.height; y++) {
    let line = '';
    for (let x = 0; x < raster.width; x++) {
      line += raster.get(x, y) ? ON : OFF;
    }
    lines.push(line);
  }
  return lines.join('\n');
}
