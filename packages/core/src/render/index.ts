export { Raster, rasterize } from './raster.js';
export { toAscii } from './ascii.js';
export { BRAILLE_BLANK, BRAILLE_CELL_HEIGHT, BRAILLE_CELL_WIDTH, brailleDotBit, packToGlyphs } from './braille.js';
