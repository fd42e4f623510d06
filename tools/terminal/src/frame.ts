import {
  BRAILLE_CELL_HEIGHT,
  BRAILLE_CELL_WIDTH,
  type GameConfig,
  type GameState,
  packToGlyphs,
  rasterize,
  toAscii,
} from 'hjkl-snake';

export type RenderMode = 'braille' | 'ascii';

export interface Viewport {
  columns: number;
  rows: number;
}

/** Fastest tick the front end will run at */
export const MIN_TICK_MS = 50;
/** Tick shortening per point scored */
export const SPEED_STEP_MS = 5;

export function renderMode(config: GameConfig): RenderMode {
  const packs = config.width % BRAILLE_CELL_WIDTH === 0 && config.height % BRAILLE_CELL_HEIGHT === 0;
  return config.brailleFriendly && packs ? 'braille' : 'ascii';
}

export function renderBoard(state: GameState): string {
  const raster = rasterize(state);
  return renderMode(state.getConfig()) === 'braille' ? packToGlyphs(raster) : toAscii(raster);
}

export function statusLine(state: GameState): string {
  const score = `Score: ${state.getScore()}`;
  return state.isGameOver() ? `${score} | GAME OVER (r: restart, q: quit)` : score;
}

/**
 * Centre a block of lines in the viewport. Lines are padded to the block
 * width so a redraw fully covers the previous frame.
 */
export function composeFrame(lines: readonly string[], viewport: Viewport): string {
  const width = Math.max(0, ...lines.map((line) => line.length));
  const left = ' '.repeat(Math.max(0, Math.floor((viewport.columns - width) / 2)));
  const top = Math.max(0, Math.floor((viewport.rows - lines.length) / 2));

  const body = lines.map((line) => left + line.padEnd(width));
  return [...new Array<string>(top).fill(''), ...body].join('\n');
}

export function renderFrame(state: GameState, viewport: Viewport): string {
  return composeFrame([...renderBoard(state).split('\n'), '', statusLine(state)], viewport);
}

export function tickIntervalMs(baseMs: number, score: number): number {
  return Math.max(MIN_TICK_MS, baseMs - score * SPEED_STEP_MS);
}
