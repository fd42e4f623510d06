import { type GameState, type TickResult, rasterize, toAscii } from 'hjkl-snake';

const RULE = '='.repeat(31);

/**
 * Print the board before each of `ticks` ticks, followed by the tick result.
 * Always plain text, so it works in pipes and logs.
 */
export function runDemo(game: GameState, ticks: number, log: (line: string) => void = console.log): TickResult[] {
  const results: TickResult[] = [];
  for (let i = 0; i < ticks; i++) {
    log(RULE);
    log(toAscii(rasterize(game)));
    const result = game.tick();
    log(RULE);
    log(`ateFood=${result.ateFood} status=${result.status} score=${result.score}`);
    results.push(result);
  }
  return results;
}
