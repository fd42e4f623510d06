#!/usr/bin/env node
/**
 * hjkl-snake terminal front end
 *
 * Usage:
 *   hjkl-snake --width 40 --height 24 --wrap
 *   hjkl-snake --demo 5 --seed 42 --width 10 --height 8 --length 3
 *
 * Or via environment variables:
 *   SNAKE_SEED=42 SNAKE_TICK_MS=120 hjkl-snake
 */

import { GameState, isSnakeError } from 'hjkl-snake';
import { runDemo } from './demo.js';
import { HELP_TEXT, parseOptions } from './options.js';
import { CLEAR_SCREEN, HIDE_CURSOR, SHOW_CURSOR, TerminalGame } from './terminal-game.js';

function main(): void {
  const options = parseOptions(process.argv.slice(2), process.env);
  if (options.kind === 'help') {
    console.log(HELP_TEXT);
    return;
  }

  const game = new GameState(options.config, { seed: options.seed });

  if (options.demoTicks !== null) {
    runDemo(game, options.demoTicks);
    return;
  }

  const stdin = process.stdin;
  const stdout = process.stdout;

  const terminal = new TerminalGame(game, {
    baseTickMs: options.tickMs,
    write: (output) => stdout.write(output),
    viewport: () => ({ columns: stdout.columns ?? 80, rows: stdout.rows ?? 24 }),
    events: {
      onQuit: () => shutdown(0),
    },
  });

  const onData = (data: Buffer): void => terminal.handleInput(data.toString('utf8'));
  const onResize = (): void => terminal.render();

  function shutdown(code: number): void {
    terminal.stop();
    stdin.removeListener('data', onData);
    stdout.removeListener('resize', onResize);
    if (stdin.isTTY) {
      stdin.setRawMode(false);
    }
    stdin.pause();
    stdout.write(CLEAR_SCREEN + SHOW_CURSOR);
    console.log(`Final score: ${game.getScore()}`);
    process.exit(code);
  }

  if (stdin.isTTY) {
    stdin.setRawMode(true);
  }
  stdin.resume();
  stdin.on('data', onData);
  stdout.on('resize', onResize);

  process.on('SIGINT', () => shutdown(0));
  process.on('SIGTERM', () => shutdown(0));

  stdout.write(HIDE_CURSOR);
  terminal.start();
}

try {
  main();
} catch (error) {
  if (isSnakeError(error)) {
    console.error(`Error: ${error.message}`);
    console.error('Run with --help for usage.');
  } else {
    console.error('Fatal error:', error);
  }
  process.exit(1);
}
