/**
 * Terminal Game Loop
 *
 * Drives a GameState from the keyboard and redraws it after every tick.
 * Tick length shrinks as the score grows. The loop parks itself once the
 * snake dies and resumes on restart.
 */

import type { GameState } from 'hjkl-snake';
import { type Viewport, renderFrame, tickIntervalMs } from './frame.js';
import { keyToCommand, splitKeys } from './key-bindings.js';

export const CLEAR_SCREEN = '\x1b[2J\x1b[H';
export const HIDE_CURSOR = '\x1b[?25l';
export const SHOW_CURSOR = '\x1b[?25h';

export interface TerminalGameEvents {
  onQuit?: () => void;
}

export interface TerminalGameOptions {
  /** Tick length at score 0 */
  baseTickMs: number;
  write: (output: string) => void;
  viewport: () => Viewport;
  events?: TerminalGameEvents;
}

export class TerminalGame {
  private game: GameState;
  private options: TerminalGameOptions;
  private events: TerminalGameEvents;
  private tickTimeout: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(game: GameState, options: TerminalGameOptions) {
    this.game = game;
    this.options = options;
    this.events = options.events ?? {};
  }

  /**
   * Draw the first frame and start ticking
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.render();
    this.schedule();
  }

  /**
   * Stop ticking. Keys still reach the game.
   */
  stop(): void {
    this.running = false;
    if (this.tickTimeout) {
      clearTimeout(this.tickTimeout);
      this.tickTimeout = null;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Feed a raw stdin chunk
   */
  handleInput(data: string): void {
    for (const key of splitKeys(data)) {
      this.handleKey(key);
    }
  }

  handleKey(key: string): void {
    const command = keyToCommand(key);
    if (!command) return;

    switch (command.type) {
      case 'turn':
        this.game.queueDirection(command.direction);
        break;
      case 'restart':
        this.game.reset();
        this.render();
        if (this.running && !this.tickTimeout) {
          this.schedule();
        }
        break;
      case 'quit':
        this.stop();
        this.events.onQuit?.();
        break;
    }
  }

  render(): void {
    this.options.write(CLEAR_SCREEN + renderFrame(this.game, this.options.viewport()));
  }

  private schedule(): void {
    const delay = tickIntervalMs(this.options.baseTickMs, this.game.getScore());
    this.tickTimeout = setTimeout(() => {
      this.tickTimeout = null;
      this.step();
    }, delay);
  }

  private step(): void {
    const result = this.game.tick();
    this.render();
    if (this.running && result.status === 'running') {
      this.schedule();
    }
  }
}
