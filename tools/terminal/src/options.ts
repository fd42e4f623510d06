import { type GameConfig, SnakeError } from 'hjkl-snake';

export const DEFAULT_TICK_MS = 150;
export const DEFAULT_DEMO_TICKS = 5;

export interface RunOptions {
  kind: 'run';
  config: Partial<GameConfig>;
  /** Undefined lets the engine pick a random seed */
  seed: number | undefined;
  tickMs: number;
  /** Non-null: print this many ticks and exit instead of playing */
  demoTicks: number | null;
}

export type CliOptions = RunOptions | { kind: 'help' };

export const HELP_TEXT = `
hjkl-snake

Usage: hjkl-snake [options]

Options:
  --width <n>      Board width in cells (default: 40)
  --height <n>     Board height in cells (default: 24)
  --length <n>     Initial snake length (default: 4)
  --wrap           Wrap around the edges instead of dying
  --seed <n>       Seed for food placement (default: random)
  --tick-ms <n>    Milliseconds per tick at score 0 (default: ${DEFAULT_TICK_MS})
  --ascii          Draw one character per cell instead of braille glyphs
  --demo [ticks]   Print a few ticks as text and exit (default: ${DEFAULT_DEMO_TICKS})
  -h, --help       Show this help message

Environment variables:
  SNAKE_SEED       Seed for food placement
  SNAKE_TICK_MS    Milliseconds per tick at score 0

Keys:
  h/j/k/l, w/a/s/d or arrows to steer, r to restart, q to quit
`;

function parseInteger(name: string, raw: string | undefined): number {
  if (raw === undefined || !/^-?\d+$/.test(raw)) {
    throw new SnakeError('INVALID_CONFIG', `${name} expects an integer, got ${raw ?? 'nothing'}`, { option: name });
  }
  return Number.parseInt(raw, 10);
}

/**
 * Read command-line flags, falling back to environment variables
 *
 * @throws SnakeError INVALID_CONFIG for unknown flags or malformed numbers
 */
export function parseOptions(argv: readonly string[], env: Record<string, string | undefined> = {}): CliOptions {
  const config: { -readonly [K in keyof GameConfig]?: GameConfig[K] } = {};
  let seed = env.SNAKE_SEED !== undefined ? parseInteger('SNAKE_SEED', env.SNAKE_SEED) : undefined;
  let tickMs = env.SNAKE_TICK_MS !== undefined ? parseInteger('SNAKE_TICK_MS', env.SNAKE_TICK_MS) : DEFAULT_TICK_MS;
  let demoTicks: number | null = null;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '--width':
        config.width = parseInteger(arg, argv[++i]);
        break;
      case '--height':
        config.height = parseInteger(arg, argv[++i]);
        break;
      case '--length':
        config.initialLength = parseInteger(arg, argv[++i]);
        break;
      case '--seed':
        seed = parseInteger(arg, argv[++i]);
        break;
      case '--tick-ms':
        tickMs = parseInteger(arg, argv[++i]);
        break;
      case '--wrap':
        config.wrapEdges = true;
        break;
      case '--ascii':
        config.brailleFriendly = false;
        break;
      case '--demo': {
        const next = argv[i + 1];
        if (next !== undefined && /^\d+$/.test(next)) {
          demoTicks = parseInteger(arg, next);
          i++;
        } else {
          demoTicks = DEFAULT_DEMO_TICKS;
        }
        break;
      }
      default:
        throw new SnakeError('INVALID_CONFIG', `Unknown option: ${arg}`, { option: arg });
    }
  }

  if (tickMs <= 0) {
    throw new SnakeError('INVALID_CONFIG', `Tick length must be positive, got ${tickMs}`, { tickMs });
  }

  return { kind: 'run', config, seed, tickMs, demoTicks };
}
