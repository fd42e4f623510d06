export type SnakeErrorCode =
  /** Board size or initial length the engine cannot run on */
  | 'INVALID_CONFIG'
  /** Raster size not a multiple of the glyph cell */
  | 'DIMENSION_MISMATCH'
  /** Internal state the engine should never reach */
  | 'INVARIANT_VIOLATION';

/**
 * Error raised by the engine and the raster packer. `context` carries the
 * offending values, e.g. `{ width: 3 }`.
 */
export class SnakeError extends Error {
  readonly code: SnakeErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: SnakeErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'SnakeError';
    this.code = code;
    this.context = context;
  }
}

/** Narrow an unknown throw, optionally to one code */
export function isSnakeError(value: unknown, code?: SnakeErrorCode): value is SnakeError {
  return value instanceof SnakeError && (code === undefined || value.code === code);
}
