export { SnakeError, isSnakeError } from './snake-error.js';
export type { SnakeErrorCode } from './snake-error.js';
