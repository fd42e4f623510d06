import type { Direction } from 'hjkl-snake';

export type KeyCommand = { type: 'turn'; direction: Direction } | { type: 'restart' } | { type: 'quit' };

const turn = (direction: Direction): KeyCommand => ({ type: 'turn', direction });

const KEY_MAP = new Map<string, KeyCommand>([
  ['h', turn('left')],
  ['j', turn('down')],
  ['k', turn('up')],
  ['l', turn('right')],
  ['a', turn('left')],
  ['s', turn('down')],
  ['w', turn('up')],
  ['d', turn('right')],
  ['\u001b[A', turn('up')], // Arrow up
  ['\u001b[B', turn('down')], // Arrow down
  ['\u001b[C', turn('right')], // Arrow right
  ['\u001b[D', turn('left')], // Arrow left
  ['r', { type: 'restart' }],
  ['q', { type: 'quit' }],
  ['\u0003', { type: 'quit' }], // Ctrl-C in raw mode
]);

/** Letter keys are case-insensitive */
export function keyToCommand(key: string): KeyCommand | null {
  return KEY_MAP.get(key) ?? KEY_MAP.get(key.toLowerCase()) ?? null;
}

/**
 * Split one stdin chunk into keys; a fast typist can deliver several at once
 */
export function splitKeys(data: string): string[] {
  return data.match(/\u001b\[[A-D]|[\s\S]/g) ?? [];
}
