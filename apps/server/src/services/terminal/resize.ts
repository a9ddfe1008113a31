/**
 * Terminal resize frames
 *
 * The browser terminal reports its size as the xterm window-manipulation
 * sequence `ESC [ 8 ; <rows> ; <cols> t`. Such frames are never keystrokes:
 * anything starting with the prefix is consumed by the bridge, and only
 * well-formed ones change the window size.
 */

export const RESIZE_PREFIX = '\x1b[8;';

const RESIZE_FRAME = /^\x1b\[8;(\d{1,5});(\d{1,5})\D$/;

const MAX_DIMENSION = 0xffff;

export interface TerminalSize {
  rows: number;
  cols: number;
}

export function isResizeFrame(frame: string): boolean {
  return frame.startsWith(RESIZE_PREFIX);
}

/**
 * Parse a resize frame.
 *
 * @returns The size, or `null` for anything that is not a well-formed frame
 * with both dimensions in 1..65535
 *
 * @example
 * parseResizeFrame('\x1b[8;40;120t') // => { rows: 40, cols: 120 }
 */
export function parseResizeFrame(frame: string): TerminalSize | null {
  const match = RESIZE_FRAME.exec(frame);
  if (!match) return null;

  const rows = Number(match[1]);
  const cols = Number(match[2]);
  if (rows < 1 || cols < 1 || rows > MAX_DIMENSION || cols > MAX_DIMENSION) return null;

  return { rows, cols };
}
