import type { DisplayKind } from '../types/invocation.js';

/** Strip whitespace from the end of the captured output only. */
export function trimOutput(output: string): string {
  return output.trimEnd();
}

/**
 * Output goes to the status line when it has no line break and fits in
 * `width` columns; anything else is shown in the output buffer.
 */
export function chooseDisplay(text: string, width: number): DisplayKind {
  return !/[\r\n]/.test(text) && text.length <= width ? 'message' : 'buffer';
}
