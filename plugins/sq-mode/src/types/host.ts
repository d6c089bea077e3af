import type { KeySequence } from '../keys/parser.js';
import type { TextRange } from './invocation.js';

/** A named text container owned by the host, e.g. the shared output buffer. */
export interface ScratchBuffer {
  readonly name: string;
  readonly modified: boolean;
  getText(): string;
  setText(text: string): void;
  markUnmodified(): void;
}

/** Handler invoked when a bound key sequence is typed. */
export type KeyHandler = () => Promise<void>;

/**
 * Editor surface consumed by the pipeline and the command layer.
 * Implementations adapt a concrete editor; HeadlessHost is the in-memory one.
 */
export interface EditorHost {
  /** Full text of the current document. */
  documentText(): string;
  /** Active selection, normalized so that start <= end, or null when none. */
  activeSelection(): TextRange | null;
  /** Find the buffer with this name, creating an empty one if absent. */
  scratchBuffer(name: string): ScratchBuffer;
  showBuffer(buffer: ScratchBuffer): void;
  showMessage(text: string): void;
  reportError(message: string): void;
  /** Ask the user for a line of text. */
  readLine(prompt: string): Promise<string>;
  /** Columns available to a transient message. */
  statusLineWidth(): number;
  bindKey(keys: KeySequence, handler: KeyHandler): void;
  unbindKey(keys: KeySequence): void;
}
