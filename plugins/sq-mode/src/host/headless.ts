import type { EditorHost, KeyHandler, ScratchBuffer } from '../types/host.js';
import type { DisplayKind, TextRange } from '../types/invocation.js';
import type { KeySequence } from '../keys/parser.js';
import { formatKeySequence, parseKeySequence } from '../keys/parser.js';
import { SqModeError, SqModeErrorCode } from '../shared/errors.js';

export class MemoryBuffer implements ScratchBuffer {
  private text = '';
  private dirty = false;

  constructor(readonly name: string) {}

  get modified(): boolean {
    return this.dirty;
  }

  getText(): string {
    return this.text;
  }

  setText(text: string): void {
    this.text = text;
    this.dirty = true;
  }

  markUnmodified(): void {
    this.dirty = false;
  }
}

/** Editor state a single request runs against. */
export interface HeadlessRequest {
  text: string;
  selection?: TextRange | null;
  /** Answer to the next readLine prompt. */
  argumentLine?: string;
}

export interface Presentation {
  kind: DisplayKind;
  /** Set when the output buffer was shown. */
  buffer?: string;
  text: string;
}

export interface SessionOutcome<T> {
  value: T;
  presentation: Presentation | null;
  errors: string[];
}

/**
 * In-memory editor host. Each request loads its own document and selection
 * and records what was displayed; requests run one at a time.
 */
export class HeadlessHost implements EditorHost {
  private document = '';
  private selection: TextRange | null = null;
  private pendingLine: string | undefined;
  private presentation: Presentation | null = null;
  private errors: string[] = [];
  private readonly buffers = new Map<string, MemoryBuffer>();
  private readonly keymap = new Map<string, KeyHandler>();
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly width: number) {}

  session<T>(request: HeadlessRequest, fn: () => Promise<T>): Promise<SessionOutcome<T>> {
    const run = this.tail.then(async () => {
      this.document = request.text;
      this.selection = request.selection ?? null;
      this.pendingLine = request.argumentLine;
      this.presentation = null;
      this.errors = [];
      const value = await fn();
      return { value, presentation: this.presentation, errors: [...this.errors] };
    });
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }

  /** Dispatch a typed key sequence to its bound handler. */
  async pressKeys(keys: string): Promise<void> {
    const canonical = formatKeySequence(parseKeySequence(keys));
    const handler = this.keymap.get(canonical);
    if (!handler) {
      throw new SqModeError(SqModeErrorCode.INVALID_KEY, `${canonical} is undefined`, { keys: canonical });
    }
    await handler();
  }

  boundKeys(): string[] {
    return [...this.keymap.keys()];
  }

  getBuffer(name: string): MemoryBuffer | undefined {
    return this.buffers.get(name);
  }

  documentText(): string {
    return this.document;
  }

  activeSelection(): TextRange | null {
    if (!this.selection) return null;
    const { start, end } = this.selection;
    return { start: Math.min(start, end), end: Math.max(start, end) };
  }

  scratchBuffer(name: string): MemoryBuffer {
    let buffer = this.buffers.get(name);
    if (!buffer) {
      buffer = new MemoryBuffer(name);
      this.buffers.set(name, buffer);
    }
    return buffer;
  }

  showBuffer(buffer: ScratchBuffer): void {
    this.presentation = { kind: 'buffer', buffer: buffer.name, text: buffer.getText() };
  }

  showMessage(text: string): void {
    this.presentation = { kind: 'message', text };
  }

  reportError(message: string): void {
    this.errors.push(message);
  }

  async readLine(prompt: string): Promise<string> {
    const line = this.pendingLine;
    if (line === undefined) {
      throw new SqModeError(SqModeErrorCode.NO_INPUT, `No answer supplied for prompt "${prompt}"`);
    }
    this.pendingLine = undefined;
    return line;
  }

  statusLineWidth(): number {
    return this.width;
  }

  bindKey(keys: KeySequence, handler: KeyHandler): void {
    this.keymap.set(formatKeySequence(keys), handler);
  }

  unbindKey(keys: KeySequence): void {
    this.keymap.delete(formatKeySequence(keys));
  }
}
