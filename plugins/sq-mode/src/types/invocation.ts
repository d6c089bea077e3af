/** Ordered subcommand and flags handed to the external tool verbatim. */
export type ArgumentList = readonly string[];

/** Half-open span of the current document, in character offsets. */
export interface TextRange {
  readonly start: number;
  readonly end: number;
}

/**
 * Where the bytes fed to the tool's stdin come from.
 * Exactly one variant is active per invocation.
 */
export type InputSource =
  | { readonly kind: 'document' }
  | ({ readonly kind: 'range' } & TextRange)
  | { readonly kind: 'literal'; readonly text: string };

export type DisplayKind = 'message' | 'buffer';

export interface InvocationResult {
  /** Captured stdout+stderr with trailing whitespace removed. */
  readonly output: string;
  readonly display: DisplayKind;
}
