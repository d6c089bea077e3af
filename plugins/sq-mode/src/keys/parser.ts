// Key notation: keys separated by spaces, each an optional run of
// "<mod>-" prefixes followed by a key name ("C-c", "C-M-x", "RET", "<f5>").
import { SqModeError, SqModeErrorCode } from '../shared/errors.js';

export type Modifier = 'A' | 'C' | 'H' | 'M' | 'S' | 's';

export interface ParsedKey {
  readonly modifiers: readonly Modifier[];
  readonly key: string;
}

export type KeySequence = readonly ParsedKey[];

/** Canonical modifier order used when formatting. */
const MODIFIER_ORDER: readonly Modifier[] = ['A', 'C', 'H', 'M', 'S', 's'];

const NAMED_KEYS = new Set(['RET', 'TAB', 'SPC', 'ESC', 'DEL', 'LFD', 'NUL']);

const MODIFIER_PREFIX = /^([ACHMSs])-(.+)$/;

function isModifier(value: string): value is Modifier {
  return MODIFIER_ORDER.some(mod => mod === value);
}

function isKeyName(name: string): boolean {
  if ([...name].length === 1) return true;
  if (NAMED_KEYS.has(name)) return true;
  return /^<[A-Za-z0-9-]+>$/.test(name);
}

function parseKey(token: string, source: string): ParsedKey {
  const modifiers: Modifier[] = [];
  let rest = token;
  let match = MODIFIER_PREFIX.exec(rest);
  while (match) {
    const [, mod, remainder] = match;
    if (!isModifier(mod) || modifiers.includes(mod)) {
      throw new SqModeError(SqModeErrorCode.INVALID_KEY, `Duplicate modifier in key "${token}"`, { keys: source });
    }
    modifiers.push(mod);
    rest = remainder;
    // A bare "-" after a modifier is the minus key, not another prefix.
    match = rest.length > 1 ? MODIFIER_PREFIX.exec(rest) : null;
  }
  if (!isKeyName(rest)) {
    throw new SqModeError(SqModeErrorCode.INVALID_KEY, `Unknown key "${rest}" in "${source}"`, { keys: source });
  }
  modifiers.sort((a, b) => MODIFIER_ORDER.indexOf(a) - MODIFIER_ORDER.indexOf(b));
  return { modifiers, key: rest };
}

export function parseKeySequence(text: string): KeySequence {
  const tokens = text.trim().split(/\s+/).filter(t => t.length > 0);
  if (tokens.length === 0) {
    throw new SqModeError(SqModeErrorCode.INVALID_KEY, 'Key sequence is empty', { keys: text });
  }
  return tokens.map(token => parseKey(token, text));
}

export function formatKey(key: ParsedKey): string {
  return [...key.modifiers.map(m => `${m}-`), key.key].join('');
}

export function formatKeySequence(keys: KeySequence): string {
  return keys.map(formatKey).join(' ');
}
