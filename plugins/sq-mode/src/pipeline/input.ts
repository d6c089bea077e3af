import type { EditorHost } from '../types/host.js';
import type { InputSource } from '../types/invocation.js';
import { SqModeError, SqModeErrorCode } from '../shared/errors.js';

/** Resolve an InputSource into the text fed to the tool's stdin. */
export function resolveInput(host: EditorHost, source: InputSource): string {
  switch (source.kind) {
    case 'literal':
      return source.text;
    case 'document':
      return host.documentText();
    case 'range': {
      const text = host.documentText();
      const { start, end } = source;
      if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end < start || end > text.length) {
        throw new SqModeError(SqModeErrorCode.INVALID_RANGE,
          `Range ${start}..${end} is not a span of the document (length ${text.length})`,
          { start, end, length: text.length });
      }
      return text.slice(start, end);
    }
  }
}
