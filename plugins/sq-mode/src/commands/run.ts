import type { EditorHost } from '../types/host.js';
import type { InputSource, InvocationResult } from '../types/invocation.js';
import type { InvocationPipeline } from '../pipeline/pipeline.js';
import type { SqCommand } from './definitions.js';
import { SqModeError } from '../shared/errors.js';
import { logger } from '../logger.js';

/** Interactive commands read the active selection, or the whole document without one. */
export function interactiveInput(host: EditorHost): InputSource {
  const selection = host.activeSelection();
  return selection ? { kind: 'range', start: selection.start, end: selection.end } : { kind: 'document' };
}

/**
 * Run a command against the host's current document. Failures are reported
 * through the host's error channel; the returned promise resolves to
 * undefined in that case.
 */
export async function runCommand(
  host: EditorHost,
  pipeline: InvocationPipeline,
  command: SqCommand,
): Promise<InvocationResult | undefined> {
  try {
    const args = await command.arguments(host);
    return await pipeline.invoke(args, interactiveInput(host));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ command: command.id, code: err instanceof SqModeError ? err.code : undefined, error: message },
      'Command failed');
    host.reportError(message);
    return undefined;
  }
}
