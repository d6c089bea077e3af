// Key bindings are installed by an explicit register() call at setup time,
// never as a side effect of loading the module. Registering again replaces
// the previous set, including bindings made under an older prefix.
import type { EditorHost } from '../types/host.js';
import type { InvocationPipeline } from '../pipeline/pipeline.js';
import type { CommandRegistry } from '../commands/registry.js';
import type { CommandId } from '../commands/definitions.js';
import { runCommand } from '../commands/run.js';
import { parseKeySequence, formatKeySequence } from './parser.js';
import type { KeySequence } from './parser.js';
import { logger } from '../logger.js';

export const DEFAULT_KEY_PREFIX = 'C-c s';

export interface KeyBinding {
  /** Canonical key notation, e.g. "C-c s d". */
  readonly keys: string;
  readonly command: CommandId;
}

export class KeybindingManager {
  private active: Array<{ sequence: KeySequence; binding: KeyBinding }> = [];

  constructor(
    private readonly host: EditorHost,
    private readonly pipeline: InvocationPipeline,
    private readonly registry: CommandRegistry,
  ) {}

  register(prefix: string = DEFAULT_KEY_PREFIX): KeyBinding[] {
    // Parse everything first so a bad prefix leaves the old bindings in place.
    const prefixKeys = parseKeySequence(prefix);
    const next = this.registry.getAll().map(command => {
      const sequence = [...prefixKeys, ...parseKeySequence(command.keySuffix)];
      return { sequence, binding: { keys: formatKeySequence(sequence), command: command.id }, command };
    });

    for (const { sequence } of this.active) {
      this.host.unbindKey(sequence);
    }
    for (const { sequence, command } of next) {
      this.host.bindKey(sequence, async () => {
        await runCommand(this.host, this.pipeline, command);
      });
    }
    this.active = next.map(({ sequence, binding }) => ({ sequence, binding }));

    logger.info({ prefix: formatKeySequence(prefixKeys), count: this.active.length }, 'Key bindings registered');
    return this.bindings();
  }

  bindings(): KeyBinding[] {
    return this.active.map(({ binding }) => binding);
  }
}
