import type { SqModeConfig } from '../types/config.js';
import type { Executor } from '../execution/executor.js';
import { LocalExecutor } from '../execution/executor.js';
import { HeadlessHost } from '../host/headless.js';
import { InvocationPipeline } from '../pipeline/pipeline.js';
import { CommandRegistry } from '../commands/registry.js';
import { KeybindingManager } from '../keys/manager.js';

/**
 * Shared server context — created once at startup, passed to every tool.
 */
export interface SqContext {
  readonly config: SqModeConfig;
  readonly host: HeadlessHost;
  readonly pipeline: InvocationPipeline;
  readonly registry: CommandRegistry;
  readonly keybindings: KeybindingManager;
}

export function createContext(config: SqModeConfig, executor: Executor = new LocalExecutor()): SqContext {
  const host = new HeadlessHost(config.message_max_width);
  const pipeline = new InvocationPipeline(host, executor, {
    program: config.program,
    outputBuffer: config.output_buffer,
  });
  const registry = new CommandRegistry();
  const keybindings = new KeybindingManager(host, pipeline, registry);
  return { config, host, pipeline, registry, keybindings };
}
