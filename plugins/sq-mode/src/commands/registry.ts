import type { SqCommand } from './definitions.js';
import { SQ_COMMANDS } from './definitions.js';
import { SqModeError, SqModeErrorCode } from '../shared/errors.js';

/**
 * Command Registry — the commands the key bindings and MCP tools dispatch to.
 */
export class CommandRegistry {
  private readonly commands = new Map<string, SqCommand>();

  constructor(commands: readonly SqCommand[] = SQ_COMMANDS) {
    for (const command of commands) {
      this.commands.set(command.id, command);
    }
  }

  get(id: string): SqCommand | undefined {
    return this.commands.get(id);
  }

  require(id: string): SqCommand {
    const command = this.commands.get(id);
    if (!command) {
      throw new SqModeError(SqModeErrorCode.UNKNOWN_COMMAND, `Unknown command: ${id}`, { id });
    }
    return command;
  }

  getAll(): SqCommand[] {
    return [...this.commands.values()];
  }

  get size(): number {
    return this.commands.size;
  }
}
