import type { EditorHost } from '../types/host.js';
import type { ArgumentList } from '../types/invocation.js';

export type CommandId = 'packet-dump' | 'packet-dump-hex' | 'packet-dump-mpis' | 'inspect' | 'command';

export interface SqCommand {
  readonly id: CommandId;
  readonly description: string;
  /** Key typed after the prefix chord. */
  readonly keySuffix: string;
  /** Produce the argument list for one run; may prompt the user. */
  arguments(host: EditorHost): Promise<ArgumentList>;
}

/**
 * Split a typed argument line on runs of whitespace. There is no quoting or
 * escaping, so an argument containing a space cannot be expressed.
 */
export function splitArgumentLine(line: string): string[] {
  return line.split(/\s+/).filter(arg => arg.length > 0);
}

function fixed(id: CommandId, keySuffix: string, description: string, args: ArgumentList): SqCommand {
  return { id, keySuffix, description, arguments: async () => args };
}

export const SQ_COMMANDS: readonly SqCommand[] = [
  fixed('packet-dump', 'd', 'Dump the packet structure of an OpenPGP artifact.',
    ['packet', 'dump']),
  fixed('packet-dump-hex', 'h', 'Dump the packet structure annotated with raw byte offsets and values.',
    ['packet', 'dump', '--hex']),
  fixed('packet-dump-mpis', 'm', 'Dump the packet structure including MPIs.',
    ['packet', 'dump', '--mpis']),
  fixed('inspect', 'i', 'Summarize an OpenPGP artifact.',
    ['inspect']),
  {
    id: 'command',
    keySuffix: 'c',
    description: 'Run sq with a typed argument line.',
    arguments: async (host) => splitArgumentLine(await host.readLine('sq ')),
  },
];
