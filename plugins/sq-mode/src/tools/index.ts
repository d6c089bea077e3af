import { z } from 'zod';
import type { SqContext } from './context.js';
import type { CommandId } from '../commands/definitions.js';
import type { SessionOutcome, HeadlessRequest } from '../host/headless.js';
import { runCommand } from '../commands/run.js';

export type ToolText = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

/** A tool with its input shape erased; execute() validates its own arguments. */
export interface SqTool {
  readonly name: string;
  readonly description: string;
  readonly shape: z.ZodRawShape;
  execute(ctx: SqContext, args: unknown): Promise<ToolText>;
}

function defineTool<S extends z.ZodRawShape>(def: {
  name: string;
  description: string;
  shape: S;
  execute: (ctx: SqContext, args: z.output<z.ZodObject<S, 'strip'>>) => Promise<ToolText>;
}): SqTool {
  const schema = z.object(def.shape);
  return {
    name: def.name,
    description: def.description,
    shape: def.shape,
    execute: (ctx, args) => def.execute(ctx, schema.parse(args)),
  };
}

// ── Response builders ───────────────────────────────────────────

function respond(body: Record<string, unknown>, isError = false): ToolText {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(body, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

function outcomeResponse(tool: string, outcome: SessionOutcome<unknown>): ToolText {
  if (outcome.errors.length > 0) {
    return respond({ status: 'error', tool, message: outcome.errors.join('\n') }, true);
  }
  const shown = outcome.presentation;
  return respond({
    status: 'success',
    tool,
    display: shown?.kind ?? null,
    buffer: shown?.buffer ?? null,
    output: shown?.text ?? '',
  });
}

/** Run `fn` in a host session, sending anything it throws to the host's error channel. */
function reportingSession(ctx: SqContext, request: HeadlessRequest, fn: () => Promise<unknown>) {
  return ctx.host.session(request, async () => {
    try {
      await fn();
    } catch (err) {
      ctx.host.reportError(err instanceof Error ? err.message : String(err));
    }
  });
}

// ── Shared input shapes ─────────────────────────────────────────

const selection = z.object({
  start: z.number().int().min(0),
  end: z.number().int().min(0),
}).optional().describe('Active selection as character offsets into text; the whole text is used when omitted');

const documentShape = {
  text: z.string().describe('Document contents, e.g. an ASCII-armored key or signature'),
  selection,
};

function commandTool(name: string, id: CommandId, description: string): SqTool {
  return defineTool({
    name,
    description,
    shape: documentShape,
    execute: async (ctx, args) => {
      const command = ctx.registry.require(id);
      const outcome = await ctx.host.session(args, () => runCommand(ctx.host, ctx.pipeline, command));
      return outcomeResponse(name, outcome);
    },
  });
}

export const SQ_TOOLS: readonly SqTool[] = [
  commandTool('sq_packet_dump', 'packet-dump',
    'Run `sq packet dump` on the document (or selection) and return the packet structure.'),
  commandTool('sq_packet_dump_hex', 'packet-dump-hex',
    'Run `sq packet dump --hex` on the document (or selection): packet structure with raw byte offsets and values.'),
  commandTool('sq_packet_dump_mpis', 'packet-dump-mpis',
    'Run `sq packet dump --mpis` on the document (or selection): packet structure including MPIs.'),
  commandTool('sq_inspect', 'inspect',
    'Run `sq inspect` on the document (or selection) and return the summary.'),
  defineTool({
    name: 'sq_command',
    description: 'Run sq with a free-form argument line on the document (or selection). The line is split on whitespace; quoting is not supported.',
    shape: {
      ...documentShape,
      argumentLine: z.string().describe('Arguments as typed, e.g. "armor --kind secret-key"'),
    },
    execute: async (ctx, args) => {
      const command = ctx.registry.require('command');
      const outcome = await ctx.host.session(args, () => runCommand(ctx.host, ctx.pipeline, command));
      return outcomeResponse('sq_command', outcome);
    },
  }),
  defineTool({
    name: 'sq_invoke',
    description: 'Run sq with an explicit argument list, feeding `input` on stdin. No document is involved.',
    shape: {
      arguments: z.array(z.string()).describe('Argument list passed verbatim, e.g. ["packet", "dump"]'),
      input: z.string().describe('Text fed to standard input'),
    },
    execute: async (ctx, args) => {
      const outcome = await reportingSession(ctx, { text: '' },
        () => ctx.pipeline.invoke(args.arguments, { kind: 'literal', text: args.input }));
      return outcomeResponse('sq_invoke', outcome);
    },
  }),
  defineTool({
    name: 'sq_press_keys',
    description: 'Type a key sequence (e.g. "C-c s d") against the document and run the bound command.',
    shape: {
      keys: z.string().min(1).describe('Key sequence, e.g. "C-c s d"'),
      ...documentShape,
      argumentLine: z.string().optional().describe('Answer for the free-form command prompt'),
    },
    execute: async (ctx, args) => {
      const { keys, ...request } = args;
      const outcome = await reportingSession(ctx, request, () => ctx.host.pressKeys(keys));
      return outcomeResponse('sq_press_keys', outcome);
    },
  }),
  defineTool({
    name: 'sq_list_keybindings',
    description: 'List the key sequences bound to sq commands.',
    shape: {},
    execute: async (ctx) => respond({
      status: 'success',
      tool: 'sq_list_keybindings',
      bindings: ctx.keybindings.bindings(),
    }),
  }),
];
