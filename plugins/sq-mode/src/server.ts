#!/usr/bin/env node

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { logger } from './logger.js';
import { loadConfig } from './config/loader.js';
import { createContext } from './tools/context.js';
import type { SqContext } from './tools/context.js';
import { DEFAULT_KEY_PREFIX } from './keys/manager.js';
import { SQ_TOOLS } from './tools/index.js';

function registerKeybindings(ctx: SqContext): void {
  try {
    ctx.keybindings.register(ctx.config.key_prefix);
  } catch (err) {
    logger.error({ prefix: ctx.config.key_prefix, error: err instanceof Error ? err.message : String(err) },
      'Invalid key prefix — falling back to the default');
    ctx.keybindings.register(DEFAULT_KEY_PREFIX);
  }
}

export function createServer(ctx: SqContext): McpServer {
  const server = new McpServer({ name: 'sq-mode', version: '0.1.0' });

  for (const tool of SQ_TOOLS) {
    server.registerTool(
      tool.name,
      {
        title: tool.name,
        description: tool.description,
        inputSchema: tool.shape,
      },
      async (args) => {
        const result = await tool.execute(ctx, args);
        logger.debug({ tool: tool.name, ok: !result.isError }, 'Tool call finished');
        return result;
      },
    );
  }
  return server;
}

async function main(): Promise<void> {
  const { config, configPath, fromFile } = loadConfig();
  logger.info({ configPath, fromFile, program: config.program }, 'Configuration loaded');

  const ctx = createContext(config);
  registerKeybindings(ctx);

  const server = createServer(ctx);
  await server.connect(new StdioServerTransport());
  logger.info({ tools: SQ_TOOLS.length }, 'sq-mode server running on stdio');
}

if (require.main === module) {
  main().catch((err) => {
    logger.fatal({ error: err instanceof Error ? err.message : String(err) }, 'Fatal startup error');
    process.exit(1);
  });
}
