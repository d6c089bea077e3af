import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { ListToolsResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import { createServer } from '../../src/server.js';
import { createContext } from '../../src/tools/context.js';
import { DEFAULT_CONFIG } from '../../src/config/loader.js';
import { fixedOutput } from '../helpers/fake-executor.js';

describe('createServer', () => {
  it('lists every sq tool over MCP', async () => {
    const server = createServer(createContext({ ...DEFAULT_CONFIG }, fixedOutput('')));
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const reply = new Promise<JSONRPCMessage>(resolve => { clientTransport.onmessage = resolve; });
    await server.connect(serverTransport);
    await clientTransport.start();

    try {
      await clientTransport.send({ jsonrpc: '2.0', id: 1, method: 'tools/list', params: {} });
      const message = await reply;
      if (!('result' in message)) throw new Error(`unexpected reply: ${JSON.stringify(message)}`);
      const { tools } = ListToolsResultSchema.parse(message.result);

      expect(tools.map(t => t.name).sort()).toEqual([
        'sq_command',
        'sq_inspect',
        'sq_invoke',
        'sq_list_keybindings',
        'sq_packet_dump',
        'sq_packet_dump_hex',
        'sq_packet_dump_mpis',
        'sq_press_keys',
      ]);
      const invoke = tools.find(t => t.name === 'sq_invoke');
      expect(Object.keys(invoke?.inputSchema.properties ?? {}).sort()).toEqual(['arguments', 'input']);
    } finally {
      await server.close();
    }
  });
});
