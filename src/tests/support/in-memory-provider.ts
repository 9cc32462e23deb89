import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { z } from 'zod';

import type { ChannelFactory } from '../../supervisor/types.js';

import { McpChannel } from '../../supervisor/mcp-channel.js';

/** A small MCP server: `echo` returns its text, `fail` answers with an error result, `structured` returns structured content. */
export function createTestServer(): McpServer {
  const server = new McpServer({ name: 'toolcore-test-server', version: '0.1.0' });
  server.tool('echo', 'Echo the given text.', { text: z.string() }, async ({ text }) => ({
    content: [{ type: 'text', text }],
  }));
  server.tool('fail', 'Always answers with an error result.', async () => ({
    content: [{ type: 'text', text: 'remote went wrong' }],
    isError: true,
  }));
  server.tool('structured', 'Returns structured content.', async () => ({
    content: [{ type: 'text', text: '{"count":2}' }],
    structuredContent: { count: 2 },
  }));
  return server;
}

/** Channel factory that connects every launch to a fresh in-process MCP server. */
export const inMemoryChannelFactory: ChannelFactory = async (config) => {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await createTestServer().connect(serverTransport);
  return McpChannel.connect(config.id, clientTransport);
};
