/**
 * End-to-end MCP round trip over an in-process transport pair
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createMcpServer } from './server.js';
import { createTestEngine, parseToolText } from './tools/__test-helpers.js';
import { configureLogger } from '../../shared/logger.js';

async function connect() {
  const { engine } = createTestEngine({ links: { A: ['B'], B: ['C'] } });
  const server = createMcpServer(engine);
  const client = new Client({ name: 'wikiladder-test', version: '0.0.0' });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  await client.connect(clientTransport);

  return {
    client,
    close: async () => {
      await client.close();
      await server.close();
    },
  };
}

describe('MCP server', () => {
  beforeAll(() => {
    configureLogger({ level: 'silent' });
  });

  afterAll(() => {
    configureLogger({ level: 'warn' });
  });

  it('lists both tools', async () => {
    const { client, close } = await connect();
    try {
      const { tools } = await client.listTools();

      expect(tools.map((t) => t.name).sort()).toEqual([
        'wikiladder_find_path',
        'wikiladder_inspect_page',
      ]);
    } finally {
      await close();
    }
  });

  it('answers a find_path call', async () => {
    const { client, close } = await connect();
    try {
      const result = await client.callTool({
        name: 'wikiladder_find_path',
        arguments: { titles: ['A', 'C'] },
      });

      expect(result.isError).toBeFalsy();
      const content = Array.isArray(result.content) ? result.content : [];
      expect(parseToolText({ content })).toMatchObject({
        status: 'found',
        path: ['A', 'B', 'C'],
      });
    } finally {
      await close();
    }
  });
});
