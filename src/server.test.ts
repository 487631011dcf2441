import { join } from 'node:path';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { RemoteClient } from './adapter/remote-calls.js';
import { packageRoot } from './config/paths.js';
import { createContext } from './context.js';
import { makeNoopLogger } from './logging/logger.js';
import { createServer } from './server.js';
import { createToolRegistry } from './tools/catalog.js';

describe('MCP server', () => {
  let client: Client | undefined;

  afterEach(async () => {
    await client?.close();
    client = undefined;
  });

  async function connect(remote: RemoteClient): Promise<Client> {
    const ctx = createContext({
      settings: {
        apiKey: 'test-secret',
        apiKeySource: 'env',
        baseUrl: 'https://api.example.test',
        timeoutMs: 1000,
        logLevel: 'silent',
        openApiPath: join(packageRoot(), 'openapi.json'),
        docsDir: join(packageRoot(), 'docs'),
      },
      log: makeNoopLogger(),
      client: remote,
    });
    const server = createServer(ctx, createToolRegistry());
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);

    const connected = new Client({ name: 'test-client', version: '0.0.0' });
    await connected.connect(clientTransport);
    return connected;
  }

  function remote() {
    return {
      get: vi.fn<RemoteClient['get']>().mockResolvedValue([{ id: 1, name: 'Platform' }]),
      post: vi.fn<RemoteClient['post']>().mockResolvedValue({}),
    };
  }

  it('lists the tools over the protocol', async () => {
    client = await connect(remote());

    const { tools } = await client.listTools();

    expect(tools).toHaveLength(23);
    expect(tools.find((tool) => tool.name === 'list_deployments')?.annotations).toEqual({ readOnlyHint: true });
  });

  it('routes tool calls through the registry', async () => {
    const fake = remote();
    client = await connect(fake);

    const result = await client.callTool({ name: 'search_teams_v2', arguments: { search_term: 'plat' } });

    expect(result.isError).toBeUndefined();
    expect(result.content).toEqual([
      { type: 'text', text: JSON.stringify([{ id: 1, name: 'Platform' }], null, 2) },
    ]);
    expect(fake.get).toHaveBeenCalledWith('/api/v2/teams', {
      offset: 0,
      page_size: 50,
      nonmerged_members_only: false,
      search_term: 'plat',
    });
  });

  it('sends the usage instructions on initialize', async () => {
    client = await connect(remote());

    expect(client.getInstructions()).toContain('Read-only access to the LinearB engineering metrics API.');
  });
});
