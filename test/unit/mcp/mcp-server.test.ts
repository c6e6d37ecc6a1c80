import pino from 'pino';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { createErrorGuidance } from '@/lib/errors';
import { createKnowledgeMcpServer, executeTool, formatErrorWithGuidance } from '@/mcp/mcp-server';
import { ALL_TOOLS, checkGovernanceZoneTool } from '@/tools';
import { Failure } from '@/types';
import { tool } from '@/types/tool';
import { HTTP_CONNECTOR_GOVERNANCE, createFixtureStore } from '../../__support__/fixtures/knowledge';

const silent = pino({ level: 'silent' });

function firstText(result: unknown): { text: string; isError: boolean } {
  const parsed = CallToolResultSchema.parse(result);
  const [item] = parsed.content;
  if (item?.type !== 'text') {
    throw new Error('Expected a text content item');
  }
  return { text: item.text, isError: parsed.isError ?? false };
}

describe('knowledge MCP server', () => {
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    server = createKnowledgeMcpServer(createFixtureStore(), {
      name: 'Test Knowledge',
      version: '1.0.0',
      instructions: 'Test instructions',
      logger: silent,
    });
    client = new Client({ name: 'test-client', version: '1.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  test('should announce its name and instructions', () => {
    expect(client.getServerVersion()).toMatchObject({ name: 'Test Knowledge', version: '1.0.0' });
    expect(client.getInstructions()).toBe('Test instructions');
  });

  test('should list every tool', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((item) => item.name)).toEqual(ALL_TOOLS.map((item) => item.name));
    expect(tools.find((item) => item.name === 'get_code_snippet')?.inputSchema.required).toEqual(['query']);
  });

  test('should call a tool and return its text', async () => {
    const result = await client.callTool({ name: 'check_governance_zone', arguments: { feature: 'http-connector' } });
    expect(firstText(result)).toEqual({
      text: `${HTTP_CONNECTOR_GOVERNANCE}\n\nResource URI: governance://http-connector`,
      isError: false,
    });
  });

  test('should list the resource templates', async () => {
    const { resourceTemplates } = await client.listResourceTemplates();
    expect(resourceTemplates.map((item) => item.uriTemplate)).toEqual([
      'bestpractice://{id}',
      'snippet://{id}',
      'troubleshooting://{id}',
      'tip://{id}',
      'governance://{feature}',
    ]);
  });

  test('should read a resource as markdown', async () => {
    const { contents } = await client.readResource({ uri: 'tip://tip-2' });
    expect(contents).toEqual([
      {
        uri: 'tip://tip-2',
        mimeType: 'text/markdown',
        text: '# Reuse topics\n\nRedirect to shared topics\n\n**Tags**: topics, reuse',
      },
    ]);
  });

  test('should answer a missing resource with text', async () => {
    const { contents } = await client.readResource({ uri: 'snippet://sn-404' });
    expect(contents[0]).toMatchObject({ text: "Snippet 'sn-404' not found." });
  });

  test('should mark a failed tool result as an error', async () => {
    const failing = tool({
      name: 'always_fails',
      description: 'Fails on purpose',
      schema: z.object({}),
      handler: async () => Failure<string>('Lookup failed', createErrorGuidance('Lookup failed', 'Try again')),
    });
    const failingServer = createKnowledgeMcpServer(createFixtureStore(), {
      name: 'Failing',
      version: '1.0.0',
      logger: silent,
      tools: [failing],
      resources: [],
    });
    const failingClient = new Client({ name: 'test-client', version: '1.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([failingServer.connect(serverTransport), failingClient.connect(clientTransport)]);

    try {
      const result = await failingClient.callTool({ name: 'always_fails', arguments: {} });
      expect(firstText(result)).toEqual({
        text: 'Lookup failed\n\n💡 Try again\n\n🔧 Resolution:\n\nCheck logs for more information',
        isError: true,
      });
    } finally {
      await failingClient.close();
      await failingServer.close();
    }
  });
});

describe('executeTool', () => {
  test('should return a failure with guidance for invalid arguments', async () => {
    const result = await executeTool(checkGovernanceZoneTool, { feature: 42 }, createFixtureStore(), silent);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe('Invalid arguments for check_governance_zone');
      expect(result.guidance?.hint).toBe('Check the fields: feature');
    }
  });

  test('should treat missing arguments as an empty object', async () => {
    const result = await executeTool(checkGovernanceZoneTool, undefined, createFixtureStore(), silent);
    expect(result.ok).toBe(false);
  });
});

describe('formatErrorWithGuidance', () => {
  test('should return the bare error without guidance', () => {
    expect(formatErrorWithGuidance('Lookup failed')).toBe('Lookup failed');
  });

  test('should use the given resolution', () => {
    expect(formatErrorWithGuidance('Lookup failed', { message: 'Lookup failed', resolution: 'Reload data' })).toBe(
      'Lookup failed\n\n🔧 Resolution:\n\nReload data',
    );
  });
});
