import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpError } from '@modelcontextprotocol/sdk/types.js';
import { McpServer } from '../src/presentation/McpServer.js';
import { StubSearchClient, makeConfig } from './helpers.js';

describe('McpServer', () => {
  let searchClient: StubSearchClient;
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    jest.spyOn(console, 'error').mockImplementation(() => {});
    searchClient = new StubSearchClient();
    server = new McpServer(makeConfig(), searchClient);
    client = new Client({ name: 'test-client', version: '1.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    jest.restoreAllMocks();
  });

  test('should be serving once connected', () => {
    expect(server.getState()).toBe('serving');
  });

  test('should list both tools', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual(['query_perplexity', 'search_perplexity']);
    expect(tools[0].inputSchema.required).toEqual(['message']);
  });

  test('should call a tool and return its text content', async () => {
    const result = await client.callTool({
      name: 'search_perplexity',
      arguments: { query: 'latest news' },
    });

    expect(result.isError).toBeFalsy();
    expect(result.content).toEqual([
      {
        type: 'text',
        text: 'Answer to: latest news\n\n**Sources:**\n1. https://example.com/source',
      },
    ]);
    expect(searchClient.calls).toBe(1);
  });

  test('should return invalid arguments as error content, not a protocol error', async () => {
    const result = await client.callTool({
      name: 'query_perplexity',
      arguments: { message: 'Q', temperature: 3 },
    });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      { type: 'text', text: 'invalid arguments for query_perplexity\n- temperature: must be <= 2' },
    ]);
    expect(searchClient.calls).toBe(0);
  });

  test('should list and render prompts', async () => {
    const { prompts } = await client.listPrompts();
    expect(prompts.map((prompt) => prompt.name)).toEqual([
      'research_topic',
      'quick_fact_check',
      'explain_concept',
    ]);

    const prompt = await client.getPrompt({
      name: 'quick_fact_check',
      arguments: { claim: 'the sky is green' },
    });
    expect(prompt.messages[0].content).toEqual({
      type: 'text',
      text: 'Is this claim accurate: the sky is green? Please verify with current information and sources.',
    });
  });

  test('should reject a prompt with a missing argument as invalid params', async () => {
    const request = client.getPrompt({ name: 'quick_fact_check', arguments: {} });

    await expect(request).rejects.toThrow(McpError);
    await expect(client.getPrompt({ name: 'quick_fact_check', arguments: {} })).rejects.toThrow(
      'Missing required argument "claim" for prompt quick_fact_check'
    );
  });

  test('should reject an unknown prompt', async () => {
    await expect(client.getPrompt({ name: 'unknown_prompt' })).rejects.toThrow(
      'Unknown prompt: unknown_prompt'
    );
  });

  test('should list and read the info resource', async () => {
    const { resources } = await client.listResources();
    expect(resources.map((resource) => resource.uri)).toEqual(['perplexity://info']);

    const { contents } = await client.readResource({ uri: 'perplexity://info' });
    expect(contents).toHaveLength(1);
    expect(contents[0].uri).toBe('perplexity://info');
    expect(contents[0].mimeType).toBe('text/plain');
  });

  test('should reject an unknown resource', async () => {
    await expect(client.readResource({ uri: 'unknown://x' })).rejects.toThrow(
      'Unknown resource: unknown://x'
    );
  });

  test('should move to closed when the transport closes', async () => {
    await client.close();
    await server.closed();

    expect(server.getState()).toBe('closed');
  });

  test('should refuse to connect twice', async () => {
    const [, serverTransport] = InMemoryTransport.createLinkedPair();

    await expect(server.connect(serverTransport)).rejects.toThrow('Cannot connect: session is serving');
  });
});

describe('McpServer shutdown before connecting', () => {
  test('should close without a transport', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => {});
    const server = new McpServer(makeConfig(), new StubSearchClient());

    await server.shutdown();
    await server.closed();

    expect(server.getState()).toBe('closed');
    jest.restoreAllMocks();
  });
});
