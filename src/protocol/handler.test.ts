import '../tests/setup.js';
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';
import { MCPProtocolHandler } from './handler.js';
import { defineTool, notFound, success, ToolRegistry } from '../gateway/index.js';
import { MetricsCollector } from '../monitoring/index.js';

function createHandler() {
  const registry = new ToolRegistry();
  registry.register(defineTool('echo', 'Echo a value', { value: z.string() }), async ({ value }) => success(value));
  registry.register(defineTool('missing', 'Always not found', {}), async () => notFound('Thing t-1 not found'));
  const metrics = new MetricsCollector('aws-test');
  const handler = new MCPProtocolHandler(registry, { name: 'aws-test', version: '1.0.0' }, metrics);
  return { handler, metrics, session: handler.getOrCreateSession() };
}

describe('MCPProtocolHandler', () => {
  it('answers initialize with server info and tool capabilities', async () => {
    const { handler, session } = createHandler();

    const response = await handler.handleMessage(
      {
        jsonrpc: '2.0',
        id: 1,
        method: 'initialize',
        params: { protocolVersion: '2024-11-05', capabilities: {}, clientInfo: { name: 'test-client', version: '0.1.0' } },
      },
      session
    );

    assert.deepEqual(response, {
      jsonrpc: '2.0',
      id: 1,
      result: {
        protocolVersion: '2024-11-05',
        capabilities: { tools: { listChanged: false } },
        serverInfo: { name: 'aws-test', version: '1.0.0' },
      },
    });
    assert.deepEqual(session.clientInfo, { name: 'test-client', version: '0.1.0' });
  });

  it('marks the session initialized on notification without responding', async () => {
    const { handler, session } = createHandler();

    const response = await handler.handleMessage({ jsonrpc: '2.0', method: 'notifications/initialized' }, session);

    assert.equal(response, null);
    assert.equal(session.initialized, true);
  });

  it('answers ping', async () => {
    const { handler, session } = createHandler();

    assert.deepEqual(await handler.handleMessage({ jsonrpc: '2.0', id: 'p', method: 'ping' }, session), {
      jsonrpc: '2.0',
      id: 'p',
      result: {},
    });
  });

  it('lists registered tools with their input schemas', async () => {
    const { handler } = createHandler();

    const tools = handler.listTools();

    assert.deepEqual(
      tools.map((tool) => tool.name),
      ['echo', 'missing']
    );
    assert.deepEqual(tools[0]?.inputSchema.required, ['value']);
  });

  it('returns the envelope of a successful tool call', async () => {
    const { handler, session, metrics } = createHandler();

    const response = await handler.handleMessage(
      { jsonrpc: '2.0', id: 2, method: 'tools/call', params: { name: 'echo', arguments: { value: 'hi' } } },
      session
    );

    assert.deepEqual(response, {
      jsonrpc: '2.0',
      id: 2,
      result: { content: [{ type: 'application/json', data: 'hi' }] },
    });
    assert.equal(metrics.getToolMetrics('echo')?.successfulCalls, 1);
  });

  it('maps a normalized tool error to InternalError', async () => {
    const { handler, session, metrics } = createHandler();

    const response = await handler.handleMessage(
      { jsonrpc: '2.0', id: 3, method: 'tools/call', params: { name: 'echo' } },
      session
    );

    assert.deepEqual(response, {
      jsonrpc: '2.0',
      id: 3,
      error: { code: -32603, message: 'Missing required argument: value' },
    });
    assert.equal(metrics.getToolMetrics('echo')?.failedCalls, 1);
    assert.equal(metrics.getSummary().errorCount, 1);
  });

  it('passes domain failures through as their message', async () => {
    const { handler, session } = createHandler();

    const response = await handler.handleMessage(
      { jsonrpc: '2.0', id: 4, method: 'tools/call', params: { name: 'missing', arguments: {} } },
      session
    );

    assert.deepEqual(response?.error, { code: -32603, message: 'Thing t-1 not found' });
  });

  it('maps an unknown tool to InvalidParams', async () => {
    const { handler, session, metrics } = createHandler();

    const response = await handler.handleMessage(
      { jsonrpc: '2.0', id: 5, method: 'tools/call', params: { name: 'nope', arguments: {} } },
      session
    );

    assert.deepEqual(response?.error, { code: -32602, message: 'Unknown tool: nope' });
    assert.equal(metrics.getToolMetrics('nope'), undefined);
  });

  it('requires a tool name', async () => {
    const { handler, session } = createHandler();

    const response = await handler.handleMessage({ jsonrpc: '2.0', id: 6, method: 'tools/call', params: {} }, session);

    assert.deepEqual(response?.error, { code: -32602, message: 'Missing tool name' });
  });

  it('rejects unknown methods', async () => {
    const { handler, session } = createHandler();

    const response = await handler.handleMessage({ jsonrpc: '2.0', id: 7, method: 'resources/list' }, session);

    assert.deepEqual(response?.error, { code: -32601, message: 'Method not found: resources/list' });
  });

  it('rejects malformed messages, keeping the id when there is one', async () => {
    const { handler, session } = createHandler();

    assert.deepEqual(await handler.handleMessage({ id: 8, method: 'ping' }, session), {
      jsonrpc: '2.0',
      id: 8,
      error: { code: -32600, message: 'Invalid request' },
    });
    assert.deepEqual(await handler.handleMessage('ping', session), {
      jsonrpc: '2.0',
      id: null,
      error: { code: -32600, message: 'Invalid request' },
    });
  });

  it('answers a batch in order, skipping notifications', async () => {
    const { handler, session } = createHandler();

    const responses = await handler.handleBatch(
      [
        { jsonrpc: '2.0', id: 'a', method: 'ping' },
        { jsonrpc: '2.0', method: 'notifications/cancelled', params: { requestId: 'x' } },
        { jsonrpc: '2.0', id: 'b', method: 'tools/call', params: { name: 'echo', arguments: { value: 'yo' } } },
      ],
      session
    );

    assert.deepEqual(
      responses.map((response) => response.id),
      ['a', 'b']
    );
    assert.deepEqual(responses[1]?.result, { content: [{ type: 'application/json', data: 'yo' }] });
  });

  it('keeps sessions until closed', () => {
    const { handler } = createHandler();
    const session = handler.getOrCreateSession();

    assert.equal(handler.getOrCreateSession(session.id), session);
    assert.equal(handler.closeSession(session.id), true);
    assert.equal(handler.getSession(session.id), undefined);
  });
});
