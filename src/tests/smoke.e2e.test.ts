/**
 * End-to-end smoke tests: a real HTTP server on an ephemeral port, driven
 * over fetch with an in-process tool registry.
 */

import './setup.js';
import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';
import { MCPHttpServer } from '../server.js';
import { defineTool, isRecord, success, ToolRegistry } from '../gateway/index.js';

function echoRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(defineTool('echo', 'Echo a value', { value: z.string() }), async ({ value }) => success(value));
  return registry;
}

describe('HTTP server smoke', () => {
  const server = new MCPHttpServer(
    { service: 'ec2', host: '127.0.0.1', port: 0 },
    echoRegistry(),
    { name: 'aws-ec2', version: '1.0.0' }
  );
  let baseUrl = '';

  before(async () => {
    await server.start();
    const address = server.address();
    assert.ok(address);
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    await server.stop();
  });

  function post(body: string, sessionId?: string): Promise<Response> {
    return fetch(`${baseUrl}/mcp`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...(sessionId ? { 'Mcp-Session-Id': sessionId } : {}),
      },
      body,
    });
  }

  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    const body: unknown = await res.json();

    assert.equal(res.status, 200);
    assert.ok(isRecord(body));
    assert.equal(body.status, 'ok');
    assert.equal(body.server, 'aws-ec2');
    assert.equal(body.service, 'ec2');
    assert.equal(body.tools, 1);
  });

  it('initializes and calls a tool within one session', async () => {
    const init = await post(JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'initialize', params: {} }));
    const sessionId = init.headers.get('mcp-session-id');
    assert.ok(sessionId);
    assert.deepEqual(await init.json(), {
      jsonrpc: '2.0',
      id: 1,
      result: {
        protocolVersion: '2024-11-05',
        capabilities: { tools: { listChanged: false } },
        serverInfo: { name: 'aws-ec2', version: '1.0.0' },
      },
    });

    const call = await post(
      JSON.stringify({ jsonrpc: '2.0', id: 2, method: 'tools/call', params: { name: 'echo', arguments: { value: 'hi' } } }),
      sessionId
    );
    assert.equal(call.headers.get('mcp-session-id'), sessionId);
    assert.deepEqual(await call.json(), {
      jsonrpc: '2.0',
      id: 2,
      result: { content: [{ type: 'application/json', data: 'hi' }] },
    });

    const closed = await fetch(`${baseUrl}/mcp`, { method: 'DELETE', headers: { 'Mcp-Session-Id': sessionId } });
    assert.equal(closed.status, 204);
  });

  it('returns a tool error for missing arguments', async () => {
    const res = await post(JSON.stringify({ jsonrpc: '2.0', id: 3, method: 'tools/call', params: { name: 'echo' } }));

    assert.deepEqual(await res.json(), {
      jsonrpc: '2.0',
      id: 3,
      error: { code: -32603, message: 'Missing required argument: value' },
    });
  });

  it('answers a notification with 202', async () => {
    const res = await post(JSON.stringify({ jsonrpc: '2.0', method: 'notifications/initialized' }));

    assert.equal(res.status, 202);
    assert.deepEqual(await res.json(), { status: 'accepted' });
  });

  it('rejects a body that is not JSON', async () => {
    const res = await post('{not json');

    assert.equal(res.status, 400);
    assert.deepEqual(await res.json(), { jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } });
  });
});
