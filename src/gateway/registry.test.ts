import '../tests/setup.js';
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';
import { defineTool, ToolRegistry, validateArguments } from './registry.js';
import { DuplicateToolError, InvalidArgumentError, MissingArgumentError, ProviderError, UnknownToolError } from './errors.js';
import { notFound, success } from './outcome.js';

function echoRegistry(calls: unknown[] = []): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(defineTool('echo', 'Echo a value', { value: z.string() }), async ({ value }) => {
    calls.push(value);
    return success(value);
  });
  return registry;
}

describe('defineTool', () => {
  it('derives the advertised input schema from the argument shape', () => {
    const tool = defineTool('run', 'Run something', {
      image_id: z.string(),
      count: z.number().int().default(1),
      note: z.string().optional(),
    });

    assert.equal(tool.inputSchema.type, 'object');
    assert.deepEqual(Object.keys(tool.inputSchema.properties), ['image_id', 'count', 'note']);
    assert.deepEqual(tool.inputSchema.required, ['image_id']);
  });

  it('omits required when every argument is optional', () => {
    const tool = defineTool('list', 'List things', { state: z.string().optional() });
    assert.equal(tool.inputSchema.required, undefined);
  });
});

describe('validateArguments', () => {
  const schema = z.object({ a: z.string(), b: z.string(), port: z.number().default(80) });

  it('applies declared defaults', () => {
    assert.deepEqual(validateArguments(schema, { a: 'x', b: 'y' }), success({ a: 'x', b: 'y', port: 80 }));
  });

  it('names every missing argument in declaration order', () => {
    const result = validateArguments(schema, {});

    assert.ok(result.kind === 'validation');
    assert.ok(result.error instanceof MissingArgumentError);
    assert.equal(result.error.message, 'Missing required arguments: a, b');
    assert.deepEqual(result.error.arguments, ['a', 'b']);
  });

  it('treats absent arguments as an empty object', () => {
    const result = validateArguments(z.object({ value: z.string() }), undefined);

    assert.ok(result.kind === 'validation');
    assert.equal(result.error.message, 'Missing required argument: value');
  });

  it('reports a malformed argument by path', () => {
    const result = validateArguments(schema, { a: 'x', b: 'y', port: 'eighty' });

    assert.ok(result.kind === 'validation');
    assert.ok(result.error instanceof InvalidArgumentError);
    assert.equal(result.error.message, "Invalid argument 'port': Expected number, received string");
    assert.equal(result.error.argument, 'port');
  });
});

describe('ToolRegistry', () => {
  it('lists tools in registration order', () => {
    const registry = echoRegistry();
    registry.register(defineTool('ping', 'Ping', {}), async () => success('pong'));

    assert.deepEqual(
      registry.list().map((tool) => tool.name),
      ['echo', 'ping']
    );
    assert.equal(registry.size, 2);
    assert.ok(registry.has('ping'));
    assert.equal(registry.get('echo')?.description, 'Echo a value');
  });

  it('rejects a second registration under the same name', () => {
    const registry = echoRegistry();

    assert.throws(
      () => registry.register(defineTool('echo', 'Again', {}), async () => success(null)),
      (error: unknown) => error instanceof DuplicateToolError && error.message === 'Tool already registered: echo'
    );
    assert.equal(registry.get('echo')?.description, 'Echo a value');
  });

  it('wraps a successful result in one envelope', async () => {
    const calls: unknown[] = [];
    const response = await echoRegistry(calls).invoke('echo', { value: 'hi' });

    assert.deepEqual(response, { ok: true, content: [{ type: 'application/json', data: 'hi' }] });
    assert.deepEqual(calls, ['hi']);
  });

  it('fails validation without running the handler', async () => {
    const calls: unknown[] = [];
    const response = await echoRegistry(calls).invoke('echo', {});

    assert.equal(response.ok, false);
    assert.ok(!response.ok && response.error instanceof MissingArgumentError);
    assert.equal(!response.ok && response.error.message, 'Missing required argument: value');
    assert.deepEqual(calls, []);
  });

  it('rejects an unknown tool name', async () => {
    await assert.rejects(
      echoRegistry().invoke('nope', {}),
      (error: unknown) => error instanceof UnknownToolError && error.message === 'Unknown tool: nope'
    );
  });

  it('normalizes a returned domain failure', async () => {
    const registry = new ToolRegistry();
    registry.register(defineTool('find', 'Find', {}), async () => notFound('Instance i-1 not found'));

    const response = await registry.invoke('find', {});

    assert.equal(!response.ok && response.error.message, 'Instance i-1 not found');
  });

  it('normalizes errors thrown by a handler', async () => {
    const registry = new ToolRegistry();
    registry.register(defineTool('fail', 'Fail', {}), async () => {
      throw new ProviderError('AccessDenied', 'Not allowed');
    });
    registry.register(defineTool('crash', 'Crash', {}), async () => {
      throw new Error('boom');
    });

    const provider = await registry.invoke('fail', {});
    const transport = await registry.invoke('crash', {});

    assert.equal(!provider.ok && provider.error.message, '{"code":"AccessDenied","message":"Not allowed"}');
    assert.equal(!transport.ok && transport.error.message, 'boom');
  });
});
