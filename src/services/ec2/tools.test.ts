import '../../tests/setup.js';
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ToolRegistry } from '../../gateway/index.js';
import { FakeHandlers, FakeProvider, metadata, serviceException } from '../../tests/fake-provider.js';
import { Ec2Operations } from './operations.js';
import { registerEc2Tools } from './tools.js';

function setup(handlers: FakeHandlers<Ec2Operations> = {}) {
  const registry = new ToolRegistry();
  const provider = new FakeProvider<Ec2Operations>(handlers);
  registerEc2Tools(registry, provider);
  return { registry, provider };
}

describe('EC2 tools', () => {
  it('registers the instance tools', () => {
    const { registry } = setup();

    assert.deepEqual(
      registry.list().map((tool) => tool.name),
      [
        'list_instances',
        'describe_instance',
        'start_instance',
        'stop_instance',
        'reboot_instance',
        'terminate_instance',
        'run_instances',
        'create_image',
        'create_tags',
      ]
    );
  });

  it('list_instances drains every page and flattens reservations', async () => {
    const { registry, provider } = setup({
      DescribeInstances: ({ NextToken }) =>
        NextToken === undefined
          ? {
              ...metadata,
              Reservations: [{ Instances: [{ InstanceId: 'i-1' }, { InstanceId: 'i-2' }] }],
              NextToken: 'page-2',
            }
          : { ...metadata, Reservations: [{ Instances: [{ InstanceId: 'i-3' }] }, {}] },
    });

    const response = await registry.invoke('list_instances', { state: 'running' });

    assert.deepEqual(response, {
      ok: true,
      content: [
        {
          type: 'application/json',
          data: [{ InstanceId: 'i-1' }, { InstanceId: 'i-2' }, { InstanceId: 'i-3' }],
        },
      ],
    });
    assert.deepEqual(provider.calls, [
      {
        operation: 'DescribeInstances',
        input: { Filters: [{ Name: 'instance-state-name', Values: ['running'] }] },
      },
      {
        operation: 'DescribeInstances',
        input: { Filters: [{ Name: 'instance-state-name', Values: ['running'] }], NextToken: 'page-2' },
      },
    ]);
  });

  it('list_instances rejects an unknown state before calling the provider', async () => {
    const { registry, provider } = setup();

    const response = await registry.invoke('list_instances', { state: 'sleeping' });

    assert.ok(!response.ok);
    assert.equal(response.error.message, "Invalid argument 'state': Unsupported instance state");
    assert.equal(provider.calls.length, 0);
  });

  it('describe_instance returns the first match or not-found', async () => {
    const found = setup({
      DescribeInstances: () => ({
        ...metadata,
        Reservations: [{ Instances: [{ InstanceId: 'i-1' }] }, { Instances: [{ InstanceId: 'i-9' }] }],
      }),
    });
    const empty = setup({ DescribeInstances: () => ({ ...metadata, Reservations: [] }) });

    const hit = await found.registry.invoke('describe_instance', { instance_id: 'i-1' });
    const miss = await empty.registry.invoke('describe_instance', { instance_id: 'i-0' });

    assert.deepEqual(hit, { ok: true, content: [{ type: 'application/json', data: { InstanceId: 'i-1' } }] });
    assert.deepEqual(found.provider.calls[0]?.input, { InstanceIds: ['i-1'] });
    assert.ok(!miss.ok);
    assert.equal(miss.error.message, 'Instance i-0 not found');
  });

  it('stop_instance sends Force false by default', async () => {
    const { registry, provider } = setup({
      StopInstances: () => ({ ...metadata, StoppingInstances: [{ InstanceId: 'i-1' }] }),
    });

    const response = await registry.invoke('stop_instance', { instance_id: 'i-1' });

    assert.deepEqual(provider.calls[0]?.input, { InstanceIds: ['i-1'], Force: false });
    assert.deepEqual(response, { ok: true, content: [{ type: 'application/json', data: [{ InstanceId: 'i-1' }] }] });
  });

  it('reboot_instance reports a status message', async () => {
    const { registry } = setup({ RebootInstances: () => ({ ...metadata }) });

    const response = await registry.invoke('reboot_instance', { instance_id: 'i-1' });

    assert.deepEqual(response, {
      ok: true,
      content: [{ type: 'application/json', data: { message: 'Instance i-1 rebooted' } }],
    });
  });

  it('run_instances builds the request from present arguments only', async () => {
    const { registry, provider } = setup({
      RunInstances: () => ({ ...metadata, Instances: [{ InstanceId: 'i-new' }] }),
    });

    const response = await registry.invoke('run_instances', {
      image_id: 'ami-1',
      instance_type: 't3.micro',
      user_data: 'echo hi',
      iam_instance_profile: 'web-role',
    });

    assert.deepEqual(provider.calls[0]?.input, {
      ImageId: 'ami-1',
      InstanceType: 't3.micro',
      MinCount: 1,
      MaxCount: 1,
      UserData: 'ZWNobyBoaQ==',
      IamInstanceProfile: { Name: 'web-role' },
    });
    assert.deepEqual(response, {
      ok: true,
      content: [{ type: 'application/json', data: [{ InstanceId: 'i-new' }] }],
    });
  });

  it('run_instances rejects an unknown instance type', async () => {
    const { registry, provider } = setup();

    const response = await registry.invoke('run_instances', { image_id: 'ami-1', instance_type: 'huge' });

    assert.ok(!response.ok);
    assert.equal(response.error.message, "Invalid argument 'instance_type': Unsupported instance type");
    assert.equal(provider.calls.length, 0);
  });

  it('create_image returns the image id and keeps NoReboot false', async () => {
    const { registry, provider } = setup({ CreateImage: () => ({ ...metadata, ImageId: 'ami-2' }) });

    const response = await registry.invoke('create_image', { instance_id: 'i-1', name: 'nightly' });

    assert.deepEqual(provider.calls[0]?.input, { InstanceId: 'i-1', Name: 'nightly', NoReboot: false });
    assert.deepEqual(response, { ok: true, content: [{ type: 'application/json', data: { ImageId: 'ami-2' } }] });
  });

  it('create_tags converts the tag map', async () => {
    const { registry, provider } = setup({ CreateTags: () => ({ ...metadata }) });

    const response = await registry.invoke('create_tags', {
      resource_ids: ['i-1', 'i-2'],
      tags: { Name: 'web', Env: 'test' },
    });

    assert.deepEqual(provider.calls[0]?.input, {
      Resources: ['i-1', 'i-2'],
      Tags: [
        { Key: 'Name', Value: 'web' },
        { Key: 'Env', Value: 'test' },
      ],
    });
    assert.deepEqual(response, {
      ok: true,
      content: [{ type: 'application/json', data: { message: 'Tags applied', resources: ['i-1', 'i-2'] } }],
    });
  });

  it('terminate_instance surfaces the provider diagnostic', async () => {
    const { registry } = setup({
      TerminateInstances: () => {
        throw serviceException('UnauthorizedOperation', 'You are not authorized to perform this operation.', 403);
      },
    });

    const response = await registry.invoke('terminate_instance', { instance_id: 'i-1' });

    assert.ok(!response.ok);
    assert.deepEqual(JSON.parse(response.error.message), {
      code: 'UnauthorizedOperation',
      message: 'You are not authorized to perform this operation.',
      fault: 'client',
      httpStatusCode: 403,
      requestId: 'req-1',
    });
  });
});
