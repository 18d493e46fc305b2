/**
 * EC2 tools: instance lifecycle, AMIs and tagging
 */

import {
  _InstanceType,
  CreateImageCommandInput,
  DescribeInstancesCommandInput,
  DescribeInstancesCommandOutput,
  Instance,
  InstanceStateName,
  RunInstancesCommandInput,
} from '@aws-sdk/client-ec2';
import { z } from 'zod';
import {
  buildRequest,
  firstOrNotFound,
  keyValuePairs,
  mapPresent,
  ProviderClient,
  success,
  ToolFactory,
  ToolRegistry,
} from '../../gateway/index.js';
import { sdkEnum, tagMap } from '../aws.js';
import { Ec2Operations } from './operations.js';

const instanceId = z.string().min(1).describe('EC2 instance ID, e.g. i-0123456789abcdef0');

function instancesOf(output: DescribeInstancesCommandOutput): Instance[] {
  return (output.Reservations ?? []).flatMap((reservation) => reservation.Instances ?? []);
}

export function registerEc2Tools(registry: ToolRegistry, provider: ProviderClient<Ec2Operations>): void {
  const tools = new ToolFactory<Ec2Operations>(registry, provider);

  tools
    .tool('list_instances', 'List EC2 instances', {
      state: sdkEnum(InstanceStateName, 'instance state').optional(),
    })
    .drain(
      'DescribeInstances',
      ({ state }, cursor) =>
        buildRequest<DescribeInstancesCommandInput>({})
          .set('Filters', mapPresent(state, (value) => [{ Name: 'instance-state-name', Values: [value] }]))
          .set('NextToken', cursor)
          .build(),
      (output) => ({ items: instancesOf(output), nextToken: output.NextToken })
    );

  tools
    .tool('describe_instance', 'Describe an EC2 instance', { instance_id: instanceId })
    .call(
      'DescribeInstances',
      ({ instance_id }) => ({ InstanceIds: [instance_id] }),
      (output, { instance_id }) => firstOrNotFound(instancesOf(output), `Instance ${instance_id} not found`)
    );

  tools
    .tool('start_instance', 'Start an EC2 instance', { instance_id: instanceId })
    .call(
      'StartInstances',
      ({ instance_id }) => ({ InstanceIds: [instance_id] }),
      (output) => success(output.StartingInstances ?? [])
    );

  tools
    .tool('stop_instance', 'Stop an EC2 instance', {
      instance_id: instanceId,
      force: z.boolean().default(false).describe('Force the instance to stop without flushing caches'),
    })
    .call(
      'StopInstances',
      ({ instance_id, force }) => ({ InstanceIds: [instance_id], Force: force }),
      (output) => success(output.StoppingInstances ?? [])
    );

  tools
    .tool('reboot_instance', 'Reboot an EC2 instance', { instance_id: instanceId })
    .call(
      'RebootInstances',
      ({ instance_id }) => ({ InstanceIds: [instance_id] }),
      (_output, { instance_id }) => success({ message: `Instance ${instance_id} rebooted` })
    );

  tools
    .tool('terminate_instance', 'Terminate an EC2 instance', { instance_id: instanceId })
    .call(
      'TerminateInstances',
      ({ instance_id }) => ({ InstanceIds: [instance_id] }),
      (output) => success(output.TerminatingInstances ?? [])
    );

  tools
    .tool('run_instances', 'Launch new EC2 instances', {
      image_id: z.string().min(1).describe('AMI ID'),
      instance_type: sdkEnum(_InstanceType, 'instance type'),
      key_name: z.string().min(1).optional(),
      min_count: z.number().int().min(1).default(1),
      max_count: z.number().int().min(1).default(1),
      subnet_id: z.string().min(1).optional(),
      security_group_ids: z.array(z.string().min(1)).optional(),
      user_data: z.string().optional().describe('Plain-text user data; encoded to base64 before sending'),
      iam_instance_profile: z.string().min(1).optional().describe('IAM instance profile name'),
    })
    .call(
      'RunInstances',
      (args) =>
        buildRequest<RunInstancesCommandInput>({
          ImageId: args.image_id,
          InstanceType: args.instance_type,
          MinCount: args.min_count,
          MaxCount: args.max_count,
        })
          .set('KeyName', args.key_name)
          .set('SubnetId', args.subnet_id)
          .set('SecurityGroupIds', args.security_group_ids)
          .set('UserData', mapPresent(args.user_data, (text) => Buffer.from(text, 'utf-8').toString('base64')))
          .set('IamInstanceProfile', mapPresent(args.iam_instance_profile, (name) => ({ Name: name })))
          .build(),
      (output) => success(output.Instances ?? [])
    );

  tools
    .tool('create_image', 'Create an AMI from an instance', {
      instance_id: instanceId,
      name: z.string().min(1),
      description: z.string().optional(),
      no_reboot: z.boolean().default(false),
    })
    .call(
      'CreateImage',
      (args) =>
        buildRequest<CreateImageCommandInput>({
          InstanceId: args.instance_id,
          Name: args.name,
          NoReboot: args.no_reboot,
        })
          .set('Description', args.description)
          .build(),
      (output) => success({ ImageId: output.ImageId ?? null })
    );

  tools
    .tool('create_tags', 'Apply tags to EC2 resources', {
      resource_ids: z.array(z.string().min(1)).min(1),
      tags: tagMap,
    })
    .call(
      'CreateTags',
      ({ resource_ids, tags }) => ({ Resources: resource_ids, Tags: keyValuePairs(tags) }),
      (_output, { resource_ids }) => success({ message: 'Tags applied', resources: resource_ids })
    );
}
