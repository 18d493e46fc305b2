/**
 * EC2 instance operations
 */

import {
  CreateImageCommand,
  CreateImageCommandInput,
  CreateImageCommandOutput,
  CreateTagsCommand,
  CreateTagsCommandInput,
  CreateTagsCommandOutput,
  DescribeInstancesCommand,
  DescribeInstancesCommandInput,
  DescribeInstancesCommandOutput,
  EC2Client,
  RebootInstancesCommand,
  RebootInstancesCommandInput,
  RebootInstancesCommandOutput,
  RunInstancesCommand,
  RunInstancesCommandInput,
  RunInstancesCommandOutput,
  StartInstancesCommand,
  StartInstancesCommandInput,
  StartInstancesCommandOutput,
  StopInstancesCommand,
  StopInstancesCommandInput,
  StopInstancesCommandOutput,
  TerminateInstancesCommand,
  TerminateInstancesCommandInput,
  TerminateInstancesCommandOutput,
} from '@aws-sdk/client-ec2';
import { Operation, ProviderClient, SdkProvider } from '../../gateway/index.js';
import { ServiceConfig } from '../../types.js';
import { awsClientSettings } from '../aws.js';

export interface Ec2Operations {
  DescribeInstances: Operation<DescribeInstancesCommandInput, DescribeInstancesCommandOutput>;
  StartInstances: Operation<StartInstancesCommandInput, StartInstancesCommandOutput>;
  StopInstances: Operation<StopInstancesCommandInput, StopInstancesCommandOutput>;
  RebootInstances: Operation<RebootInstancesCommandInput, RebootInstancesCommandOutput>;
  TerminateInstances: Operation<TerminateInstancesCommandInput, TerminateInstancesCommandOutput>;
  RunInstances: Operation<RunInstancesCommandInput, RunInstancesCommandOutput>;
  CreateImage: Operation<CreateImageCommandInput, CreateImageCommandOutput>;
  CreateTags: Operation<CreateTagsCommandInput, CreateTagsCommandOutput>;
}

export function createEc2Provider(config: ServiceConfig): ProviderClient<Ec2Operations> {
  const client = new EC2Client(awsClientSettings(config));

  return new SdkProvider<Ec2Operations>('ec2', {
    DescribeInstances: (input) => client.send(new DescribeInstancesCommand(input)),
    StartInstances: (input) => client.send(new StartInstancesCommand(input)),
    StopInstances: (input) => client.send(new StopInstancesCommand(input)),
    RebootInstances: (input) => client.send(new RebootInstancesCommand(input)),
    TerminateInstances: (input) => client.send(new TerminateInstancesCommand(input)),
    RunInstances: (input) => client.send(new RunInstancesCommand(input)),
    CreateImage: (input) => client.send(new CreateImageCommand(input)),
    CreateTags: (input) => client.send(new CreateTagsCommand(input)),
  });
}
