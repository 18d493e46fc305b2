/**
 * Elastic Load Balancing v2 operations used for Network Load Balancers
 */

import {
  CreateListenerCommand,
  CreateListenerCommandInput,
  CreateListenerCommandOutput,
  CreateLoadBalancerCommand,
  CreateLoadBalancerCommandInput,
  CreateLoadBalancerCommandOutput,
  CreateTargetGroupCommand,
  CreateTargetGroupCommandInput,
  CreateTargetGroupCommandOutput,
  DeleteListenerCommand,
  DeleteListenerCommandInput,
  DeleteListenerCommandOutput,
  DeleteLoadBalancerCommand,
  DeleteLoadBalancerCommandInput,
  DeleteLoadBalancerCommandOutput,
  DeleteTargetGroupCommand,
  DeleteTargetGroupCommandInput,
  DeleteTargetGroupCommandOutput,
  DeregisterTargetsCommand,
  DeregisterTargetsCommandInput,
  DeregisterTargetsCommandOutput,
  DescribeListenersCommand,
  DescribeListenersCommandInput,
  DescribeListenersCommandOutput,
  DescribeLoadBalancersCommand,
  DescribeLoadBalancersCommandInput,
  DescribeLoadBalancersCommandOutput,
  DescribeTargetGroupsCommand,
  DescribeTargetGroupsCommandInput,
  DescribeTargetGroupsCommandOutput,
  ElasticLoadBalancingV2Client,
  ModifyListenerCommand,
  ModifyListenerCommandInput,
  ModifyListenerCommandOutput,
  ModifyLoadBalancerAttributesCommand,
  ModifyLoadBalancerAttributesCommandInput,
  ModifyLoadBalancerAttributesCommandOutput,
  RegisterTargetsCommand,
  RegisterTargetsCommandInput,
  RegisterTargetsCommandOutput,
} from '@aws-sdk/client-elastic-load-balancing-v2';
import { Operation, ProviderClient, SdkProvider } from '../../gateway/index.js';
import { ServiceConfig } from '../../types.js';
import { awsClientSettings } from '../aws.js';

export interface NlbOperations {
  DescribeLoadBalancers: Operation<DescribeLoadBalancersCommandInput, DescribeLoadBalancersCommandOutput>;
  CreateLoadBalancer: Operation<CreateLoadBalancerCommandInput, CreateLoadBalancerCommandOutput>;
  DeleteLoadBalancer: Operation<DeleteLoadBalancerCommandInput, DeleteLoadBalancerCommandOutput>;
  ModifyLoadBalancerAttributes: Operation<
    ModifyLoadBalancerAttributesCommandInput,
    ModifyLoadBalancerAttributesCommandOutput
  >;
  DescribeTargetGroups: Operation<DescribeTargetGroupsCommandInput, DescribeTargetGroupsCommandOutput>;
  CreateTargetGroup: Operation<CreateTargetGroupCommandInput, CreateTargetGroupCommandOutput>;
  DeleteTargetGroup: Operation<DeleteTargetGroupCommandInput, DeleteTargetGroupCommandOutput>;
  RegisterTargets: Operation<RegisterTargetsCommandInput, RegisterTargetsCommandOutput>;
  DeregisterTargets: Operation<DeregisterTargetsCommandInput, DeregisterTargetsCommandOutput>;
  DescribeListeners: Operation<DescribeListenersCommandInput, DescribeListenersCommandOutput>;
  CreateListener: Operation<CreateListenerCommandInput, CreateListenerCommandOutput>;
  DeleteListener: Operation<DeleteListenerCommandInput, DeleteListenerCommandOutput>;
  ModifyListener: Operation<ModifyListenerCommandInput, ModifyListenerCommandOutput>;
}

export function createNlbProvider(config: ServiceConfig): ProviderClient<NlbOperations> {
  const client = new ElasticLoadBalancingV2Client(awsClientSettings(config));

  return new SdkProvider<NlbOperations>('elbv2', {
    DescribeLoadBalancers: (input) => client.send(new DescribeLoadBalancersCommand(input)),
    CreateLoadBalancer: (input) => client.send(new CreateLoadBalancerCommand(input)),
    DeleteLoadBalancer: (input) => client.send(new DeleteLoadBalancerCommand(input)),
    ModifyLoadBalancerAttributes: (input) => client.send(new ModifyLoadBalancerAttributesCommand(input)),
    DescribeTargetGroups: (input) => client.send(new DescribeTargetGroupsCommand(input)),
    CreateTargetGroup: (input) => client.send(new CreateTargetGroupCommand(input)),
    DeleteTargetGroup: (input) => client.send(new DeleteTargetGroupCommand(input)),
    RegisterTargets: (input) => client.send(new RegisterTargetsCommand(input)),
    DeregisterTargets: (input) => client.send(new DeregisterTargetsCommand(input)),
    DescribeListeners: (input) => client.send(new DescribeListenersCommand(input)),
    CreateListener: (input) => client.send(new CreateListenerCommand(input)),
    DeleteListener: (input) => client.send(new DeleteListenerCommand(input)),
    ModifyListener: (input) => client.send(new ModifyListenerCommand(input)),
  });
}
