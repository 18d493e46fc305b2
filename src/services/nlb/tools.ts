/**
 * Network Load Balancer tools: load balancers, target groups and listeners
 */

import {
  ActionTypeEnum,
  CreateTargetGroupCommandInput,
  DescribeListenersCommandInput,
  DescribeLoadBalancersCommandInput,
  DescribeTargetGroupsCommandInput,
  IpAddressType,
  LoadBalancerSchemeEnum,
  LoadBalancerTypeEnum,
  ModifyListenerCommandInput,
  ProtocolEnum,
  TargetTypeEnum,
} from '@aws-sdk/client-elastic-load-balancing-v2';
import { z } from 'zod';
import {
  bodyOrStatus,
  buildRequest,
  firstOrNotFound,
  keyValuePairs,
  ProviderClient,
  success,
  ToolFactory,
  ToolRegistry,
} from '../../gateway/index.js';
import { sdkEnum } from '../aws.js';
import { NlbOperations } from './operations.js';

const NLB_PROTOCOLS = new Set(['TCP', 'TLS', 'UDP', 'TCP_UDP']);

const loadBalancerArn = z.string().min(1).describe('Load balancer ARN');
const targetGroupArn = z.string().min(1).describe('Target group ARN');
const listenerArn = z.string().min(1).describe('Listener ARN');
const protocol = sdkEnum(ProtocolEnum, 'protocol');
const port = z.number().int().min(1).max(65535);

// Unknown keys are rejected rather than dropped
const targets = z
  .array(
    z.object({
      Id: z.string().min(1),
      Port: port.optional(),
      AvailabilityZone: z.string().optional(),
    }).strict()
  )
  .min(1);

const actions = z.array(
  z.object({
    Type: sdkEnum(ActionTypeEnum, 'action type'),
    TargetGroupArn: z.string().optional(),
    Order: z.number().int().optional(),
    ForwardConfig: z
      .object({
        TargetGroups: z
          .array(z.object({ TargetGroupArn: z.string(), Weight: z.number().int().optional() }).strict())
          .optional(),
        TargetGroupStickinessConfig: z
          .object({ Enabled: z.boolean().optional(), DurationSeconds: z.number().int().optional() })
          .strict()
          .optional(),
      })
      .strict()
      .optional(),
  }).strict()
);

export function registerNlbTools(registry: ToolRegistry, provider: ProviderClient<NlbOperations>): void {
  const tools = new ToolFactory<NlbOperations>(registry, provider);

  tools
    .tool('list_load_balancers', 'List Network Load Balancers', {})
    .drain(
      'DescribeLoadBalancers',
      (_args, cursor) => buildRequest<DescribeLoadBalancersCommandInput>({}).set('Marker', cursor).build(),
      (output) => ({ items: output.LoadBalancers, nextToken: output.NextMarker }),
      (loadBalancers) => success(loadBalancers.filter((lb) => lb.Type === 'network'))
    );

  tools
    .tool('describe_load_balancer', 'Describe a Network Load Balancer', { load_balancer_arn: loadBalancerArn })
    .call(
      'DescribeLoadBalancers',
      ({ load_balancer_arn }) => ({ LoadBalancerArns: [load_balancer_arn] }),
      (output, { load_balancer_arn }) =>
        firstOrNotFound(output.LoadBalancers, `Load balancer ${load_balancer_arn} not found`)
    );

  tools
    .tool('create_load_balancer', 'Create a Network Load Balancer', {
      name: z.string().min(1),
      subnets: z.array(z.string().min(1)).min(1),
      scheme: sdkEnum(LoadBalancerSchemeEnum, 'scheme').default('internet-facing'),
      ip_address_type: sdkEnum(IpAddressType, 'IP address type').default('ipv4'),
      type: sdkEnum(LoadBalancerTypeEnum, 'load balancer type').default('network'),
    })
    .call(
      'CreateLoadBalancer',
      (args) => ({
        Name: args.name,
        Subnets: args.subnets,
        Scheme: args.scheme,
        Type: args.type,
        IpAddressType: args.ip_address_type,
      }),
      (output) => success(output.LoadBalancers ?? [])
    );

  tools
    .tool('delete_load_balancer', 'Delete a Network Load Balancer', { load_balancer_arn: loadBalancerArn })
    .call(
      'DeleteLoadBalancer',
      ({ load_balancer_arn }) => ({ LoadBalancerArn: load_balancer_arn }),
      (output, { load_balancer_arn }) =>
        success(bodyOrStatus(output, `Load balancer ${load_balancer_arn} deletion initiated`))
    );

  tools
    .tool('modify_load_balancer_attributes', 'Update NLB attributes', {
      load_balancer_arn: loadBalancerArn,
      attributes: z.record(z.string()).describe('Attribute keys mapped to values'),
    })
    .call(
      'ModifyLoadBalancerAttributes',
      ({ load_balancer_arn, attributes }) => ({
        LoadBalancerArn: load_balancer_arn,
        Attributes: keyValuePairs(attributes),
      }),
      (output) => success(output.Attributes ?? [])
    );

  tools
    .tool('list_target_groups', 'List NLB target groups', { load_balancer_arn: loadBalancerArn.optional() })
    .drain(
      'DescribeTargetGroups',
      ({ load_balancer_arn }, cursor) =>
        buildRequest<DescribeTargetGroupsCommandInput>({})
          .set('LoadBalancerArn', load_balancer_arn)
          .set('Marker', cursor)
          .build(),
      (output) => ({ items: output.TargetGroups, nextToken: output.NextMarker }),
      (targetGroups) =>
        success(targetGroups.filter((tg) => NLB_PROTOCOLS.has((tg.Protocol ?? '').toUpperCase())))
    );

  tools
    .tool('create_target_group', 'Create a target group for NLB', {
      name: z.string().min(1),
      protocol,
      port,
      vpc_id: z.string().min(1),
      target_type: sdkEnum(TargetTypeEnum, 'target type').default('instance'),
      health_check_protocol: protocol.optional(),
      health_check_port: z.string().min(1).optional().describe('Port number or "traffic-port"'),
    })
    .call(
      'CreateTargetGroup',
      (args) =>
        buildRequest<CreateTargetGroupCommandInput>({
          Name: args.name,
          Protocol: args.protocol,
          Port: args.port,
          VpcId: args.vpc_id,
          TargetType: args.target_type,
        })
          .set('HealthCheckProtocol', args.health_check_protocol)
          .set('HealthCheckPort', args.health_check_port)
          .build(),
      (output) => success(output.TargetGroups ?? [])
    );

  tools
    .tool('delete_target_group', 'Delete an NLB target group', { target_group_arn: targetGroupArn })
    .call(
      'DeleteTargetGroup',
      ({ target_group_arn }) => ({ TargetGroupArn: target_group_arn }),
      (output, { target_group_arn }) =>
        success(bodyOrStatus(output, `Target group ${target_group_arn} deletion initiated`))
    );

  tools
    .tool('register_targets', 'Register targets with an NLB target group', {
      target_group_arn: targetGroupArn,
      targets,
    })
    .call(
      'RegisterTargets',
      (args) => ({ TargetGroupArn: args.target_group_arn, Targets: args.targets }),
      (output) => success(bodyOrStatus(output, 'Targets registration initiated'))
    );

  tools
    .tool('deregister_targets', 'Deregister targets from an NLB target group', {
      target_group_arn: targetGroupArn,
      targets,
    })
    .call(
      'DeregisterTargets',
      (args) => ({ TargetGroupArn: args.target_group_arn, Targets: args.targets }),
      (output) => success(bodyOrStatus(output, 'Targets deregistration initiated'))
    );

  tools
    .tool('list_listeners', 'List listeners for a Network Load Balancer', { load_balancer_arn: loadBalancerArn })
    .drain(
      'DescribeListeners',
      ({ load_balancer_arn }, cursor) =>
        buildRequest<DescribeListenersCommandInput>({ LoadBalancerArn: load_balancer_arn })
          .set('Marker', cursor)
          .build(),
      (output) => ({ items: output.Listeners, nextToken: output.NextMarker })
    );

  tools
    .tool('create_listener', 'Create a listener for an NLB', {
      load_balancer_arn: loadBalancerArn,
      protocol,
      port,
      default_actions: actions.min(1),
    })
    .call(
      'CreateListener',
      (args) => ({
        LoadBalancerArn: args.load_balancer_arn,
        Protocol: args.protocol,
        Port: args.port,
        DefaultActions: args.default_actions,
      }),
      (output) => success(output.Listeners ?? [])
    );

  tools
    .tool('delete_listener', 'Delete an NLB listener', { listener_arn: listenerArn })
    .call(
      'DeleteListener',
      ({ listener_arn }) => ({ ListenerArn: listener_arn }),
      (output, { listener_arn }) => success(bodyOrStatus(output, `Listener ${listener_arn} deletion initiated`))
    );

  tools
    .tool('modify_listener', 'Modify an NLB listener', {
      listener_arn: listenerArn,
      default_actions: actions.optional(),
      port: port.optional(),
      protocol: protocol.optional(),
    })
    .call(
      'ModifyListener',
      (args) =>
        buildRequest<ModifyListenerCommandInput>({ ListenerArn: args.listener_arn })
          .set('DefaultActions', args.default_actions)
          .set('Port', args.port)
          .set('Protocol', args.protocol)
          .build(),
      (output) => success(output.Listeners ?? [])
    );
}
