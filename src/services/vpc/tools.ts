/**
 * VPC tools: VPCs, subnets and tagging
 */

import {
  CreateSubnetCommandInput,
  DescribeSubnetsCommandInput,
  DescribeVpcsCommandInput,
  ModifyVpcAttributeCommandInput,
  Tenancy,
  Vpc,
} from '@aws-sdk/client-ec2';
import { z } from 'zod';
import {
  bodyOrStatus,
  buildRequest,
  Failure,
  firstOrNotFound,
  invalid,
  isPresent,
  keyValuePairs,
  mapPresent,
  ProviderClient,
  ProviderError,
  success,
  ToolFactory,
  ToolOutcome,
  ToolRegistry,
} from '../../gateway/index.js';
import { logger } from '../../logger.js';
import { sdkEnum, tagMap } from '../aws.js';
import { VpcOperations } from './operations.js';

/**
 * Failure of a follow-up step, carrying the id of the VPC already created
 */
function withCreatedVpc(failure: Failure, createdVpcId: string | undefined): Failure {
  const { error } = failure;
  const code = failure.kind === 'provider' ? failure.error.code : error.name;
  const diagnostic = failure.kind === 'provider' ? failure.error.diagnostic : { code, message: error.message };
  return {
    kind: 'provider',
    error: new ProviderError(code, error.message, { ...diagnostic, createdVpcId }),
  };
}

const vpcId = z.string().min(1).describe('VPC ID, e.g. vpc-0123456789abcdef0');

export function registerVpcTools(registry: ToolRegistry, provider: ProviderClient<VpcOperations>): void {
  const tools = new ToolFactory<VpcOperations>(registry, provider);

  tools
    .tool('list_vpcs', 'List all VPCs', {})
    .drain(
      'DescribeVpcs',
      (_args, cursor) => buildRequest<DescribeVpcsCommandInput>({}).set('NextToken', cursor).build(),
      (output) => ({ items: output.Vpcs, nextToken: output.NextToken })
    );

  tools
    .tool('describe_vpc', 'Describe a specific VPC', { vpc_id: vpcId })
    .call(
      'DescribeVpcs',
      ({ vpc_id }) => ({ VpcIds: [vpc_id] }),
      (output, { vpc_id }) => firstOrNotFound(output.Vpcs, `VPC ${vpc_id} not found`)
    );

  /*
   * Creating the VPC and associating its IPv6 block are two provider calls.
   * A failed association leaves the VPC in place; the failure names it.
   */
  tools
    .tool('create_vpc', 'Create a new VPC', {
      cidr_block: z.string().min(1).describe('IPv4 CIDR block, e.g. 10.0.0.0/16'),
      ipv6_support: z.boolean().default(false).describe('Associate an Amazon-provided IPv6 block'),
      instance_tenancy: sdkEnum(Tenancy, 'instance tenancy').default('default'),
    })
    .handle(async ({ cidr_block, ipv6_support, instance_tenancy }): Promise<ToolOutcome> => {
      const created = await tools.call('CreateVpc', { CidrBlock: cidr_block, InstanceTenancy: instance_tenancy });
      if (created.kind !== 'success') {
        return created;
      }
      const vpc: Vpc = created.payload.Vpc ?? {};
      if (!ipv6_support) {
        return success(vpc);
      }

      const associated = await tools.call('AssociateVpcCidrBlock', {
        VpcId: vpc.VpcId,
        AmazonProvidedIpv6CidrBlock: true,
      });
      if (associated.kind === 'success') {
        return success(vpc);
      }
      logger.warn(`VPC ${vpc.VpcId ?? '(unknown)'} created but IPv6 association failed`, {
        kind: associated.kind,
        error: associated.error.message,
      });
      return withCreatedVpc(associated, vpc.VpcId);
    });

  tools
    .tool('delete_vpc', 'Delete a VPC', { vpc_id: vpcId })
    .call(
      'DeleteVpc',
      ({ vpc_id }) => ({ VpcId: vpc_id }),
      (output, { vpc_id }) => success(bodyOrStatus(output, `VPC ${vpc_id} deletion initiated`))
    );

  tools
    .tool(
      'modify_vpc_attribute',
      'Modify VPC DNS attributes; at least one of enable_dns_support or enable_dns_hostnames is required',
      {
        vpc_id: vpcId,
        enable_dns_support: z.boolean().optional(),
        enable_dns_hostnames: z.boolean().optional(),
      }
    )
    .handle(async ({ vpc_id, enable_dns_support, enable_dns_hostnames }): Promise<ToolOutcome> => {
      // The provider accepts one attribute per request
      const changes: ModifyVpcAttributeCommandInput[] = [];
      if (isPresent(enable_dns_support)) {
        changes.push({ VpcId: vpc_id, EnableDnsSupport: { Value: enable_dns_support } });
      }
      if (isPresent(enable_dns_hostnames)) {
        changes.push({ VpcId: vpc_id, EnableDnsHostnames: { Value: enable_dns_hostnames } });
      }
      if (changes.length === 0) {
        return invalid(
          'At least one of enable_dns_support or enable_dns_hostnames is required',
          'enable_dns_support'
        );
      }

      for (const change of changes) {
        const result = await tools.call('ModifyVpcAttribute', change);
        if (result.kind !== 'success') {
          return result;
        }
      }
      return success({ message: 'VPC attributes updated', vpc_id });
    });

  tools
    .tool('list_subnets', 'List subnets optionally filtered by VPC', { vpc_id: vpcId.optional() })
    .drain(
      'DescribeSubnets',
      ({ vpc_id }, cursor) =>
        buildRequest<DescribeSubnetsCommandInput>({})
          .set('Filters', mapPresent(vpc_id, (id) => [{ Name: 'vpc-id', Values: [id] }]))
          .set('NextToken', cursor)
          .build(),
      (output) => ({ items: output.Subnets, nextToken: output.NextToken })
    );

  tools
    .tool('create_subnet', 'Create a subnet within a VPC', {
      vpc_id: vpcId,
      cidr_block: z.string().min(1),
      availability_zone: z.string().min(1).optional(),
    })
    .call(
      'CreateSubnet',
      (args) =>
        buildRequest<CreateSubnetCommandInput>({ VpcId: args.vpc_id, CidrBlock: args.cidr_block })
          .set('AvailabilityZone', args.availability_zone)
          .build(),
      (output) => success(output.Subnet ?? {})
    );

  tools
    .tool('delete_subnet', 'Delete a subnet', { subnet_id: z.string().min(1) })
    .call(
      'DeleteSubnet',
      ({ subnet_id }) => ({ SubnetId: subnet_id }),
      (output, { subnet_id }) => success(bodyOrStatus(output, `Subnet ${subnet_id} deletion initiated`))
    );

  tools
    .tool('create_tags', 'Apply tags to AWS resources', {
      resource_ids: z.array(z.string().min(1)).min(1),
      tags: tagMap,
    })
    .call(
      'CreateTags',
      ({ resource_ids, tags }) => ({ Resources: resource_ids, Tags: keyValuePairs(tags) }),
      (_output, { resource_ids }) => success({ message: 'Tags applied', resources: resource_ids })
    );
}
