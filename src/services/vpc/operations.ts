/**
 * VPC and subnet operations
 */

import {
  AssociateVpcCidrBlockCommand,
  AssociateVpcCidrBlockCommandInput,
  AssociateVpcCidrBlockCommandOutput,
  CreateSubnetCommand,
  CreateSubnetCommandInput,
  CreateSubnetCommandOutput,
  CreateTagsCommand,
  CreateTagsCommandInput,
  CreateTagsCommandOutput,
  CreateVpcCommand,
  CreateVpcCommandInput,
  CreateVpcCommandOutput,
  DeleteSubnetCommand,
  DeleteSubnetCommandInput,
  DeleteSubnetCommandOutput,
  DeleteVpcCommand,
  DeleteVpcCommandInput,
  DeleteVpcCommandOutput,
  DescribeSubnetsCommand,
  DescribeSubnetsCommandInput,
  DescribeSubnetsCommandOutput,
  DescribeVpcsCommand,
  DescribeVpcsCommandInput,
  DescribeVpcsCommandOutput,
  EC2Client,
  ModifyVpcAttributeCommand,
  ModifyVpcAttributeCommandInput,
  ModifyVpcAttributeCommandOutput,
} from '@aws-sdk/client-ec2';
import { Operation, ProviderClient, SdkProvider } from '../../gateway/index.js';
import { ServiceConfig } from '../../types.js';
import { awsClientSettings } from '../aws.js';

export interface VpcOperations {
  DescribeVpcs: Operation<DescribeVpcsCommandInput, DescribeVpcsCommandOutput>;
  CreateVpc: Operation<CreateVpcCommandInput, CreateVpcCommandOutput>;
  AssociateVpcCidrBlock: Operation<AssociateVpcCidrBlockCommandInput, AssociateVpcCidrBlockCommandOutput>;
  DeleteVpc: Operation<DeleteVpcCommandInput, DeleteVpcCommandOutput>;
  ModifyVpcAttribute: Operation<ModifyVpcAttributeCommandInput, ModifyVpcAttributeCommandOutput>;
  DescribeSubnets: Operation<DescribeSubnetsCommandInput, DescribeSubnetsCommandOutput>;
  CreateSubnet: Operation<CreateSubnetCommandInput, CreateSubnetCommandOutput>;
  DeleteSubnet: Operation<DeleteSubnetCommandInput, DeleteSubnetCommandOutput>;
  CreateTags: Operation<CreateTagsCommandInput, CreateTagsCommandOutput>;
}

export function createVpcProvider(config: ServiceConfig): ProviderClient<VpcOperations> {
  const client = new EC2Client(awsClientSettings(config));

  return new SdkProvider<VpcOperations>('ec2', {
    DescribeVpcs: (input) => client.send(new DescribeVpcsCommand(input)),
    CreateVpc: (input) => client.send(new CreateVpcCommand(input)),
    AssociateVpcCidrBlock: (input) => client.send(new AssociateVpcCidrBlockCommand(input)),
    DeleteVpc: (input) => client.send(new DeleteVpcCommand(input)),
    ModifyVpcAttribute: (input) => client.send(new ModifyVpcAttributeCommand(input)),
    DescribeSubnets: (input) => client.send(new DescribeSubnetsCommand(input)),
    CreateSubnet: (input) => client.send(new CreateSubnetCommand(input)),
    DeleteSubnet: (input) => client.send(new DeleteSubnetCommand(input)),
    CreateTags: (input) => client.send(new CreateTagsCommand(input)),
  });
}
