/**
 * Transit Gateway operations (served by the EC2 API)
 */

import {
  AcceptTransitGatewayVpcAttachmentCommand,
  AcceptTransitGatewayVpcAttachmentCommandInput,
  AcceptTransitGatewayVpcAttachmentCommandOutput,
  AssociateTransitGatewayRouteTableCommand,
  AssociateTransitGatewayRouteTableCommandInput,
  AssociateTransitGatewayRouteTableCommandOutput,
  CreateTransitGatewayCommand,
  CreateTransitGatewayCommandInput,
  CreateTransitGatewayCommandOutput,
  CreateTransitGatewayRouteCommand,
  CreateTransitGatewayRouteCommandInput,
  CreateTransitGatewayRouteCommandOutput,
  CreateTransitGatewayRouteTableCommand,
  CreateTransitGatewayRouteTableCommandInput,
  CreateTransitGatewayRouteTableCommandOutput,
  CreateTransitGatewayVpcAttachmentCommand,
  CreateTransitGatewayVpcAttachmentCommandInput,
  CreateTransitGatewayVpcAttachmentCommandOutput,
  DeleteTransitGatewayCommand,
  DeleteTransitGatewayCommandInput,
  DeleteTransitGatewayCommandOutput,
  DeleteTransitGatewayRouteCommand,
  DeleteTransitGatewayRouteCommandInput,
  DeleteTransitGatewayRouteCommandOutput,
  DeleteTransitGatewayRouteTableCommand,
  DeleteTransitGatewayRouteTableCommandInput,
  DeleteTransitGatewayRouteTableCommandOutput,
  DeleteTransitGatewayVpcAttachmentCommand,
  DeleteTransitGatewayVpcAttachmentCommandInput,
  DeleteTransitGatewayVpcAttachmentCommandOutput,
  DescribeTransitGatewayAttachmentsCommand,
  DescribeTransitGatewayAttachmentsCommandInput,
  DescribeTransitGatewayAttachmentsCommandOutput,
  DescribeTransitGatewayRouteTablesCommand,
  DescribeTransitGatewayRouteTablesCommandInput,
  DescribeTransitGatewayRouteTablesCommandOutput,
  DescribeTransitGatewaysCommand,
  DescribeTransitGatewaysCommandInput,
  DescribeTransitGatewaysCommandOutput,
  DisassociateTransitGatewayRouteTableCommand,
  DisassociateTransitGatewayRouteTableCommandInput,
  DisassociateTransitGatewayRouteTableCommandOutput,
  EC2Client,
  ModifyTransitGatewayCommand,
  ModifyTransitGatewayCommandInput,
  ModifyTransitGatewayCommandOutput,
} from '@aws-sdk/client-ec2';
import { Operation, ProviderClient, SdkProvider } from '../../gateway/index.js';
import { ServiceConfig } from '../../types.js';
import { awsClientSettings } from '../aws.js';

export interface TgwOperations {
  DescribeTransitGateways: Operation<DescribeTransitGatewaysCommandInput, DescribeTransitGatewaysCommandOutput>;
  CreateTransitGateway: Operation<CreateTransitGatewayCommandInput, CreateTransitGatewayCommandOutput>;
  DeleteTransitGateway: Operation<DeleteTransitGatewayCommandInput, DeleteTransitGatewayCommandOutput>;
  ModifyTransitGateway: Operation<ModifyTransitGatewayCommandInput, ModifyTransitGatewayCommandOutput>;
  DescribeTransitGatewayAttachments: Operation<
    DescribeTransitGatewayAttachmentsCommandInput,
    DescribeTransitGatewayAttachmentsCommandOutput
  >;
  CreateTransitGatewayVpcAttachment: Operation<
    CreateTransitGatewayVpcAttachmentCommandInput,
    CreateTransitGatewayVpcAttachmentCommandOutput
  >;
  DeleteTransitGatewayVpcAttachment: Operation<
    DeleteTransitGatewayVpcAttachmentCommandInput,
    DeleteTransitGatewayVpcAttachmentCommandOutput
  >;
  AcceptTransitGatewayVpcAttachment: Operation<
    AcceptTransitGatewayVpcAttachmentCommandInput,
    AcceptTransitGatewayVpcAttachmentCommandOutput
  >;
  DescribeTransitGatewayRouteTables: Operation<
    DescribeTransitGatewayRouteTablesCommandInput,
    DescribeTransitGatewayRouteTablesCommandOutput
  >;
  CreateTransitGatewayRouteTable: Operation<
    CreateTransitGatewayRouteTableCommandInput,
    CreateTransitGatewayRouteTableCommandOutput
  >;
  DeleteTransitGatewayRouteTable: Operation<
    DeleteTransitGatewayRouteTableCommandInput,
    DeleteTransitGatewayRouteTableCommandOutput
  >;
  AssociateTransitGatewayRouteTable: Operation<
    AssociateTransitGatewayRouteTableCommandInput,
    AssociateTransitGatewayRouteTableCommandOutput
  >;
  DisassociateTransitGatewayRouteTable: Operation<
    DisassociateTransitGatewayRouteTableCommandInput,
    DisassociateTransitGatewayRouteTableCommandOutput
  >;
  CreateTransitGatewayRoute: Operation<CreateTransitGatewayRouteCommandInput, CreateTransitGatewayRouteCommandOutput>;
  DeleteTransitGatewayRoute: Operation<DeleteTransitGatewayRouteCommandInput, DeleteTransitGatewayRouteCommandOutput>;
}

export function createTgwProvider(config: ServiceConfig): ProviderClient<TgwOperations> {
  const client = new EC2Client(awsClientSettings(config));

  return new SdkProvider<TgwOperations>('ec2', {
    DescribeTransitGateways: (input) => client.send(new DescribeTransitGatewaysCommand(input)),
    CreateTransitGateway: (input) => client.send(new CreateTransitGatewayCommand(input)),
    DeleteTransitGateway: (input) => client.send(new DeleteTransitGatewayCommand(input)),
    ModifyTransitGateway: (input) => client.send(new ModifyTransitGatewayCommand(input)),
    DescribeTransitGatewayAttachments: (input) => client.send(new DescribeTransitGatewayAttachmentsCommand(input)),
    CreateTransitGatewayVpcAttachment: (input) => client.send(new CreateTransitGatewayVpcAttachmentCommand(input)),
    DeleteTransitGatewayVpcAttachment: (input) => client.send(new DeleteTransitGatewayVpcAttachmentCommand(input)),
    AcceptTransitGatewayVpcAttachment: (input) => client.send(new AcceptTransitGatewayVpcAttachmentCommand(input)),
    DescribeTransitGatewayRouteTables: (input) => client.send(new DescribeTransitGatewayRouteTablesCommand(input)),
    CreateTransitGatewayRouteTable: (input) => client.send(new CreateTransitGatewayRouteTableCommand(input)),
    DeleteTransitGatewayRouteTable: (input) => client.send(new DeleteTransitGatewayRouteTableCommand(input)),
    AssociateTransitGatewayRouteTable: (input) => client.send(new AssociateTransitGatewayRouteTableCommand(input)),
    DisassociateTransitGatewayRouteTable: (input) => client.send(new DisassociateTransitGatewayRouteTableCommand(input)),
    CreateTransitGatewayRoute: (input) => client.send(new CreateTransitGatewayRouteCommand(input)),
    DeleteTransitGatewayRoute: (input) => client.send(new DeleteTransitGatewayRouteCommand(input)),
  });
}
