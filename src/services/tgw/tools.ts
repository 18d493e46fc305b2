/**
 * Transit Gateway tools: gateways, VPC attachments, route tables and routes
 */

import {
  CreateTransitGatewayCommandInput,
  CreateTransitGatewayRouteCommandInput,
  CreateTransitGatewayRouteTableCommandInput,
  CreateTransitGatewayVpcAttachmentCommandInput,
  DescribeTransitGatewayAttachmentsCommandInput,
  DescribeTransitGatewayRouteTablesCommandInput,
  DescribeTransitGatewaysCommandInput,
  ModifyTransitGatewayCommandInput,
  ModifyTransitGatewayOptions,
  TransitGatewayRequestOptions,
} from '@aws-sdk/client-ec2';
import { z } from 'zod';
import {
  buildRequest,
  compact,
  firstOrNotFound,
  mapPresent,
  ProviderClient,
  success,
  ToolFactory,
  ToolRegistry,
} from '../../gateway/index.js';
import { enableDisable, tagMap, tagSpecifications } from '../aws.js';
import { TgwOperations } from './operations.js';

const transitGatewayId = z.string().min(1).describe('Transit gateway ID, e.g. tgw-0123456789abcdef0');
const attachmentId = z.string().min(1).describe('Transit gateway attachment ID');
const routeTableId = z.string().min(1).describe('Transit gateway route table ID');

const gatewayOptions = {
  auto_accept_shared_attachments: enableDisable.optional(),
  default_route_table_association: enableDisable.optional(),
  default_route_table_propagation: enableDisable.optional(),
  dns_support: enableDisable.optional(),
  vpn_ecmp_support: enableDisable.optional(),
};

type GatewayOptionArgs = z.output<z.ZodObject<typeof gatewayOptions>>;

function gatewayOptionFields(args: GatewayOptionArgs) {
  return {
    AutoAcceptSharedAttachments: args.auto_accept_shared_attachments,
    DefaultRouteTableAssociation: args.default_route_table_association,
    DefaultRouteTablePropagation: args.default_route_table_propagation,
    DnsSupport: args.dns_support,
    VpnEcmpSupport: args.vpn_ecmp_support,
  };
}

function byTransitGateway(transitGatewayId: string | undefined) {
  return mapPresent(transitGatewayId, (id) => [{ Name: 'transit-gateway-id', Values: [id] }]);
}

export function registerTgwTools(registry: ToolRegistry, provider: ProviderClient<TgwOperations>): void {
  const tools = new ToolFactory<TgwOperations>(registry, provider);

  tools
    .tool('list_transit_gateways', 'List Transit Gateways', {})
    .drain(
      'DescribeTransitGateways',
      (_args, cursor) => buildRequest<DescribeTransitGatewaysCommandInput>({}).set('NextToken', cursor).build(),
      (output) => ({ items: output.TransitGateways, nextToken: output.NextToken })
    );

  tools
    .tool('describe_transit_gateway', 'Describe a Transit Gateway', { transit_gateway_id: transitGatewayId })
    .call(
      'DescribeTransitGateways',
      ({ transit_gateway_id }) => ({ TransitGatewayIds: [transit_gateway_id] }),
      (output, { transit_gateway_id }) =>
        firstOrNotFound(output.TransitGateways, `Transit gateway ${transit_gateway_id} not found`)
    );

  tools
    .tool('create_transit_gateway', 'Create a Transit Gateway', {
      description: z.string().optional(),
      amazon_side_asn: z.number().int().positive().optional().describe('Private ASN for the Amazon side of BGP'),
      ...gatewayOptions,
    })
    .call(
      'CreateTransitGateway',
      (args) =>
        buildRequest<CreateTransitGatewayCommandInput>({})
          .set('Description', args.description)
          .set(
            'Options',
            compact<TransitGatewayRequestOptions>({ AmazonSideAsn: args.amazon_side_asn, ...gatewayOptionFields(args) })
          )
          .build(),
      (output) => success(output.TransitGateway ?? {})
    );

  tools
    .tool('delete_transit_gateway', 'Delete a Transit Gateway', { transit_gateway_id: transitGatewayId })
    .call(
      'DeleteTransitGateway',
      ({ transit_gateway_id }) => ({ TransitGatewayId: transit_gateway_id }),
      (output) => success(output.TransitGateway ?? {})
    );

  tools
    .tool('modify_transit_gateway', 'Modify Transit Gateway options', {
      transit_gateway_id: transitGatewayId,
      ...gatewayOptions,
      description: z.string().optional(),
    })
    .call(
      'ModifyTransitGateway',
      (args) =>
        buildRequest<ModifyTransitGatewayCommandInput>({ TransitGatewayId: args.transit_gateway_id })
          .set('Options', compact<ModifyTransitGatewayOptions>(gatewayOptionFields(args)))
          .set('Description', args.description)
          .build(),
      (output) => success(output.TransitGateway ?? {})
    );

  tools
    .tool('list_transit_gateway_attachments', 'List TGW attachments', {
      transit_gateway_id: transitGatewayId.optional(),
      attachment_ids: z.array(z.string().min(1)).optional(),
    })
    .drain(
      'DescribeTransitGatewayAttachments',
      ({ transit_gateway_id, attachment_ids }, cursor) =>
        buildRequest<DescribeTransitGatewayAttachmentsCommandInput>({})
          .set('Filters', byTransitGateway(transit_gateway_id))
          .set('TransitGatewayAttachmentIds', attachment_ids && attachment_ids.length > 0 ? attachment_ids : undefined)
          .set('NextToken', cursor)
          .build(),
      (output) => ({ items: output.TransitGatewayAttachments, nextToken: output.NextToken })
    );

  tools
    .tool('create_vpc_attachment', 'Create a VPC attachment', {
      transit_gateway_id: transitGatewayId,
      vpc_id: z.string().min(1),
      subnet_ids: z.array(z.string().min(1)).min(1),
      options: z
        .object({
          DnsSupport: enableDisable.optional(),
          Ipv6Support: enableDisable.optional(),
          ApplianceModeSupport: enableDisable.optional(),
        })
        .optional(),
      tags: tagMap.optional(),
    })
    .call(
      'CreateTransitGatewayVpcAttachment',
      (args) =>
        buildRequest<CreateTransitGatewayVpcAttachmentCommandInput>({
          TransitGatewayId: args.transit_gateway_id,
          VpcId: args.vpc_id,
          SubnetIds: args.subnet_ids,
        })
          .set('Options', args.options && Object.keys(args.options).length > 0 ? args.options : undefined)
          .set('TagSpecifications', tagSpecifications('transit-gateway-attachment', args.tags))
          .build(),
      (output) => success(output.TransitGatewayVpcAttachment ?? {})
    );

  tools
    .tool('delete_vpc_attachment', 'Delete a VPC attachment', { transit_gateway_attachment_id: attachmentId })
    .call(
      'DeleteTransitGatewayVpcAttachment',
      ({ transit_gateway_attachment_id }) => ({ TransitGatewayAttachmentId: transit_gateway_attachment_id }),
      (output) => success(output.TransitGatewayVpcAttachment ?? {})
    );

  tools
    .tool('accept_vpc_attachment', 'Accept a shared VPC attachment', { transit_gateway_attachment_id: attachmentId })
    .call(
      'AcceptTransitGatewayVpcAttachment',
      ({ transit_gateway_attachment_id }) => ({ TransitGatewayAttachmentId: transit_gateway_attachment_id }),
      (output) => success(output.TransitGatewayVpcAttachment ?? {})
    );

  tools
    .tool('list_route_tables', 'List Transit Gateway route tables', { transit_gateway_id: transitGatewayId.optional() })
    .drain(
      'DescribeTransitGatewayRouteTables',
      ({ transit_gateway_id }, cursor) =>
        buildRequest<DescribeTransitGatewayRouteTablesCommandInput>({})
          .set('Filters', byTransitGateway(transit_gateway_id))
          .set('NextToken', cursor)
          .build(),
      (output) => ({ items: output.TransitGatewayRouteTables, nextToken: output.NextToken })
    );

  tools
    .tool('create_route_table', 'Create a Transit Gateway route table', {
      transit_gateway_id: transitGatewayId,
      tags: tagMap.optional(),
    })
    .call(
      'CreateTransitGatewayRouteTable',
      ({ transit_gateway_id, tags }) =>
        buildRequest<CreateTransitGatewayRouteTableCommandInput>({ TransitGatewayId: transit_gateway_id })
          .set('TagSpecifications', tagSpecifications('transit-gateway-route-table', tags))
          .build(),
      (output) => success(output.TransitGatewayRouteTable ?? {})
    );

  tools
    .tool('delete_route_table', 'Delete a Transit Gateway route table', { transit_gateway_route_table_id: routeTableId })
    .call(
      'DeleteTransitGatewayRouteTable',
      ({ transit_gateway_route_table_id }) => ({ TransitGatewayRouteTableId: transit_gateway_route_table_id }),
      (output) => success(output.TransitGatewayRouteTable ?? {})
    );

  const association = {
    transit_gateway_route_table_id: routeTableId,
    transit_gateway_attachment_id: attachmentId,
  };

  tools
    .tool('associate_route_table', 'Associate attachment to a route table', association)
    .call(
      'AssociateTransitGatewayRouteTable',
      (args) => ({
        TransitGatewayRouteTableId: args.transit_gateway_route_table_id,
        TransitGatewayAttachmentId: args.transit_gateway_attachment_id,
      }),
      (output) => success(output.Association ?? {})
    );

  tools
    .tool('disassociate_route_table', 'Disassociate attachment from a route table', association)
    .call(
      'DisassociateTransitGatewayRouteTable',
      (args) => ({
        TransitGatewayRouteTableId: args.transit_gateway_route_table_id,
        TransitGatewayAttachmentId: args.transit_gateway_attachment_id,
      }),
      (output) => success(output.Association ?? {})
    );

  tools
    .tool('create_route', 'Create a Transit Gateway route', {
      transit_gateway_route_table_id: routeTableId,
      destination_cidr_block: z.string().min(1),
      transit_gateway_attachment_id: attachmentId.optional(),
      blackhole: z.boolean().default(false).describe('Drop traffic matching the route'),
    })
    .call(
      'CreateTransitGatewayRoute',
      (args) =>
        buildRequest<CreateTransitGatewayRouteCommandInput>({
          TransitGatewayRouteTableId: args.transit_gateway_route_table_id,
          DestinationCidrBlock: args.destination_cidr_block,
        })
          .set('TransitGatewayAttachmentId', args.transit_gateway_attachment_id)
          // Blackhole is only sent when requested
          .set('Blackhole', args.blackhole ? true : undefined)
          .build(),
      (output) => success(output.Route ?? {})
    );

  tools
    .tool('delete_route', 'Delete a Transit Gateway route', {
      transit_gateway_route_table_id: routeTableId,
      destination_cidr_block: z.string().min(1),
    })
    .call(
      'DeleteTransitGatewayRoute',
      (args) => ({
        TransitGatewayRouteTableId: args.transit_gateway_route_table_id,
        DestinationCidrBlock: args.destination_cidr_block,
      }),
      (output) => success(output.Route ?? {})
    );
}
