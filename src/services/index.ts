/**
 * Service catalogue
 *
 * Builds the registry for the one service a process hosts.
 */

import { ToolRegistry } from '../gateway/index.js';
import { ServiceConfig } from '../types.js';
import { createEc2Provider } from './ec2/operations.js';
import { registerEc2Tools } from './ec2/tools.js';
import { createNlbProvider } from './nlb/operations.js';
import { registerNlbTools } from './nlb/tools.js';
import { createS3Provider } from './s3/operations.js';
import { registerS3Tools } from './s3/tools.js';
import { createTgwProvider } from './tgw/operations.js';
import { registerTgwTools } from './tgw/tools.js';
import { createVpcProvider } from './vpc/operations.js';
import { registerVpcTools } from './vpc/tools.js';

export { registerEc2Tools, registerNlbTools, registerS3Tools, registerTgwTools, registerVpcTools };

export function createServiceRegistry(config: ServiceConfig): ToolRegistry {
  const registry = new ToolRegistry();

  switch (config.service) {
    case 'ec2':
      registerEc2Tools(registry, createEc2Provider(config));
      break;
    case 'nlb':
      registerNlbTools(registry, createNlbProvider(config));
      break;
    case 's3':
      registerS3Tools(registry, createS3Provider(config), { region: config.region });
      break;
    case 'tgw':
      registerTgwTools(registry, createTgwProvider(config));
      break;
    case 'vpc':
      registerVpcTools(registry, createVpcProvider(config));
      break;
  }

  return registry;
}
