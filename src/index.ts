#!/usr/bin/env node
/**
 * AWS MCP Servers - Entry Point
 *
 * One process hosts one service (ec2, nlb, s3, tgw or vpc), chosen by the
 * first command-line argument or MCP_SERVICE, over stdio or HTTP.
 */

import 'dotenv/config';
import { loadServiceConfig, serverName, SERVER_VERSION } from './config.js';
import { MCPProtocolHandler } from './protocol/index.js';
import { MCPHttpServer } from './server.js';
import { createServiceRegistry } from './services/index.js';
import { StdioTransport } from './transports/index.js';
import { logger } from './logger.js';

async function main(): Promise<void> {
  const config = loadServiceConfig();
  logger.level = config.logLevel;

  const registry = createServiceRegistry(config);
  const serverInfo = { name: serverName(config), version: SERVER_VERSION };

  logger.info('Configuration loaded', {
    server: serverInfo.name,
    region: config.region,
    profile: config.profile,
    endpoint: config.endpoint,
    transport: config.transport,
    tools: registry.size,
  });

  let stop: () => Promise<void>;

  if (config.transport === 'http') {
    const server = new MCPHttpServer(config, registry, serverInfo);
    await server.start();
    stop = () => server.stop();
  } else {
    const transport = new StdioTransport(new MCPProtocolHandler(registry, serverInfo));
    stop = async () => transport.close();
    transport
      .start()
      .then(() => {
        logger.info('stdin closed, exiting');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('stdio transport failed', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      });
  }

  // Handle graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down...`);
    try {
      await stop();
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.error('Fatal error', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
