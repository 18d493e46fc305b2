/**
 * Configuration loading
 *
 * Read once at startup; the resulting struct is handed to whatever needs it.
 */

import { ServiceConfig, ServiceConfigSchema } from './types.js';

export const SERVER_VERSION = '1.0.0';

export type Environment = Record<string, string | undefined>;

function parsePort(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

/**
 * Load service configuration from environment.
 * A service name given on the command line wins over MCP_SERVICE.
 */
export function loadServiceConfig(
  env: Environment = process.env,
  argv: string[] = process.argv.slice(2)
): ServiceConfig {
  const settings = {
    service: argv[0] ?? env.MCP_SERVICE,
    region: env.AWS_REGION || undefined,
    profile: env.AWS_PROFILE || undefined,
    endpoint: env.AWS_ENDPOINT_URL || undefined,
    logLevel: env.LOG_LEVEL || undefined,
    transport: env.MCP_TRANSPORT || undefined,
    host: env.HOST || undefined,
    port: parsePort(env.PORT),
  };

  // Unset values are left out of the parsed config
  const present = Object.entries(settings).filter(([, value]) => value !== undefined);
  return ServiceConfigSchema.parse(Object.fromEntries(present));
}

/**
 * Name announced to MCP clients, e.g. "aws-ec2"
 */
export function serverName(config: ServiceConfig): string {
  return `aws-${config.service}`;
}
