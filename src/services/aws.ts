/**
 * Shared AWS SDK client settings and argument schemas
 */

import { fromIni } from '@aws-sdk/credential-providers';
import type { ResourceType, TagSpecification } from '@aws-sdk/client-ec2';
import { z } from 'zod';
import { keyValuePairs } from '../gateway/index.js';
import { ServiceConfig } from '../types.js';

export interface AwsClientSettings {
  region: string;
  endpoint?: string;
  credentials?: ReturnType<typeof fromIni>;
}

/**
 * Client settings for every SDK client of a process. Without a profile the
 * SDK's default credential chain applies.
 */
export function awsClientSettings(config: ServiceConfig): AwsClientSettings {
  return {
    region: config.region,
    ...(config.endpoint ? { endpoint: config.endpoint } : {}),
    ...(config.profile ? { credentials: fromIni({ profile: config.profile }) } : {}),
  };
}

/**
 * String argument restricted to the values of an SDK enum object
 */
export function sdkEnum<E extends Record<string, string>>(values: E, label: string) {
  const allowed = new Set<string>(Object.values(values));
  return z
    .string()
    .refine((value): value is E[keyof E] => allowed.has(value), {
      message: `Unsupported ${label}`,
    })
    .describe(`One of: ${Array.from(allowed).join(', ')}`);
}

export const tagMap = z.record(z.string()).describe('Tag keys mapped to values');

export const enableDisable = z.enum(['enable', 'disable']);

/**
 * Tag map as EC2 tag specifications for a resource being created; nothing
 * when the map is absent or empty.
 */
export function tagSpecifications(
  resourceType: ResourceType,
  tags: Readonly<Record<string, string>> | undefined
): TagSpecification[] | undefined {
  const pairs = keyValuePairs(tags);
  if (!pairs || pairs.length === 0) {
    return undefined;
  }
  return [{ ResourceType: resourceType, Tags: pairs }];
}
