/**
 * Shared type definitions: configuration schemas and MCP protocol shapes
 */

import { z } from 'zod';

export const SERVICE_NAMES = ['ec2', 'nlb', 's3', 'tgw', 'vpc'] as const;

export const ServiceNameSchema = z.enum(SERVICE_NAMES);

export const ServiceConfigSchema = z.object({
  service: ServiceNameSchema,
  region: z.string().min(1).default('us-east-1'),
  profile: z.string().min(1).optional(),
  endpoint: z.string().url().optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  transport: z.enum(['stdio', 'http']).default('stdio'),
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(0).max(65535).default(3010),
});

export type ServiceName = z.infer<typeof ServiceNameSchema>;
export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;

// MCP Protocol Types
export interface MCPTool {
  name: string;
  description?: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export interface MCPServerCapabilities {
  tools?: {
    listChanged?: boolean;
  };
}

export interface MCPInitializeResult {
  protocolVersion: string;
  capabilities: MCPServerCapabilities;
  serverInfo: {
    name: string;
    version: string;
  };
}

export interface ServerSession {
  id: string;
  createdAt: Date;
  lastActivityAt: Date;
  initialized: boolean;
  clientInfo?: {
    name?: string;
    version?: string;
  };
}

// Request/Response types for MCP protocol
export const MCPMessageSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number()]).nullish(),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

export type MCPMessage = z.infer<typeof MCPMessageSchema>;

export interface MCPRequest extends MCPMessage {
  id: string | number;
}

export interface MCPResponse {
  jsonrpc: '2.0';
  id: string | number | null;
  result?: unknown;
  error?: {
    code: number;
    message: string;
    data?: unknown;
  };
}

// Error codes
export const MCPErrorCodes = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
} as const;
