/**
 * MCP Protocol Handler
 * Handles JSON-RPC messages and routes tool calls to the registry
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
  MCPErrorCodes,
  MCPInitializeResult,
  MCPMessage,
  MCPMessageSchema,
  MCPRequest,
  MCPResponse,
  MCPTool,
  ServerSession,
} from '../types.js';
import { isRecord, ToolRegistry, UnknownToolError } from '../gateway/index.js';
import { MetricsCollector } from '../monitoring/index.js';
import { logger } from '../logger.js';

export const PROTOCOL_VERSION = '2024-11-05';

export interface ServerInfo {
  name: string;
  version: string;
}

const InitializeParamsSchema = z.object({
  protocolVersion: z.string().optional(),
  capabilities: z.record(z.unknown()).optional(),
  clientInfo: z.object({ name: z.string().optional(), version: z.string().optional() }).optional(),
});

const ToolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.unknown().optional(),
});

type ErrorCode = (typeof MCPErrorCodes)[keyof typeof MCPErrorCodes];

export function errorResponse(id: MCPResponse['id'], code: ErrorCode, message: string): MCPResponse {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

/**
 * Best-effort request id of a message that failed validation
 */
function requestIdOf(raw: unknown): MCPResponse['id'] {
  if (isRecord(raw) && (typeof raw.id === 'string' || typeof raw.id === 'number')) {
    return raw.id;
  }
  return null;
}

export class MCPProtocolHandler {
  private sessions = new Map<string, ServerSession>();

  constructor(
    private readonly registry: ToolRegistry,
    private readonly serverInfo: ServerInfo,
    private readonly metrics?: MetricsCollector
  ) {}

  get info(): ServerInfo {
    return this.serverInfo;
  }

  /**
   * Create or get a session
   */
  getOrCreateSession(sessionId?: string): ServerSession {
    const existing = sessionId ? this.sessions.get(sessionId) : undefined;
    if (existing) {
      existing.lastActivityAt = new Date();
      return existing;
    }

    const newSession: ServerSession = {
      id: sessionId ?? uuidv4(),
      createdAt: new Date(),
      lastActivityAt: new Date(),
      initialized: false,
    };

    this.sessions.set(newSession.id, newSession);
    return newSession;
  }

  getSession(sessionId: string): ServerSession | undefined {
    return this.sessions.get(sessionId);
  }

  closeSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /**
   * Tools as advertised by tools/list
   */
  listTools(): MCPTool[] {
    return this.registry.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    }));
  }

  /**
   * Handle incoming MCP message. Resolves with null for notifications.
   */
  async handleMessage(raw: unknown, session: ServerSession): Promise<MCPResponse | null> {
    session.lastActivityAt = new Date();

    const parsed = MCPMessageSchema.safeParse(raw);
    if (!parsed.success) {
      this.metrics?.recordRequest(true);
      return errorResponse(requestIdOf(raw), MCPErrorCodes.InvalidRequest, 'Invalid request');
    }

    const message = parsed.data;
    if (message.id === null || message.id === undefined) {
      this.handleNotification(message, session);
      return null;
    }

    const request: MCPRequest = { ...message, id: message.id };
    let response: MCPResponse;
    try {
      response = await this.handleRequest(request, session);
    } catch (error) {
      logger.error('Error handling request', {
        method: request.method,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      response = errorResponse(
        request.id,
        MCPErrorCodes.InternalError,
        error instanceof Error ? error.message : 'Internal error'
      );
    }

    this.metrics?.recordRequest(response.error !== undefined);
    return response;
  }

  /**
   * Handle a JSON-RPC batch in order; notifications produce no entry.
   */
  async handleBatch(messages: readonly unknown[], session: ServerSession): Promise<MCPResponse[]> {
    const responses: MCPResponse[] = [];
    for (const message of messages) {
      const response = await this.handleMessage(message, session);
      if (response !== null) {
        responses.push(response);
      }
    }
    return responses;
  }

  private async handleRequest(request: MCPRequest, session: ServerSession): Promise<MCPResponse> {
    logger.debug(`Handling request: ${request.method}`, { id: request.id });

    switch (request.method) {
      case 'initialize':
        return this.handleInitialize(request, session);

      case 'ping':
        return { jsonrpc: '2.0', id: request.id, result: {} };

      case 'tools/list':
        return { jsonrpc: '2.0', id: request.id, result: { tools: this.listTools() } };

      case 'tools/call':
        return this.handleToolsCall(request, session);

      default:
        return errorResponse(request.id, MCPErrorCodes.MethodNotFound, `Method not found: ${request.method}`);
    }
  }

  /**
   * Handle notification (no response needed)
   */
  private handleNotification(notification: MCPMessage, session: ServerSession): void {
    switch (notification.method) {
      case 'notifications/initialized':
        session.initialized = true;
        logger.info(`Session ${session.id} initialized`);
        break;

      case 'notifications/cancelled':
        logger.debug('Request cancelled', { params: notification.params });
        break;

      default:
        logger.debug(`Unhandled notification: ${notification.method}`);
    }
  }

  private handleInitialize(request: MCPRequest, session: ServerSession): MCPResponse {
    const params = InitializeParamsSchema.safeParse(request.params ?? {});
    if (!params.success) {
      return errorResponse(request.id, MCPErrorCodes.InvalidParams, 'Invalid initialize params');
    }

    session.clientInfo = params.data.clientInfo;

    logger.info('Initialize request from client', {
      sessionId: session.id,
      clientInfo: params.data.clientInfo,
      protocolVersion: params.data.protocolVersion,
    });

    const result: MCPInitializeResult = {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: { tools: { listChanged: false } },
      serverInfo: this.serverInfo,
    };
    return { jsonrpc: '2.0', id: request.id, result };
  }

  private async handleToolsCall(request: MCPRequest, session: ServerSession): Promise<MCPResponse> {
    if (!session.initialized) {
      logger.debug('tools/call called before initialized notification');
    }

    const params = ToolCallParamsSchema.safeParse(request.params ?? {});
    if (!params.success) {
      return errorResponse(request.id, MCPErrorCodes.InvalidParams, 'Missing tool name');
    }

    const { name } = params.data;
    logger.info(`Calling tool: ${name}`, { sessionId: session.id });

    const started = Date.now();
    try {
      const response = await this.registry.invoke(name, params.data.arguments ?? {});
      this.metrics?.recordToolCall(name, Date.now() - started, response.ok);
      if (response.ok) {
        return { jsonrpc: '2.0', id: request.id, result: { content: response.content } };
      }
      return errorResponse(request.id, MCPErrorCodes.InternalError, response.error.message);
    } catch (error) {
      if (error instanceof UnknownToolError) {
        return errorResponse(request.id, MCPErrorCodes.InvalidParams, error.message);
      }
      throw error;
    }
  }

  /**
   * Clean up old sessions
   */
  cleanupSessions(maxAgeMs = 3600000): void {
    const now = Date.now();
    let cleaned = 0;

    for (const [id, session] of this.sessions) {
      if (now - session.lastActivityAt.getTime() > maxAgeMs) {
        this.sessions.delete(id);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.debug(`Cleaned up ${cleaned} stale sessions`);
    }
  }
}
