/**
 * HTTP Streamable Transport Handler
 * Implements the MCP HTTP Streamable transport: JSON request in, JSON response out
 */

import { Request, Response, Router } from 'express';
import { MCPProtocolHandler, PROTOCOL_VERSION, errorResponse } from '../protocol/index.js';
import { MCPErrorCodes } from '../types.js';
import { logger } from '../logger.js';

function sessionHeader(req: Request): string | undefined {
  const value = req.headers['mcp-session-id'];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createHttpTransport(protocolHandler: MCPProtocolHandler): Router {
  const router = Router();

  /**
   * Handle POST requests - main MCP endpoint
   * Supports both single requests and batch requests
   */
  router.post('/', async (req: Request, res: Response) => {
    const session = protocolHandler.getOrCreateSession(sessionHeader(req));

    // Set session ID header
    res.setHeader('Mcp-Session-Id', session.id);

    const body: unknown = req.body;

    try {
      if (Array.isArray(body)) {
        if (body.length === 0) {
          res.status(400).json(errorResponse(null, MCPErrorCodes.InvalidRequest, 'Empty batch'));
          return;
        }
        const responses = await protocolHandler.handleBatch(body, session);
        if (responses.length === 0) {
          res.status(202).json({ status: 'accepted' });
          return;
        }
        res.json(responses);
        return;
      }

      const response = await protocolHandler.handleMessage(body, session);
      if (response === null) {
        // It was a notification, no response needed
        res.status(202).json({ status: 'accepted' });
        return;
      }
      res.json(response);
    } catch (error) {
      logger.error('Error handling request', {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      res
        .status(500)
        .json(
          errorResponse(null, MCPErrorCodes.InternalError, error instanceof Error ? error.message : 'Internal error')
        );
    }
  });

  /**
   * Handle GET requests - server info
   */
  router.get('/', (_req: Request, res: Response) => {
    res.json({
      ...protocolHandler.info,
      protocol: PROTOCOL_VERSION,
      transports: ['stdio', 'http'],
    });
  });

  /**
   * Handle DELETE requests - close session
   */
  router.delete('/', (req: Request, res: Response) => {
    const sessionId = sessionHeader(req);

    if (sessionId && protocolHandler.closeSession(sessionId)) {
      logger.info(`Session ${sessionId} closed by client`);
    }

    res.status(204).send();
  });

  return router;
}
