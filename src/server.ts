/**
 * MCP HTTP Server
 * Hosts one service's tool registry behind the HTTP Streamable transport
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { ServiceConfig, MCPErrorCodes } from './types.js';
import { isRecord, ToolRegistry } from './gateway/index.js';
import { MCPProtocolHandler, ServerInfo, errorResponse } from './protocol/index.js';
import { createHttpTransport } from './transports/index.js';
import { MetricsCollector, createMetricsRoutes } from './monitoring/index.js';
import { logger } from './logger.js';

type ListenConfig = Pick<ServiceConfig, 'service' | 'host' | 'port'>;

/** Body parser failure raised for a request that is not JSON */
function isJsonParseFailure(err: unknown): boolean {
  return isRecord(err) && err.type === 'entity.parse.failed';
}

export class MCPHttpServer {
  private app: Express;
  private protocolHandler: MCPProtocolHandler;
  private server: Server | null = null;
  private sessionCleanupInterval: NodeJS.Timeout | null = null;
  private metricsCollector: MetricsCollector;

  constructor(
    private readonly config: ListenConfig,
    private readonly registry: ToolRegistry,
    private readonly serverInfo: ServerInfo
  ) {
    this.app = express();
    this.metricsCollector = new MetricsCollector(serverInfo.name);
    this.protocolHandler = new MCPProtocolHandler(registry, serverInfo, this.metricsCollector);

    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Set up Express middleware
   */
  private setupMiddleware(): void {
    // Security headers (relaxed for MCP compatibility)
    this.app.use(helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
    }));

    this.app.use(cors({
      origin: '*',
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Mcp-Session-Id', 'Accept'],
      exposedHeaders: ['Mcp-Session-Id'],
    }));

    this.app.use(compression());

    this.app.use(express.json({ limit: '10mb' }));

    // Request logging
    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`, {
        ip: req.ip,
        sessionId: req.headers['mcp-session-id'],
      });
      next();
    });
  }

  /**
   * Set up routes
   */
  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      const metricsSummary = this.metricsCollector.getSummary();

      res.json({
        status: 'ok',
        server: this.serverInfo.name,
        version: this.serverInfo.version,
        service: this.config.service,
        tools: this.registry.size,
        metrics: {
          uptime: metricsSummary.uptime,
          requestCount: metricsSummary.requestCount,
          errorRate: metricsSummary.errorRate,
          latency: metricsSummary.latency,
        },
      });
    });

    // Metrics & Monitoring (Prometheus format)
    this.app.use('/', createMetricsRoutes(this.metricsCollector, () => this.registry.size));

    // MCP endpoint
    this.app.use('/mcp', createHttpTransport(this.protocolHandler));

    // 404 handler
    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({
        error: 'Not Found',
        message: 'Use /mcp for the HTTP Streamable transport',
      });
    });

    // Error handler
    this.app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      if (isJsonParseFailure(err)) {
        res.status(400).json(errorResponse(null, MCPErrorCodes.ParseError, 'Parse error'));
        return;
      }
      logger.error('Unhandled error', {
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
      res.status(500).json(errorResponse(null, MCPErrorCodes.InternalError, 'Internal server error'));
    });
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host, () => {
        const port = this.address()?.port ?? this.config.port;
        logger.info(`${this.serverInfo.name} listening`, {
          host: this.config.host,
          port,
          endpoints: {
            http: `http://${this.config.host}:${port}/mcp`,
            health: `http://${this.config.host}:${port}/health`,
          },
        });

        // Start session cleanup
        this.sessionCleanupInterval = setInterval(() => {
          this.protocolHandler.cleanupSessions();
        }, 60000);

        resolve();
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    logger.info(`Shutting down ${this.serverInfo.name}...`);

    if (this.sessionCleanupInterval) {
      clearInterval(this.sessionCleanupInterval);
      this.sessionCleanupInterval = null;
    }

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
      this.server = null;
    }

    logger.info(`${this.serverInfo.name} stopped`);
  }

  /**
   * Bound address once listening (the real port when started on port 0)
   */
  address(): AddressInfo | null {
    const address = this.server?.address();
    return typeof address === 'object' && address !== null ? address : null;
  }

  /**
   * Get the Express app (for testing)
   */
  getApp(): Express {
    return this.app;
  }

  getMetricsCollector(): MetricsCollector {
    return this.metricsCollector;
  }
}
