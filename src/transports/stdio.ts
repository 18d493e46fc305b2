/**
 * stdio Transport
 * Newline-delimited JSON-RPC on stdin/stdout
 */

import { createInterface, Interface } from 'readline';
import { MCPProtocolHandler, errorResponse } from '../protocol/index.js';
import { MCPErrorCodes, MCPResponse, ServerSession } from '../types.js';
import { logger } from '../logger.js';

export interface StdioStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export class StdioTransport {
  private readline: Interface | null = null;
  // Messages are answered in the order they arrive
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly protocolHandler: MCPProtocolHandler,
    private readonly streams: StdioStreams = { input: process.stdin, output: process.stdout }
  ) {}

  /**
   * Serve one session until the input stream ends
   */
  start(): Promise<void> {
    const session = this.protocolHandler.getOrCreateSession();
    const readline = createInterface({
      input: this.streams.input,
      crlfDelay: Infinity,
      terminal: false,
    });
    this.readline = readline;

    readline.on('line', (line) => {
      this.queue = this.queue.then(() => this.handleLine(line, session));
    });

    logger.info('stdio transport ready', { sessionId: session.id });

    return new Promise((resolve) => {
      readline.once('close', () => {
        this.readline = null;
        void this.queue.then(resolve);
      });
    });
  }

  close(): void {
    this.readline?.close();
  }

  private async handleLine(line: string, session: ServerSession): Promise<void> {
    if (!line.trim()) return;

    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch {
      this.send(errorResponse(null, MCPErrorCodes.ParseError, 'Parse error'));
      return;
    }

    try {
      if (Array.isArray(message)) {
        if (message.length === 0) {
          this.send(errorResponse(null, MCPErrorCodes.InvalidRequest, 'Empty batch'));
          return;
        }
        const responses = await this.protocolHandler.handleBatch(message, session);
        if (responses.length > 0) {
          this.send(responses);
        }
        return;
      }

      const response = await this.protocolHandler.handleMessage(message, session);
      if (response !== null) {
        this.send(response);
      }
    } catch (error) {
      logger.error('Error handling stdio message', {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
    }
  }

  private send(payload: MCPResponse | MCPResponse[]): void {
    this.streams.output.write(`${JSON.stringify(payload)}\n`);
  }
}
