/**
 * HTTP/SSE Transport for the MCP server
 * Provides an alternative to stdio for web clients
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import { randomUUID } from 'crypto';
import type { Server as HttpServer } from 'http';
import { z } from 'zod';
import { getConfig } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { httpStatusForCode } from '../utils/errors.js';
import { resolveOwnerParam } from '../utils/owner-param.js';
import { handleToolCall, getToolDefinitions } from '../tools/index.js';
import type { HttpSettings } from '../types/index.js';

// SSE client connections, each subscribed to one owner's results
interface SSEClient {
  id: string;
  owner: string;
  response: Response;
}

let clients: SSEClient[] = [];
let httpServer: HttpServer | null = null;

const argsSchema = z.record(z.unknown()).optional().default({});

const messageSchema = z.discriminatedUnion('method', [
  z.object({ method: z.literal('tools/list') }),
  z.object({
    method: z.literal('tools/call'),
    params: z.object({
      name: z.string().min(1, 'Tool name is required'),
      arguments: argsSchema,
    }),
  }),
]);

/**
 * Check if HTTP transport is enabled
 */
export function isHttpEnabled(): boolean {
  return getConfig().http.enabled;
}

/**
 * Owner a tool call acts for, as the tool itself resolves it
 */
function ownerOf(args: Record<string, unknown>): string {
  return resolveOwnerParam(typeof args.owner === 'string' ? args.owner : undefined);
}

/**
 * Send SSE message to the clients subscribed to an owner
 */
function broadcast(owner: string, event: string, data: unknown): void {
  const message = `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
  clients
    .filter((client) => client.owner === owner)
    .forEach((client) => {
      client.response.write(message);
    });
}

/**
 * Build the express app (without listening)
 */
export function createHttpApp(settings: HttpSettings = getConfig().http): Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: settings.corsOrigin }));
  app.use(express.json());

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(`HTTP ${req.method} ${req.path}`);
    next();
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      transport: 'http',
      clients: clients.length,
      timestamp: new Date().toISOString(),
    });
  });

  // SSE endpoint for server-to-client communication
  app.get('/sse', (req: Request, res: Response) => {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');

    const clientId = `client-${randomUUID()}`;
    const owner = resolveOwnerParam(typeof req.query.owner === 'string' ? req.query.owner : undefined);
    res.write(`event: connected\ndata: ${JSON.stringify({ clientId, owner })}\n\n`);

    const client: SSEClient = { id: clientId, owner, response: res };
    clients.push(client);
    logger.info(`SSE client connected: ${clientId} for ${owner} (total: ${clients.length})`);

    // Send heartbeat every 30 seconds
    const heartbeat = setInterval(() => {
      res.write(`event: heartbeat\ndata: ${JSON.stringify({ timestamp: Date.now() })}\n\n`);
    }, 30000);

    req.on('close', () => {
      clearInterval(heartbeat);
      clients = clients.filter((c) => c.id !== clientId);
      logger.info(`SSE client disconnected: ${clientId} (total: ${clients.length})`);
    });
  });

  // List available tools
  app.get('/tools', (_req: Request, res: Response) => {
    res.json({ tools: getToolDefinitions() });
  });

  // Call one tool directly; failures map to HTTP status codes
  app.post('/tools/:name', async (req: Request, res: Response, next: NextFunction) => {
    const args = argsSchema.safeParse(req.body);
    if (!args.success) {
      res.status(400).json({ success: false, error: 'Body must be a JSON object', code: 'VALIDATION_ERROR' });
      return;
    }

    try {
      const result = await handleToolCall(req.params.name ?? '', args.data);
      if (result.success) {
        const owner = ownerOf(args.data);
        broadcast(owner, 'tool_result', { name: req.params.name, owner, result });
        res.json(result);
      } else {
        res.status(result.code === 'UNKNOWN_TOOL' ? 404 : httpStatusForCode(result.code)).json(result);
      }
    } catch (error) {
      next(error);
    }
  });

  // MCP-style message endpoint
  app.post('/message', async (req: Request, res: Response) => {
    const parsed = messageSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      });
      return;
    }

    const message = parsed.data;
    if (message.method === 'tools/list') {
      res.json({ result: { tools: getToolDefinitions() } });
      return;
    }

    const { name, arguments: args } = message.params;
    try {
      const result = await handleToolCall(name, args);

      const owner = ownerOf(args);
      broadcast(owner, 'tool_result', { name, owner, result });

      res.json({
        result: {
          content: [
            {
              type: 'text',
              text: JSON.stringify(result, null, 2),
            },
          ],
          isError: !result.success,
        },
      });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.error(`Tool error: ${name}`, error);
      res.status(500).json({
        error: errorMessage,
        result: {
          content: [
            {
              type: 'text',
              text: JSON.stringify({ success: false, error: errorMessage }),
            },
          ],
          isError: true,
        },
      });
    }
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('HTTP error', err);
    res.status(500).json({ error: err.message });
  });

  return app;
}

/**
 * Create and start the HTTP server
 */
export async function startHttpTransport(settings: HttpSettings = getConfig().http): Promise<HttpServer> {
  const app = createHttpApp(settings);

  return new Promise((resolve) => {
    const server = app.listen(settings.port, () => {
      logger.info(`HTTP transport listening on port ${settings.port}`);
      resolve(server);
    });
    httpServer = server;
  });
}

/**
 * Stop the HTTP server
 */
export async function stopHttpTransport(): Promise<void> {
  if (!httpServer) return;

  // Close all SSE connections
  clients.forEach((client) => {
    client.response.end();
  });
  clients = [];

  const server = httpServer;
  return new Promise((resolve, reject) => {
    server.close((error) => {
      httpServer = null;
      if (error) {
        reject(error);
        return;
      }
      logger.info('HTTP transport stopped');
      resolve();
    });
  });
}
