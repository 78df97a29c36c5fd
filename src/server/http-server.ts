/**
 * Operator HTTP surface
 *
 *   GET /health                    liveness
 *   GET /ready                     readiness (503 when a dependency is down)
 *   GET /metrics                   Prometheus text format
 *   GET /mode                      active sync mode and current index
 *   GET /api/v1/categories         search the alias
 *   GET /api/v1/categories/:id     single document from the alias
 *   GET /api/v1/sync/failures      recent terminal failures
 */

import type { Server } from 'http';
import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { randomUUID } from 'crypto';
import { withContext } from '../context/execution-context.js';
import type { IndexWriter } from '../elasticsearch/index-writer.js';
import { SyncError } from '../errors/hierarchy.js';
import type { HealthStatus } from '../health/health-check.js';
import type { MetricsCollector } from '../metrics/index.js';
import type { FailureLog } from '../sync/failure-log.js';
import type { ProcessingMode, SyncMode } from '../types/config.js';
import type { StructuredLogger } from '../types/index.js';
import { NullLogger } from '../types/index.js';
import { CategorySearchQuerySchema } from '../validation/schemas.js';

export interface ModeStatus {
  mode: SyncMode;
  processing: ProcessingMode;
  currentIndex: string;
  alias: string;
  consumerStatus: string;
}

export interface HttpServerOptions {
  port: number;
  writer: IndexWriter;
  /** Alias that read-side lookups go through */
  aliasName: string;
  readiness: () => Promise<HealthStatus>;
  mode: () => ModeStatus;
  metrics?: MetricsCollector;
  failures?: FailureLog;
  logger?: StructuredLogger;
}

/**
 * Adapt an async handler so rejections reach the error middleware
 */
function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

function respondWithError(res: Response, status: number, message: string, requestId: string): void {
  res.status(status).json({ status: 'error', message, request_id: requestId });
}

function requestIdOf(res: Response): string {
  const id: unknown = res.locals.requestId;
  return typeof id === 'string' ? id : randomUUID();
}

export function createHttpApp(options: HttpServerOptions): express.Express {
  const logger = options.logger ?? new NullLogger();
  const app = express();
  app.disable('x-powered-by');

  app.use((req, res, next) => {
    const header = req.header('x-request-id');
    const requestId = header && header.length > 0 ? header : randomUUID();
    const started = Date.now();
    res.locals.requestId = requestId;
    res.setHeader('x-request-id', requestId);

    res.on('finish', () => {
      logger.debug('HTTP request', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - started,
        requestId,
      });
    });

    withContext({ correlationId: requestId }, () => next());
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'UP', timestamp: new Date().toISOString() });
  });

  app.get(
    '/ready',
    asyncHandler(async (_req, res) => {
      const health = await options.readiness();
      if (health.status === 'DOWN') {
        logger.warn('Readiness check failed', {
          elasticsearch: health.elasticsearch.status,
          kafka: health.kafka.status,
        });
      }
      res.status(health.status === 'UP' ? 200 : 503).json(health);
    }),
  );

  app.get(
    '/metrics',
    asyncHandler(async (_req, res) => {
      if (!options.metrics?.initialized) {
        respondWithError(res, 404, 'Metrics are disabled', requestIdOf(res));
        return;
      }
      res.set('Content-Type', options.metrics.contentType);
      res.send(await options.metrics.getMetricsText());
    }),
  );

  app.get('/mode', (_req, res) => {
    res.json(options.mode());
  });

  app.get(
    '/api/v1/categories',
    asyncHandler(async (req, res) => {
      const parsed = CategorySearchQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        const message = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
        respondWithError(res, 400, message, requestIdOf(res));
        return;
      }

      const { q, status, from, size } = parsed.data;
      const result = await options.writer.search(options.aliasName, { text: q, status, from, size });
      res.json({ total: result.total, from, size, data: result.items });
    }),
  );

  app.get(
    '/api/v1/categories/:id',
    asyncHandler(async (req, res) => {
      const document = await options.writer.get(options.aliasName, req.params.id);
      if (!document) {
        respondWithError(res, 404, `Category ${req.params.id} not found`, requestIdOf(res));
        return;
      }
      res.json({ data: document });
    }),
  );

  app.get('/api/v1/sync/failures', (_req, res) => {
    const data = options.failures?.list() ?? [];
    res.json({ total: data.length, data });
  });

  app.use((_req, res) => {
    respondWithError(res, 404, 'Not found', requestIdOf(res));
  });

  // Express recognises error middleware by its four parameters
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = error instanceof SyncError ? error.metadata.statusCode : 500;
    logger.error('HTTP request failed', error, { method: req.method, path: req.path, status });
    respondWithError(res, status, error instanceof Error ? error.message : 'Internal server error', requestIdOf(res));
  });

  return app;
}

export class HttpServer {
  private server: Server | undefined;
  private readonly logger: StructuredLogger;

  constructor(private readonly options: HttpServerOptions) {
    this.logger = options.logger ?? new NullLogger();
  }

  /**
   * @returns the bound port (useful with port 0)
   */
  async start(): Promise<number> {
    if (this.server) return this.port();

    const app = createHttpApp(this.options);
    this.server = await new Promise<Server>((resolve, reject) => {
      const server = app.listen(this.options.port);
      server.once('listening', () => resolve(server));
      server.once('error', reject);
    });

    const port = this.port();
    this.logger.info('HTTP server listening', { port });
    return port;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
    this.logger.info('HTTP server stopped');
  }

  private port(): number {
    const address = this.server?.address();
    return typeof address === 'object' && address !== null ? address.port : this.options.port;
  }
}
