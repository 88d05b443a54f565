import express, { Express, Request, Response, NextFunction } from 'express';
import { AppConfig } from './config';
import { createErrorHandler, notFoundHandler } from './lib/errors';
import { FunctionRegistry } from './functions/registry';
import { namecheapFunctions } from './functions/definitions';
import { requireApiKey } from './middleware/auth';
import { loggingMiddleware } from './middleware/logging';
import { NamecheapClient, NamecheapTransport } from './providers/namecheap';
import { createFunctionRoutes } from './routes/functions';
import { getMetrics, incHttpRequest, observeHttpDuration } from './metrics';

export interface AppDependencies {
  config: AppConfig;
  registry: FunctionRegistry;
}

/**
 * Build the function registry over a client configured from app config
 */
export function createRegistry(config: AppConfig, transport?: NamecheapTransport): FunctionRegistry {
  const client = new NamecheapClient({ ...config.namecheap, transport });
  return new FunctionRegistry(client, namecheapFunctions);
}

/**
 * Create and configure Express application
 */
export function createApp({ config, registry }: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: '1mb' }));

  // Structured logging middleware (adds req.id and req.log)
  app.use(loggingMiddleware);

  // Metrics middleware (track request duration and count)
  app.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - startTime) / 1000; // seconds
      const route = typeof req.route?.path === 'string' ? req.route.path : 'unmatched';

      // Record metrics
      incHttpRequest(route, req.method, res.statusCode);
      observeHttpDuration(route, req.method, duration);
    });

    next();
  });

  // Metrics endpoint (no auth required for monitoring)
  app.get('/metrics', async (_req: Request, res: Response) => {
    res.set('Content-Type', 'text/plain');
    res.send(await getMetrics());
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // Root endpoint with API documentation
  app.get('/', (_req: Request, res: Response) => {
    res.json({
      name: 'namecheap-dns-functions',
      version: '1.0.0',
      description: 'Namecheap DNS, host record and email forwarding functions for agents',
      authentication: config.serverApiKey
        ? { type: 'Bearer token', header: 'Authorization: Bearer <api-key>' }
        : { type: 'none' },
      endpoints: {
        health: 'GET /health',
        metrics: 'GET /metrics',
        functions: 'GET /functions',
        call: 'POST /call (body: { name, params })',
        invoke: 'POST /functions/:name (body: params)',
      },
      config: {
        sandbox: config.namecheap.sandbox,
        functions: registry.listFunctions().map((fn) => fn.name),
      },
    });
  });

  // Function endpoints
  app.use(requireApiKey(config.serverApiKey));
  app.use('/', createFunctionRoutes(registry));

  // 404 handler (must come before error handler)
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(createErrorHandler(config.nodeEnv));

  return app;
}
