import express, { type Application, type Request, type Response, type NextFunction } from 'express';
import { AppError } from './errors';
import { type LinkRouterDeps, createLinkRouter } from './routes/link.routes';
import { type Logger, createLogger } from './utils/logger';

export interface HealthStatus {
  kv: boolean;
  database: boolean;
}

export interface AppDeps extends LinkRouterDeps {
  checkHealth: () => Promise<HealthStatus>;
  logger?: Logger;
}

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

export function createApp(deps: AppDeps): Application {
  const app: Application = express();
  const logger = deps.logger ?? createLogger('http');

  // Middleware
  app.use(express.json());

  // Trust proxy for accurate IP addresses
  app.set('trust proxy', 1);

  // Health check endpoint
  app.get('/health', async (_req: Request, res: Response) => {
    try {
      const status = await deps.checkHealth();
      const body = {
        status: status.kv && status.database ? 'healthy' : 'unhealthy',
        kv: status.kv ? 'connected' : 'disconnected',
        database: status.database ? 'ok' : 'error',
      };
      res.status(body.status === 'healthy' ? 200 : 503).json(body);
    } catch (error) {
      logger.error('Health check failed', { error });
      res.status(503).json({ status: 'unhealthy', kv: 'error', database: 'error' });
    }
  });

  // Short link routes
  app.use('/', createLinkRouter(deps));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'NOT_FOUND', message: 'Not Found' });
  });

  // Error handler
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof AppError) {
      if (error.status >= 500) {
        logger.error(`${req.method} ${req.path} failed`, { code: error.code, error });
      }
      res.status(error.status).json({ error: error.code, message: error.message });
      return;
    }

    if (isBodyParseError(error)) {
      res.status(400).json({ error: 'INVALID_REQUEST', message: 'Request body is not valid JSON.' });
      return;
    }

    logger.error(`${req.method} ${req.path} failed`, { error });
    res.status(500).json({ error: 'INTERNAL', message: 'Internal server error' });
  });

  return app;
}
