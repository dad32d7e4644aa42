import express from 'express';
import type { ExtractionService } from '../src/extraction/service.js';
import { createLogger } from '../src/logging-config.js';
import { createExtractRouter } from './extract-routes.js';

const logger = createLogger('structura.server');

export interface ApiServerOptions {
  verboseErrors?: boolean;
  /** Largest accepted JSON body; uploads arrive base64-encoded (default: 15mb). */
  bodyLimit?: string;
}

const isBodyParseError = (err: unknown): err is Error & { status: number; type: string } =>
  err instanceof Error &&
  'type' in err &&
  err.type === 'entity.parse.failed' &&
  'status' in err &&
  typeof err.status === 'number';

export function createApp(service: ExtractionService, options: ApiServerOptions = {}) {
  const app = express();

  // CORS middleware
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept, X-API-Key');

    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  app.use(express.json({ limit: options.bodyLimit ?? '15mb' }));

  app.get('/health', (req, res) => {
    res.json({ status: 'healthy', open_blueprints: service.listOpenDomains() });
  });

  app.use(createExtractRouter(service, { verboseErrors: options.verboseErrors }));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: `Endpoint not found: ${req.method} ${req.path}`,
    });
  });

  // Error handling middleware
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ success: false, error: 'Request body is not valid JSON', kind: 'InvalidInput' });
      return;
    }
    logger.error(`Unhandled error on ${req.method} ${req.path}`, err);
    const message = err instanceof Error ? err.message : 'Unknown error';
    res.status(500).json({
      success: false,
      error:
        options.verboseErrors && err instanceof Error && err.stack
          ? `Internal server error: ${message}\n\n${err.stack}`
          : `Internal server error: ${message}`,
      kind: 'Internal',
    });
  });

  return app;
}
