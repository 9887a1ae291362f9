import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { PosContainer } from './config/container';
import { env } from './config/environment';
import { logger } from './config/logger';
import { requestLogger } from './middleware/logger.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { createRoutes } from './routes';
import { getSwaggerSpec } from './swagger/swagger.config';

const DOCS_HTML = `
<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>POS Ledger API Docs</title>
  <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@5.11.0/swagger-ui.css">
  <style>
    body { margin: 0; padding: 0; }
    .swagger-ui .topbar { display: none; }
  </style>
</head>
<body>
  <div id="swagger-ui"></div>
  <script src="https://unpkg.com/swagger-ui-dist@5.11.0/swagger-ui-bundle.js"></script>
  <script>
    window.onload = function() {
      SwaggerUIBundle({
        url: '/openapi.json',
        dom_id: '#swagger-ui',
        deepLinking: true,
        displayRequestDuration: true,
        tryItOutEnabled: true
      });
    };
  </script>
</body>
</html>`;

const allowedOrigins = (): string | string[] =>
  env.ALLOWED_ORIGINS === '*'
    ? '*'
    : env.ALLOWED_ORIGINS.split(',')
        .map((origin) => origin.trim())
        .filter(Boolean);

/**
 * Creates and configures the Express application around a service container
 */
export function createApp(container: PosContainer): Application {
  const app = express();

  // Security middleware
  app.use(
    helmet({
      contentSecurityPolicy: false, // Swagger UI loads from a CDN
    })
  );

  app.use(cors({ origin: allowedOrigins() }));

  app.use(express.json({ limit: '1mb' }));

  app.use(requestLogger);

  // API Documentation - Swagger UI
  app.get('/docs', (_req, res) => {
    res.type('html').send(DOCS_HTML);
  });

  app.get('/openapi.json', (_req, res) => {
    res.json(getSwaggerSpec());
  });

  app.use('/', createRoutes(container));

  app.use(notFoundHandler);

  // Global error handling middleware (must be last)
  app.use(errorHandler);

  logger.info('Express application configured', { storage: container.storage });

  return app;
}
