import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { requestLogger } from './middleware/logger.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { createRoutes } from './routes';
import { createServices, Services } from './container';
import { swaggerSpec } from './swagger/swagger.config';
import { env } from './config/environment';
import { logger } from './config/logger';

const allowedOrigins = (): string | string[] =>
  env.ALLOWED_ORIGINS === '*'
    ? '*'
    : env.ALLOWED_ORIGINS.split(',')
        .map((origin) => origin.trim())
        .filter(Boolean);

/**
 * Creates and configures the Express application
 */
export function createApp(services: Services = createServices()): Application {
  const app = express();

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // Disable for Swagger UI
  }));

  // CORS middleware
  const origin = allowedOrigins();
  app.use(cors({
    origin,
    credentials: origin !== '*',
  }));

  // Body parsing middleware
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));

  // Request logging middleware
  app.use(requestLogger);

  // API Documentation - Swagger UI
  // Use CDN-hosted Swagger UI for serverless compatibility
  app.get('/docs', (_req, res) => {
    const html = `
<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>Donation Claims API Docs</title>
  <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@5.11.0/swagger-ui.css">
  <style>
    body { margin: 0; padding: 0; }
    .swagger-ui .topbar { display: none; }
  </style>
</head>
<body>
  <div id="swagger-ui"></div>
  <script src="https://unpkg.com/swagger-ui-dist@5.11.0/swagger-ui-bundle.js"></script>
  <script src="https://unpkg.com/swagger-ui-dist@5.11.0/swagger-ui-standalone-preset.js"></script>
  <script>
    window.onload = function() {
      SwaggerUIBundle({
        url: '/openapi.json',
        dom_id: '#swagger-ui',
        deepLinking: true,
        presets: [
          SwaggerUIBundle.presets.apis,
          SwaggerUIStandalonePreset
        ],
        plugins: [
          SwaggerUIBundle.plugins.DownloadUrl
        ],
        layout: "StandaloneLayout",
        persistAuthorization: true,
        displayRequestDuration: true,
        filter: true,
        tryItOutEnabled: true
      });
    };
  </script>
</body>
</html>`;
    res.send(html);
  });

  // OpenAPI JSON endpoint
  app.get('/openapi.json', (_req, res) => {
    res.json(swaggerSpec);
  });

  // Mount API routes
  app.use('/', createRoutes(services));

  // 404 handler
  app.use(notFoundHandler);

  // Global error handling middleware (must be last)
  app.use(errorHandler);

  logger.info('Express application configured successfully');

  return app;
}
