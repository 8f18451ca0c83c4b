import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { requestLogger } from './middleware/logger.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { createRoutes, AppServices } from './routes';
import { ReservationCoordinator } from './services/reservation-coordinator.service';
import { VenueService } from './services/venue.service';
import { MaterialService } from './services/material.service';
import type { ReservationStore } from './repositories/store.types';
import { getReservationStore } from './config/database';
import { allowedOrigins } from './config/environment';
import { swaggerSpec } from './swagger/swagger.config';
import { systemClock, Clock } from './utils/clock';
import { logger } from './config/logger';

/**
 * Wire the engine and catalog services around one store
 */
export function createServices(store: ReservationStore, clock: Clock = systemClock): AppServices {
  return {
    store,
    coordinator: new ReservationCoordinator(store, { clock }),
    venueService: new VenueService(store, clock),
    materialService: new MaterialService(store, clock),
  };
}

/**
 * Creates and configures the Express application
 */
export function createApp(services: AppServices = createServices(getReservationStore())): Application {
  const app = express();

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // Disable for Swagger UI
  }));

  // CORS middleware
  const origins = allowedOrigins();
  app.use(cors({
    origin: origins,
    credentials: origins !== '*',
  }));

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  // Request logging middleware
  app.use(requestLogger);

  // API Documentation - Swagger UI
  // CDN-hosted Swagger UI
  app.get('/docs', (_req, res) => {
    const html = `
<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>Venue Reservation API Docs</title>
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

  logger.info('Express application configured successfully', { store: services.store.driver });

  return app;
}
