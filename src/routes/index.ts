import { Router } from 'express';
import { createListingsRouter } from './v1/listings.routes';
import { createCommandsRouter } from './v1/commands.routes';
import { createIntakeRouter } from './v1/intake.routes';
import { createClaimRequestsRouter } from './v1/claim-requests.routes';
import { createMaintenanceRouter } from './v1/maintenance.routes';
import { Services } from '../container';
import { HealthCheckResponse } from '../types/api.types';
import { env } from '../config/environment';

/**
 * API Routes Aggregator
 */
export function createRoutes(services: Services): Router {
  const router = Router();

  // v1 routes
  router.use('/v1/listings', createListingsRouter(services));
  router.use('/v1/commands', createCommandsRouter(services));
  router.use('/v1/intake', createIntakeRouter(services));
  router.use('/v1/claim-requests', createClaimRequestsRouter(services));
  router.use('/v1/maintenance', createMaintenanceRouter(services));

  // Health check endpoint
  router.get('/health', (_req, res) => {
    const health: HealthCheckResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      store: env.STORE_DRIVER,
      uptime: process.uptime(),
    };
    res.status(200).json(health);
  });

  // API version info
  router.get('/v1', (_req, res) => {
    res.status(200).json({
      version: '1.0.0',
      api: 'Donation Claims API',
    });
  });

  return router;
}
