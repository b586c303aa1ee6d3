import { Router } from 'express';
import { MaintenanceController } from '../../controllers/maintenance.controller';
import { validate } from '../../middleware/validation.middleware';
import { exportListingsSchema } from '../../validators/listing.validator';
import { Services } from '../../container';

/**
 * Maintenance routes (v1)
 */
export function createMaintenanceRouter(services: Services): Router {
  const router = Router();
  const maintenanceController = new MaintenanceController(services.listingService);

  /**
   * @swagger
   * /v1/maintenance/export:
   *   get:
   *     summary: Export a year of listings as CSV
   *     tags: [Maintenance]
   *     parameters:
   *       - in: query
   *         name: year
   *         schema:
   *           type: string
   *           pattern: '^\d{4}$'
   *         description: Defaults to the current year (UTC)
   *     responses:
   *       200:
   *         description: CSV report
   *         content:
   *           text/csv:
   *             schema:
   *               type: string
   */
  /**
   * @swagger
   * /v1/maintenance/bump:
   *   post:
   *     summary: Re-announce open listings that still have stock and a post
   *     tags: [Maintenance]
   *     responses:
   *       200:
   *         description: Number of listings bumped
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 data:
   *                   type: object
   *                   properties:
   *                     bumped:
   *                       type: integer
   *                 message:
   *                   type: string
   */
  router.post('/bump', maintenanceController.bumpListings);

  router.get('/export', validate(exportListingsSchema), maintenanceController.exportListings);

  return router;
}
