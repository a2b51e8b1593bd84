import { type NextFunction, type Request, type Response, Router } from 'express';
import type { Coordinator } from '../game/Coordinator.js';
import { toDeviceView } from '../game/views.js';

/**
 * Read-only views consumed by operator consoles and dashboards.
 */
export function createReportsRouter(coordinator: Coordinator): Router {
  const router = Router();

  /**
   * GET /api/devices - All known devices, sorted by id
   */
  router.get('/devices', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const records = await coordinator.snapshot();
      res.json({ devices: records.map(toDeviceView) });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /api/status - Phase, settings, group members and timing
   */
  router.get('/status', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await coordinator.summary());
    } catch (err) {
      next(err);
    }
  });

  return router;
}
