import { type NextFunction, type Request, type Response, Router } from 'express';
import type { Coordinator } from '../game/Coordinator.js';
import { InvalidPollError } from '../game/errors.js';
import { toPollResponse } from '../game/views.js';
import { logger } from '../utils/logger.js';

/**
 * Device check-in endpoint.
 *
 * The firmware sends its state as URL-encoded JSON in the `data` query
 * parameter; POST with a JSON body is accepted as well.
 */
export function createDeviceRouter(coordinator: Coordinator): Router {
  const router = Router();

  async function respond(payload: unknown, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await coordinator.pollDevice(payload);
      res.json(toPollResponse(result));
    } catch (err) {
      if (err instanceof InvalidPollError) {
        logger.warn('Rejected device poll', { error: err.message, issues: err.issues });
        res.status(400).json({ error: err.message, details: err.issues });
        return;
      }
      next(err);
    }
  }

  /**
   * GET /api/device?data={...} - Device poll
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    const data = req.query['data'];
    if (typeof data !== 'string' || data.length === 0) {
      logger.warn('No data provided in query parameter');
      res.status(400).json({ error: 'No data provided' });
      return;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(data);
    } catch (err) {
      logger.warn('Invalid JSON format', { error: err instanceof Error ? err.message : String(err) });
      res.status(400).json({ error: 'Invalid JSON format' });
      return;
    }

    await respond(payload, res, next);
  });

  /**
   * POST /api/device - Device poll with a JSON body
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    await respond(req.body, res, next);
  });

  return router;
}
