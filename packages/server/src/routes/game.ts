import {
  ExtendRequestSchema,
  type GameSummary,
  PrepareRequestSchema,
  ReassignRequestSchema,
} from '@tagfield/shared';
import { type NextFunction, type Request, type Response, Router } from 'express';
import type { z } from 'zod';
import type { Coordinator } from '../game/Coordinator.js';
import { InvalidSettingsError, PhaseTransitionError, toInputIssues } from '../game/errors.js';
import { logger } from '../utils/logger.js';

type OperatorAction = (req: Request, res: Response) => Promise<GameSummary | null>;

function rejectInvalidForm(res: Response, issues: readonly z.ZodIssue[]): null {
  logger.warn('Invalid form data', { issues: toInputIssues(issues) });
  res.status(400).json({ error: 'Invalid form data', details: toInputIssues(issues) });
  return null;
}

/**
 * Operator actions that drive the activity through its phases.
 * Bodies may be JSON or form-encoded; every action answers with the game summary.
 */
export function createGameRouter(coordinator: Coordinator): Router {
  const router = Router();

  /**
   * Wrap an action with the shared error mapping.
   * A null result means the action already answered.
   */
  function handle(action: OperatorAction) {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const summary = await action(req, res);
        if (summary) {
          res.json(summary);
        }
      } catch (err) {
        if (err instanceof InvalidSettingsError) {
          logger.warn('Invalid game settings', { issues: err.issues });
          res.status(400).json({ error: 'Invalid form data', details: err.issues });
          return;
        }
        if (err instanceof PhaseTransitionError) {
          logger.warn('Phase transition refused', { from: err.from, to: err.to });
          res.status(409).json({ error: err.message });
          return;
        }
        next(err);
      }
    };
  }

  /**
   * POST /api/game/reset - Back to sleep, all devices neutral
   */
  router.post(
    '/reset',
    handle(() => coordinator.reset())
  );

  /**
   * POST /api/game/prepare - Store settings and move to prepare
   */
  router.post(
    '/prepare',
    handle(async (req, res) => {
      const parsed = PrepareRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return rejectInvalidForm(res, parsed.error.issues);
      }
      return coordinator.enterPreparing(parsed.data);
    })
  );

  /**
   * POST /api/game/activate - Partition devices and start the activity
   */
  router.post(
    '/activate',
    handle(() => coordinator.enterActive())
  );

  /**
   * POST /api/game/extend - Add minutes to the duration (one by default)
   */
  router.post(
    '/extend',
    handle(async (req, res) => {
      const parsed = ExtendRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return rejectInvalidForm(res, parsed.error.issues);
      }
      return coordinator.extendDuration(parsed.data.minutes ?? 1);
    })
  );

  /**
   * POST /api/game/shorten - Take one minute off the duration
   */
  router.post(
    '/shorten',
    handle(async (_req, res) => {
      const { accepted, summary } = await coordinator.shortenDuration();
      if (!accepted) {
        res.status(409).json({ error: 'Duration already at minimum', summary });
        return null;
      }
      return summary;
    })
  );

  /**
   * POST /api/game/end - End the activity
   */
  router.post(
    '/end',
    handle(() => coordinator.enterEnded())
  );

  /**
   * POST /api/game/reassign - Move a device into the other group while active
   */
  router.post(
    '/reassign',
    handle(async (req, res) => {
      const parsed = ReassignRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return rejectInvalidForm(res, parsed.error.issues);
      }
      const { accepted, summary } = await coordinator.reassign(parsed.data.id, parsed.data.role);
      if (!accepted) {
        res.status(409).json({ error: 'Reassignment rejected', summary });
        return null;
      }
      return summary;
    })
  );

  return router;
}
