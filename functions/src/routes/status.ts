import { Router, Request, Response } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import type { AppContext } from '../context';
import { sendApiError } from '../middlewares/errorHandler';
import type { StatusCheckRecord } from '../services/repositories/statusChecks/StatusCheckRepository';

const createStatusCheckSchema = z.object({
  client_name: z.string(),
});

export function toStatusCheckResponse(record: StatusCheckRecord) {
  return {
    id: record.id,
    client_name: record.client_name,
    timestamp: record.timestamp.toISOString(),
  };
}

export function createStatusRouter(context: AppContext): Router {
  const statusRouter = Router();
  const { statusCheckService } = context.services;

  /**
   * POST /api/status
   * Appends a status check for the calling client
   */
  statusRouter.post('/', async (req: Request, res: Response) => {
    try {
      const { client_name } = createStatusCheckSchema.parse(req.body ?? {});
      const record = await statusCheckService.record(client_name);
      res.json(toStatusCheckResponse(record));
    } catch (error) {
      if (sendApiError(res, error)) {
        return;
      }

      functions.logger.error('[status] Error recording status check:', error);
      res.status(500).json({
        code: 'server_error',
        message: 'Failed to record status check',
      });
    }
  });

  /**
   * GET /api/status
   * Lists status checks in insertion order (first 1000)
   */
  statusRouter.get('/', async (_req: Request, res: Response) => {
    try {
      const records = await statusCheckService.list();
      res.json(records.map(toStatusCheckResponse));
    } catch (error) {
      functions.logger.error('[status] Error listing status checks:', error);
      res.status(500).json({
        code: 'server_error',
        message: 'Failed to list status checks',
      });
    }
  });

  return statusRouter;
}
