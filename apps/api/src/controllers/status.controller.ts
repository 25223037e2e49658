import { Router } from 'express';
import type { Request, Response } from 'express';
import type { TelemetryQueryPort } from '@telemetry-relay/domain';

export function createStatusRouter(reader: TelemetryQueryPort): Router {
  const router = Router();

  /** GET /status - connection flags merged with the static backend config */
  router.get('/', (_req: Request, res: Response) => {
    res.json(reader.status());
  });

  return router;
}
