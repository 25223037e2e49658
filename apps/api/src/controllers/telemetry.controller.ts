import { Router } from 'express';
import type { Request, Response } from 'express';
import type { TelemetryQueryPort } from '@telemetry-relay/domain';

export function createTelemetryRouter(reader: TelemetryQueryPort): Router {
  const router = Router();

  /** GET /telemetry - position, attitude, battery and last_updated */
  router.get('/', (_req: Request, res: Response) => {
    res.json(reader.full());
  });

  /** GET /telemetry/position */
  router.get('/position', (_req: Request, res: Response) => {
    res.json(reader.position());
  });

  /** GET /telemetry/attitude */
  router.get('/attitude', (_req: Request, res: Response) => {
    res.json(reader.attitude());
  });

  /** GET /telemetry/battery - remaining_percent is a 0..1 fraction */
  router.get('/battery', (_req: Request, res: Response) => {
    res.json(reader.battery());
  });

  return router;
}
