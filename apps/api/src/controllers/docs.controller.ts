import { Router } from 'express';
import type { Request, Response } from 'express';
import { buildOpenApiDocument } from '../docs/openapi.js';

export function createDocsRouter(version: string): Router {
  const router = Router();
  const document = buildOpenApiDocument(version);

  /** GET /openapi.json */
  router.get('/openapi.json', (_req: Request, res: Response) => {
    res.json(document);
  });

  return router;
}
