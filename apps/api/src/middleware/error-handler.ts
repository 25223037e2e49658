import type { Request, Response, NextFunction } from 'express';

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'not_found' });
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof Error) {
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 500) console.error('[server] request failed', err);
    res.status(status).json({ error: status >= 500 ? 'internal_error' : err.message });
    return;
  }
  console.error('[server] request failed', err);
  res.status(500).json({ error: 'internal_error' });
}
