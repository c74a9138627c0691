import type { Request, Response, NextFunction } from 'express';

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  console.error('[Server] Error:', err);

  const message = err instanceof Error && err.message ? err.message : undefined;

  // Body-parser and other HTTP-aware errors carry their own status
  const status = statusOf(err);
  if (status !== undefined && status >= 400 && status < 500) {
    return res.status(status).json({ error: message ?? 'An error occurred' });
  }

  res.status(500).json({ error: message ?? 'Internal server error' });
}
