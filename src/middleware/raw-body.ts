import type { IncomingMessage } from 'http';

declare global {
  namespace Express {
    interface Request {
      /** Unparsed request body, kept for Slack signature verification */
      rawBody?: string;
    }
  }
}

// `verify` hook for express.json / express.urlencoded
export function captureRawBody(req: IncomingMessage & { rawBody?: string }, _res: unknown, buf: Buffer): void {
  req.rawBody = buf.toString('utf8');
}
