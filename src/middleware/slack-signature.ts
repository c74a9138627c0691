import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { verifySlackSignature } from '../integrations/slack.js';

export function requireSlackSignature(signingSecret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const signature = req.get('x-slack-signature');
    const timestamp = req.get('x-slack-request-timestamp');

    if (!signature || !timestamp) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }

    // Raw body captured by the body parsers; the parsed form cannot be re-signed
    if (req.rawBody === undefined) {
      res.status(401).json({ error: 'Missing raw body for verification' });
      return;
    }

    if (!verifySlackSignature(signingSecret, signature, timestamp, req.rawBody)) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }

    next();
  };
}
