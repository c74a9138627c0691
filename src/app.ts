import express from 'express';
import type { Express } from 'express';
import type { DecisionChannel } from './approval/channel.js';
import { errorHandler } from './middleware/error-handler.js';
import { globalLimiter } from './middleware/rate-limit.js';
import { captureRawBody } from './middleware/raw-body.js';
import { createSlackRouter } from './routes/slack.js';
import { createStatusRouter } from './routes/status.js';
import type { CycleTracker } from './scheduler/cycle-state.js';
import type { HistoryStore } from './store/history-store.js';
import type { PendingStore } from './store/pending-store.js';

export interface AppDeps {
  tracker: CycleTracker;
  store: PendingStore;
  history: HistoryStore;
  /** Review surface; the Slack routes are only mounted when present */
  slack?: { channel: DecisionChannel; signingSecret: string };
  rateLimit?: boolean;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  // Global rate limiter — applied before all routes
  if (deps.rateLimit !== false) {
    app.use(globalLimiter);
  }

  // Keep the raw bytes of both encodings Slack uses for signature checks
  app.use(express.json({ verify: captureRawBody }));
  app.use(express.urlencoded({ extended: true, verify: captureRawBody }));

  // Health check endpoint
  app.get('/', (_req, res) => {
    res.json({ message: 'Post approval bot' });
  });

  app.use('/status', createStatusRouter(deps));

  if (deps.slack) {
    app.use('/slack', createSlackRouter({ ...deps.slack, rateLimit: deps.rateLimit }));
  }

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
