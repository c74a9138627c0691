import { Router } from 'express';
import type { Request, Response } from 'express';
import type { CycleTracker } from '../scheduler/cycle-state.js';
import type { HistoryStore } from '../store/history-store.js';
import type { PendingStore } from '../store/pending-store.js';

export interface StatusRouterDeps {
  tracker: CycleTracker;
  store: PendingStore;
  history: HistoryStore;
}

export function createStatusRouter({ tracker, store, history }: StatusRouterDeps): Router {
  const router = Router();

  // GET /status
  router.get('/', (_req: Request, res: Response) => {
    try {
      res.json({
        state: tracker.state,
        busy: tracker.isBusy(),
        wakePending: tracker.hasPendingWake(),
        pendingDrafts: store.count(),
        publishedPosts: history.count(),
      });
    } catch (error) {
      console.error('[Status] Error reading state:', error);
      res.status(500).json({ error: 'Failed to read status' });
    }
  });

  return router;
}
