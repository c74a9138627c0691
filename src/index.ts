import dotenv from 'dotenv';
import { createApp } from './app.js';
import { DecisionChannel } from './approval/channel.js';
import { ApprovalCoordinator } from './approval/coordinator.js';
import { DecisionBoard } from './approval/decision-board.js';
import { loadConfig } from './config.js';
import { openDatabase } from './db.js';
import { ConfigError } from './errors.js';
import { SlackReviewerMessenger } from './integrations/slack.js';
import { TwitterPublisher } from './integrations/twitter.js';
import { createContentGenerator } from './llm/index.js';
import { OpenAIImageSynthesizer } from './media/image.js';
import { DryRunPublisher } from './publishing/dry-run.js';
import { CycleTracker } from './scheduler/cycle-state.js';
import { CycleScheduler } from './scheduler/index.js';
import { HistoryStore } from './store/history-store.js';
import { PendingStore } from './store/pending-store.js';
import type { Publisher } from './types.js';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();

  const db = openDatabase(config.dbPath);
  const store = new PendingStore(db);
  const history = new HistoryStore(db);
  const tracker = new CycleTracker();

  let channel: DecisionChannel | null = null;
  let approvals: ApprovalCoordinator | null = null;

  if (config.slack && config.approvalPolicy !== 'disabled') {
    const decisions = new DecisionBoard();
    channel = new DecisionChannel({
      store,
      decisions,
      messenger: new SlackReviewerMessenger(config.slack),
      trigger: tracker,
      maxLength: config.postMaxLength,
    });
    approvals = new ApprovalCoordinator({ store, decisions, presenter: channel });
    await approvals.discardStaleDrafts();
  } else if (config.approvalPolicy === 'optional') {
    console.log('[Server] Slack approval is not configured; posts will be published directly');
  }

  let publisher: Publisher;
  if (config.dryRun || !config.twitter) {
    publisher = new DryRunPublisher();
  } else {
    publisher = new TwitterPublisher({ credentials: config.twitter });
  }

  const reviewChannel = channel;
  const scheduler = new CycleScheduler(
    {
      generator: createContentGenerator(config),
      images: new OpenAIImageSynthesizer(config.images),
      publisher,
      history,
      tracker,
      approvals,
      notify: reviewChannel ? text => reviewChannel.notify(text) : undefined,
      historyContextSize: config.historyContextSize,
    },
    config
  );

  const app = createApp({
    tracker,
    store,
    history,
    slack: channel && config.slack ? { channel, signingSecret: config.slack.signingSecret } : undefined,
  });

  const server = app.listen(config.port, () => {
    console.log(`[Server] Listening on http://localhost:${config.port} (DRY_RUN=${config.dryRun})`);
    scheduler.start();
  });

  let shuttingDown = false;
  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Server] ${signal} received — shutting down gracefully`);

    // Force exit if shutdown hasn't finished within 10 seconds
    setTimeout(() => {
      console.error('[Server] Forced exit after shutdown timeout');
      process.exit(1);
    }, 10_000).unref();

    await scheduler.stop();
    server.close(() => {
      db.close();
      console.log('[Server] HTTP server closed');
      process.exit(0);
    });
  }

  const onSignal = (signal: string) => {
    shutdown(signal).catch(error => {
      console.error('[Server] Shutdown failed:', error);
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch(error => {
  if (error instanceof ConfigError) {
    console.error(`[Server] ${error.message}`);
    console.error('[Server] Please add the missing values to your .env file');
  } else {
    console.error('[Server] Failed to start:', error);
  }
  process.exit(1);
});
