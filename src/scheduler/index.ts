import fs from 'fs/promises';
import type { ApprovalCoordinator } from '../approval/coordinator.js';
import { ApprovalAborted, ChannelUnavailable, toError } from '../errors.js';
import type { ContentGenerator } from '../llm/adapter.js';
import type { HistoryStore } from '../store/history-store.js';
import type {
  ApprovalPolicy,
  Decision,
  ImageSynthesizer,
  IntervalRange,
  Publisher,
} from '../types.js';
import type { CycleTracker } from './cycle-state.js';

export type CycleOutcome = 'published' | 'denied' | 'timeout' | 'failed' | 'aborted';

export type PostingMode = 'approval' | 'direct';

export interface SchedulerSettings {
  approvalPolicy: ApprovalPolicy;
  approvalTimeoutMs: number;
  approvalInterval: IntervalRange;
  directInterval: IntervalRange;
  failureBackoffMs: number;
}

export interface SchedulerDeps {
  generator: ContentGenerator;
  images: ImageSynthesizer;
  publisher: Publisher;
  history: HistoryStore;
  tracker: CycleTracker;
  /** null when no review channel is configured */
  approvals: ApprovalCoordinator | null;
  notify?: (text: string) => Promise<void>;
  historyContextSize?: number;
  random?: () => number;
  removeFile?: (file: string) => Promise<void>;
}

export function pickInterval(range: IntervalRange, random: () => number = Math.random): number {
  return Math.round(range.minMs + random() * (range.maxMs - range.minMs));
}

export function resolveMode(policy: ApprovalPolicy, channelAvailable: boolean): PostingMode {
  if (policy === 'disabled') return 'direct';
  if (policy === 'required') return 'approval';
  return channelAvailable ? 'approval' : 'direct';
}

const removeQuietly = (file: string) => fs.rm(file, { force: true });

/**
 * Outer control loop: generate → review → publish-or-skip → sleep, one cycle
 * at a time. A failing cycle never ends the loop; it sleeps the short
 * failure backoff instead of the normal randomized interval.
 */
export class CycleScheduler {
  private readonly deps: SchedulerDeps;
  private readonly settings: SchedulerSettings;
  private readonly random: () => number;
  private readonly removeFile: (file: string) => Promise<void>;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(deps: SchedulerDeps, settings: SchedulerSettings) {
    if (settings.approvalPolicy === 'required' && !deps.approvals) {
      throw new Error('Approval policy "required" needs an approval channel');
    }
    this.deps = deps;
    this.settings = settings;
    this.random = deps.random ?? Math.random;
    this.removeFile = deps.removeFile ?? removeQuietly;
  }

  get mode(): PostingMode {
    return resolveMode(this.settings.approvalPolicy, this.deps.approvals !== null);
  }

  start(): void {
    if (this.loop) return;
    this.controller = new AbortController();
    console.log(`[Scheduler] Started (mode=${this.mode}, policy=${this.settings.approvalPolicy})`);
    this.loop = this.run(this.controller.signal).catch(error => {
      console.error('[Scheduler] Loop crashed:', error);
    });
  }

  // Breaks out of a sleep or approval wait; an in-flight publish finishes first.
  async stop(): Promise<void> {
    if (!this.loop || !this.controller) return;
    this.controller.abort();
    await this.loop;
    this.loop = null;
    this.controller = null;
    console.log('[Scheduler] Stopped');
  }

  async runCycle(signal?: AbortSignal): Promise<CycleOutcome> {
    const { tracker } = this.deps;
    tracker.transition('generating');

    let imagePath: string | null = null;
    let outcome: CycleOutcome;
    try {
      const history = this.deps.history.recent(this.deps.historyContextSize ?? 3);
      const content = await this.deps.generator.generate(history);
      console.log(`[Scheduler] Generated post: ${content.text}`);
      console.log(`[Scheduler] Image prompt: ${content.imagePrompt}`);

      imagePath = await this.deps.images.render(content.imagePrompt, {
        top: content.overlayTop,
        bottom: content.overlayBottom,
      });
      console.log(`[Scheduler] Image generated: ${imagePath}`);

      outcome = await this.review(content.text, imagePath, signal);
    } catch (error) {
      if (error instanceof ApprovalAborted) {
        outcome = 'aborted';
      } else {
        console.error(`[Scheduler] Cycle failed: ${toError(error).message}`);
        outcome = 'failed';
      }
    } finally {
      if (imagePath) {
        await this.removeFile(imagePath).catch(error => {
          console.error(`[Scheduler] Could not remove ${imagePath}:`, error);
        });
      }
    }

    tracker.transition('sleeping');
    return outcome;
  }

  private async review(text: string, imagePath: string, signal?: AbortSignal): Promise<CycleOutcome> {
    const { approvals, tracker } = this.deps;

    if (this.mode === 'direct' || !approvals) {
      return this.publish(text, imagePath, false);
    }

    tracker.transition('awaiting_approval');
    let decision: Decision;
    try {
      decision = await approvals.requestApproval(text, imagePath, {
        timeoutMs: this.settings.approvalTimeoutMs,
        signal,
      });
    } catch (error) {
      if (error instanceof ChannelUnavailable && this.settings.approvalPolicy === 'optional') {
        console.error(`[Scheduler] ${error.message}; approval is optional, continuing without it`);
        return this.publish(text, imagePath, false);
      }
      throw error;
    }

    if (decision.action === 'approve') {
      // The reviewer may have rewritten the text
      return this.publish(decision.finalText, imagePath, true);
    }
    if (decision.action === 'deny') {
      console.log('[Scheduler] Post denied. A new one will be generated next cycle.');
      return 'denied';
    }
    console.log('[Scheduler] Approval timed out. Skipping this post.');
    return 'timeout';
  }

  private async publish(text: string, imagePath: string, reviewed: boolean): Promise<CycleOutcome> {
    this.deps.tracker.transition('publishing');
    const result = await this.deps.publisher.publish(text, imagePath);
    this.deps.history.append(text);
    console.log(`[Scheduler] Post ${result.id} published successfully`);

    if (reviewed && this.deps.notify) {
      await this.deps.notify('✅ Post published successfully!').catch(error => {
        console.error('[Scheduler] Failed to send publish confirmation:', error);
      });
    }
    return 'published';
  }

  nextDelay(outcome: CycleOutcome): number {
    if (outcome === 'failed') return this.settings.failureBackoffMs;
    const range = this.mode === 'approval' ? this.settings.approvalInterval : this.settings.directInterval;
    return pickInterval(range, this.random);
  }

  private async run(signal: AbortSignal): Promise<void> {
    const { tracker } = this.deps;

    while (!signal.aborted) {
      const outcome = await this.runCycle(signal);
      if (outcome === 'aborted' || signal.aborted) break;

      const delay = this.nextDelay(outcome);
      console.log(
        outcome === 'failed'
          ? `[Scheduler] Retrying in ${Math.round(delay / 1000)}s`
          : `[Scheduler] Waiting ${(delay / 3_600_000).toFixed(1)} hours until next post`
      );

      const reason = await tracker.waitForWake(delay, signal);
      if (reason === 'aborted') break;
      if (reason === 'manual') console.log('[Scheduler] Woken by manual trigger');
      tracker.transition('idle');
    }

    tracker.transition('stopped');
  }
}
