import { StoreIOError } from '../errors.js';
import type { PendingStore } from '../store/pending-store.js';
import type { Draft } from '../types.js';
import type { DecisionBoard } from './decision-board.js';

export interface MessageRef {
  channel: string;
  ts: string;
}

// Outbound side of the review surface. SlackReviewerMessenger is the
// production implementation.
export interface ReviewerMessenger {
  postDraft(draft: Draft): Promise<MessageRef>;
  updateMessage(ref: MessageRef, text: string): Promise<void>;
  send(text: string, channel?: string): Promise<void>;
}

export interface ManualTriggerTarget {
  isBusy(): boolean;
  requestWake(): boolean;
}

export interface ReviewerAction {
  draftId: string;
  /** Platform user id; free-text replies are matched on it */
  reviewerId: string;
  /** Display name recorded as `decidedBy` */
  userId: string;
  message: MessageRef;
}

export interface ReviewerMessage {
  channel: string;
  userId: string;
  text: string;
}

export interface TriggerRequest {
  channel: string;
  userId: string;
}

export type ReviewOutcome =
  | { outcome: 'approved'; draftId: string }
  | { outcome: 'denied'; draftId: string }
  | { outcome: 'editing'; draftId: string }
  | { outcome: 'already_processed'; draftId: string };

export type FreeTextOutcome =
  | { outcome: 'ignored' }
  | { outcome: 'invalid_length'; draftId: string; length: number }
  | { outcome: 'stale_edit'; draftId: string }
  | { outcome: 'edited_and_approved'; draftId: string };

export type TriggerOutcome =
  | { outcome: 'busy'; message: string }
  | { outcome: 'triggered'; message: string };

export interface DecisionChannelDeps {
  store: PendingStore;
  decisions: DecisionBoard;
  messenger: ReviewerMessenger;
  trigger: ManualTriggerTarget;
  maxLength: number;
}

export const ALREADY_PROCESSED = '❌ Post data not found. It may have already been processed.';
export const BUSY_MESSAGE = '⏳ A post is already being generated. Please wait for it to finish.';
export const TRIGGERED_MESSAGE = '🚀 Generating a new post now…';

export function sessionKey(channel: string, userId: string): string {
  return `${channel}:${userId}`;
}

/**
 * Reviewer-facing half of the approval workflow.
 *
 * Every decision path consumes the draft with `PendingStore.take` and records
 * the decision before the next `await`, so concurrent presses on the same
 * draft produce exactly one decision and every later press sees the draft
 * as already processed.
 */
export class DecisionChannel {
  private readonly store: PendingStore;
  private readonly decisions: DecisionBoard;
  private readonly messenger: ReviewerMessenger;
  private readonly trigger: ManualTriggerTarget;
  private readonly maxLength: number;

  /** reviewer session → draft id being rewritten */
  private readonly editSessions = new Map<string, string>();
  /** draft id → rendered message */
  private readonly rendered = new Map<string, MessageRef>();

  constructor(deps: DecisionChannelDeps) {
    this.store = deps.store;
    this.decisions = deps.decisions;
    this.messenger = deps.messenger;
    this.trigger = deps.trigger;
    this.maxLength = deps.maxLength;
  }

  async present(draft: Draft): Promise<void> {
    const ref = await this.messenger.postDraft(draft);
    this.rendered.set(draft.id, ref);
  }

  async onApprove(action: ReviewerAction): Promise<ReviewOutcome> {
    const draft = this.consumeDraft(action.draftId);
    if (!draft) {
      await this.show(action.message, ALREADY_PROCESSED);
      return { outcome: 'already_processed', draftId: action.draftId };
    }

    this.decisions.record({
      action: 'approve',
      draftId: draft.id,
      finalText: draft.text,
      decidedBy: action.userId,
    });
    this.forget(draft.id);
    console.log(`[Channel] Draft ${draft.id} approved by ${action.userId}`);

    await this.show(action.message, `✅ APPROVED\n\n${draft.text}\n\nPosting…`);
    return { outcome: 'approved', draftId: draft.id };
  }

  async onDeny(action: ReviewerAction): Promise<ReviewOutcome> {
    const draft = this.consumeDraft(action.draftId);
    if (!draft) {
      await this.show(action.message, ALREADY_PROCESSED);
      return { outcome: 'already_processed', draftId: action.draftId };
    }

    this.decisions.record({ action: 'deny', draftId: draft.id, decidedBy: action.userId });
    this.forget(draft.id);
    console.log(`[Channel] Draft ${draft.id} denied by ${action.userId}`);

    await this.show(action.message, `❌ DENIED\n\n${draft.text}\n\nA new post will be generated next cycle.`);
    return { outcome: 'denied', draftId: draft.id };
  }

  // Opens (or supersedes) the reviewer's edit session. The decision stays
  // open until their next free-text message.
  async onEdit(action: ReviewerAction): Promise<ReviewOutcome> {
    const draft = this.lookupDraft(action.draftId);
    if (!draft) {
      await this.show(action.message, ALREADY_PROCESSED);
      return { outcome: 'already_processed', draftId: action.draftId };
    }

    this.editSessions.set(sessionKey(action.message.channel, action.reviewerId), draft.id);
    console.log(`[Channel] Draft ${draft.id} opened for editing by ${action.userId}`);

    await this.show(
      action.message,
      `✏️ EDITING\n\nCurrent text:\n${draft.text}\n\nSend me the new post text (up to ${this.maxLength} characters):`
    );
    return { outcome: 'editing', draftId: draft.id };
  }

  async onFreeText(message: ReviewerMessage): Promise<FreeTextOutcome> {
    const key = sessionKey(message.channel, message.userId);
    const draftId = this.editSessions.get(key);
    if (!draftId) {
      return { outcome: 'ignored' };
    }

    const text = message.text.trim();
    if (text.length === 0 || text.length > this.maxLength) {
      await this.reply(
        message.channel,
        `⚠️ The new text must be between 1 and ${this.maxLength} characters (got ${text.length}). Send it again.`
      );
      return { outcome: 'invalid_length', draftId, length: text.length };
    }

    const draft = this.consumeDraft(draftId);
    this.editSessions.delete(key);
    if (!draft) {
      console.log(`[Channel] Dropping edit for draft ${draftId}: no longer pending`);
      return { outcome: 'stale_edit', draftId };
    }

    this.decisions.record({
      action: 'approve',
      draftId: draft.id,
      finalText: text,
      decidedBy: message.userId,
    });
    const ref = this.rendered.get(draft.id);
    this.forget(draft.id);
    console.log(`[Channel] Draft ${draft.id} edited and approved by ${message.userId}`);

    if (ref) {
      await this.show(ref, `✅ APPROVED (edited)\n\n${text}\n\nPosting…`);
    }
    await this.reply(message.channel, `✅ Post updated and approved!\n\nNew text: ${text}\n\nPosting…`);
    return { outcome: 'edited_and_approved', draftId: draft.id };
  }

  onManualTrigger(request: TriggerRequest): TriggerOutcome {
    if (this.trigger.isBusy()) {
      console.log(`[Channel] Manual trigger from ${request.userId} rejected: cycle in progress`);
      return { outcome: 'busy', message: BUSY_MESSAGE };
    }

    const woke = this.trigger.requestWake();
    console.log(
      `[Channel] Manual trigger from ${request.userId}` + (woke ? '' : ' (wake already pending)')
    );
    return { outcome: 'triggered', message: TRIGGERED_MESSAGE };
  }

  // Best-effort: the approval window elapsed for a draft nobody decided on.
  async expire(draft: Draft, timeoutMs: number): Promise<void> {
    const ref = this.rendered.get(draft.id);
    this.forget(draft.id);

    if (ref) {
      await this.show(ref, `⏰ EXPIRED\n\n${draft.text}\n\nNo decision was made in time.`);
    }
    await this.notify(`⏰ Post approval timed out after ${formatDuration(timeoutMs)}. Skipping…`);
  }

  // Drops local state for a draft the coordinator withdrew without a decision.
  withdraw(draftId: string): void {
    this.forget(draftId);
  }

  async notify(text: string): Promise<void> {
    try {
      await this.messenger.send(text);
    } catch (error) {
      console.error('[Channel] Failed to send notification:', error);
    }
  }

  hasEditSession(channel: string, userId: string): boolean {
    return this.editSessions.has(sessionKey(channel, userId));
  }

  private consumeDraft(draftId: string): Draft | null {
    try {
      return this.store.take(draftId);
    } catch (error) {
      if (error instanceof StoreIOError) {
        console.error(`[Channel] Draft ${draftId} treated as lost:`, error);
        return null;
      }
      throw error;
    }
  }

  private lookupDraft(draftId: string): Draft | null {
    try {
      return this.store.get(draftId);
    } catch (error) {
      if (error instanceof StoreIOError) {
        console.error(`[Channel] Draft ${draftId} treated as lost:`, error);
        return null;
      }
      throw error;
    }
  }

  private forget(draftId: string): void {
    this.rendered.delete(draftId);
    for (const [key, id] of this.editSessions) {
      if (id === draftId) this.editSessions.delete(key);
    }
  }

  private async show(ref: MessageRef, text: string): Promise<void> {
    try {
      await this.messenger.updateMessage(ref, text);
    } catch (error) {
      console.error(`[Channel] Failed to update message ${ref.ts}:`, error);
    }
  }

  private async reply(channel: string, text: string): Promise<void> {
    try {
      await this.messenger.send(text, channel);
    } catch (error) {
      console.error(`[Channel] Failed to reply in ${channel}:`, error);
    }
  }
}

export function formatDuration(ms: number): string {
  const plural = (value: number, unit: string) => `${value} ${unit}${value === 1 ? '' : 's'}`;
  const hours = ms / 3_600_000;
  if (hours >= 1) return plural(Number.isInteger(hours) ? hours : Number(hours.toFixed(1)), 'hour');
  const minutes = Math.round(ms / 60_000);
  if (minutes >= 1) return plural(minutes, 'minute');
  return plural(Math.round(ms / 1000), 'second');
}
