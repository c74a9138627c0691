import fs from 'fs/promises';
import { ApprovalAborted, ChannelUnavailable, StoreIOError } from '../errors.js';
import type { PendingStore } from '../store/pending-store.js';
import type { Decision, Draft } from '../types.js';
import type { DecisionBoard } from './decision-board.js';
import { DraftIdSequence } from './draft-id.js';

// The slice of DecisionChannel the coordinator drives.
export interface DraftPresenter {
  present(draft: Draft): Promise<void>;
  expire(draft: Draft, timeoutMs: number): Promise<void>;
  withdraw(draftId: string): void;
  notify(text: string): Promise<void>;
}

export interface ApprovalCoordinatorDeps {
  store: PendingStore;
  decisions: DecisionBoard;
  presenter: DraftPresenter;
  clock?: () => Date;
}

export interface ApprovalRequestOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Request/response over the asynchronous review channel: submit a draft,
 * suspend until the reviewer decides or the window elapses, and return the
 * decision exactly once.
 */
export class ApprovalCoordinator {
  private readonly store: PendingStore;
  private readonly decisions: DecisionBoard;
  private readonly presenter: DraftPresenter;
  private readonly clock: () => Date;
  private readonly ids = new DraftIdSequence();

  constructor(deps: ApprovalCoordinatorDeps) {
    this.store = deps.store;
    this.decisions = deps.decisions;
    this.presenter = deps.presenter;
    this.clock = deps.clock ?? (() => new Date());
  }

  async requestApproval(
    text: string,
    imagePath: string,
    options: ApprovalRequestOptions
  ): Promise<Decision> {
    const draft = this.createDraft(text, imagePath);

    this.store.put(draft);
    this.decisions.open(draft.id);
    console.log(`[Approval] Draft ${draft.id} submitted for review`);

    try {
      await this.presenter.present(draft);
    } catch (error) {
      this.decisions.consume(draft.id);
      this.release(draft.id);
      throw new ChannelUnavailable(`Could not present draft ${draft.id} for review`, { cause: error });
    }

    const outcome = await this.decisions.wait(draft.id, options.timeoutMs, options.signal);

    // Whoever removes the draft from the store first owns the outcome. If a
    // handler got there before us its decision is already on the board.
    const withdrawn = outcome === 'decided' ? null : this.release(draft.id);
    const decision = this.decisions.consume(draft.id);
    if (decision) {
      console.log(`[Approval] Draft ${draft.id} resolved: ${decision.action}`);
      return decision;
    }

    if (outcome === 'aborted') {
      this.presenter.withdraw(draft.id);
      throw new ApprovalAborted(draft.id);
    }

    console.log(`[Approval] Draft ${draft.id} timed out after ${options.timeoutMs}ms`);
    await this.presenter.expire(withdrawn ?? draft, options.timeoutMs).catch(error => {
      console.error(`[Approval] Failed to notify timeout for draft ${draft.id}:`, error);
    });
    return { action: 'timeout', draftId: draft.id };
  }

  // Drafts left pending by a previous process can never be decided on: the
  // caller that waited for them is gone. Remove them with their previews.
  async discardStaleDrafts(): Promise<number> {
    const stale = this.store.loadAll();
    for (const draft of stale.values()) {
      this.store.remove(draft.id);
      await fs.rm(draft.imagePath, { force: true }).catch(error => {
        console.error(`[Approval] Could not remove preview ${draft.imagePath}:`, error);
      });
    }

    if (stale.size > 0) {
      console.log(`[Approval] Discarded ${stale.size} stale draft(s) from a previous run`);
      await this.presenter.notify(
        `♻️ ${stale.size} post(s) awaiting approval were discarded after a restart.`
      );
    }
    return stale.size;
  }

  private createDraft(text: string, imagePath: string): Draft {
    const now = this.clock();
    let id = this.ids.next(now);
    while (this.store.get(id)) {
      id = this.ids.next(now);
    }
    return { id, text, imagePath, createdAt: now.toISOString() };
  }

  private release(draftId: string): Draft | null {
    try {
      return this.store.take(draftId);
    } catch (error) {
      if (error instanceof StoreIOError) {
        console.error(`[Approval] Could not withdraw draft ${draftId}:`, error);
        return null;
      }
      throw error;
    }
  }
}
