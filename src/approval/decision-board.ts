import type { Decision } from '../types.js';

export type WaitOutcome = 'decided' | 'timeout' | 'aborted';

interface Slot {
  decision?: Decision;
  notify?: () => void;
}

// In-memory hand-off of decisions from the review handlers to the caller
// waiting in ApprovalCoordinator. Entries exist only between open() and
// consume(), so memory is bounded by the number of in-flight drafts.
export class DecisionBoard {
  private readonly slots = new Map<string, Slot>();

  open(draftId: string): void {
    if (!this.slots.has(draftId)) {
      this.slots.set(draftId, {});
    }
  }

  isOpen(draftId: string): boolean {
    return this.slots.has(draftId);
  }

  // First decision for an open id wins. Returns false when the id is unknown
  // or already decided.
  record(decision: Decision): boolean {
    const slot = this.slots.get(decision.draftId);
    if (!slot || slot.decision) return false;

    slot.decision = decision;
    slot.notify?.();
    return true;
  }

  wait(draftId: string, timeoutMs: number, signal?: AbortSignal): Promise<WaitOutcome> {
    const slot = this.slots.get(draftId);
    if (!slot || slot.decision) return Promise.resolve('decided');
    if (signal?.aborted) return Promise.resolve('aborted');

    return new Promise<WaitOutcome>(resolve => {
      const finish = (outcome: WaitOutcome) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        slot.notify = undefined;
        resolve(outcome);
      };
      const onAbort = () => finish('aborted');
      const timer = setTimeout(() => finish('timeout'), timeoutMs);

      slot.notify = () => finish('decided');
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  // Read-once: the entry is gone after this call.
  consume(draftId: string): Decision | undefined {
    const slot = this.slots.get(draftId);
    this.slots.delete(draftId);
    return slot?.decision;
  }

  size(): number {
    return this.slots.size;
  }
}
