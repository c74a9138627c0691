import { InvalidTransitionError } from '../errors.js';

export type CycleState =
  | 'idle'
  | 'generating'
  | 'awaiting_approval'
  | 'publishing'
  | 'sleeping'
  | 'stopped';

export type WakeReason = 'timer' | 'manual' | 'aborted';

// Every state may also move to 'stopped'. Failures from any active state
// fall through to 'sleeping'.
const VALID_TRANSITIONS: Record<CycleState, readonly CycleState[]> = {
  idle: ['generating'],
  generating: ['awaiting_approval', 'publishing', 'sleeping'],
  awaiting_approval: ['publishing', 'sleeping'],
  publishing: ['sleeping'],
  sleeping: ['idle'],
  stopped: [],
};

const BUSY_STATES: ReadonlySet<CycleState> = new Set(['generating', 'awaiting_approval', 'publishing']);

/**
 * Current position of the generate → review → publish loop, shared between
 * the scheduler (which drives it) and the review channel (which reads
 * `isBusy()` and raises manual wakes).
 */
export class CycleTracker {
  private current: CycleState = 'idle';
  private wakePending = false;
  private wakeListener: (() => void) | null = null;

  get state(): CycleState {
    return this.current;
  }

  transition(to: CycleState): void {
    if (to !== 'stopped' && !VALID_TRANSITIONS[this.current].includes(to)) {
      throw new InvalidTransitionError(this.current, to);
    }
    this.current = to;
  }

  isBusy(): boolean {
    return BUSY_STATES.has(this.current);
  }

  // Edge-triggered: any number of requests before the next wait collapse to
  // one wake. Returns false when a wake was already pending.
  requestWake(): boolean {
    if (this.wakePending) return false;
    this.wakePending = true;
    this.wakeListener?.();
    return true;
  }

  hasPendingWake(): boolean {
    return this.wakePending;
  }

  waitForWake(ms: number, signal?: AbortSignal): Promise<WakeReason> {
    if (signal?.aborted) return Promise.resolve('aborted');
    if (this.wakePending) {
      this.wakePending = false;
      return Promise.resolve('manual');
    }

    return new Promise<WakeReason>(resolve => {
      const finish = (reason: WakeReason) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.wakeListener = null;
        if (reason === 'manual') this.wakePending = false;
        resolve(reason);
      };
      const onAbort = () => finish('aborted');
      const timer = setTimeout(() => finish('timer'), ms);

      this.wakeListener = () => finish('manual');
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
