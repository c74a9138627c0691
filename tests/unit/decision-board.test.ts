import { describe, it, expect, vi, afterEach } from 'vitest';
import { DecisionBoard } from '@/approval/decision-board.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('DecisionBoard', () => {
  it('ignores decisions for ids that were never opened', () => {
    const board = new DecisionBoard();
    expect(board.record({ action: 'deny', draftId: 'ghost' })).toBe(false);
    expect(board.size()).toBe(0);
  });

  it('keeps the first decision and ignores later ones for the same id', () => {
    const board = new DecisionBoard();
    board.open('d1');

    expect(board.record({ action: 'approve', draftId: 'd1', finalText: 'first' })).toBe(true);
    expect(board.record({ action: 'deny', draftId: 'd1' })).toBe(false);

    expect(board.consume('d1')).toEqual({ action: 'approve', draftId: 'd1', finalText: 'first' });
  });

  it('consume is read-once and frees the slot', () => {
    const board = new DecisionBoard();
    board.open('d1');
    board.record({ action: 'deny', draftId: 'd1' });

    expect(board.consume('d1')).toEqual({ action: 'deny', draftId: 'd1' });
    expect(board.consume('d1')).toBeUndefined();
    expect(board.isOpen('d1')).toBe(false);
  });

  it('wakes a waiter as soon as a decision is recorded', async () => {
    vi.useFakeTimers();
    const board = new DecisionBoard();
    board.open('d1');

    const waiting = board.wait('d1', 60_000);
    board.record({ action: 'deny', draftId: 'd1' });

    await expect(waiting).resolves.toBe('decided');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('resolves immediately when the decision is already there', async () => {
    const board = new DecisionBoard();
    board.open('d1');
    board.record({ action: 'deny', draftId: 'd1' });

    await expect(board.wait('d1', 60_000)).resolves.toBe('decided');
  });

  it('times out when nobody decides', async () => {
    vi.useFakeTimers();
    const board = new DecisionBoard();
    board.open('d1');

    const waiting = board.wait('d1', 5_000);
    await vi.advanceTimersByTimeAsync(5_000);

    await expect(waiting).resolves.toBe('timeout');
    expect(board.consume('d1')).toBeUndefined();
  });

  it('stops waiting when the signal aborts', async () => {
    vi.useFakeTimers();
    const board = new DecisionBoard();
    const controller = new AbortController();
    board.open('d1');

    const waiting = board.wait('d1', 60_000, controller.signal);
    controller.abort();

    await expect(waiting).resolves.toBe('aborted');
    expect(vi.getTimerCount()).toBe(0);
  });
});
