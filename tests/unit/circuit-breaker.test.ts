import { describe, it, expect, vi, afterEach } from 'vitest';
import { CircuitBreaker, CircuitOpenError } from '@/circuit-breaker/index.js';

const makeBreaker = (overrides: Partial<ConstructorParameters<typeof CircuitBreaker>[0]> = {}) =>
  new CircuitBreaker({
    serviceName: 'llm',
    failureThreshold: 3,
    resetTimeoutMs: 1000,
    successThreshold: 2,
    ...overrides,
  });

const fail = () => Promise.reject(new Error('upstream 503'));
const succeed = () => Promise.resolve('ok');

afterEach(() => {
  vi.useRealTimers();
});

describe('CircuitBreaker', () => {
  it('starts CLOSED and passes results through', async () => {
    const cb = makeBreaker();
    expect(cb.getState()).toBe('CLOSED');
    await expect(cb.execute(succeed)).resolves.toBe('ok');
  });

  it('rethrows the original error while below the threshold', async () => {
    const cb = makeBreaker({ failureThreshold: 3 });
    await expect(cb.execute(fail)).rejects.toThrow('upstream 503');
    await expect(cb.execute(fail)).rejects.toThrow('upstream 503');
    expect(cb.getState()).toBe('CLOSED');
  });

  it('opens after failureThreshold consecutive failures', async () => {
    const cb = makeBreaker({ failureThreshold: 3 });
    for (let i = 0; i < 3; i++) {
      await expect(cb.execute(fail)).rejects.toThrow();
    }
    expect(cb.getState()).toBe('OPEN');
  });

  it('rejects with CircuitOpenError without calling fn while OPEN', async () => {
    const cb = makeBreaker({ failureThreshold: 1 });
    await expect(cb.execute(fail)).rejects.toThrow();

    const fn = vi.fn(succeed);
    const error = await cb.execute(fn).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CircuitOpenError);
    expect(error).toMatchObject({ serviceName: 'llm', name: 'CircuitOpenError' });
    expect(fn).not.toHaveBeenCalled();
  });

  it('a success resets the consecutive failure count', async () => {
    const cb = makeBreaker({ failureThreshold: 3 });
    await expect(cb.execute(fail)).rejects.toThrow();
    await expect(cb.execute(fail)).rejects.toThrow();
    await cb.execute(succeed);
    await expect(cb.execute(fail)).rejects.toThrow();
    await expect(cb.execute(fail)).rejects.toThrow();
    expect(cb.getState()).toBe('CLOSED');
  });

  it('lets a probe through once resetTimeoutMs has elapsed', async () => {
    vi.useFakeTimers();
    const cb = makeBreaker({ failureThreshold: 1, resetTimeoutMs: 500 });

    await expect(cb.execute(fail)).rejects.toThrow();
    vi.advanceTimersByTime(600);

    await expect(cb.execute(succeed)).resolves.toBe('ok');
    expect(cb.getState()).toBe('HALF_OPEN');
  });

  it('closes after successThreshold successful probes', async () => {
    vi.useFakeTimers();
    const cb = makeBreaker({ failureThreshold: 1, resetTimeoutMs: 500, successThreshold: 2 });

    await expect(cb.execute(fail)).rejects.toThrow();
    vi.advanceTimersByTime(600);

    await cb.execute(succeed);
    expect(cb.getState()).toBe('HALF_OPEN');
    await cb.execute(succeed);
    expect(cb.getState()).toBe('CLOSED');
  });

  it('re-opens immediately when a probe fails', async () => {
    vi.useFakeTimers();
    const cb = makeBreaker({ failureThreshold: 1, resetTimeoutMs: 500 });

    await expect(cb.execute(fail)).rejects.toThrow();
    vi.advanceTimersByTime(600);

    await expect(cb.execute(fail)).rejects.toThrow('upstream 503');
    expect(cb.getState()).toBe('OPEN');
    await expect(cb.execute(succeed)).rejects.toThrow(CircuitOpenError);
  });
});
