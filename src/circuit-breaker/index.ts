import { AppError } from '../errors.js';

export class CircuitOpenError extends AppError {
  constructor(readonly serviceName: string) {
    super(`Circuit is OPEN for service "${serviceName}": call rejected until it recovers`);
  }
}

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  serviceName: string;
  /** Consecutive failures before tripping OPEN */
  failureThreshold: number;
  /** Milliseconds to wait in OPEN before probing (HALF_OPEN) */
  resetTimeoutMs: number;
  /** Consecutive successes in HALF_OPEN before returning to CLOSED */
  successThreshold: number;
}

// Guards one upstream (OpenAI, X) so a cycle fails fast while the service is
// down instead of waiting on every request to time out.
export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failures = 0;
  private probes = 0;
  private openedAt = 0;

  constructor(private readonly config: CircuitBreakerConfig) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      if (Date.now() - this.openedAt < this.config.resetTimeoutMs) {
        throw new CircuitOpenError(this.config.serviceName);
      }
      this.moveTo('HALF_OPEN');
    }

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.recordFailure();
      throw error;
    }
    this.recordSuccess();
    return result;
  }

  getState(): CircuitState {
    return this.state;
  }

  private recordSuccess(): void {
    this.failures = 0;
    if (this.state !== 'HALF_OPEN') return;

    this.probes++;
    if (this.probes >= this.config.successThreshold) {
      this.moveTo('CLOSED');
    }
  }

  private recordFailure(): void {
    this.probes = 0;

    // Any failed probe re-opens immediately
    if (this.state === 'HALF_OPEN') {
      this.trip();
      return;
    }

    this.failures++;
    if (this.failures >= this.config.failureThreshold) {
      this.trip(` (${this.failures} consecutive failures)`);
    }
  }

  private trip(detail = ''): void {
    this.openedAt = Date.now();
    this.moveTo('OPEN', detail);
  }

  private moveTo(next: CircuitState, detail = ''): void {
    console.log(`[CircuitBreaker] ${this.config.serviceName}: ${this.state} → ${next}${detail}`);
    this.state = next;
    this.probes = 0;
    if (next === 'CLOSED') this.failures = 0;
  }
}
