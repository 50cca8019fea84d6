export interface CircuitBreakerConfig {
  failureThreshold: number; // failure rate in [0, 1] that opens the circuit
  recoveryTimeout: number;
  monitoringPeriod: number;
  minimumRequests: number;
}

export type CircuitBreakerState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerStats {
  state: CircuitBreakerState;
  failures: number;
  successes: number;
  totalRequests: number;
  failureRate: number;
  lastFailureTime?: Date;
  lastSuccessTime?: Date;
  nextRetryTime?: Date;
}

export const DEFAULT_SOURCE_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 0.5,
  recoveryTimeout: 60000,
  monitoringPeriod: 120000,
  minimumRequests: 3
};

interface Outcome {
  at: number;
  ok: boolean;
}

function toDate(epochMs: number | undefined): Date | undefined {
  return epochMs === undefined ? undefined : new Date(epochMs);
}

/**
 * Guards one upstream price source. Opens when the failure rate over the
 * monitoring period reaches the threshold. After the recovery timeout exactly one
 * trial request is let through; the others stay blocked until it is recorded.
 */
export class CircuitBreaker {
  private state: CircuitBreakerState = 'closed';
  private outcomes: Outcome[] = [];
  private failureCount = 0;
  private successCount = 0;
  private lastFailureAt?: number;
  private lastSuccessAt?: number;
  private retryAt?: number;
  private trialInFlight = false;

  constructor(
    private readonly config: CircuitBreakerConfig = DEFAULT_SOURCE_BREAKER_CONFIG,
    private readonly now: () => number = Date.now
  ) {}

  public recordSuccess(): void {
    this.lastSuccessAt = this.now();
    this.successCount++;
    this.trialInFlight = false;
    this.track(true);

    if (this.state === 'half-open') {
      this.state = 'closed';
      this.failureCount = 0;
      this.retryAt = undefined;
    }
  }

  public recordFailure(): void {
    this.lastFailureAt = this.now();
    this.failureCount++;
    this.trialInFlight = false;
    this.track(false);

    if (this.state === 'half-open') {
      this.trip();
      return;
    }

    const sampled = this.outcomes.length >= this.config.minimumRequests;
    if (this.state === 'closed' && sampled && this.failureRate() >= this.config.failureThreshold) {
      this.trip();
    }
  }

  /**
   * True while requests should be skipped. A half-open circuit answers false
   * once, claiming the trial request; callers asking again before it is
   * recorded get true.
   */
  public isOpen(): boolean {
    this.refresh();
    if (this.state === 'closed') {
      return false;
    }
    if (this.state === 'half-open' && !this.trialInFlight) {
      this.trialInFlight = true;
      return false;
    }
    return true;
  }

  public getState(): CircuitBreakerState {
    this.refresh();
    return this.state;
  }

  public getStats(): CircuitBreakerStats {
    return {
      state: this.getState(),
      failures: this.failureCount,
      successes: this.successCount,
      totalRequests: this.failureCount + this.successCount,
      failureRate: this.failureRate(),
      lastFailureTime: toDate(this.lastFailureAt),
      lastSuccessTime: toDate(this.lastSuccessAt),
      nextRetryTime: toDate(this.retryAt)
    };
  }

  public reset(): void {
    this.state = 'closed';
    this.outcomes = [];
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureAt = undefined;
    this.lastSuccessAt = undefined;
    this.retryAt = undefined;
    this.trialInFlight = false;
  }

  private refresh(): void {
    if (this.state === 'open' && this.retryAt !== undefined && this.now() >= this.retryAt) {
      this.state = 'half-open';
    }
  }

  private trip(): void {
    this.state = 'open';
    this.retryAt = this.now() + this.config.recoveryTimeout;
  }

  private track(ok: boolean): void {
    const at = this.now();
    const cutoff = at - this.config.monitoringPeriod;
    this.outcomes = [...this.outcomes.filter(outcome => outcome.at >= cutoff), { at, ok }];
  }

  private failureRate(): number {
    if (this.outcomes.length === 0) {
      return 0;
    }
    return this.outcomes.filter(outcome => !outcome.ok).length / this.outcomes.length;
  }
}
