/**
 * Circuit breaker for the collaborator.
 * After repeated exhausted calls the collaborator is treated as unreachable
 * and calls fail fast instead of burning the retry budget of every file.
 *
 * States: closed (normal) → open (failing) → half-open (one trial call)
 */

export type CircuitState = "closed" | "open" | "half-open";

export interface CircuitBreakerConfig {
  failureThreshold: number;
  resetTimeoutMs: number;
  /** Clock, replaceable in tests */
  now: () => number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 60_000,
  now: () => Date.now(),
};

export class CircuitBreaker {
  private state: CircuitState = "closed";
  private failures = 0;
  private openedAt: number | null = null;
  private readonly config: CircuitBreakerConfig;

  constructor(config?: Partial<CircuitBreakerConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  canExecute(): boolean {
    return this.getState() !== "open";
  }

  recordSuccess(): void {
    this.failures = 0;
    this.openedAt = null;
    this.state = "closed";
  }

  recordFailure(): void {
    this.failures++;

    // A failed trial call re-opens immediately.
    if (this.state === "half-open" || this.failures >= this.config.failureThreshold) {
      this.state = "open";
      this.openedAt = this.config.now();
    }
  }

  getState(): CircuitState {
    if (this.state === "open" && this.openedAt !== null) {
      if (this.config.now() - this.openedAt >= this.config.resetTimeoutMs) {
        this.state = "half-open";
      }
    }
    return this.state;
  }

  getFailureCount(): number {
    return this.failures;
  }
}
