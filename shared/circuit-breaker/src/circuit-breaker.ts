import { logger } from "../../observability/src/logger.js";

export type CircuitState = "closed" | "open" | "half-open";

export class CircuitOpenError extends Error {
  constructor(breakerName: string) {
    super(`Circuit breaker "${breakerName}" is open, request rejected`);
    this.name = "CircuitOpenError";
  }
}

export interface CircuitBreakerOptions {
  /** Identifier for logging */
  name: string;
  /** Consecutive failures before opening the circuit (default: 5) */
  failureThreshold?: number;
  /** Time in ms the circuit stays open before probing (default: 30000) */
  resetTimeoutMs?: number;
  /**
   * Errors for which this returns true are rethrown without counting
   * towards the threshold (rate limits, overload responses).
   */
  isTransient?: (err: unknown) => boolean;
  /** Clock override for tests */
  now?: () => number;
}

/**
 * Circuit breaker for calls to an external service.
 *
 * - Closed: calls pass through; consecutive counted failures are tracked.
 * - Open: calls fail immediately with CircuitOpenError.
 * - Half-open: one probe call is let through; success closes, failure reopens.
 */
export class CircuitBreaker {
  readonly name: string;
  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly isTransient: (err: unknown) => boolean;
  private readonly now: () => number;

  private state: CircuitState = "closed";
  private consecutiveFailures = 0;
  private openedAt = 0;

  constructor(opts: CircuitBreakerOptions) {
    this.name = opts.name;
    this.failureThreshold = opts.failureThreshold ?? 5;
    this.resetTimeoutMs = opts.resetTimeoutMs ?? 30_000;
    this.isTransient = opts.isTransient ?? (() => false);
    this.now = opts.now ?? Date.now;
  }

  getState(): CircuitState {
    if (this.state === "open" && this.now() - this.openedAt >= this.resetTimeoutMs) {
      this.transitionTo("half-open");
    }
    return this.state;
  }

  reset(): void {
    this.consecutiveFailures = 0;
    this.transitionTo("closed");
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.getState() === "open") {
      throw new CircuitOpenError(this.name);
    }

    try {
      const result = await fn();
      this.consecutiveFailures = 0;
      if (this.state === "half-open") this.transitionTo("closed");
      return result;
    } catch (error) {
      if (!this.isTransient(error)) this.recordFailure();
      throw error;
    }
  }

  private recordFailure(): void {
    this.consecutiveFailures++;
    if (this.state === "half-open" || this.consecutiveFailures >= this.failureThreshold) {
      this.openedAt = this.now();
      this.transitionTo("open");
    }
  }

  private transitionTo(newState: CircuitState): void {
    if (this.state === newState) return;
    const prevState = this.state;
    this.state = newState;
    logger.warn(`Circuit breaker "${this.name}": ${prevState} → ${newState}`, {
      failures: this.consecutiveFailures,
      threshold: this.failureThreshold,
    });
  }
}
