export type CircuitState = 'closed' | 'open' | 'half_open';

/**
 * Everything the breaker knows. Transitions below are pure functions over it.
 */
export interface CircuitSnapshot {
  state: CircuitState;
  consecutiveFailures: number;
  openedAt?: number;
  /** A half-open trial call has been admitted and has not reported back */
  trialInFlight: boolean;
}

export interface CircuitBreakerOptions {
  failureThreshold: number;
  cooldownMs: number;
  now?: () => number;
}

export const CLOSED: CircuitSnapshot = { state: 'closed', consecutiveFailures: 0, trialInFlight: false };

/** Moves an open circuit to half-open once the cooldown has elapsed */
export function advance(s: CircuitSnapshot, now: number, cooldownMs: number): CircuitSnapshot {
  if (s.state === 'open' && s.openedAt !== undefined && now - s.openedAt >= cooldownMs) {
    return { ...s, state: 'half_open', trialInFlight: false };
  }
  return s;
}

export function admit(s: CircuitSnapshot): { allowed: boolean; next: CircuitSnapshot } {
  switch (s.state) {
    case 'closed':
      return { allowed: true, next: s };
    case 'open':
      return { allowed: false, next: s };
    case 'half_open':
      return s.trialInFlight
        ? { allowed: false, next: s }
        : { allowed: true, next: { ...s, trialInFlight: true } };
  }
}

export function onSuccess(): CircuitSnapshot {
  return CLOSED;
}

export function onFailure(s: CircuitSnapshot, now: number, failureThreshold: number): CircuitSnapshot {
  if (s.state === 'half_open') {
    return { state: 'open', consecutiveFailures: s.consecutiveFailures + 1, openedAt: now, trialInFlight: false };
  }
  const consecutiveFailures = s.consecutiveFailures + 1;
  if (consecutiveFailures >= failureThreshold) {
    return { state: 'open', consecutiveFailures, openedAt: now, trialInFlight: false };
  }
  return { ...s, consecutiveFailures };
}

/**
 * Stops calling a failing dependency for a cooldown window. Every method is
 * synchronous, so concurrent callers cannot interleave inside a transition.
 */
export class CircuitBreaker {
  private snapshot: CircuitSnapshot = CLOSED;
  private readonly now: () => number;

  constructor(private readonly options: CircuitBreakerOptions) {
    this.now = options.now ?? Date.now;
  }

  get state(): CircuitState {
    this.snapshot = advance(this.snapshot, this.now(), this.options.cooldownMs);
    return this.snapshot.state;
  }

  get failureCount(): number {
    return this.snapshot.consecutiveFailures;
  }

  /** True when a call may proceed. In half-open only the first caller is let through. */
  allowRequest(): boolean {
    const { allowed, next } = admit(advance(this.snapshot, this.now(), this.options.cooldownMs));
    this.snapshot = next;
    return allowed;
  }

  recordSuccess(): void {
    this.snapshot = onSuccess();
  }

  recordFailure(): void {
    this.snapshot = onFailure(this.snapshot, this.now(), this.options.failureThreshold);
  }

  reset(): void {
    this.snapshot = CLOSED;
  }
}
