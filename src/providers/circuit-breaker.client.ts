import CircuitBreaker from 'opossum';
import { DateWindow } from '../screening/dates';
import { ProviderError } from '../screening/errors';
import { ProviderClient } from '../screening/probes/probe.interface';

export interface BreakerOptions {
  timeout: number;
  errorThresholdPercentage: number;
  resetTimeout: number;
}

/** Wraps a provider client so repeated failures stop hitting the upstream API. */
export class CircuitBreakerClient implements ProviderClient {
  readonly id: string;
  private readonly breaker: CircuitBreaker<[string, DateWindow], unknown>;

  constructor(inner: ProviderClient, options: BreakerOptions) {
    this.id = inner.id;
    this.breaker = new CircuitBreaker(
      async (subjectId: string, window: DateWindow) => inner.fetch(subjectId, window),
      { ...options, name: inner.id },
    );
  }

  get opened(): boolean {
    return this.breaker.opened;
  }

  async fetch(subjectId: string, window: DateWindow): Promise<unknown> {
    if (this.breaker.opened) {
      throw new ProviderError(`${this.id} is currently unavailable. Please try again later.`, this.id, subjectId);
    }
    return this.breaker.fire(subjectId, window);
  }

  shutdown(): void {
    this.breaker.shutdown();
  }
}
