/**
 * Base class for every fault raised by the screening core, so callers can
 * tell them apart from framework or driver errors.
 */
export abstract class ScreeningError extends Error {
  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Unknown check id, missing probe registration, bad wiring. Fatal to one request. */
export class ConfigurationError extends ScreeningError {
  constructor(message: string) {
    super(message);
  }
}

/** Missing or malformed required parameter. Recovered as NO_DATA. */
export class ValidationError extends ScreeningError {
  constructor(
    message: string,
    readonly parameter: string,
  ) {
    super(message);
  }
}

/** Network failure, timeout or unexpected payload shape. Recovered as NO_DATA. */
export class ProviderError extends ScreeningError {
  constructor(
    message: string,
    readonly providerId: string,
    readonly subjectId: string,
    readonly original?: unknown,
  ) {
    super(message);
  }

  static timeout(providerId: string, subjectId: string, timeoutMs: number): ProviderError {
    return new ProviderError(`${providerId} timed out after ${timeoutMs}ms`, providerId, subjectId);
  }

  static from(error: unknown, providerId: string, subjectId: string): ProviderError {
    if (error instanceof ProviderError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError(`${providerId} request failed: ${message}`, providerId, subjectId, error);
  }
}

/** A component of an aggregate faulted internally. Recovered as NO_DATA for that component. */
export class AggregationError extends ScreeningError {
  constructor(
    message: string,
    readonly aggregateId: string,
    readonly componentId: string,
    readonly original?: unknown,
  ) {
    super(message);
  }
}

export class ScreeningCancelledError extends ScreeningError {
  constructor(message = 'Screening was cancelled by the caller') {
    super(message);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
