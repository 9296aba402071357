export type SignalEngineErrorCode = 'INSUFFICIENT_HISTORY' | 'MALFORMED_SERIES';

export abstract class SignalEngineError extends Error {
  abstract readonly code: SignalEngineErrorCode;
}

/**
 * The series is shorter than the configured minimum. Callers normally skip
 * the cycle and try again on the next one.
 */
export class InsufficientHistoryError extends SignalEngineError {
  readonly code = 'INSUFFICIENT_HISTORY';

  constructor(
    readonly required: number,
    readonly actual: number,
  ) {
    super(`Series has ${actual} bar(s), at least ${required} required`);
    this.name = 'InsufficientHistoryError';
  }
}

export type MalformedSeriesReason = 'NON_INCREASING_TIME' | 'NON_FINITE_CLOSE';

export class MalformedSeriesError extends SignalEngineError {
  readonly code = 'MALFORMED_SERIES';

  constructor(
    readonly reason: MalformedSeriesReason,
    readonly index: number,
  ) {
    super(
      reason === 'NON_INCREASING_TIME'
        ? `Bar ${index} is not later than the bar before it`
        : `Bar ${index} has a non-finite close`,
    );
    this.name = 'MalformedSeriesError';
  }
}
