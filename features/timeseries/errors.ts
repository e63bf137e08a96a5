/**
 * Error types raised by the time series transforms.
 *
 * Only parameter and shape violations are errors. Absent values inside a
 * series never throw; they come out as `null` at the affected position.
 */

export class TimeSeriesError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeSeriesError';
  }
}

/** A transform parameter (periods, window, minPeriods, interval) is out of range. */
export class InvalidParameterError extends TimeSeriesError {
  constructor(
    public parameter: string,
    public value: unknown,
    message: string
  ) {
    super(message);
    this.name = 'InvalidParameterError';
  }
}

/** Two series (or a series and an index) that must line up do not. */
export class IndexMisalignmentError extends TimeSeriesError {
  constructor(message: string) {
    super(message);
    this.name = 'IndexMisalignmentError';
  }
}

/** Timestamps are not strictly ascending. */
export class UnsortedSeriesError extends TimeSeriesError {
  constructor(
    public position: number,
    message: string
  ) {
    super(message);
    this.name = 'UnsortedSeriesError';
  }
}
