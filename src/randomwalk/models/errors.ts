export enum SimulationErrorCode {
  INVALID_PARAMETER = 'INVALID_PARAMETER',
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH'
}

export class SimulationError extends Error {
  constructor(
    public readonly code: SimulationErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SimulationError';
  }
}

/**
 * Raised when a generation, assembly or rendering parameter is out of range
 */
export class InvalidParameterError extends SimulationError {
  constructor(
    public readonly parameter: string,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(SimulationErrorCode.INVALID_PARAMETER, message, { parameter, ...details });
    this.name = 'InvalidParameterError';
  }
}

export type TableDimension = 'rows' | 'walks';

/**
 * Raised when the time axis and the ensemble disagree on the number of rows,
 * or an ensemble's declared count disagrees with its walks
 */
export class DimensionMismatchError extends SimulationError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    public readonly dimension: TableDimension = 'rows'
  ) {
    super(
      SimulationErrorCode.DIMENSION_MISMATCH,
      dimension === 'rows'
        ? `Time axis has ${expected} points but walks have ${actual} samples`
        : `Ensemble declares ${expected} walks but holds ${actual}`,
      { expected, actual, dimension }
    );
    this.name = 'DimensionMismatchError';
  }
}
