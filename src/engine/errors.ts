/**
 * Error classes raised by the hydropower engine.
 *
 * Every class carries a stable `code` so callers can branch without matching
 * on message text.
 */

export type HydroModelErrorCode =
  | 'DATA_INSUFFICIENT'
  | 'UNKNOWN_TURBINE_TYPE'
  | 'REFERENCE_SOURCE_UNAVAILABLE'
  | 'INVALID_REFERENCE_TABLE'
  | 'INVALID_TIME_SERIES'
  | 'INVALID_PLANT_SPEC'
  | 'PLANT_SPEC_INVARIANT';

export class HydroModelError extends Error {
  constructor(
    message: string,
    public readonly code: HydroModelErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Not enough of {P_n, h_n, dV_n, history} is known to estimate the plant. */
export class DataInsufficientError extends HydroModelError {
  constructor(public readonly plantName: string) {
    super(`The input data is not sufficient for plant ${plantName}`, 'DATA_INSUFFICIENT');
  }
}

export class UnknownTurbineTypeError extends HydroModelError {
  constructor(
    public readonly turbType: string,
    public readonly validTypes: readonly string[],
  ) {
    super(
      `Turbine type ${turbType} is not in the efficiency table (${validTypes.join(', ')})`,
      'UNKNOWN_TURBINE_TYPE',
    );
  }
}

export class ReferenceSourceUnavailableError extends HydroModelError {
  constructor(public readonly source: string, cause?: unknown) {
    super(`Reference source ${source} could not be read`, 'REFERENCE_SOURCE_UNAVAILABLE', { cause });
  }
}

export class InvalidReferenceTableError extends HydroModelError {
  constructor(public readonly source: string, detail: string) {
    super(`Reference source ${source} is malformed: ${detail}`, 'INVALID_REFERENCE_TABLE');
  }
}

export class InvalidTimeSeriesError extends HydroModelError {
  constructor(message: string) {
    super(message, 'INVALID_TIME_SERIES');
  }
}

export class InvalidPlantSpecError extends HydroModelError {
  constructor(message: string, public readonly field?: string) {
    super(message, 'INVALID_PLANT_SPEC');
  }
}

/** A caller broke an internal precondition (programming error, not user input). */
export class PlantSpecInvariantError extends HydroModelError {
  constructor(message: string) {
    super(message, 'PLANT_SPEC_INVARIANT');
  }
}
