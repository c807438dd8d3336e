// ============================================================================
// Kinetics error taxonomy
// ============================================================================

export class KineticsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Out-of-domain numeric input: negative concentration, non-positive tolerance, NaN. */
export class InvalidParameterError extends KineticsError {
  constructor(
    readonly field: string,
    readonly value: number,
    reason: string,
  ) {
    super(`Invalid ${field}=${value}: ${reason}`);
  }
}

/** A value the computation needs was not supplied (e.g. Ki with an inhibitor present). */
export class MissingParameterError extends KineticsError {
  constructor(
    readonly field: string,
    reason: string,
  ) {
    super(`Missing ${field}: ${reason}`);
  }
}

export class DatasetFormatError extends KineticsError {
  constructor(
    readonly key: string,
    readonly issues: string[],
  ) {
    super(`Malformed enzyme record '${key}': ${issues.join('; ')}`);
  }
}

/** Dataset file could not be read or is not JSON. */
export class DatasetSourceError extends KineticsError {
  constructor(
    readonly source: string,
    reason: string,
  ) {
    super(`Could not load enzyme dataset from ${source}: ${reason}`);
  }
}

export class LookupError extends KineticsError {
  constructor(readonly key: string) {
    super(`Enzyme not found: '${key}'`);
  }
}
