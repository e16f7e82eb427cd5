export type GradingErrorCode =
  | 'INSUFFICIENT_DATA'
  | 'INVALID_CONFIGURATION'
  | 'UNRESOLVABLE_GRID'
  | 'INTERNAL_CONSISTENCY';

export class GradingError extends Error {
  readonly code: GradingErrorCode;

  constructor(code: GradingErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Too few, or collinear, elevation samples to build a surface. */
export class InsufficientDataError extends GradingError {
  constructor(message: string) {
    super('INSUFFICIENT_DATA', message);
  }
}

export class InvalidConfigurationError extends GradingError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIGURATION', `Invalid grading configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** No cell has a target elevation and nothing configured supplies one. */
export class UnresolvableGridError extends GradingError {
  constructor(message: string) {
    super('UNRESOLVABLE_GRID', message);
  }
}

/**
 * A computed invariant does not hold. This is a defect in the engine, never
 * bad input, and always aborts the analysis.
 */
export class InternalConsistencyError extends GradingError {
  constructor(message: string) {
    super('INTERNAL_CONSISTENCY', message);
  }
}
