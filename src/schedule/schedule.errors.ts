import { ACCEPTED_DATE_FORMATS } from '../constants.js';

export class ConfigurationNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`Configuration file not found: ${path}`);
    this.name = 'ConfigurationNotFoundError';
  }
}

export class InvalidConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'InvalidConfigurationError';
  }
}

export class InvalidDateExpressionError extends Error {
  constructor(
    public readonly expression: string,
    public readonly acceptedFormats: readonly string[] = ACCEPTED_DATE_FORMATS,
  ) {
    super(`Invalid date format '${expression}'. Use one of: ${acceptedFormats.join(', ')}`);
    this.name = 'InvalidDateExpressionError';
  }
}

export class NoShiftsProducedError extends Error {
  constructor(
    public readonly scheduleName: string,
    public readonly layerCount: number,
  ) {
    super(`No shifts produced for "${scheduleName}" from ${layerCount} layer(s)`);
    this.name = 'NoShiftsProducedError';
  }
}

/**
 * Returned (never thrown) when the resolved end is not after the start.
 * The schedule is simply empty.
 */
export class EmptyRangeWarning {
  readonly name = 'EmptyRangeWarning';
  readonly message: string;

  constructor(
    public readonly start: string,
    public readonly end: string,
  ) {
    this.message = `End date ${end} is not after start date ${start}; the schedule will be empty`;
  }
}
