import type { BoundedField } from './defaults.js';
import { BOUNDED_OPTIONS, FILL_PATTERN_VARIABLE } from './defaults.js';

// ── Codes ────────────────────────────────────────────────────

export type FillPatternErrorCode = 'ODD_LENGTH_PATTERN' | 'INVALID_HEX_DIGIT';

export type RangeErrorCode = (typeof BOUNDED_OPTIONS)[BoundedField]['code'];

export type ConfigErrorCode = FillPatternErrorCode | RangeErrorCode;

// ── Errors ───────────────────────────────────────────────────

/**
 * A configuration value that cannot be used. Always fatal for the run;
 * the message names the offending variable and the rule it breaks.
 */
export class ConfigError extends Error {
  readonly exitCode = 1;
  readonly code: ConfigErrorCode;
  readonly variable: string;

  constructor(code: ConfigErrorCode, variable: string, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.variable = variable;
  }
}

export class FillPatternError extends ConfigError {
  constructor(code: FillPatternErrorCode, message: string) {
    super(code, FILL_PATTERN_VARIABLE, message);
    this.name = 'FillPatternError';
  }
}

export class ConfigRangeError extends ConfigError {
  constructor(field: BoundedField, message: string) {
    const option = BOUNDED_OPTIONS[field];
    super(option.code, option.variable, message);
    this.name = 'ConfigRangeError';
  }
}
