/**
 * Stable failure codes. Safe to match against downstream; the message text is
 * for humans and may be reworded.
 */
export const FailureCode = {
  INVALID_ENUM_VALUE: "INVALID_ENUM_VALUE",
  MALFORMED_FIXED_PATTERN: "MALFORMED_FIXED_PATTERN",
  MALFORMED_VARIABLE_PATTERN: "MALFORMED_VARIABLE_PATTERN",
  EMPTY_REQUIRED_FIELD: "EMPTY_REQUIRED_FIELD",
  UNSET_REQUIRED_FIELD: "UNSET_REQUIRED_FIELD",
  OUT_OF_RANGE_VALUE: "OUT_OF_RANGE_VALUE",
  EMPTY_REQUIRED_COLLECTION: "EMPTY_REQUIRED_COLLECTION",
} as const;

export type FailureCode = (typeof FailureCode)[keyof typeof FailureCode];

/**
 * One violated constraint on one field.
 *
 * `field` is the dotted path of the offending value, with array indices in
 * brackets: "points[2].coordination_signals.burst_score".
 */
export class ValidationFailure extends Error {
  readonly code: FailureCode;
  readonly field: string;

  constructor(code: FailureCode, field: string, message: string) {
    super(message);
    this.name = "ValidationFailure";
    this.code = code;
    this.field = field;
  }
}

export function failure(code: FailureCode, field: string, message: string): ValidationFailure {
  return new ValidationFailure(code, field, message);
}
