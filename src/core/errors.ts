/**
 * Core error definitions
 *
 * Error classes, codes, and factory functions shared by the scheme engine,
 * the classifier and the CLI. CLI formatting lives in src/cli/utils/errors.ts.
 */

export class ConcordanceError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConcordanceError';
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error codes for programmatic handling
 */
export const ErrorCodes = {
  // Validation errors (1000-1099)
  INVALID_PARAMETER: 'E1004',
  CONFIG_INVALID: 'E1005',

  // Scheme errors (1100-1199)
  SCHEME_DEFINITION: 'E1100',
  SCHEME_INCOMPLETE: 'E1101',
  UNREACHABLE_COMPARISON: 'E1102',

  // System errors (5000-5999)
  UNKNOWN_ERROR: 'E5000',
  INTERNAL_ERROR: 'E5001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * A scheme table was defined incorrectly (wrong row arity, or a row added
 * after the scheme was sealed). Not recoverable.
 */
export class SchemeDefinitionError extends ConcordanceError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.SCHEME_DEFINITION, context);
    this.name = 'SchemeDefinitionError';
  }
}

/**
 * A (truth, call) pair has no entry in the scheme
 */
export class SchemeValidationError extends ConcordanceError {
  constructor(
    public readonly truthState: string,
    public readonly callState: string,
    context?: Record<string, unknown>
  ) {
    super(`Missing scheme tuple: [${truthState}, ${callState}]`, ErrorCodes.SCHEME_INCOMPLETE, {
      ...context,
      truthState,
      callState,
    });
    this.name = 'SchemeValidationError';
  }
}

/**
 * A pair classified NA was observed. The defect is upstream, in whatever
 * produced the genotype categories.
 */
export class UnreachableComparisonError extends ConcordanceError {
  constructor(
    public readonly truthState: string,
    public readonly callState: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Unreachable comparison observed: truth ${truthState} vs call ${callState}`,
      ErrorCodes.UNREACHABLE_COMPARISON,
      { ...context, truthState, callState }
    );
    this.name = 'UnreachableComparisonError';
  }
}

// =============================================================================
// FACTORIES
// =============================================================================

/**
 * Create a validation error with helpful context
 */
export function createValidationError(
  field: string,
  message: string,
  suggestion?: string
): ConcordanceError {
  return new ConcordanceError(
    `Validation error: ${field} - ${message}${suggestion ? `. Suggestion: ${suggestion}` : ''}`,
    ErrorCodes.INVALID_PARAMETER,
    { field, suggestion }
  );
}

/**
 * Create a configuration error listing every failed option
 */
export function createConfigError(issues: string[]): ConcordanceError {
  return new ConcordanceError(
    `Configuration validation failed:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`,
    ErrorCodes.CONFIG_INVALID,
    { issues }
  );
}

/**
 * Create a row arity error for addRow
 */
export function createRowArityError(
  callState: string,
  expected: number,
  actual: number
): SchemeDefinitionError {
  return new SchemeDefinitionError(
    `Length mismatch for row ${callState}: expected ${expected} outcome sequences, got ${actual}`,
    { callState, expected, actual }
  );
}

/**
 * Create an error for a write to a validated scheme
 */
export function createSealedSchemeError(callState: string): SchemeDefinitionError {
  return new SchemeDefinitionError(
    `Cannot add row ${callState}: scheme has already been validated`,
    { callState }
  );
}

/**
 * Create an error for a command line commander rejected (missing argument,
 * bad option value, unknown command)
 */
export function createUsageError(message: string, commanderCode: string): ConcordanceError {
  return new ConcordanceError(message.replace(/^error: /, ''), ErrorCodes.INVALID_PARAMETER, {
    commanderCode,
  });
}
