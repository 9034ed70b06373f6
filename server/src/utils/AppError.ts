/**
 * Custom application error class with error codes
 * Provides structured error handling across the engine
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly timestamp: Date;
  public readonly details?: unknown;

  constructor(
    message: string,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    details?: unknown
  ) {
    super(message);

    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;
    this.timestamp = new Date();
    this.details = details;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to JSON for callers that serialize it
   */
  toJSON() {
    return {
      error: {
        message: this.message,
        code: this.code,
        timestamp: this.timestamp.toISOString(),
        ...(this.details !== undefined ? { details: this.details } : {})
      }
    };
  }

  /**
   * A broken invariant inside the pipeline. Not a user error.
   */
  static internal(message: string = 'Internal calculation error', code: string = 'INTERNAL_ERROR'): AppError {
    return new AppError(message, code, false);
  }
}

/**
 * One problem found while validating a tax return
 */
export interface InputIssue {
  field: string;
  message: string;
}

// Filing status tag outside the recognized set
export class InvalidFilingStatusError extends AppError {
  constructor(message: string, details?: InputIssue[]) {
    super(message, 'INVALID_FILING_STATUS', true, details);
  }
}

// Required field missing or structurally invalid
export class IncompleteInputError extends AppError {
  constructor(message: string, details?: InputIssue[]) {
    super(message, 'INCOMPLETE_INPUT', true, details);
  }
}

// Monetary field fails its numeric or sign constraint
export class ValidationError extends AppError {
  constructor(message: string, details?: InputIssue[]) {
    super(message, 'VALIDATION_ERROR', true, details);
  }
}

export class UnsupportedScenarioError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'UNSUPPORTED_SCENARIO', true, details);
  }

  static negativeAgi(agi: string): UnsupportedScenarioError {
    return new UnsupportedScenarioError(
      `Adjusted gross income is negative (${agi}); returns with negative AGI are not modeled`
    );
  }

  static unknownTaxYear(year: number, available: number[]): UnsupportedScenarioError {
    return new UnsupportedScenarioError(
      `No rate table for tax year ${year}`,
      { availableYears: available }
    );
  }
}
