// ============================================================================
// Valuation Error Types
// ============================================================================

export enum ValuationErrorCode {
  INVALID_PARAMETER = 'INVALID_PARAMETER',
  MISSING_STATEMENT_FIELD = 'MISSING_STATEMENT_FIELD',
  ARITHMETIC_DEGENERATE = 'ARITHMETIC_DEGENERATE',
  INTERACTIVE_INPUT_REQUIRED = 'INTERACTIVE_INPUT_REQUIRED',
}

export class ValuationError extends Error {
  constructor(
    public code: ValuationErrorCode,
    message: string,
    public field?: string
  ) {
    super(message);
    this.name = 'ValuationError';
  }
}

export class InvalidParameterError extends ValuationError {
  constructor(field: string, message: string) {
    super(ValuationErrorCode.INVALID_PARAMETER, message, field);
    this.name = 'InvalidParameterError';
  }
}

export class MissingStatementFieldError extends ValuationError {
  constructor(
    public statement: string,
    public recordIndex: number,
    lineItem: string
  ) {
    super(
      ValuationErrorCode.MISSING_STATEMENT_FIELD,
      `"${lineItem}" is missing from ${statement} record ${recordIndex}`,
      lineItem
    );
    this.name = 'MissingStatementFieldError';
  }
}

export class ArithmeticDegenerateError extends ValuationError {
  constructor(message: string, field?: string) {
    super(ValuationErrorCode.ARITHMETIC_DEGENERATE, message, field);
    this.name = 'ArithmeticDegenerateError';
  }
}

export class InteractiveInputRequiredError extends ValuationError {
  constructor(
    public prompt: string,
    field: string
  ) {
    super(
      ValuationErrorCode.INTERACTIVE_INPUT_REQUIRED,
      `Manual input required but no provider is available: ${prompt.trim()}`,
      field
    );
    this.name = 'InteractiveInputRequiredError';
  }
}
