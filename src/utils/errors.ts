/**
 * Error classes raised by the backtester.
 */

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for structured responses
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
    };
  }
}

/**
 * Too few usable price points for a run, or an unusable first price
 */
export class InsufficientDataError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INSUFFICIENT_DATA', 422, context);
  }
}

export class InvalidGridTypeError extends AppError {
  public readonly gridType: string;

  constructor(gridType: string) {
    super(`Unknown grid type: ${gridType}`, 'INVALID_GRID_TYPE', 400, { gridType });
    this.gridType = gridType;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

export class BacktestTimeoutError extends AppError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: Record<string, unknown>) {
    super(`Backtest timed out after ${timeoutMs}ms`, 'BACKTEST_TIMEOUT', 504, context);
    this.timeoutMs = timeoutMs;
  }
}
