/**
 * Custom Error Classes
 * ====================
 * Standardized error classes for better error handling and debugging.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>, code: string = 'VALIDATION_ERROR') {
    super(message, code, 400, context);
  }
}

/**
 * Parameter range is empty, inverted, non-finite, or not usable for the step mode
 */
export class InvalidRangeError extends ValidationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context, 'INVALID_RANGE');
  }
}

/**
 * Malformed optimization argument (step count, parameter name, step mode)
 */
export class InvalidArgumentError extends ValidationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context, 'INVALID_ARGUMENT');
  }
}

/**
 * Not found error - for missing resources
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, context?: Record<string, unknown>) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404, { resource, identifier, ...context });
  }
}

/**
 * Parameter missing from the loaded CAD model; the message lists what is there
 */
export class ParameterNotFoundError extends NotFoundError {
  public readonly available: readonly string[];

  constructor(name: string, available: readonly string[]) {
    super('Parameter', name, { available });
    this.message =
      available.length > 0
        ? `Parameter '${name}' not found. Available parameters: ${available.join(', ')}`
        : `Parameter '${name}' not found and the model exposes no parameters`;
    this.available = available;
  }
}

/**
 * Output directory cannot be created or written
 */
export class OutputDirectoryError extends AppError {
  public readonly outputDir: string;

  constructor(outputDir: string, cause?: unknown, context?: Record<string, unknown>) {
    const reason = cause instanceof Error ? cause.message : cause !== undefined ? String(cause) : '';
    super(
      `Output directory '${outputDir}' is not writable${reason ? `: ${reason}` : ''}`,
      'OUTPUT_DIRECTORY_ERROR',
      500,
      { outputDir, ...context }
    );
    this.outputDir = outputDir;
  }
}

/**
 * CAD session error - a CAD operation (load, set, rebuild, export) was rejected
 */
export class CadSessionError extends AppError {
  public readonly operation: string;

  constructor(message: string, operation: string, context?: Record<string, unknown>) {
    super(message, 'CAD_SESSION_ERROR', 502, { operation, ...context });
    this.operation = operation;
  }
}

/**
 * Configuration error - for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 500, { configKey, ...context });
  }
}

/**
 * Timeout error - for operation timeouts
 */
export class TimeoutError extends AppError {
  public readonly timeoutMs?: number;

  constructor(message: string = 'Operation timed out', timeoutMs?: number, context?: Record<string, unknown>) {
    super(message, 'TIMEOUT_ERROR', 504, { timeoutMs, ...context });
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: Error): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}
