/**
 * Error Handler - User-friendly error messages, no secret leakage
 */

import { AppError, logger } from '@cae/utils';

/**
 * Sensitive patterns that should never appear in error messages
 */
const SENSITIVE_PATTERNS = [
  /api[_-]?key/i,
  /token/i,
  /secret/i,
  /password/i,
  /private[_-]?key/i,
  /bearer/i,
  /authorization/i,
];

/**
 * Check if a string contains sensitive information
 */
function containsSensitiveInfo(message: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(message));
}

/**
 * Sanitize error message to remove sensitive information
 */
function sanitizeErrorMessage(message: string): string {
  if (containsSensitiveInfo(message)) {
    return 'An error occurred. Please check your configuration and try again.';
  }

  return message;
}

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message);
  }

  if (typeof error === 'string') {
    return sanitizeErrorMessage(error);
  }

  return 'An unexpected error occurred';
}

/**
 * Add a hint for the CAD/optimizer errors a user can act on
 */
export function describeOptimizerError(error: unknown): string {
  const message = formatError(error);
  if (!(error instanceof AppError)) {
    return message;
  }

  switch (error.code) {
    case 'CAD_SESSION_ERROR':
      return `${message} (check that the CAD file opens and FREECAD_PYTHON points to a FreeCAD-capable Python, or use --cad mock)`;
    case 'OUTPUT_DIRECTORY_ERROR':
      return `${message} (choose another directory with --output-dir)`;
    case 'TIMEOUT_ERROR':
      return `${message} (raise freecad.timeoutMs in config.yaml)`;
    default:
      return message;
  }
}

/**
 * Log error with full context (for debugging)
 * This should include full error details, but never expose secrets
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  const sanitizedContext = context
    ? Object.fromEntries(
        Object.entries(context).map(([key, value]) => [
          key,
          containsSensitiveInfo(String(value)) ? '[REDACTED]' : value,
        ])
      )
    : undefined;

  logger.error('CLI error', error instanceof Error ? error : String(error), {
    ...sanitizedContext,
    ...(error instanceof AppError ? { code: error.code, errorContext: error.context } : {}),
  });
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logError(error, context);
  return describeOptimizerError(error);
}

/**
 * Print the error and exit with status 1
 */
export function die(error: unknown): never {
  const message = handleError(error);
  console.error(`Error: ${message}`);
  process.exit(1);
}
