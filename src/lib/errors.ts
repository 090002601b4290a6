/**
 * Error Types
 * Structured error handling
 */

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    statusCode: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigurationError extends AppError {
  constructor(variable: string, reason: string) {
    super('CONFIGURATION_ERROR', `Invalid ${variable}: ${reason}`, 500, { variable });
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Message of anything caught in a catch clause
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
