/**
 * Structured error types for the reflector
 *
 * Every failure carries a machine-readable code and structured details so
 * callers can tell a duplicated parameter from a broken type description
 * without parsing messages.
 */

export class ReflectorError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ReflectorError';
  }
}

export class DuplicateParameterError extends ReflectorError {
  constructor(paramName: string, location: string) {
    super(
      `parameter ${paramName} in ${location} is already defined`,
      'DUPLICATE_PARAMETER',
      { name: paramName, in: location }
    );
    this.name = 'DuplicateParameterError';
  }
}

export class ReflectionError extends ReflectorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'REFLECTION_FAILED', details);
    this.name = 'ReflectionError';
  }
}

export class FieldPopulationError extends ReflectorError {
  constructor(fieldName: string, reason: string, issues?: unknown[]) {
    super(
      `failed to apply options of field ${fieldName}: ${reason}`,
      'FIELD_POPULATION_FAILED',
      issues ? { field: fieldName, reason, issues } : { field: fieldName, reason }
    );
    this.name = 'FieldPopulationError';
  }
}

export class ConfigurationError extends ReflectorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export class OperationConflictError extends ReflectorError {
  constructor(method: string, path: string) {
    super(
      `operation ${method.toUpperCase()} ${path} is already defined`,
      'OPERATION_CONFLICT',
      { method, path }
    );
    this.name = 'OperationConflictError';
  }
}

/**
 * Aggregate of independent failures collected while setting up one operation.
 * Each entry keeps its own class, code and details.
 */
export class OperationSetupError extends ReflectorError {
  constructor(public errors: Error[]) {
    super(
      errors.map(e => e.message).join(', '),
      'OPERATION_SETUP_FAILED',
      { count: errors.length }
    );
    this.name = 'OperationSetupError';
  }
}

/**
 * Helper function to check if an error is a ReflectorError
 */
export function isReflectorError(error: unknown): error is ReflectorError {
  return error instanceof ReflectorError;
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Helper function to get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (error instanceof OperationSetupError) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      errors: error.errors.map(e => getErrorDetails(e)),
    };
  }

  if (isReflectorError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}
