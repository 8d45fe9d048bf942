/**
 * Error taxonomy system for cloudforge
 * Provides structured error codes with dev/prod differentiation
 */

/**
 * Error categories for systematic classification
 */
export enum ErrorCategory {
  VALIDATION = 'VALIDATION',
  CONFIGURATION = 'CONFIGURATION',
  AUTHENTICATION = 'AUTHENTICATION',
  PROVIDER = 'PROVIDER',
  INFRASTRUCTURE = 'INFRASTRUCTURE',
  SESSION = 'SESSION',
  SYSTEM = 'SYSTEM'
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  CRITICAL = 'CRITICAL',  // Run cannot continue
  ERROR = 'ERROR',        // Operation failed but recoverable
  WARNING = 'WARNING'     // Potential issue but operation succeeded
}

/**
 * Environment context for error messages
 */
export enum ErrorEnvironment {
  DEVELOPMENT = 'DEVELOPMENT',
  PRODUCTION = 'PRODUCTION'
}

/**
 * Structured error code with metadata.
 *
 * `devMessage` may reference context values as `{key}`; they are substituted
 * when the error is built. `prodMessage` is used verbatim.
 */
export interface ErrorCode {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly devMessage: string;
  readonly prodMessage: string;
  readonly possibleCauses?: string[];
  readonly suggestions?: string[];
}

/**
 * Complete registry of all error codes
 */
export class ErrorCodeRegistry {
  private static codes: Map<string, ErrorCode> = new Map();

  static register(errorCode: ErrorCode): ErrorCode {
    this.codes.set(errorCode.code, errorCode);
    return errorCode;
  }

  static get(code: string): ErrorCode | undefined {
    return this.codes.get(code);
  }

  static getAllCodes(): ErrorCode[] {
    return Array.from(this.codes.values());
  }

  static getByCategory(category: ErrorCategory): ErrorCode[] {
    return this.getAllCodes().filter(error => error.category === category);
  }
}

/**
 * Substitute `{key}` placeholders with values from context.
 * Unknown keys are left as-is.
 */
export function formatErrorMessage(template: string, context: Record<string, unknown>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    if (!(key in context)) {
      return match;
    }
    const value = context[key];
    return Array.isArray(value) ? value.join(', ') : String(value);
  });
}

/**
 * Base structured error class
 */
export abstract class CloudForgeError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly timestamp: string;
  readonly context: Record<string, unknown>;
  readonly originalError?: Error;

  constructor(
    errorCode: ErrorCode,
    context: Record<string, unknown> = {},
    originalError?: Error,
    environment: ErrorEnvironment = ErrorEnvironment.DEVELOPMENT
  ) {
    const message = environment === ErrorEnvironment.PRODUCTION
      ? errorCode.prodMessage
      : formatErrorMessage(errorCode.devMessage, context);

    super(message);

    this.name = this.constructor.name;
    this.code = errorCode.code;
    this.category = errorCode.category;
    this.severity = errorCode.severity;
    this.timestamp = new Date().toISOString();
    this.context = context;
    this.originalError = originalError;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get user-friendly error details
   */
  getDetails(environment: ErrorEnvironment = ErrorEnvironment.DEVELOPMENT): {
    code: string;
    message: string;
    suggestions?: string[];
    context: Record<string, unknown>;
  } {
    const errorCode = ErrorCodeRegistry.get(this.code);

    return {
      code: this.code,
      message: this.message,
      suggestions: errorCode?.suggestions,
      context: environment === ErrorEnvironment.PRODUCTION ? {} : this.context
    };
  }

  /**
   * Serialize for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      severity: this.severity,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
      originalError: this.originalError?.message
    };
  }
}

/**
 * Validation-specific errors
 */
export class ValidationError extends CloudForgeError {}

/**
 * Configuration-specific errors
 */
export class ConfigurationError extends CloudForgeError {}

/**
 * Provider-specific errors
 */
export class ProviderError extends CloudForgeError {}

/**
 * Infrastructure-specific errors
 */
export class InfrastructureError extends CloudForgeError {}

/**
 * Session storage errors
 */
export class SessionError extends CloudForgeError {}

/**
 * Helper to create error instances with proper typing
 */
export function createError(
  errorCode: ErrorCode,
  context: Record<string, unknown> = {},
  originalError?: Error,
  environment: ErrorEnvironment = ErrorEnvironment.DEVELOPMENT
): CloudForgeError {
  switch (errorCode.category) {
    case ErrorCategory.VALIDATION:
      return new ValidationError(errorCode, context, originalError, environment);
    case ErrorCategory.CONFIGURATION:
    case ErrorCategory.AUTHENTICATION:
      return new ConfigurationError(errorCode, context, originalError, environment);
    case ErrorCategory.PROVIDER:
      return new ProviderError(errorCode, context, originalError, environment);
    case ErrorCategory.INFRASTRUCTURE:
      return new InfrastructureError(errorCode, context, originalError, environment);
    case ErrorCategory.SESSION:
      return new SessionError(errorCode, context, originalError, environment);
    default:
      // Create a concrete implementation for unknown categories
      return new (class extends CloudForgeError {})(errorCode, context, originalError, environment);
  }
}

/**
 * Type guard for cloudforge errors
 */
export function isCloudForgeError(error: unknown): error is CloudForgeError {
  return error instanceof CloudForgeError;
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Extract error details safely from any error
 */
export function extractErrorDetails(
  error: unknown,
  environment: ErrorEnvironment = ErrorEnvironment.DEVELOPMENT
): {
  code?: string;
  message: string;
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
} {
  if (isCloudForgeError(error)) {
    const details = error.getDetails(environment);
    return {
      code: details.code,
      message: details.message,
      category: error.category,
      severity: error.severity,
      context: details.context
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      context: environment === ErrorEnvironment.PRODUCTION ? {} : { stack: error.stack }
    };
  }

  return {
    message: String(error),
    context: {}
  };
}
