/**
 * @fileoverview Resource error class with structured lifecycle information
 *
 * Carries the code, category, severity and context of every failure reported
 * by a managed resource, its registry or the configuration layer.
 */

import { ResourceErrorCode, ErrorCategory, getErrorCategory } from './codes';

/**
 * Structured context information for debugging and telemetry
 */
export interface ErrorContext {
  /** Operation being performed when error occurred */
  operation?: string;
  /** Resource kind (file, connection, ...) */
  resourceKind?: string;
  /** Registry-assigned instance id */
  resourceId?: number;
  /** Path, host:port or other external identifier */
  identifier?: string;
  /** Component or module where error originated */
  component?: string;
  /** Additional contextual data */
  metadata?: Record<string, unknown>;
  /** Allow additional properties for extensibility */
  [key: string]: unknown;
}

/**
 * Error severity levels for categorizing impact
 */
export enum ErrorSeverity {
  /** Informational error, operation can continue */
  Info = 'info',
  /** Warning error, degraded functionality */
  Warning = 'warning',
  /** Error that prevents operation completion */
  Error = 'error',
  /** Critical error requiring immediate attention */
  Critical = 'critical',
}

export interface ResourceErrorOptions {
  recoverable?: boolean;
  severity?: ErrorSeverity;
  cause?: unknown;
  context?: ErrorContext;
}

const MESSAGES: Record<ResourceErrorCode, string> = {
  [ResourceErrorCode.AcquisitionFailed]: 'Resource acquisition failed',
  [ResourceErrorCode.InvalidOperation]: 'Operation not permitted in current state',
  [ResourceErrorCode.ReleaseFailed]: 'Resource release failed',
  [ResourceErrorCode.OperationFailed]: 'Resource operation failed',
  [ResourceErrorCode.UseAfterRelease]: 'Resource used after release',
  [ResourceErrorCode.ConfigInvalid]: 'Invalid configuration',
  [ResourceErrorCode.Unknown]: 'Unknown error occurred',
  [ResourceErrorCode.InternalError]: 'Internal error',
};

const SENSITIVE_PATTERNS = [/password/i, /secret/i, /key/i, /token/i, /credential/i, /auth/i];

/**
 * Resource error class with structured error information
 *
 * Lifecycle failures are not thrown by resource operations; they are
 * recorded on the resource and surfaced through the registry's
 * `diagnostic` event. Configuration errors are thrown.
 */
export class ResourceError extends Error {
  public readonly name = 'ResourceError';
  public readonly code: ResourceErrorCode;
  public readonly category: ErrorCategory;
  public readonly details: string;
  public readonly recoverable: boolean;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly timestamp: Date;

  constructor(code: ResourceErrorCode, details: string, options: ResourceErrorOptions = {}) {
    super(ResourceError.formatMessage(code, details));

    this.code = code;
    this.category = getErrorCategory(code);
    this.details = details;
    this.recoverable = options.recoverable ?? ResourceError.isRecoverableByDefault(code);
    this.severity = options.severity ?? ResourceError.getSeverityForCode(code);
    this.context = options.context;
    this.timestamp = new Date();

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintain prototype chain
    Object.setPrototypeOf(this, ResourceError.prototype);
  }

  private static formatMessage(code: ResourceErrorCode, details: string): string {
    const baseMessage = ResourceError.getMessageForCode(code);
    return details ? `${baseMessage}: ${details}` : baseMessage;
  }

  /**
   * Get human-readable message for error code
   */
  static getMessageForCode(code: ResourceErrorCode): string {
    return MESSAGES[code] ?? 'Unknown error';
  }

  /**
   * Nothing in the lifecycle is fatal; only internal faults are not
   * recoverable by default
   */
  private static isRecoverableByDefault(code: ResourceErrorCode): boolean {
    return code !== ResourceErrorCode.InternalError && code !== ResourceErrorCode.ConfigInvalid;
  }

  private static getSeverityForCode(code: ResourceErrorCode): ErrorSeverity {
    switch (code) {
      case ResourceErrorCode.InvalidOperation:
      case ResourceErrorCode.UseAfterRelease:
        return ErrorSeverity.Warning;
      case ResourceErrorCode.InternalError:
        return ErrorSeverity.Critical;
      default:
        return ErrorSeverity.Error;
    }
  }

  /**
   * Create a new error with additional context
   */
  withContext(context: Partial<ErrorContext>): ResourceError {
    return new ResourceError(this.code, this.details, {
      recoverable: this.recoverable,
      severity: this.severity,
      cause: this.cause,
      context: { ...this.context, ...context },
    });
  }

  isCategory(category: ErrorCategory): boolean {
    return this.category === category;
  }

  /**
   * Serialize error to JSON for logging/telemetry
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      details: this.details,
      recoverable: this.recoverable,
      severity: this.severity,
      context: this.getSanitizedContext(),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause instanceof Error
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };
  }

  /**
   * Get sanitized context (removes sensitive metadata for logging)
   */
  getSanitizedContext(): ErrorContext | undefined {
    if (!this.context) return undefined;

    const { metadata, ...safeContext } = this.context;
    const sanitizedMetadata: Record<string, unknown> = {};

    if (metadata) {
      for (const [key, value] of Object.entries(metadata)) {
        if (!SENSITIVE_PATTERNS.some(pattern => pattern.test(key))) {
          sanitizedMetadata[key] = value;
        }
      }
    }

    return {
      ...safeContext,
      metadata: Object.keys(sanitizedMetadata).length > 0 ? sanitizedMetadata : undefined,
    };
  }

  /**
   * Get a developer-friendly error description
   */
  getDescription(): string {
    let description = `[${this.code}] ${this.category}: ${this.message}`;

    if (this.recoverable) {
      description += ' (Recoverable)';
    }

    if (this.context?.operation) {
      description += ` | Operation: ${this.context.operation}`;
    }

    return description;
  }
}

/**
 * Helper function to create a ResourceError with context
 */
export function createResourceError(
  code: ResourceErrorCode,
  details: string,
  context?: ErrorContext
): ResourceError {
  return new ResourceError(code, details, { context });
}

/**
 * Wrap anything caught from the platform as a ResourceError
 */
export function wrapError(
  cause: unknown,
  code: ResourceErrorCode,
  details?: string,
  context?: ErrorContext
): ResourceError {
  if (cause instanceof ResourceError) {
    return context ? cause.withContext(context) : cause;
  }
  const message = cause instanceof Error ? cause.message : String(cause);
  return new ResourceError(code, details ?? message, { cause, context });
}

/**
 * Type guard to check if an error is a ResourceError
 */
export function isResourceError(error: unknown): error is ResourceError {
  return error instanceof ResourceError;
}
