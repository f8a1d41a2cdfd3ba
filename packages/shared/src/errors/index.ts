/**
 * Custom error hierarchy for framegrab
 */

export type ErrorCategory =
  | 'VALIDATION'
  | 'CONFIGURATION'
  | 'NETWORK'
  | 'FILESYSTEM'
  | 'DOWNLOAD'
  | 'EXTRACTION'
  | 'PIPELINE'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  stage?: string;
  [key: string]: unknown;
}

export interface FramegrabErrorOptions {
  context?: Partial<ErrorContext>;
  cause?: unknown;
}

/**
 * Base error class for framegrab
 */
export class FramegrabError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(message: string, code: string, options: FramegrabErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    const context = options.context ?? {};
    this.name = 'FramegrabError';
    this.code = code;
    this.context = {
      ...context,
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
    };
    this.timestamp = new Date();

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Validation errors (command-line input)
 */
export class ValidationError extends FramegrabError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      context: { category: 'VALIDATION', severity: 'LOW', retryable: false, ...context },
    });
    this.name = 'ValidationError';
  }
}

/**
 * A required external tool is missing and no fallback is permitted
 */
export class ConfigurationError extends FramegrabError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E6001', {
      context: { category: 'CONFIGURATION', severity: 'CRITICAL', retryable: false, ...context },
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Tool acquisition failed: network, unsupported platform or unwritable install location
 */
export class FetchError extends FramegrabError {
  constructor(message: string, options: FramegrabErrorOptions = {}) {
    super(message, 'E7001', {
      ...options,
      context: { category: 'NETWORK', severity: 'HIGH', retryable: false, ...options.context },
    });
    this.name = 'FetchError';
  }
}

/**
 * Temporary storage could not be provided
 */
export class ResourceError extends FramegrabError {
  constructor(message: string, options: FramegrabErrorOptions = {}) {
    super(message, 'E7101', {
      ...options,
      context: { category: 'FILESYSTEM', severity: 'HIGH', retryable: false, ...options.context },
    });
    this.name = 'ResourceError';
  }
}

export type DownloadErrorKind = 'TOOL_FAILED' | 'MISSING_OUTPUT';

export class DownloadError extends FramegrabError {
  public readonly kind: DownloadErrorKind;

  constructor(kind: DownloadErrorKind, message: string, options: FramegrabErrorOptions = {}) {
    super(message, 'E7201', {
      ...options,
      context: { category: 'DOWNLOAD', severity: 'HIGH', retryable: false, ...options.context },
    });
    this.name = 'DownloadError';
    this.kind = kind;
  }
}

export type ExtractionErrorKind = 'OUTPUT_DIR_UNAVAILABLE' | 'TOOL_FAILED';

export class ExtractionError extends FramegrabError {
  public readonly kind: ExtractionErrorKind;

  constructor(kind: ExtractionErrorKind, message: string, options: FramegrabErrorOptions = {}) {
    super(message, 'E7301', {
      ...options,
      context: { category: 'EXTRACTION', severity: 'HIGH', retryable: false, ...options.context },
    });
    this.name = 'ExtractionError';
    this.kind = kind;
  }
}

/**
 * Wraps a pipeline stage failure with a label naming the stage
 */
export class StageError extends FramegrabError {
  public readonly stage: string;

  constructor(stage: string, label: string, cause: unknown) {
    super(label, 'E8001', {
      cause,
      context: {
        category: 'PIPELINE',
        severity: 'HIGH',
        retryable: false,
        stage,
      },
    });
    this.name = 'StageError';
    this.stage = stage;
  }
}

/**
 * Follows the `cause` chain down to the innermost error
 */
export function rootCause(error: unknown): unknown {
  let current = error;
  while (current instanceof Error && current.cause !== undefined) {
    current = current.cause;
  }
  return current;
}

/**
 * Renders an error and its causes as `outer: inner: innermost`
 */
export function formatErrorChain(error: unknown): string {
  const messages: string[] = [];
  let current: unknown = error;

  while (current !== undefined) {
    if (current instanceof Error) {
      messages.push(current.message);
      current = current.cause;
    } else {
      messages.push(String(current));
      current = undefined;
    }
  }

  return messages.filter((message) => message.length > 0).join(': ');
}
