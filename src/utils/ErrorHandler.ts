/**
 * Error taxonomy and retrying error handler
 */

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  VALIDATION = 'validation',
  CONTRACT = 'contract',
  NETWORK = 'network',
  EXTERNAL_SERVICE = 'external_service',
  SYSTEM = 'system'
}

export interface ErrorContext {
  operation: string;
  component: string;
  entityId?: string;
  timestamp: Date;
  metadata?: Record<string, string | number | boolean>;
}

export interface RetryPolicy {
  maxAttempts: number;
  backoffMs: number;
  maxBackoffMs?: number;
}

export type ErrorHandlingResult<T> =
  | { success: true; result: T; attempts: number }
  | { success: false; error: ApplicationError; attempts: number };

export interface ErrorHandlerDependencies {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * Application error with category, severity and call context
 */
export class ApplicationError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly originalError?: Error;
  public readonly isRetryable: boolean;
  public readonly userMessage: string;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context: ErrorContext,
    options: {
      originalError?: Error;
      isRetryable?: boolean;
      userMessage?: string;
    } = {}
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.context = context;
    this.originalError = options.originalError;
    this.isRetryable = options.isRetryable ?? this.determineRetryability();
    this.userMessage = options.userMessage ?? this.generateUserMessage();
  }

  private determineRetryability(): boolean {
    if (this.category === ErrorCategory.NETWORK || this.category === ErrorCategory.EXTERNAL_SERVICE) {
      return true;
    }

    if (this.category === ErrorCategory.SYSTEM && this.severity !== ErrorSeverity.CRITICAL) {
      return true;
    }

    return false;
  }

  private generateUserMessage(): string {
    switch (this.category) {
      case ErrorCategory.VALIDATION:
        return 'Some holdings data was malformed and has been ignored.';
      case ErrorCategory.CONTRACT:
        return 'Holdings data does not have the expected shape.';
      case ErrorCategory.NETWORK:
        return 'Holdings source could not be reached. Please try again.';
      case ErrorCategory.EXTERNAL_SERVICE:
        return 'Holdings source is temporarily unavailable. Please try again later.';
      case ErrorCategory.SYSTEM:
        return 'An unexpected error occurred.';
      default:
        return 'An unexpected error occurred.';
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      context: this.context,
      isRetryable: this.isRetryable,
      userMessage: this.userMessage
    };
  }
}

/**
 * Builds the error thrown when input lies entirely outside the documented data contract
 */
export function contractViolation(message: string, operation: string, component: string): ApplicationError {
  return new ApplicationError(
    message,
    'CONTRACT_VIOLATION',
    ErrorCategory.CONTRACT,
    ErrorSeverity.HIGH,
    { operation, component, timestamp: new Date() }
  );
}

export function isApplicationError(value: unknown): value is ApplicationError {
  return value instanceof ApplicationError;
}

const DEFAULT_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: 1000,
  maxBackoffMs: 30000
};

const defaultSleep = (ms: number): Promise<void> =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Runs operations with bounded, backed-off retries for retryable failures
 */
export class ErrorHandler {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private errorMetrics: Map<string, { count: number; lastOccurrence: Date }> = new Map();

  constructor(dependencies: ErrorHandlerDependencies = {}) {
    this.sleep = dependencies.sleep ?? defaultSleep;
    this.random = dependencies.random ?? Math.random;
  }

  /**
   * Runs an operation, retrying retryable errors until the policy is exhausted
   */
  async handleError<T>(
    operation: () => Promise<T>,
    context: ErrorContext,
    policy: RetryPolicy = DEFAULT_POLICY
  ): Promise<ErrorHandlingResult<T>> {
    const maxAttempts = Math.max(1, policy.maxAttempts);
    let attempts = 0;

    while (true) {
      attempts++;
      try {
        const result = await operation();
        return { success: true, result, attempts };
      } catch (error) {
        const wrapped = this.wrapError(error, context);
        this.recordErrorMetrics(wrapped);

        if (!wrapped.isRetryable || attempts >= maxAttempts) {
          return { success: false, error: wrapped, attempts };
        }

        await this.sleep(this.calculateBackoffDelay(attempts, policy));
      }
    }
  }

  /**
   * Wraps raw errors into ApplicationError with context
   */
  wrapError(error: unknown, context: ErrorContext): ApplicationError {
    if (error instanceof ApplicationError) {
      return error;
    }

    let category = ErrorCategory.SYSTEM;
    let severity = ErrorSeverity.MEDIUM;
    let code = 'UNKNOWN_ERROR';
    let isRetryable = false;

    if (error instanceof Error) {
      const message = error.message.toLowerCase();

      if (message.includes('network') || message.includes('timeout') || message.includes('connection')) {
        category = ErrorCategory.NETWORK;
        code = 'NETWORK_ERROR';
        isRetryable = true;
      } else if (message.includes('rate limit') || message.includes('429') || message.includes('service')) {
        category = ErrorCategory.EXTERNAL_SERVICE;
        code = 'EXTERNAL_SERVICE_ERROR';
        isRetryable = true;
      } else if (message.includes('invalid') || message.includes('malformed')) {
        category = ErrorCategory.VALIDATION;
        code = 'VALIDATION_ERROR';
        severity = ErrorSeverity.LOW;
      }
    }

    return new ApplicationError(
      error instanceof Error ? error.message : String(error),
      code,
      category,
      severity,
      context,
      {
        originalError: error instanceof Error ? error : undefined,
        isRetryable
      }
    );
  }

  /**
   * Exponential backoff with up to 10% jitter
   */
  private calculateBackoffDelay(attempt: number, policy: RetryPolicy): number {
    const maxDelay = policy.maxBackoffMs ?? DEFAULT_POLICY.maxBackoffMs ?? 30000;
    const delay = Math.min(policy.backoffMs * Math.pow(2, attempt - 1), maxDelay);
    return delay * (1 + this.random() * 0.1);
  }

  private recordErrorMetrics(error: ApplicationError): void {
    const key = `${error.category}:${error.code}`;
    const existing = this.errorMetrics.get(key) ?? { count: 0, lastOccurrence: new Date() };

    this.errorMetrics.set(key, {
      count: existing.count + 1,
      lastOccurrence: new Date()
    });
  }

  /**
   * Gets error counts keyed by category and code
   */
  getErrorMetrics(): Map<string, { count: number; lastOccurrence: Date }> {
    return new Map(this.errorMetrics);
  }
}
