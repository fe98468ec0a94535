/**
 * Cloud Audit Core - Structured Error Handling
 *
 * Provides error handling with:
 * - Error categorization
 * - Severity levels
 * - Remediation guidance
 * - Error codes for programmatic handling
 */

export enum ErrorCategory {
  VALIDATION = 'VALIDATION',
  AUTHENTICATION = 'AUTHENTICATION',
  API = 'API',
  COLLECTION = 'COLLECTION',
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',
  CONFIGURATION = 'CONFIGURATION',
  INTERNAL = 'INTERNAL',
}

export enum ErrorSeverity {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  CRITICAL = 'CRITICAL',
}

export interface StructuredError {
  code: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  details?: Record<string, unknown>;
  remediation?: string;
  timestamp: string;
  retryable: boolean;
}

/**
 * Base class for all audit errors
 */
export class AuditError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly details?: Record<string, unknown>;
  public readonly remediation?: string;
  public readonly timestamp: string;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    retryable: boolean = false,
    details?: Record<string, unknown>,
    remediation?: string
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.details = details;
    this.remediation = remediation;
    this.timestamp = new Date().toISOString();
    this.retryable = retryable;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): StructuredError {
    return {
      code: this.code,
      category: this.category,
      severity: this.severity,
      message: this.message,
      details: this.details,
      remediation: this.remediation,
      timestamp: this.timestamp,
      retryable: this.retryable,
    };
  }

  toString(): string {
    return `[${this.severity}] ${this.category}/${this.code}: ${this.message}${this.remediation ? `\nRemediation: ${this.remediation}` : ''}`;
  }
}

/**
 * Validation errors (invalid inputs)
 */
export class ValidationError extends AuditError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    remediation?: string
  ) {
    super(
      message,
      'VALIDATION_ERROR',
      ErrorCategory.VALIDATION,
      ErrorSeverity.MEDIUM,
      false,
      details,
      remediation || 'Check input parameters and format. Refer to tool documentation.'
    );
  }
}

export type AuthErrorCode = 'NO_USABLE_IDENTITY' | 'ASSUME_ROLE_FAILED';

/**
 * Fatal setup failures: no usable local identity, or the initial role
 * assumption failed. Never retried.
 */
export class AuthError extends AuditError {
  constructor(
    message: string,
    code: AuthErrorCode,
    details?: Record<string, unknown>
  ) {
    super(
      message,
      code,
      ErrorCategory.AUTHENTICATION,
      ErrorSeverity.CRITICAL,
      false,
      details,
      code === 'ASSUME_ROLE_FAILED'
        ? 'Verify the role ARN, its trust policy and the external id, and that the source identity may call sts:AssumeRole.'
        : 'Verify AWS credentials are configured: aws configure, AWS_PROFILE, or AWS_ACCESS_KEY_ID/AWS_SECRET_ACCESS_KEY environment variables.'
    );
  }

  static noUsableIdentity(cause: unknown, profile?: string): AuthError {
    return new AuthError(
      `No usable AWS identity${profile ? ` for profile '${profile}'` : ''}: ${describeCause(cause)}`,
      'NO_USABLE_IDENTITY',
      { profile, cause: causeName(cause) }
    );
  }

  static assumeRoleFailed(cause: unknown, roleArn: string): AuthError {
    return new AuthError(
      `Unable to assume role ${roleArn}: ${describeCause(cause)}`,
      'ASSUME_ROLE_FAILED',
      { roleArn, cause: causeName(cause) }
    );
  }
}

/**
 * Credential refresh exchange failed. Surfaced to the in-flight API caller;
 * the SDK transport decides whether to retry.
 */
export class RefreshError extends AuditError {
  constructor(message: string, cause?: unknown, details?: Record<string, unknown>) {
    super(
      message,
      'REFRESH_ERROR',
      ErrorCategory.AUTHENTICATION,
      ErrorSeverity.HIGH,
      true,
      { ...details, cause: cause === undefined ? undefined : causeName(cause) },
      'Retry the call. If refreshes keep failing, check the role session duration and STS availability.'
    );
    this.cause = cause;
  }
}

/**
 * A listing call failed in one region. Recorded by the collector, never
 * thrown past it.
 */
export class CollectionError extends AuditError {
  public readonly service: string;
  public readonly operation: string;
  public readonly region: string;
  public readonly errorClass: string;

  constructor(service: string, operation: string, region: string, cause: unknown) {
    super(
      `${region} -- ${causeName(cause)}: ${describeCause(cause)}`,
      'COLLECTION_ERROR',
      ErrorCategory.COLLECTION,
      ErrorSeverity.MEDIUM,
      false,
      { service, operation, region, cause: causeName(cause) },
      'Resources from this region are missing from the results. Check IAM permissions and whether the region is enabled.'
    );
    this.service = service;
    this.operation = operation;
    this.region = region;
    this.errorClass = causeName(cause);
  }
}

/**
 * Resource identifier does not follow the ARN positional grammar
 */
export class MalformedIdentifierError extends AuditError {
  constructor(identifier: string, reason: string) {
    super(
      `Malformed resource ARN '${identifier}': ${reason}`,
      'MALFORMED_IDENTIFIER',
      ErrorCategory.VALIDATION,
      ErrorSeverity.MEDIUM,
      false,
      { identifier, reason },
      'Use fully-qualified ARNs: arn:<partition>:<service>:<region>:<account>:<resource>.'
    );
  }
}

/**
 * No checks are registered for a service
 */
export class CheckNotFoundError extends AuditError {
  constructor(service: string) {
    super(
      `No checks registered for service '${service}'`,
      'CHECK_NOT_FOUND',
      ErrorCategory.RESOURCE_NOT_FOUND,
      ErrorSeverity.LOW,
      false,
      { service }
    );
  }
}

/**
 * AWS API errors
 */
export class AWSAPIError extends AuditError {
  constructor(
    message: string,
    awsErrorCode?: string,
    statusCode?: number,
    retryable: boolean = false,
    details?: Record<string, unknown>
  ) {
    super(
      message,
      awsErrorCode || 'AWS_API_ERROR',
      ErrorCategory.API,
      statusCode && statusCode >= 500 ? ErrorSeverity.HIGH : ErrorSeverity.MEDIUM,
      retryable,
      { ...details, statusCode, awsErrorCode },
      retryable
        ? 'Retry the operation. If error persists, check AWS service health dashboard.'
        : 'Check AWS API documentation for this error code. Verify resource exists and parameters are correct.'
    );
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends AuditError {
  constructor(
    message: string,
    configKey?: string,
    details?: Record<string, unknown>
  ) {
    super(
      message,
      'CONFIG_ERROR',
      ErrorCategory.CONFIGURATION,
      ErrorSeverity.HIGH,
      false,
      { ...details, configKey },
      configKey
        ? `Set configuration: ${configKey}`
        : 'Review server configuration and environment variables.'
    );
  }
}

/**
 * Internal errors
 */
export class InternalError extends AuditError {
  constructor(
    message: string,
    originalError?: Error,
    details?: Record<string, unknown>
  ) {
    super(
      message,
      'INTERNAL_ERROR',
      ErrorCategory.INTERNAL,
      ErrorSeverity.CRITICAL,
      false,
      originalError ? { ...details, originalError: originalError.message } : details,
      'This is an internal error. Please report it with the error details.'
    );
  }
}

interface AwsServiceErrorShape {
  name: string;
  message: string;
  $metadata?: { httpStatusCode?: number; requestId?: string };
  $retryable?: { throttling?: boolean };
  $service?: string;
}

function isAwsServiceError(error: Error): error is Error & AwsServiceErrorShape {
  return '$metadata' in error;
}

export function causeName(cause: unknown): string {
  if (cause instanceof Error) return cause.name;
  return typeof cause;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/**
 * Convert unknown errors to structured errors
 */
export function normalizeError(error: unknown): AuditError {
  if (error instanceof AuditError) {
    return error;
  }

  if (error instanceof Error) {
    if (isAwsServiceError(error)) {
      return new AWSAPIError(
        error.message,
        error.name,
        error.$metadata?.httpStatusCode,
        error.$retryable?.throttling ?? false,
        {
          requestId: error.$metadata?.requestId,
          service: error.$service,
        }
      );
    }

    return new InternalError(error.message, error);
  }

  return new InternalError(
    'An unknown error occurred',
    undefined,
    { originalError: String(error) }
  );
}

/**
 * Format error for markdown response
 */
export function formatErrorMarkdown(error: AuditError): string {
  return `
## Error: ${error.category}

**Severity:** ${error.severity}
**Code:** \`${error.code}\`
**Message:** ${error.message}

${error.details ? `**Details:**\n\`\`\`json\n${JSON.stringify(error.details, null, 2)}\n\`\`\`\n` : ''}
${error.remediation ? `### Remediation\n${error.remediation}\n` : ''}

*Timestamp: ${error.timestamp}*
`.trim();
}

/**
 * Format error for JSON response
 */
export function formatErrorJSON(error: AuditError): string {
  return JSON.stringify(
    {
      error: error.toJSON(),
    },
    null,
    2
  );
}
