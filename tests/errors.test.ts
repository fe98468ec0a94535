import { describe, it, expect } from '@jest/globals';
import {
  AWSAPIError,
  AuditError,
  AuthError,
  CollectionError,
  ConfigurationError,
  ErrorCategory,
  ErrorSeverity,
  InternalError,
  MalformedIdentifierError,
  RefreshError,
  ValidationError,
  causeName,
  formatErrorJSON,
  formatErrorMarkdown,
  normalizeError,
} from '../src/errors';

describe('AuthError', () => {
  it('should describe a missing local identity', () => {
    const error = AuthError.noUsableIdentity(new Error('Could not load credentials from any providers'));

    expect(error.message).toBe('No usable AWS identity: Could not load credentials from any providers');
    expect(error.code).toBe('NO_USABLE_IDENTITY');
    expect(error.category).toBe(ErrorCategory.AUTHENTICATION);
    expect(error.severity).toBe(ErrorSeverity.CRITICAL);
    expect(error.retryable).toBe(false);
  });

  it('should describe a failed role assumption', () => {
    const cause = new Error('User is not authorized to perform: sts:AssumeRole');
    cause.name = 'AccessDenied';
    const error = AuthError.assumeRoleFailed(cause, 'arn:aws:iam::111111111111:role/Auditor');

    expect(error.message).toBe(
      'Unable to assume role arn:aws:iam::111111111111:role/Auditor: User is not authorized to perform: sts:AssumeRole'
    );
    expect(error.code).toBe('ASSUME_ROLE_FAILED');
    expect(error.details).toEqual({ roleArn: 'arn:aws:iam::111111111111:role/Auditor', cause: 'AccessDenied' });
  });

  it('should be an AuditError and an Error', () => {
    const error = AuthError.noUsableIdentity('nothing configured');
    expect(error).toBeInstanceOf(AuditError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('AuthError');
    expect(error.message).toBe('No usable AWS identity: nothing configured');
  });
});

describe('CollectionError', () => {
  it('should carry the service, operation, region and error class', () => {
    const cause = new Error('Rate exceeded');
    cause.name = 'ThrottlingException';
    const error = new CollectionError('backup', 'Listing Backup Plans', 'ap-south-1', cause);

    expect(error.message).toBe('ap-south-1 -- ThrottlingException: Rate exceeded');
    expect(error.service).toBe('backup');
    expect(error.operation).toBe('Listing Backup Plans');
    expect(error.region).toBe('ap-south-1');
    expect(error.errorClass).toBe('ThrottlingException');
    expect(error.category).toBe(ErrorCategory.COLLECTION);
  });
});

describe('RefreshError', () => {
  it('should be retryable and keep its cause', () => {
    const cause = new Error('ExpiredToken');
    const error = new RefreshError('Credential refresh failed: ExpiredToken', cause);

    expect(error.retryable).toBe(true);
    expect(error.cause).toBe(cause);
    expect(error.details?.cause).toBe('Error');
  });
});

describe('MalformedIdentifierError', () => {
  it('should name the identifier and the reason', () => {
    const error = new MalformedIdentifierError('arn:aws', 'too short');
    expect(error.message).toBe("Malformed resource ARN 'arn:aws': too short");
    expect(error.category).toBe(ErrorCategory.VALIDATION);
  });
});

describe('causeName', () => {
  it('should use the error name or the value type', () => {
    expect(causeName(new TypeError('x'))).toBe('TypeError');
    expect(causeName('text')).toBe('string');
    expect(causeName(undefined)).toBe('undefined');
  });
});

describe('normalizeError', () => {
  it('should pass audit errors through', () => {
    const error = new ValidationError('bad input');
    expect(normalizeError(error)).toBe(error);
  });

  it('should recognise AWS SDK service exceptions', () => {
    const sdkError = Object.assign(new Error('Rate exceeded'), {
      name: 'ThrottlingException',
      $metadata: { httpStatusCode: 400, requestId: 'req-1' },
      $retryable: { throttling: true },
    });

    const normalized = normalizeError(sdkError);

    expect(normalized).toBeInstanceOf(AWSAPIError);
    expect(normalized.code).toBe('ThrottlingException');
    expect(normalized.retryable).toBe(true);
    expect(normalized.details?.requestId).toBe('req-1');
    expect(normalized.severity).toBe(ErrorSeverity.MEDIUM);
  });

  it('should wrap plain errors as internal errors', () => {
    const normalized = normalizeError(new Error('boom'));
    expect(normalized).toBeInstanceOf(InternalError);
    expect(normalized.message).toBe('boom');
  });

  it('should wrap non-error values', () => {
    const normalized = normalizeError(42);
    expect(normalized.message).toBe('An unknown error occurred');
    expect(normalized.details?.originalError).toBe('42');
  });
});

describe('error formatting', () => {
  it('should render the JSON payload', () => {
    const error = new ConfigurationError('AUDIT_PARTITION must be one of aws, aws-cn, aws-us-gov', 'AUDIT_PARTITION');
    const payload: unknown = JSON.parse(formatErrorJSON(error));

    expect(payload).toEqual({
      error: {
        code: 'CONFIG_ERROR',
        category: 'CONFIGURATION',
        severity: 'HIGH',
        message: 'AUDIT_PARTITION must be one of aws, aws-cn, aws-us-gov',
        details: { configKey: 'AUDIT_PARTITION' },
        remediation: 'Set configuration: AUDIT_PARTITION',
        timestamp: error.timestamp,
        retryable: false,
      },
    });
  });

  it('should render the markdown payload', () => {
    const text = formatErrorMarkdown(new ValidationError('Invalid value'));

    expect(text.startsWith('## Error: VALIDATION')).toBe(true);
    expect(text).toContain('**Code:** `VALIDATION_ERROR`');
    expect(text).toContain('**Message:** Invalid value');
    expect(text).toContain('### Remediation\nCheck input parameters and format. Refer to tool documentation.');
  });
});
