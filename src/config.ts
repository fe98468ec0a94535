/**
 * Cloud Audit Core - Configuration
 *
 * The audit is configured once, from the environment, at startup.
 */

import { ConfigurationError, ValidationError } from './errors.js';
import { PARTITIONS, createAuditIdentity, isPartition, type AuditIdentity } from './identity.js';
import { validateArnList, validateRegion, validateRegionList } from './utils.js';

export const MIN_SESSION_DURATION = 900;
export const MAX_SESSION_DURATION = 43200;
export const DEFAULT_SESSION_DURATION = 3600;
export const DEFAULT_REFRESH_WINDOW_SECONDS = 300;

const ROLE_ARN_PATTERN = /^arn:aws[a-z-]*:iam::\d{12}:role\/.+$/;

export interface AuditConfig {
  identity: AuditIdentity;
  refreshWindowMs: number;
}

export type Environment = Record<string, string | undefined>;

function readOptional(env: Environment, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readInteger(env: Environment, key: string, fallback: number, min: number, max: number): number {
  const raw = readOptional(env, key);
  if (raw === undefined) return fallback;

  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`${key} must be a whole number of seconds, got '${raw}'`, key);
  }
  const value = Number(raw);
  if (value < min || value > max) {
    throw new ConfigurationError(`${key} must be between ${min} and ${max}, got ${value}`, key);
  }
  return value;
}

/** Re-raise input validation failures as configuration errors naming the variable */
function fromVariable<T>(key: string, read: () => T): T {
  try {
    return read();
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ConfigurationError(`${key}: ${error.message}`, key, error.details);
    }
    throw error;
  }
}

export function loadAuditConfig(env: Environment = process.env): AuditConfig {
  const partition = readOptional(env, 'AUDIT_PARTITION') ?? 'aws';
  if (!isPartition(partition)) {
    throw new ConfigurationError(
      `AUDIT_PARTITION must be one of ${PARTITIONS.join(', ')}, got '${partition}'`,
      'AUDIT_PARTITION'
    );
  }

  const regionVariable = readOptional(env, 'AWS_REGION') !== undefined ? 'AWS_REGION' : 'AWS_DEFAULT_REGION';
  const profileRegion = fromVariable(regionVariable, () => validateRegion(readOptional(env, regionVariable)));
  const regionAllowList = fromVariable('AUDIT_REGIONS', () => validateRegionList(readOptional(env, 'AUDIT_REGIONS')));
  const resourceArns = fromVariable('AUDIT_RESOURCE_ARNS', () => validateArnList(readOptional(env, 'AUDIT_RESOURCE_ARNS')));

  const roleArn = readOptional(env, 'AUDIT_ROLE_ARN');
  if (roleArn !== undefined && !ROLE_ARN_PATTERN.test(roleArn)) {
    throw new ConfigurationError(`AUDIT_ROLE_ARN is not an IAM role ARN: '${roleArn}'`, 'AUDIT_ROLE_ARN');
  }

  const externalId = readOptional(env, 'AUDIT_EXTERNAL_ID');
  const sessionName = readOptional(env, 'AUDIT_SESSION_NAME');
  if ((externalId !== undefined || sessionName !== undefined) && roleArn === undefined) {
    throw new ConfigurationError(
      'AUDIT_EXTERNAL_ID and AUDIT_SESSION_NAME only apply together with AUDIT_ROLE_ARN',
      'AUDIT_ROLE_ARN'
    );
  }

  const sessionDuration = readInteger(
    env,
    'AUDIT_SESSION_DURATION',
    DEFAULT_SESSION_DURATION,
    MIN_SESSION_DURATION,
    MAX_SESSION_DURATION
  );
  const refreshWindowSeconds = readInteger(
    env,
    'AUDIT_REFRESH_WINDOW_SECONDS',
    DEFAULT_REFRESH_WINDOW_SECONDS,
    0,
    MAX_SESSION_DURATION
  );

  if (roleArn !== undefined && refreshWindowSeconds >= sessionDuration) {
    throw new ConfigurationError(
      `AUDIT_REFRESH_WINDOW_SECONDS must be shorter than AUDIT_SESSION_DURATION, got ${refreshWindowSeconds} >= ${sessionDuration}`,
      'AUDIT_REFRESH_WINDOW_SECONDS'
    );
  }

  return {
    identity: createAuditIdentity({
      partition,
      profile: readOptional(env, 'AWS_PROFILE'),
      profileRegion,
      regionAllowList,
      resourceArns,
      assumedRole: roleArn === undefined ? undefined : { roleArn, externalId, sessionDuration, sessionName },
    }),
    refreshWindowMs: refreshWindowSeconds * 1000,
  };
}
