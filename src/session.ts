import {
  AssumeRoleCommand,
  GetCallerIdentityCommand,
  STSClient,
  type AssumeRoleCommandInput,
} from '@aws-sdk/client-sts';
import { fromIni, fromNodeProviderChain } from '@aws-sdk/credential-providers';
import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import {
  type CredentialProvider,
  RefreshableCredentialProvider,
  fromIdentity,
} from './credentials.js';
import { AuthError, causeName, describeCause } from './errors.js';
import {
  deriveIdentity,
  type AssumedRoleDescriptor,
  type AuditIdentity,
  type Credential,
  type Partition,
} from './identity.js';
import { logger } from './logging.js';

/** Session name used when the trust policy requires an external id */
export const SESSION_NAME_WITH_EXTERNAL_ID = 'CloudAuditAssessmentSession';
/** Session name used by callers trusted without an external id */
export const SESSION_NAME_WITHOUT_EXTERNAL_ID = 'CloudAuditProAssessmentSession';

const STS_DEFAULT_REGIONS: Record<Partition, string> = {
  'aws': 'us-east-1',
  'aws-cn': 'cn-north-1',
  'aws-us-gov': 'us-gov-west-1',
};

export type SessionMethod = 'profile' | 'default-chain' | 'sts-assume-role';

export interface Session {
  readonly method: SessionMethod;
  readonly partition: Partition;
  readonly profile?: string;
  readonly region?: string;
  readonly credentialProvider: CredentialProvider;
  /** Passed as `credentials` to every SDK client */
  readonly credentials: AwsCredentialIdentityProvider;
}

export type LocalCredentialSource = (profile?: string) => AwsCredentialIdentityProvider;

export interface StsClientConfig {
  region: string;
  credentials: AwsCredentialIdentityProvider;
}

export interface SessionOptions {
  /** Resolves the named profile, or the default chain when none is named */
  localCredentials?: LocalCredentialSource;
  createStsClient?: (config: StsClientConfig) => STSClient;
  refreshWindowMs?: number;
}

export interface CallerIdentity {
  account: string;
  arn: string;
  userId: string;
}

export const defaultLocalCredentials: LocalCredentialSource = profile =>
  profile ? fromIni({ profile }) : fromNodeProviderChain();

function defaultStsClient(config: StsClientConfig): STSClient {
  return new STSClient(config);
}

export function stsRegionFor(identity: AuditIdentity): string {
  return identity.profileRegion ?? STS_DEFAULT_REGIONS[identity.partition];
}

export function sessionNameFor(role: AssumedRoleDescriptor): string {
  if (role.sessionName) return role.sessionName;
  return role.externalId ? SESSION_NAME_WITH_EXTERNAL_ID : SESSION_NAME_WITHOUT_EXTERNAL_ID;
}

/**
 * Exchange the caller's credentials for the role's. Errors are returned to
 * the caller untouched.
 */
export async function assumeRole(sts: STSClient, role: AssumedRoleDescriptor): Promise<Credential> {
  const input: AssumeRoleCommandInput = {
    RoleArn: role.roleArn,
    RoleSessionName: sessionNameFor(role),
    DurationSeconds: role.sessionDuration,
  };
  if (role.externalId) {
    input.ExternalId = role.externalId;
  }

  const response = await sts.send(new AssumeRoleCommand(input));
  const credentials = response.Credentials;
  if (!credentials?.AccessKeyId || !credentials.SecretAccessKey || !credentials.Expiration) {
    throw new Error(`AssumeRole response for ${role.roleArn} did not include credentials`);
  }

  return Object.freeze({
    accessKeyId: credentials.AccessKeyId,
    secretAccessKey: credentials.SecretAccessKey,
    sessionToken: credentials.SessionToken,
    expiration: credentials.Expiration,
  });
}

/**
 * Initial role assumption. Any failure, throttling included, is an
 * AuthError: the audit cannot start without the role.
 */
export async function enterAssumedRole(
  identity: AuditIdentity,
  options: SessionOptions = {}
): Promise<AuditIdentity> {
  const role = identity.assumedRole;
  if (!role) {
    throw new AuthError('No role to assume was configured', 'ASSUME_ROLE_FAILED');
  }

  const base = (options.localCredentials ?? defaultLocalCredentials)(identity.profile);
  const sts = (options.createStsClient ?? defaultStsClient)({ region: stsRegionFor(identity), credentials: base });

  logger.info(`Assuming role ${role.roleArn} ...`, { sessionName: sessionNameFor(role) });
  try {
    const credentials = await assumeRole(sts, role);
    return deriveIdentity(identity, { credentials });
  } catch (error) {
    throw AuthError.assumeRoleFailed(error, role.roleArn);
  }
}

/**
 * Build the authenticated session for an audit.
 *
 * Without `identity.credentials` the named profile (or the default chain) is
 * resolved once up front; failing that is an AuthError. With them, the
 * session refreshes by assuming `identity.assumedRole` again whenever the SDK
 * finds the credential near expiry.
 */
export async function establish(identity: AuditIdentity, options: SessionOptions = {}): Promise<Session> {
  const base = (options.localCredentials ?? defaultLocalCredentials)(identity.profile);

  if (!identity.credentials) {
    logger.info('Creating session for not assumed identity ...', { profile: identity.profile });

    let initial: Credential;
    try {
      initial = fromIdentity(await base());
    } catch (error) {
      throw AuthError.noUsableIdentity(error, identity.profile);
    }

    const method: SessionMethod = identity.profile ? 'profile' : 'default-chain';
    const provider = new RefreshableCredentialProvider(
      initial,
      async () => fromIdentity(await base()),
      { method, refreshWindowMs: options.refreshWindowMs }
    );
    return createSession(method, identity, provider);
  }

  const role = identity.assumedRole;
  if (!role) {
    throw new AuthError(
      'Assumed-role credentials were supplied without the role they came from, so they cannot be refreshed',
      'NO_USABLE_IDENTITY'
    );
  }

  logger.info('Creating session for assumed role ...', { roleArn: role.roleArn });
  const sts = (options.createStsClient ?? defaultStsClient)({ region: stsRegionFor(identity), credentials: base });
  const provider = new RefreshableCredentialProvider(
    identity.credentials,
    () => assumeRole(sts, role),
    { method: 'sts-assume-role', refreshWindowMs: options.refreshWindowMs }
  );
  return createSession('sts-assume-role', identity, provider);
}

function createSession(
  method: SessionMethod,
  identity: AuditIdentity,
  provider: RefreshableCredentialProvider
): Session {
  return Object.freeze({
    method,
    partition: identity.partition,
    profile: identity.profile,
    region: identity.profileRegion,
    credentialProvider: provider,
    credentials: provider.asIdentityProvider(),
  });
}

export async function getCallerIdentity(
  session: Session,
  options: Pick<SessionOptions, 'createStsClient'> = {}
): Promise<CallerIdentity> {
  const sts = (options.createStsClient ?? defaultStsClient)({
    region: session.region ?? STS_DEFAULT_REGIONS[session.partition],
    credentials: session.credentials,
  });
  const response = await sts.send(new GetCallerIdentityCommand({}));
  return {
    account: response.Account ?? '',
    arn: response.Arn ?? '',
    userId: response.UserId ?? '',
  };
}

/**
 * Terminal handler for setup failures: one critical log line, exit status 1.
 */
export function exitOnFatal(error: unknown): never {
  logger.critical(`${causeName(error)} -- ${describeCause(error)}`);
  process.exit(1);
}
