/**
 * Audit identity: who is audited, where, and under which credentials.
 */

export type Partition = 'aws' | 'aws-cn' | 'aws-us-gov';

export const PARTITIONS: readonly Partition[] = ['aws', 'aws-cn', 'aws-us-gov'];

export function isPartition(value: string): value is Partition {
  return PARTITIONS.some(partition => partition === value);
}

export interface AssumedRoleDescriptor {
  readonly roleArn: string;
  readonly externalId?: string;
  /** Seconds, 900-43200 */
  readonly sessionDuration: number;
  /** Overrides the default session-name convention */
  readonly sessionName?: string;
}

export interface Credential {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  readonly sessionToken?: string;
  /** Absent for long-term keys, which never expire */
  readonly expiration?: Date;
}

export interface AuditIdentity {
  readonly auditedAccount: string;
  readonly partition: Partition;
  readonly profile?: string;
  readonly profileRegion?: string;
  /** Empty means every region the catalog lists */
  readonly regionAllowList: readonly string[];
  /** Empty means the audit is not scoped to resources */
  readonly resourceArns: readonly string[];
  readonly assumedRole?: AssumedRoleDescriptor;
  /** Present when the audit runs under an already-assumed role */
  readonly credentials?: Credential;
}

export interface AuditIdentityInput {
  auditedAccount?: string;
  partition?: Partition;
  profile?: string;
  profileRegion?: string;
  regionAllowList?: readonly string[];
  resourceArns?: readonly string[];
  assumedRole?: AssumedRoleDescriptor;
  credentials?: Credential;
}

export function createAuditIdentity(input: AuditIdentityInput): AuditIdentity {
  return Object.freeze({
    auditedAccount: input.auditedAccount ?? '',
    partition: input.partition ?? 'aws',
    profile: input.profile,
    profileRegion: input.profileRegion,
    regionAllowList: Object.freeze([...(input.regionAllowList ?? [])]),
    resourceArns: Object.freeze([...(input.resourceArns ?? [])]),
    assumedRole: input.assumedRole ? Object.freeze({ ...input.assumedRole }) : undefined,
    credentials: input.credentials ? Object.freeze({ ...input.credentials }) : undefined,
  });
}

/**
 * Copy of `identity` with some fields replaced. The original is untouched.
 */
export function deriveIdentity(identity: AuditIdentity, changes: AuditIdentityInput): AuditIdentity {
  return createAuditIdentity({ ...identity, ...changes });
}
