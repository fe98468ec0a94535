import {
  CognitoIdentityProviderClient,
  DescribeUserPoolClientCommand,
  paginateListUserPoolClients,
  paginateListUserPools,
} from '@aws-sdk/client-cognito-identity-provider';
import { ResourceCollector, type CollectorOptions } from '../collector.js';
import type { AuditIdentity, Partition } from '../identity.js';
import { performanceTracker } from '../logging.js';
import {
  buildRegionalClients,
  type RegionalClient,
  type RegionalClientOptions,
  type RegionalClients,
} from '../regional-clients.js';
import type { Session } from '../session.js';

const LIST_USER_POOLS_PAGE_SIZE = 60;

export interface UserPoolClient {
  readonly id: string;
  readonly name: string;
  readonly arn: string;
  readonly region: string;
  readonly enableTokenRevocation?: boolean;
}

export interface UserPool {
  readonly id: string;
  readonly arn: string;
  readonly name: string;
  readonly region: string;
  readonly status?: string;
  readonly creationDate?: Date;
  readonly lastModified?: Date;
  /** Keyed by client id */
  readonly userPoolClients: ReadonlyMap<string, UserPoolClient>;
}

type UserPoolSummary = Omit<UserPool, 'userPoolClients'>;

export interface CognitoCollectorOptions extends CollectorOptions {
  partition: Partition;
  auditedAccount: string;
}

export function userPoolArn(partition: string, region: string, account: string, poolId: string): string {
  return `arn:${partition}:cognito-idp:${region}:${account}:userpool/${poolId}`;
}

export class CognitoIdpCollector extends ResourceCollector<CognitoIdentityProviderClient> {
  /** Keyed by user pool ARN */
  readonly userPools = new Map<string, UserPool>();
  private readonly partition: Partition;
  private readonly auditedAccount: string;

  constructor(
    regionalClients: RegionalClients<CognitoIdentityProviderClient>,
    options: CognitoCollectorOptions
  ) {
    super('cognito-idp', regionalClients, options);
    this.partition = options.partition;
    this.auditedAccount = options.auditedAccount;
  }

  static async create(
    session: Session,
    identity: AuditIdentity,
    options: RegionalClientOptions = {}
  ): Promise<CognitoIdpCollector> {
    const clients = buildRegionalClients(
      'cognito-idp',
      session,
      identity,
      config => new CognitoIdentityProviderClient(config),
      options
    );
    const collector = new CognitoIdpCollector(clients, {
      auditResources: identity.resourceArns,
      profileRegion: identity.profileRegion,
      partition: identity.partition,
      auditedAccount: identity.auditedAccount,
    });
    return collector.collect();
  }

  async collect(): Promise<this> {
    const pools = await this.fanOut('Listing User Pools', async (regionalClient, trackingId) => {
      const collected: UserPool[] = [];
      for (const summary of await this.listUserPools(regionalClient, trackingId)) {
        const userPoolClients = await this.listUserPoolClients(regionalClient, summary, trackingId);
        collected.push(Object.freeze({ ...summary, userPoolClients }));
      }
      return collected;
    });

    for (const pool of pools) {
      this.userPools.set(pool.arn, pool);
    }
    return this;
  }

  /** Pools of the region that pass the inclusion filter */
  private async listUserPools(
    { client, region }: RegionalClient<CognitoIdentityProviderClient>,
    trackingId: string
  ): Promise<UserPoolSummary[]> {
    const summaries: UserPoolSummary[] = [];
    for await (const page of paginateListUserPools({ client }, { MaxResults: LIST_USER_POOLS_PAGE_SIZE })) {
      performanceTracker.recordAPICall(trackingId);
      for (const pool of page.UserPools ?? []) {
        if (!pool.Id) continue;
        const arn = userPoolArn(this.partition, region, this.auditedAccount, pool.Id);
        if (!this.isIncluded(arn)) continue;

        summaries.push({
          id: pool.Id,
          arn,
          name: pool.Name ?? '',
          region,
          status: pool.Status,
          creationDate: pool.CreationDate,
          lastModified: pool.LastModifiedDate,
        });
      }
    }
    return summaries;
  }

  private async listUserPoolClients(
    { client, region }: RegionalClient<CognitoIdentityProviderClient>,
    pool: UserPoolSummary,
    trackingId: string
  ): Promise<ReadonlyMap<string, UserPoolClient>> {
    const clients = new Map<string, UserPoolClient>();
    for await (const page of paginateListUserPoolClients({ client }, { UserPoolId: pool.id })) {
      performanceTracker.recordAPICall(trackingId);
      for (const description of page.UserPoolClients ?? []) {
        if (!description.ClientId) continue;

        const details = await client.send(
          new DescribeUserPoolClientCommand({ UserPoolId: pool.id, ClientId: description.ClientId })
        );
        performanceTracker.recordAPICall(trackingId);

        clients.set(description.ClientId, Object.freeze({
          id: description.ClientId,
          name: description.ClientName ?? '',
          arn: `${pool.arn}/client/${description.ClientId}`,
          region,
          enableTokenRevocation: details.UserPoolClient?.EnableTokenRevocation,
        }));
      }
    }
    return clients;
  }
}
