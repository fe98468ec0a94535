import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import { ServiceRegionCatalog, getDefaultCatalog } from './catalog.js';
import { causeName, describeCause } from './errors.js';
import type { AuditIdentity } from './identity.js';
import { logger } from './logging.js';
import type { Session } from './session.js';

export interface RegionalClientConfig {
  region: string;
  credentials: AwsCredentialIdentityProvider;
}

/**
 * A provider client bound to one service in one region.
 */
export interface RegionalClient<C> {
  readonly service: string;
  readonly region: string;
  readonly client: C;
}

export type RegionalClients<C> = ReadonlyMap<string, RegionalClient<C>>;

export interface RegionalClientOptions {
  /** Control plane is not region-partitioned: query a single region */
  isGlobal?: boolean;
  catalog?: ServiceRegionCatalog;
}

/**
 * Regions to audit for `service`: the catalog's list for the identity's
 * partition, narrowed by the allow-list and, for global services, collapsed
 * to one region. Catalog order is kept.
 */
export function resolveServiceRegions(
  service: string,
  identity: AuditIdentity,
  options: RegionalClientOptions = {}
): string[] {
  const catalog = options.catalog ?? getDefaultCatalog();
  const catalogRegions = catalog.regionsFor(service, identity.partition);
  if (!catalogRegions) {
    logger.debug(`${service} has no regions in partition ${identity.partition}`);
    return [];
  }

  const allowList = new Set(identity.regionAllowList);
  const effective = allowList.size > 0
    ? catalogRegions.filter(region => allowList.has(region))
    : [...catalogRegions];

  if (!options.isGlobal || effective.length === 0) {
    return effective;
  }

  if (identity.profileRegion && effective.includes(identity.profileRegion)) {
    return [identity.profileRegion];
  }
  return effective.slice(0, 1);
}

/**
 * One client per resolved region. A region whose client cannot be created
 * is logged and left out; the others are still returned.
 */
export function buildRegionalClients<C>(
  service: string,
  session: Session,
  identity: AuditIdentity,
  createClient: (config: RegionalClientConfig) => C,
  options: RegionalClientOptions = {}
): RegionalClients<C> {
  const clients = new Map<string, RegionalClient<C>>();

  for (const region of resolveServiceRegions(service, identity, options)) {
    try {
      const client = createClient({ region, credentials: session.credentials });
      clients.set(region, Object.freeze({ service, region, client }));
    } catch (error) {
      logger.error(`${region} -- ${causeName(error)}: ${describeCause(error)}`, { service }, service);
    }
  }

  return clients;
}
