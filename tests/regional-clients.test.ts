import { describe, it, expect, beforeEach } from '@jest/globals';
import { ServiceRegionCatalog } from '../src/catalog';
import { RefreshableCredentialProvider } from '../src/credentials';
import { createAuditIdentity } from '../src/identity';
import { LogLevel, logger } from '../src/logging';
import { buildRegionalClients, resolveServiceRegions, type RegionalClientConfig } from '../src/regional-clients';
import type { Session } from '../src/session';

const catalog = ServiceRegionCatalog.fromDocument({
  services: {
    sso: { regions: { aws: ['us-east-1', 'eu-west-1'] } },
    widgets: { regions: { aws: ['us-east-1', 'us-west-2', 'eu-west-1', 'ap-south-1'], 'aws-cn': ['cn-north-1'] } },
  },
});

const provider = new RefreshableCredentialProvider(
  { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
  async () => ({ accessKeyId: 'test-key', secretAccessKey: 'test-secret' })
);

const session: Session = {
  method: 'profile',
  partition: 'aws',
  credentialProvider: provider,
  credentials: provider.asIdentityProvider(),
};

class FakeClient {
  constructor(readonly config: RegionalClientConfig) {}
}

describe('resolveServiceRegions', () => {
  it('should keep every catalog region when the allow-list is empty', () => {
    const regions = resolveServiceRegions('widgets', createAuditIdentity({}), { catalog });
    expect(regions).toEqual(['us-east-1', 'us-west-2', 'eu-west-1', 'ap-south-1']);
  });

  it('should intersect with the allow-list in catalog order', () => {
    const identity = createAuditIdentity({ regionAllowList: ['ap-south-1', 'us-east-1', 'sa-east-1'] });
    expect(resolveServiceRegions('widgets', identity, { catalog })).toEqual(['us-east-1', 'ap-south-1']);
  });

  it('should use the identity partition', () => {
    const identity = createAuditIdentity({ partition: 'aws-cn' });
    expect(resolveServiceRegions('widgets', identity, { catalog })).toEqual(['cn-north-1']);
  });

  it('should return nothing for a catalog miss', () => {
    expect(resolveServiceRegions('unknown', createAuditIdentity({}), { catalog })).toEqual([]);
    expect(resolveServiceRegions('sso', createAuditIdentity({ partition: 'aws-us-gov' }), { catalog })).toEqual([]);
  });

  it('should collapse a global service to the profile region when it is effective', () => {
    const identity = createAuditIdentity({ profileRegion: 'eu-west-1' });
    expect(resolveServiceRegions('sso', identity, { catalog, isGlobal: true })).toEqual(['eu-west-1']);
  });

  it('should collapse a global service to the first region otherwise', () => {
    const identity = createAuditIdentity({ profileRegion: 'ap-south-1' });
    expect(resolveServiceRegions('sso', identity, { catalog, isGlobal: true })).toEqual(['us-east-1']);
  });

  it('should not collapse to a profile region outside the allow-list', () => {
    const identity = createAuditIdentity({ profileRegion: 'us-east-1', regionAllowList: ['eu-west-1'] });
    expect(resolveServiceRegions('sso', identity, { catalog, isGlobal: true })).toEqual(['eu-west-1']);
  });

  it('should fall back to the bundled catalog', () => {
    expect(resolveServiceRegions('iam', createAuditIdentity({}), { isGlobal: true })).toEqual(['us-east-1']);
  });
});

describe('buildRegionalClients', () => {
  beforeEach(() => {
    logger.clearLogs();
  });

  it('should build exactly one client for a global service in the profile region', () => {
    const identity = createAuditIdentity({ profileRegion: 'eu-west-1' });

    const clients = buildRegionalClients('sso', session, identity, config => new FakeClient(config), {
      catalog,
      isGlobal: true,
    });

    expect([...clients.keys()]).toEqual(['eu-west-1']);
    expect(clients.get('eu-west-1')?.region).toBe('eu-west-1');
    expect(clients.get('eu-west-1')?.service).toBe('sso');
  });

  it('should hand every client the region and the session credential provider', () => {
    const identity = createAuditIdentity({ regionAllowList: ['us-west-2', 'eu-west-1'] });

    const clients = buildRegionalClients('widgets', session, identity, config => new FakeClient(config), { catalog });

    expect([...clients.keys()]).toEqual(['us-west-2', 'eu-west-1']);
    for (const [region, regional] of clients) {
      expect(regional.client.config.region).toBe(region);
      expect(regional.client.config.credentials).toBe(session.credentials);
    }
  });

  it('should skip a region whose client cannot be created', () => {
    const clients = buildRegionalClients('widgets', session, createAuditIdentity({}), config => {
      if (config.region === 'us-west-2') {
        throw new TypeError('bad endpoint');
      }
      return new FakeClient(config);
    }, { catalog });

    expect([...clients.keys()]).toEqual(['us-east-1', 'eu-west-1', 'ap-south-1']);
    const errors = logger.getLogs(LogLevel.ERROR);
    expect(errors).toHaveLength(1);
    expect(errors[0].message).toBe('us-west-2 -- TypeError: bad endpoint');
  });

  it('should return an empty map for a catalog miss', () => {
    const clients = buildRegionalClients('unknown', session, createAuditIdentity({}), config => new FakeClient(config), {
      catalog,
    });
    expect(clients.size).toBe(0);
  });

  it('should freeze each regional client', () => {
    const clients = buildRegionalClients('widgets', session, createAuditIdentity({}), config => new FakeClient(config), {
      catalog,
    });
    expect(Object.isFrozen(clients.get('us-east-1'))).toBe(true);
  });
});
