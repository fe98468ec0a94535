import { describe, it, expect } from '@jest/globals';
import { ServiceRegionCatalog } from '../src/catalog';
import { createAuditIdentity } from '../src/identity';
import { completeArgument, configuredScopeRegions } from '../src/tools';

const catalog = ServiceRegionCatalog.fromDocument({
  services: {
    'backup': { regions: { 'aws': ['us-east-1', 'us-west-2', 'eu-west-1'], 'aws-cn': ['cn-north-1'] } },
    'cognito-idp': { regions: { aws: ['us-east-1', 'ap-south-1'] } },
    'config': { regions: { 'aws': ['us-east-2'], 'aws-us-gov': ['us-gov-west-1'] } },
  },
});

const context = { catalog, identity: createAuditIdentity({ partition: 'aws' }) };

describe('completeArgument', () => {
  describe('regions', () => {
    it('should suggest every region of the partition for an empty prefix', () => {
      expect(completeArgument(context, 'region', '')).toEqual({
        values: ['ap-south-1', 'eu-west-1', 'us-east-1', 'us-east-2', 'us-west-2'],
        total: 5,
        hasMore: false,
      });
    });

    it('should filter by prefix', () => {
      expect(completeArgument(context, 'regions', 'us-e').values).toEqual(['us-east-1', 'us-east-2']);
    });

    it('should ignore the case of the prefix', () => {
      expect(completeArgument(context, 'region', 'EU').values).toEqual(['eu-west-1']);
    });

    it('should follow the audited partition', () => {
      const china = { catalog, identity: createAuditIdentity({ partition: 'aws-cn' }) };
      expect(completeArgument(china, 'region', '').values).toEqual(['cn-north-1']);
    });
  });

  describe('services', () => {
    it('should suggest catalogued services', () => {
      expect(completeArgument(context, 'service', 'co').values).toEqual(['cognito-idp', 'config']);
    });
  });

  describe('formats', () => {
    it('should suggest output formats', () => {
      expect(completeArgument(context, 'format', '').values).toEqual(['markdown', 'json']);
      expect(completeArgument(context, 'format', 'j').values).toEqual(['json']);
    });
  });

  it('should return nothing for other arguments', () => {
    expect(completeArgument(context, 'resourceArns', 'arn')).toEqual({ values: [], total: 0, hasMore: false });
  });

  it('should cap the number of values', () => {
    const regions = Array.from({ length: 25 }, (_, i) => `us-test-${i + 1}`);
    const large = {
      catalog: ServiceRegionCatalog.fromDocument({ services: { ec2: { regions: { aws: regions } } } }),
      identity: createAuditIdentity({}),
    };

    const result = completeArgument(large, 'region', 'us-');

    expect(result.values).toHaveLength(20);
    expect(result.total).toBe(25);
    expect(result.hasMore).toBe(true);
  });
});

describe('configuredScopeRegions', () => {
  it('should list the regions named by the configured resource ARNs', () => {
    const identity = createAuditIdentity({
      resourceArns: ['arn:aws:s3:::logs', 'arn:aws:backup:eu-west-1:111111111111:backup-vault:main'],
    });
    expect(configuredScopeRegions(identity)).toEqual(['eu-west-1']);
  });

  it('should be empty without regional ARNs', () => {
    expect(configuredScopeRegions(createAuditIdentity({}))).toEqual([]);
  });
});
