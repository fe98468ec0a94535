import { hasChecks, type CheckRegistry } from './checks.js';
import { MalformedIdentifierError, ValidationError } from './errors.js';
import { deriveIdentity, type AuditIdentity } from './identity.js';

export interface ParsedArn {
  partition: string;
  service: string;
  region: string;
  account: string;
  /** Everything after the fifth colon */
  resource: string;
  /** First `/`-delimited segment of the sixth field */
  resourceType: string;
}

export type ScopeDecision =
  | { readonly kind: 'unscoped' }
  | {
      readonly kind: 'scoped';
      readonly services: ReadonlySet<string>;
      readonly subserviceTokens: ReadonlySet<string>;
      /** Undefined when no ARN carries a region: every region stays in scope */
      readonly regions: readonly string[] | undefined;
    };

const unscoped: ScopeDecision = { kind: 'unscoped' };
export const UNSCOPED: ScopeDecision = Object.freeze(unscoped);

/** Services that have no checks at all */
const SERVICES_WITHOUT_CHECKS = new Set(['waf', 'wafv2']);

/** ARN service token -> service name used by the check catalogue */
const SERVICE_ALIASES: Record<string, string> = {
  'lambda': 'awslambda',
  'elasticloadbalancing': 'elb',
  'logs': 'cloudwatch',
  'cognito-idp': 'cognito',
};

/** Services whose checks are not split by resource type */
const SERVICES_WITHOUT_SUBSERVICES = new Set(['guardduty', 'kms', 's3', 'elb']);

/** Per service: normalized resource type -> token used in check names */
const SUBSERVICE_ALIASES: Record<string, Record<string, string>> = {
  ec2: {
    security_group: 'securitygroup',
    network_acl: 'networkacl',
    image: 'ami',
  },
  rds: {
    cluster_snapshot: 'snapshot',
  },
  cognito: {
    userpool: 'user_pool',
  },
};

export function parseArn(arn: string): ParsedArn {
  const fields = arn.split(':');
  if (fields.length < 6) {
    throw new MalformedIdentifierError(arn, `expected at least 6 colon-delimited fields, found ${fields.length}`);
  }
  if (fields[0] !== 'arn') {
    throw new MalformedIdentifierError(arn, 'must start with "arn:"');
  }

  const [, partition, service, region, account] = fields;
  return {
    partition,
    service,
    region,
    account,
    resource: fields.slice(5).join(':'),
    resourceType: fields[5].split('/')[0],
  };
}

export function normalizeServiceName(service: string): string {
  return SERVICE_ALIASES[service] ?? service;
}

export function subserviceToken(service: string, resourceType: string): string {
  if (SERVICES_WITHOUT_SUBSERVICES.has(service)) {
    return service;
  }
  const normalized = resourceType.replace(/-/g, '_');
  return SUBSERVICE_ALIASES[service]?.[normalized] ?? normalized;
}

/**
 * Regions named by the ARNs, in order of first appearance. Global resources
 * (empty region field) add nothing; undefined when no ARN has a region.
 */
export function regionsFromResourceArns(arns: readonly string[]): string[] | undefined {
  const regions: string[] = [];
  for (const arn of arns) {
    const { region } = parseArn(arn);
    if (region && !regions.includes(region)) {
      regions.push(region);
    }
  }
  return regions.length > 0 ? regions : undefined;
}

/**
 * Narrow an audit to the services, check subservices and regions the given
 * resource ARNs touch. An empty list narrows nothing.
 */
export function resolveScope(arns: readonly string[], registry: CheckRegistry): ScopeDecision {
  if (arns.length === 0) {
    return UNSCOPED;
  }

  const services = new Set<string>();
  const subserviceTokens = new Set<string>();

  for (const arn of arns) {
    const parsed = parseArn(arn);
    if (SERVICES_WITHOUT_CHECKS.has(parsed.service)) {
      continue;
    }

    const service = normalizeServiceName(parsed.service);
    if (hasChecks(registry, service)) {
      services.add(service);
    }
    subserviceTokens.add(subserviceToken(service, parsed.resourceType));
  }

  const decision: ScopeDecision = {
    kind: 'scoped',
    services,
    subserviceTokens,
    regions: regionsFromResourceArns(arns),
  };
  return Object.freeze(decision);
}

/**
 * Copy of `identity` restricted to the regions a scoped decision names.
 * Unscoped decisions, and decisions whose ARNs are all global, leave the
 * allow-list as it is.
 */
export function narrowIdentity(identity: AuditIdentity, decision: ScopeDecision): AuditIdentity {
  if (decision.kind === 'unscoped' || !decision.regions) {
    return identity;
  }

  const allowList = identity.regionAllowList;
  const regions = allowList.length > 0
    ? decision.regions.filter(region => allowList.includes(region))
    : [...decision.regions];
  if (regions.length === 0) {
    throw new ValidationError('None of the scoped resources are in a region of the configured allow-list', {
      resourceRegions: [...decision.regions],
      allowed: [...allowList],
    });
  }
  return deriveIdentity(identity, { regionAllowList: regions });
}

/**
 * Substring containment with one exception: the `policy` token does not
 * select `password_policy` checks.
 */
export function checkMatchesToken(checkName: string, token: string): boolean {
  if (!checkName.includes(token)) return false;
  return !(token === 'policy' && checkName.includes('password_policy'));
}

/**
 * Checks that apply to a scoped audit, sorted. Undefined for an unscoped
 * decision, which means every check applies.
 */
export function selectChecks(decision: ScopeDecision, registry: CheckRegistry): string[] | undefined {
  if (decision.kind === 'unscoped') {
    return undefined;
  }

  const selected: string[] = [];
  for (const check of registry.checksForServices(decision.services)) {
    for (const token of decision.subserviceTokens) {
      if (checkMatchesToken(check, token)) {
        selected.push(check);
        break;
      }
    }
  }
  return selected.sort();
}
