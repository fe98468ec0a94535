/**
 * Cloud Audit Core - MCP tool definitions and dispatch
 */

import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ServiceRegionCatalog } from './catalog.js';
import type { CheckRegistry } from './checks.js';
import type { CollectionError } from './errors.js';
import { ValidationError, formatErrorJSON, formatErrorMarkdown, normalizeError } from './errors.js';
import { deriveIdentity, type AuditIdentity } from './identity.js';
import { logger, performanceTracker } from './logging.js';
import { resolveServiceRegions } from './regional-clients.js';
import { narrowIdentity, regionsFromResourceArns, resolveScope, selectChecks } from './scope.js';
import { getCallerIdentity, type Session, type SessionOptions } from './session.js';
import { BackupCollector } from './services/backup.js';
import { CognitoIdpCollector } from './services/cognito.js';
import {
  validateArnList,
  validateInput,
  validateOutputFormat,
  validateRegionList,
  type OutputFormat,
} from './utils.js';

const MAX_COMPLETIONS = 20;

export interface AuditContext {
  /** Identity with the audited account filled in */
  identity: AuditIdentity;
  session: Session;
  catalog: ServiceRegionCatalog;
  checks: CheckRegistry;
  sessionOptions?: Pick<SessionOptions, 'createStsClient'>;
}

export type ToolArguments = Record<string, unknown> | undefined;

const FORMAT_PROPERTY = {
  type: 'string',
  description: "Output format: 'markdown' (default, human-readable) or 'json' (machine-readable)",
  enum: ['markdown', 'json'],
};

const REGIONS_PROPERTY = {
  type: 'array',
  items: { type: 'string' },
  description: 'Regions to audit (e.g., ["us-east-1"]). Narrows the configured allow-list; omit for every region the service is offered in',
};

const RESOURCE_ARNS_PROPERTY = {
  type: 'array',
  items: { type: 'string' },
  description: 'Only collect these resources (and the parents of any child ARNs). Omit to use the configured scope',
};

export const TOOLS: Tool[] = [
  {
    name: 'aws_whoami',
    description: 'Identify the audited AWS identity (user/role), account ID and ARN using STS GetCallerIdentity, plus how the session was authenticated',
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: false,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        format: FORMAT_PROPERTY,
      },
    },
  },
  {
    name: 'aws_list_service_regions',
    description: 'List the regions a service is offered in for the audited partition, and the regions an audit of it would actually query after the allow-list and global-service collapse',
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        service: {
          type: 'string',
          description: 'Service name as used in endpoints (e.g., backup, cognito-idp, iam)',
        },
        global: {
          type: 'boolean',
          description: 'Treat the service as global and query a single region',
        },
        format: FORMAT_PROPERTY,
      },
      required: ['service'],
    },
  },
  {
    name: 'aws_resolve_resource_scope',
    description: 'Resolve resource ARNs to the services, check subservices, regions and checks an audit scoped to them would cover',
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        resourceArns: RESOURCE_ARNS_PROPERTY,
        format: FORMAT_PROPERTY,
      },
    },
  },
  {
    name: 'aws_collect_backup_inventory',
    description: 'Collect AWS Backup vaults, backup plans and report plans across regions. Per-region failures are reported without stopping the other regions',
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: false,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        regions: REGIONS_PROPERTY,
        resourceArns: RESOURCE_ARNS_PROPERTY,
        format: FORMAT_PROPERTY,
      },
    },
  },
  {
    name: 'aws_collect_cognito_user_pools',
    description: 'Collect Cognito user pools and their app clients (with token revocation status) across regions',
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: false,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        regions: REGIONS_PROPERTY,
        resourceArns: RESOURCE_ARNS_PROPERTY,
        format: FORMAT_PROPERTY,
      },
    },
  },
];

/**
 * Format response based on requested format (markdown or json)
 */
export function formatResponse(data: unknown, format: OutputFormat, toolName: string): string {
  if (format === 'json') {
    return JSON.stringify({
      tool: toolName,
      format: 'json',
      timestamp: new Date().toISOString(),
      data,
    }, null, 2);
  }
  return typeof data === 'string' ? data : JSON.stringify(data, null, 2);
}

function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

interface FailureSummary {
  region: string;
  operation: string;
  errorClass: string;
  message: string;
}

function summarizeFailures(failures: readonly CollectionError[]): FailureSummary[] {
  return failures.map(failure => ({
    region: failure.region,
    operation: failure.operation,
    errorClass: failure.errorClass,
    message: failure.message,
  }));
}

function failuresMarkdown(failures: readonly FailureSummary[]): string[] {
  if (failures.length === 0) return [];
  return [
    '',
    `## Collection Failures (${failures.length})`,
    '',
    ...failures.map(f => `- **${f.region}** ${f.operation}: ${f.message}`),
  ];
}

function yesNo(value: boolean | undefined): string {
  if (value === undefined) return 'unknown';
  return value ? 'yes' : 'no';
}

/**
 * Identity for a collection run: tool arguments narrow the configured
 * allow-list and replace the configured resource scope.
 */
export function scopedIdentity(identity: AuditIdentity, args: ToolArguments): AuditIdentity {
  const requestedRegions = validateRegionList(args?.regions);
  const requestedArns = validateArnList(args?.resourceArns);

  let regionAllowList = identity.regionAllowList;
  if (requestedRegions.length > 0) {
    regionAllowList = identity.regionAllowList.length > 0
      ? requestedRegions.filter(region => identity.regionAllowList.includes(region))
      : requestedRegions;
    if (regionAllowList.length === 0) {
      throw new ValidationError('None of the requested regions are in the configured allow-list', {
        requested: requestedRegions,
        allowed: [...identity.regionAllowList],
      });
    }
  }

  return deriveIdentity(identity, {
    regionAllowList,
    resourceArns: requestedArns.length > 0 ? requestedArns : identity.resourceArns,
  });
}

function collectionIdentity(context: AuditContext, args: ToolArguments): AuditIdentity {
  const requested = scopedIdentity(context.identity, args);
  return narrowIdentity(requested, resolveScope(requested.resourceArns, context.checks));
}

async function whoami(context: AuditContext, format: OutputFormat): Promise<string> {
  const caller = await getCallerIdentity(context.session, context.sessionOptions);
  const data = {
    account: caller.account,
    arn: caller.arn,
    userId: caller.userId,
    partition: context.session.partition,
    method: context.session.method,
    profile: context.session.profile,
    profileRegion: context.session.region,
    assumedRole: context.identity.assumedRole?.roleArn,
    credentialExpiration: context.session.credentialProvider.expiration?.toISOString(),
  };
  if (format === 'json') return formatResponse(data, format, 'aws_whoami');

  const lines = [
    '# AWS Identity',
    '',
    `**Account:** ${data.account}`,
    `**ARN:** ${data.arn}`,
    `**User ID:** ${data.userId}`,
    `**Partition:** ${data.partition}`,
    `**Authentication:** ${data.method}`,
  ];
  if (data.profile) lines.push(`**Profile:** ${data.profile}`);
  if (data.profileRegion) lines.push(`**Profile Region:** ${data.profileRegion}`);
  if (data.assumedRole) lines.push(`**Assumed Role:** ${data.assumedRole}`);
  if (data.credentialExpiration) lines.push(`**Credentials Expire:** ${data.credentialExpiration}`);
  return lines.join('\n');
}

function listServiceRegions(context: AuditContext, args: ToolArguments, format: OutputFormat): string {
  const service = validateInput(args?.service, {
    required: true,
    maxLength: 64,
    pattern: /^[a-z0-9-]+$/,
    patternName: 'service name',
  });
  if (!service) throw new ValidationError('service is required');
  const isGlobal = args?.global === true;

  const offered = context.catalog.regionsFor(service, context.identity.partition);
  const effective = resolveServiceRegions(service, context.identity, { isGlobal, catalog: context.catalog });
  const data = {
    service,
    partition: context.identity.partition,
    global: isGlobal,
    offeredRegions: offered ? [...offered] : [],
    auditedRegions: effective,
  };
  if (format === 'json') return formatResponse(data, format, 'aws_list_service_regions');

  if (!offered) {
    return `# ${service} Regions\n\n${service} is not offered in partition ${data.partition}.`;
  }
  return [
    `# ${service} Regions`,
    '',
    `**Partition:** ${data.partition}`,
    `**Offered in:** ${data.offeredRegions.length} regions`,
    `**Audited:** ${effective.length > 0 ? effective.join(', ') : 'none (outside the region allow-list)'}`,
    '',
    ...data.offeredRegions.map(region => `- ${region}${effective.includes(region) ? ' (audited)' : ''}`),
  ].join('\n');
}

function resolveResourceScope(context: AuditContext, args: ToolArguments, format: OutputFormat): string {
  const requested = validateArnList(args?.resourceArns);
  const arns = requested.length > 0 ? requested : [...context.identity.resourceArns];

  const decision = resolveScope(arns, context.checks);
  const checks = selectChecks(decision, context.checks);

  if (decision.kind === 'unscoped') {
    const data = { scoped: false };
    return format === 'json'
      ? formatResponse(data, format, 'aws_resolve_resource_scope')
      : '# Resource Scope\n\nNo resource ARNs given: every service, region and check stays in scope.';
  }

  const data = {
    scoped: true,
    resourceArns: arns,
    services: [...decision.services].sort(),
    subserviceTokens: [...decision.subserviceTokens].sort(),
    regions: decision.regions ?? null,
    checks: checks ?? [],
  };
  if (format === 'json') return formatResponse(data, format, 'aws_resolve_resource_scope');

  return [
    '# Resource Scope',
    '',
    `**Resources:** ${arns.length}`,
    `**Services:** ${data.services.length > 0 ? data.services.join(', ') : 'none with checks'}`,
    `**Subservices:** ${data.subserviceTokens.join(', ')}`,
    `**Regions:** ${decision.regions ? decision.regions.join(', ') : 'all (no regional ARNs)'}`,
    '',
    `## Checks (${data.checks.length})`,
    '',
    ...data.checks.map(check => `- ${check}`),
  ].join('\n');
}

async function collectBackupInventory(context: AuditContext, args: ToolArguments, format: OutputFormat): Promise<string> {
  const identity = collectionIdentity(context, args);
  const collector = await BackupCollector.create(context.session, identity, { catalog: context.catalog });

  const data = {
    regions: collector.regions,
    primaryRegion: collector.primaryRegion ?? null,
    vaults: collector.vaults,
    plans: collector.plans,
    reportPlans: collector.reportPlans,
    failures: summarizeFailures(collector.failures),
  };
  if (format === 'json') return formatResponse(data, format, 'aws_collect_backup_inventory');

  const lines = [
    '# AWS Backup Inventory',
    '',
    `**Regions:** ${data.regions.length > 0 ? data.regions.join(', ') : 'none'}`,
    '',
    `## Backup Vaults (${data.vaults.length})`,
    '',
  ];
  if (data.vaults.length > 0) {
    lines.push('| Region | Name | Encryption Key | Recovery Points | Locked |');
    lines.push('|--------|------|----------------|-----------------|--------|');
    for (const vault of data.vaults) {
      lines.push(`| ${vault.region} | ${vault.name} | ${vault.encryption ?? 'none'} | ${vault.recoveryPoints} | ${yesNo(vault.locked)} |`);
    }
  }
  lines.push('', `## Backup Plans (${data.plans.length})`, '');
  for (const plan of data.plans) {
    lines.push(`- **${plan.name}** (${plan.region}) last run: ${plan.lastExecutionDate?.toISOString() ?? 'never'}`);
  }
  lines.push('', `## Report Plans (${data.reportPlans.length})`, '');
  for (const reportPlan of data.reportPlans) {
    lines.push(`- **${reportPlan.name}** (${reportPlan.region}) last success: ${reportPlan.lastSuccessfulExecutionDate?.toISOString() ?? 'never'}`);
  }
  lines.push(...failuresMarkdown(data.failures));
  return lines.join('\n');
}

async function collectCognitoUserPools(context: AuditContext, args: ToolArguments, format: OutputFormat): Promise<string> {
  const identity = collectionIdentity(context, args);
  const collector = await CognitoIdpCollector.create(context.session, identity, { catalog: context.catalog });

  const pools = [...collector.userPools.values()].map(pool => ({
    id: pool.id,
    arn: pool.arn,
    name: pool.name,
    region: pool.region,
    status: pool.status,
    clients: [...pool.userPoolClients.values()],
  }));
  const failures = summarizeFailures(collector.failures);
  if (format === 'json') {
    return formatResponse({ regions: collector.regions, userPools: pools, failures }, format, 'aws_collect_cognito_user_pools');
  }

  const lines = [
    '# Cognito User Pools',
    '',
    `**Regions:** ${collector.regions.length > 0 ? collector.regions.join(', ') : 'none'}`,
    `**User Pools:** ${pools.length}`,
  ];
  for (const pool of pools) {
    lines.push('', `## ${pool.name} (${pool.region})`, '', `**ARN:** ${pool.arn}`, '');
    if (pool.clients.length === 0) {
      lines.push('No app clients.');
      continue;
    }
    lines.push('| Client | ID | Token Revocation |');
    lines.push('|--------|----|------------------|');
    for (const client of pool.clients) {
      lines.push(`| ${client.name} | ${client.id} | ${yesNo(client.enableTokenRevocation)} |`);
    }
  }
  lines.push(...failuresMarkdown(failures));
  return lines.join('\n');
}

/**
 * Dispatch one tool call. Errors never escape: they are normalized, logged
 * and returned with `isError` set.
 */
export async function handleToolCall(context: AuditContext, name: string, args: ToolArguments): Promise<CallToolResult> {
  const trackingId = performanceTracker.start(name);
  logger.info(`Tool invoked: ${name}`, { args }, name);

  try {
    const format = validateOutputFormat(args?.format);
    let text: string;

    switch (name) {
      case 'aws_whoami':
        text = await whoami(context, format);
        break;
      case 'aws_list_service_regions':
        text = listServiceRegions(context, args, format);
        break;
      case 'aws_resolve_resource_scope':
        text = resolveResourceScope(context, args, format);
        break;
      case 'aws_collect_backup_inventory':
        text = await collectBackupInventory(context, args, format);
        break;
      case 'aws_collect_cognito_user_pools':
        text = await collectCognitoUserPools(context, args, format);
        break;
      default:
        throw new ValidationError(`Unknown tool: ${name}`, { tool: name });
    }

    performanceTracker.end(trackingId, true);
    logger.info(`Tool completed successfully: ${name}`, { format }, name);
    return textResult(text);
  } catch (error) {
    performanceTracker.end(trackingId, false);
    const structured = normalizeError(error);
    logger.error(`Tool execution failed: ${name}`, { error: structured.toJSON() }, name);

    const text = args?.format === 'json' ? formatErrorJSON(structured) : formatErrorMarkdown(structured);
    return { content: [{ type: 'text', text }], isError: true };
  }
}

export type CompletionResult = {
  values: string[];
  total: number;
  hasMore: boolean;
};

function completion(candidates: readonly string[], partial: string): CompletionResult {
  const matches = candidates.filter(candidate => candidate.startsWith(partial.toLowerCase()));
  return {
    values: matches.slice(0, MAX_COMPLETIONS),
    total: matches.length,
    hasMore: matches.length > MAX_COMPLETIONS,
  };
}

/**
 * Argument completion for regions, services and output formats.
 */
export function completeArgument(context: Pick<AuditContext, 'catalog' | 'identity'>, name: string, value: string): CompletionResult {
  switch (name) {
    case 'region':
    case 'regions':
      return completion(context.catalog.allRegions(context.identity.partition), value);
    case 'service':
      return completion(context.catalog.services(), value);
    case 'format':
      return completion(['markdown', 'json'], value);
    default:
      return { values: [], total: 0, hasMore: false };
  }
}

/** Regions named by the configured resource scope, for startup logging */
export function configuredScopeRegions(identity: AuditIdentity): string[] {
  return regionsFromResourceArns(identity.resourceArns) ?? [];
}
