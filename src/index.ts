#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  CompleteRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { readFileSync } from 'fs';
import { join } from 'path';
import { getDefaultCatalog } from './catalog.js';
import { getDefaultCheckRegistry } from './checks.js';
import { loadAuditConfig } from './config.js';
import { deriveIdentity } from './identity.js';
import { logger } from './logging.js';
import { enterAssumedRole, establish, exitOnFatal, getCallerIdentity } from './session.js';
import { TOOLS, completeArgument, configuredScopeRegions, handleToolCall, type AuditContext } from './tools.js';

function readServerVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
    return packageJson.version;
  }
  return '0.0.0';
}

/**
 * Load configuration, authenticate and discover the audited account.
 */
async function startAudit(): Promise<AuditContext> {
  const config = loadAuditConfig(process.env);
  let identity = config.identity;

  if (identity.assumedRole) {
    identity = await enterAssumedRole(identity);
  }
  const session = await establish(identity, { refreshWindowMs: config.refreshWindowMs });
  const caller = await getCallerIdentity(session);
  identity = deriveIdentity(identity, { auditedAccount: caller.account });

  logger.info('Audit session ready', {
    method: session.method,
    partition: identity.partition,
    regionAllowList: [...identity.regionAllowList],
    scopedRegions: configuredScopeRegions(identity),
  });

  return {
    identity,
    session,
    catalog: getDefaultCatalog(),
    checks: getDefaultCheckRegistry(),
  };
}

function createServer(context: AuditContext): Server {
  const server = new Server(
    {
      name: 'cloud-audit-core',
      version: readServerVersion(),
    },
    {
      capabilities: {
        tools: {},
        completions: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOLS,
  }));

  server.setRequestHandler(CompleteRequestSchema, async (request) => {
    const { argument } = request.params;
    return { completion: completeArgument(context, argument.name, argument.value) };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(context, name, args);
  });

  return server;
}

async function main(): Promise<void> {
  const context = await startAudit();
  const transport = new StdioServerTransport();
  await createServer(context).connect(transport);
  logger.info('Cloud audit MCP server running on stdio', {
    partition: context.identity.partition,
    method: context.session.method,
  });
}

// AuthError and ConfigurationError from startup end up here
main().catch((error) => {
  exitOnFatal(error);
});
