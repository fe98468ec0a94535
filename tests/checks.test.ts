import { describe, it, expect } from '@jest/globals';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { JsonCheckRegistry, getDefaultCheckRegistry, hasChecks } from '../src/checks';
import { CheckNotFoundError, ConfigurationError } from '../src/errors';

function writeRegistry(content: string): string {
  const path = join(mkdtempSync(join(tmpdir(), 'checks-')), 'checks.json');
  writeFileSync(path, content);
  return path;
}

describe('JsonCheckRegistry', () => {
  const registry = new JsonCheckRegistry({
    backup: ['backup_plans_exist', 'backup_vaults_encrypted'],
    kms: ['kms_cmk_rotation_enabled'],
  });

  it('should list checks for a registered service', () => {
    expect(registry.listChecksForService('backup')).toEqual(['backup_plans_exist', 'backup_vaults_encrypted']);
  });

  it('should throw CheckNotFoundError for unknown services', () => {
    expect(() => registry.listChecksForService('sqs')).toThrow(CheckNotFoundError);
    expect(() => registry.listChecksForService('sqs')).toThrow("No checks registered for service 'sqs'");
  });

  it('should union the checks of several services and skip unknown ones', () => {
    expect(registry.checksForServices(['kms', 'sqs', 'backup'])).toEqual(new Set([
      'kms_cmk_rotation_enabled',
      'backup_plans_exist',
      'backup_vaults_encrypted',
    ]));
  });

  it('should answer hasChecks without throwing', () => {
    expect(hasChecks(registry, 'kms')).toBe(true);
    expect(hasChecks(registry, 'sqs')).toBe(false);
  });

  it('should load the bundled registry', () => {
    const bundled = getDefaultCheckRegistry();
    expect(bundled.services()).toContain('cognito');
    expect(bundled.listChecksForService('backup')).toContain('backup_reportplans_exist');
  });

  it('should load a registry from disk', () => {
    const path = writeRegistry(JSON.stringify({ checks: { s3: ['s3_bucket_public_access'] } }));
    expect(JsonCheckRegistry.fromFile(path).listChecksForService('s3')).toEqual(['s3_bucket_public_access']);
  });

  it('should reject malformed registry files', () => {
    expect(() => JsonCheckRegistry.fromFile(writeRegistry('[]'))).toThrow(ConfigurationError);
    expect(() => JsonCheckRegistry.fromFile(writeRegistry('{"checks": {"s3": "s3_bucket_public_access"}}')))
      .toThrow('Checks for "s3" must be a list of names');
    expect(() => JsonCheckRegistry.fromFile('/nonexistent/checks.json')).toThrow(/Unable to load check registry/);
  });
});
