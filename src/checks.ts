import { readFileSync } from 'fs';
import { join } from 'path';
import { CheckNotFoundError, ConfigurationError } from './errors.js';

export const DEFAULT_CHECKS_PATH = join(__dirname, '..', 'data', 'checks.json');

/**
 * Catalogue of check names per service. Check logic lives elsewhere; this
 * only answers which checks exist.
 */
export interface CheckRegistry {
  /** @throws CheckNotFoundError when the service has no checks */
  listChecksForService(service: string): readonly string[];
  checksForServices(services: Iterable<string>): Set<string>;
}

export class JsonCheckRegistry implements CheckRegistry {
  private readonly checks: ReadonlyMap<string, readonly string[]>;

  constructor(checks: Record<string, readonly string[]>) {
    this.checks = new Map(
      Object.entries(checks).map(([service, names]) => [service, Object.freeze([...names])])
    );
  }

  static fromFile(path: string = DEFAULT_CHECKS_PATH): JsonCheckRegistry {
    let document: unknown;
    try {
      document = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Unable to load check registry from ${path}: ${error instanceof Error ? error.message : String(error)}`,
        'checksPath'
      );
    }

    if (typeof document !== 'object' || document === null || !('checks' in document)) {
      throw new ConfigurationError(`Check registry at ${path} has no "checks" object`, 'checksPath');
    }

    const checks: Record<string, string[]> = {};
    const raw = document.checks;
    if (typeof raw !== 'object' || raw === null) {
      throw new ConfigurationError(`Check registry at ${path} has no "checks" object`, 'checksPath');
    }
    for (const [service, names] of Object.entries(raw)) {
      if (!Array.isArray(names) || !names.every((name): name is string => typeof name === 'string')) {
        throw new ConfigurationError(`Checks for "${service}" must be a list of names`, 'checksPath');
      }
      checks[service] = names;
    }
    return new JsonCheckRegistry(checks);
  }

  listChecksForService(service: string): readonly string[] {
    const names = this.checks.get(service);
    if (!names) {
      throw new CheckNotFoundError(service);
    }
    return names;
  }

  checksForServices(services: Iterable<string>): Set<string> {
    const result = new Set<string>();
    for (const service of services) {
      for (const name of this.checks.get(service) ?? []) {
        result.add(name);
      }
    }
    return result;
  }

  services(): string[] {
    return [...this.checks.keys()];
  }
}

export function hasChecks(registry: CheckRegistry, service: string): boolean {
  try {
    registry.listChecksForService(service);
    return true;
  } catch (error) {
    if (error instanceof CheckNotFoundError) return false;
    throw error;
  }
}

let defaultRegistry: JsonCheckRegistry | undefined;

export function getDefaultCheckRegistry(): JsonCheckRegistry {
  if (!defaultRegistry) {
    defaultRegistry = JsonCheckRegistry.fromFile();
  }
  return defaultRegistry;
}
