import { readFileSync } from 'fs';
import { join } from 'path';
import { ConfigurationError } from './errors.js';
import { logger } from './logging.js';

export const DEFAULT_CATALOG_PATH = join(__dirname, '..', 'data', 'aws_regions_by_service.json');

type ServiceRegions = ReadonlyMap<string, readonly string[]>;

/**
 * Immutable (service, partition) -> regions lookup, in the order the
 * catalog file lists them.
 */
export class ServiceRegionCatalog {
  private readonly entries: ReadonlyMap<string, ServiceRegions>;

  private constructor(entries: ReadonlyMap<string, ServiceRegions>) {
    this.entries = entries;
  }

  static fromFile(path: string = DEFAULT_CATALOG_PATH): ServiceRegionCatalog {
    let raw: string;
    try {
      raw = readFileSync(path, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(
        `Unable to read region catalog at ${path}: ${error instanceof Error ? error.message : String(error)}`,
        'catalogPath'
      );
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError(
        `Region catalog at ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        'catalogPath'
      );
    }

    const catalog = ServiceRegionCatalog.fromDocument(document);
    logger.debug(`Loaded region catalog with ${catalog.entries.size} services`, { path });
    return catalog;
  }

  /**
   * Expects `{ services: { <service>: { regions: { <partition>: string[] } } } }`.
   */
  static fromDocument(document: unknown): ServiceRegionCatalog {
    if (!isRecord(document) || !isRecord(document.services)) {
      throw new ConfigurationError('Region catalog must contain a "services" object');
    }

    const entries = new Map<string, ServiceRegions>();
    for (const [service, entry] of Object.entries(document.services)) {
      if (!isRecord(entry) || !isRecord(entry.regions)) {
        throw new ConfigurationError(`Region catalog entry "${service}" has no "regions" object`);
      }

      const partitions = new Map<string, readonly string[]>();
      for (const [partition, regions] of Object.entries(entry.regions)) {
        if (!Array.isArray(regions) || !regions.every((region): region is string => typeof region === 'string')) {
          throw new ConfigurationError(`Region catalog entry "${service}.${partition}" must be a list of region names`);
        }
        partitions.set(partition, Object.freeze([...regions]));
      }
      entries.set(service, partitions);
    }

    return new ServiceRegionCatalog(entries);
  }

  /**
   * Regions supporting `service` in `partition`; undefined when the catalog
   * has no entry, which callers treat as zero regions.
   */
  regionsFor(service: string, partition: string): readonly string[] | undefined {
    return this.entries.get(service)?.get(partition);
  }

  services(): string[] {
    return [...this.entries.keys()];
  }

  partitions(): string[] {
    const names = new Set<string>();
    for (const partitions of this.entries.values()) {
      for (const partition of partitions.keys()) names.add(partition);
    }
    return [...names];
  }

  /**
   * Every region any service lists, sorted.
   */
  allRegions(partition?: string): string[] {
    const regions = new Set<string>();
    for (const partitions of this.entries.values()) {
      for (const [name, list] of partitions) {
        if (partition && name !== partition) continue;
        for (const region of list) regions.add(region);
      }
    }
    return [...regions].sort();
  }
}

let defaultCatalog: ServiceRegionCatalog | undefined;

export function getDefaultCatalog(): ServiceRegionCatalog {
  if (!defaultCatalog) {
    defaultCatalog = ServiceRegionCatalog.fromFile();
  }
  return defaultCatalog;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
