import { CollectionError } from './errors.js';
import { logger, performanceTracker } from './logging.js';
import type { RegionalClient, RegionalClients } from './regional-clients.js';
import { isResourceIncluded } from './scan-filters.js';

export interface CollectorOptions {
  /** Resource ARNs to keep; empty or absent keeps everything */
  auditResources?: readonly string[];
  /** Region for account-level findings; defaults to the first regional client */
  profileRegion?: string;
}

/**
 * Fans a service's listing operations out over its regional clients.
 *
 * Each `fanOut` starts one worker per region and waits for all of them.
 * A worker that throws is recorded in `failures` and contributes nothing,
 * not even the pages it listed before failing; its siblings are unaffected.
 */
export abstract class ResourceCollector<C> {
  readonly failures: CollectionError[] = [];
  readonly auditResources: readonly string[];
  readonly primaryRegion: string | undefined;

  protected constructor(
    readonly service: string,
    readonly regionalClients: RegionalClients<C>,
    options: CollectorOptions = {}
  ) {
    this.auditResources = Object.freeze([...(options.auditResources ?? [])]);
    this.primaryRegion = options.profileRegion ?? regionalClients.keys().next().value;
  }

  /**
   * Runs every listing operation of the service. Resolves once all regions
   * have finished; never rejects because of a listing failure.
   */
  abstract collect(): Promise<this>;

  get regions(): string[] {
    return [...this.regionalClients.keys()];
  }

  protected isIncluded(arn: string | undefined): boolean {
    return isResourceIncluded(arn, this.auditResources);
  }

  /**
   * Results of the workers that finished, in regional-client order. A
   * failed worker's partial results are discarded with it.
   */
  protected async fanOut<R>(
    operation: string,
    worker: (regionalClient: RegionalClient<C>, trackingId: string) => Promise<R[]>
  ): Promise<R[]> {
    logger.info(`${this.service} - ${operation}...`, { regions: this.regionalClients.size }, this.service);
    const trackingId = performanceTracker.start(`${this.service}:${operation}`);
    const failuresBefore = this.failures.length;

    const perRegion = await Promise.all(
      [...this.regionalClients.values()].map(async (regionalClient): Promise<R[]> => {
        try {
          return await worker(regionalClient, trackingId);
        } catch (error) {
          this.recordFailure(operation, regionalClient.region, error);
          return [];
        }
      })
    );

    performanceTracker.end(trackingId, this.failures.length === failuresBefore);
    return perRegion.flat();
  }

  protected recordFailure(operation: string, region: string, error: unknown): void {
    const failure = new CollectionError(this.service, operation, region, error);
    this.failures.push(failure);
    logger.error(failure.message, { operation }, this.service);
  }
}
