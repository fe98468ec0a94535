import type { AwsCredentialIdentity, AwsCredentialIdentityProvider } from '@aws-sdk/types';
import { RefreshError, describeCause } from './errors.js';
import type { Credential } from './identity.js';
import { logger } from './logging.js';

export const DEFAULT_REFRESH_WINDOW_MS = 5 * 60 * 1000;

/**
 * Source of a credential that is valid at the moment it is returned.
 * SDK clients reach it before signing each request.
 */
export interface CredentialProvider {
  /** Expiry of the credential currently held; undefined for long-term keys */
  readonly expiration?: Date;
  currentValid(): Promise<Credential>;
}

export interface RefreshableCredentialOptions {
  /** Refresh once the credential expires within this many milliseconds */
  refreshWindowMs?: number;
  /** Label for log lines, e.g. "sts-assume-role" */
  method?: string;
  now?: () => number;
}

/**
 * Holds one credential and swaps it for a fresh one when it nears expiry.
 * Only one refresh runs at a time; callers arriving while it is in flight
 * wait for the same result.
 */
export class RefreshableCredentialProvider implements CredentialProvider {
  private current: Credential;
  private inflight?: Promise<Credential>;
  private readonly refreshWindowMs: number;
  private readonly method: string;
  private readonly now: () => number;

  constructor(
    initial: Credential,
    private readonly refresh: () => Promise<Credential>,
    options: RefreshableCredentialOptions = {}
  ) {
    this.current = initial;
    this.refreshWindowMs = options.refreshWindowMs ?? DEFAULT_REFRESH_WINDOW_MS;
    this.method = options.method ?? 'refreshable';
    this.now = options.now ?? Date.now;
  }

  get expiration(): Date | undefined {
    return this.current.expiration;
  }

  needsRefresh(): boolean {
    const { expiration } = this.current;
    if (!expiration) return false;
    return expiration.getTime() - this.now() <= this.refreshWindowMs;
  }

  async currentValid(): Promise<Credential> {
    if (!this.needsRefresh()) {
      return this.current;
    }

    if (!this.inflight) {
      this.inflight = this.runRefresh().finally(() => {
        this.inflight = undefined;
      });
    }
    return this.inflight;
  }

  /**
   * Adapter for the `credentials` option of SDK clients.
   */
  asIdentityProvider(): AwsCredentialIdentityProvider {
    return async (): Promise<AwsCredentialIdentity> => toIdentity(await this.currentValid());
  }

  private async runRefresh(): Promise<Credential> {
    logger.info(`Refreshing ${this.method} credentials...`, {
      expiration: this.current.expiration?.toISOString(),
    });

    let refreshed: Credential;
    try {
      refreshed = await this.refresh();
    } catch (error) {
      throw new RefreshError(`Credential refresh failed: ${describeCause(error)}`, error, { method: this.method });
    }

    const expiresAt = refreshed.expiration?.getTime();
    if (expiresAt !== undefined && expiresAt <= this.now()) {
      throw new RefreshError(
        `Refreshed credentials already expired at ${refreshed.expiration?.toISOString()}`,
        undefined,
        { method: this.method }
      );
    }

    const previousExpiry = this.current.expiration;
    if (expiresAt !== undefined && previousExpiry !== undefined && expiresAt <= previousExpiry.getTime()) {
      throw new RefreshError(
        `Refreshed credentials expire at ${refreshed.expiration?.toISOString()}, not after the replaced ones (${previousExpiry.toISOString()})`,
        undefined,
        { method: this.method }
      );
    }

    this.current = refreshed;
    logger.info('Refreshed credentials', { expiration: refreshed.expiration?.toISOString() });
    return refreshed;
  }
}

export function toIdentity(credential: Credential): AwsCredentialIdentity {
  return {
    accessKeyId: credential.accessKeyId,
    secretAccessKey: credential.secretAccessKey,
    sessionToken: credential.sessionToken,
    expiration: credential.expiration,
  };
}

export function fromIdentity(identity: AwsCredentialIdentity): Credential {
  return Object.freeze({
    accessKeyId: identity.accessKeyId,
    secretAccessKey: identity.secretAccessKey,
    sessionToken: identity.sessionToken,
    expiration: identity.expiration,
  });
}
