import { createSilentLogger, describeError, type Logger } from '@taskhook/core-logging';
import { withRetry, type BackoffConfig } from '@taskhook/core-retry';

import {
  InstallationNotFoundError,
  PermanentRefreshError,
  TokenRefreshError,
  VersionConflictError
} from './errors.js';
import type { InstallationRepository } from './repository.js';
import {
  isTokenExpired,
  parseTokenInfo,
  toTokenInfo,
  type Installation,
  type InstallationCreate,
  type InstallationFilter,
  type Platform,
  type TokenInfo
} from './schemas.js';

/**
 * Exchanges an installation's refresh credentials for a new token. Injected
 * per platform; throw PermanentRefreshError when the grant is revoked.
 */
export type RefreshFunction = (installation: Installation) => Promise<TokenInfo>;

export interface TokenServiceOptions {
  repository: InstallationRepository;
  refreshers?: Partial<Record<Platform, RefreshFunction>>;
  logger?: Logger;
  /** Backoff for transient refresh failures. One retry by default. */
  retry?: Partial<BackoffConfig>;
  now?: () => number;
}

const DEFAULT_REFRESH_RETRY: Partial<BackoffConfig> = {
  maxRetries: 1,
  initialDelayMs: 250,
  jitter: true
};

/**
 * Hands out valid tokens and webhook secrets per tenant.
 *
 * Refreshes are coalesced per installation inside the process (one in-flight
 * promise per id) and committed with an optimistic version check across
 * processes: a refresher that finds the row already moved on returns the
 * stored token instead of calling the provider again.
 */
export class TokenService {
  private readonly repository: InstallationRepository;
  private readonly refreshers: Partial<Record<Platform, RefreshFunction>>;
  private readonly logger: Logger;
  private readonly retry: Partial<BackoffConfig>;
  private readonly now: () => number;
  private readonly inFlightRefreshes = new Map<string, Promise<TokenInfo>>();

  constructor(options: TokenServiceOptions) {
    this.repository = options.repository;
    this.refreshers = options.refreshers ?? {};
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'token-service' });
    this.retry = { ...DEFAULT_REFRESH_RETRY, ...options.retry };
    this.now = options.now ?? Date.now;
  }

  async createInstallation(data: InstallationCreate): Promise<Installation> {
    this.logger.info('Creating installation', { platform: data.platform, organizationId: data.organizationId });
    const installation = await this.repository.create(data);
    this.logger.info('Installation created', {
      installationId: installation.id,
      platform: installation.platform,
      organizationId: installation.organizationId
    });
    return installation;
  }

  async getToken(platform: Platform, organizationId: string): Promise<TokenInfo> {
    const installation = await this.requireActive(platform, organizationId);
    const token = toTokenInfo(installation);

    if (!isTokenExpired(token, this.now())) {
      return token;
    }

    this.logger.info('Token expired, refreshing', { installationId: installation.id, platform });
    return this.refreshCoalesced(installation);
  }

  async getWebhookSecret(platform: Platform, organizationId: string): Promise<string> {
    const installation = await this.requireActive(platform, organizationId);
    return installation.webhookSecret;
  }

  async getInstallationById(installationId: string): Promise<Installation | undefined> {
    return this.repository.getById(installationId);
  }

  async getActiveInstallation(platform: Platform, organizationId: string): Promise<Installation> {
    return this.requireActive(platform, organizationId);
  }

  async listInstallations(filter: InstallationFilter = {}): Promise<Installation[]> {
    return this.repository.list(filter);
  }

  async deactivateInstallation(installationId: string): Promise<Installation> {
    this.logger.info('Deactivating installation', { installationId });
    return this.repository.update(installationId, { isActive: false });
  }

  private async requireActive(platform: Platform, organizationId: string): Promise<Installation> {
    const installation = await this.repository.getActive(platform, organizationId);
    if (!installation || !installation.isActive) {
      throw new InstallationNotFoundError({ platform, organizationId });
    }
    return installation;
  }

  private refreshCoalesced(installation: Installation): Promise<TokenInfo> {
    const pending = this.inFlightRefreshes.get(installation.id);
    if (pending) {
      return pending;
    }

    const refresh = this.refresh(installation).finally(() => {
      this.inFlightRefreshes.delete(installation.id);
    });
    this.inFlightRefreshes.set(installation.id, refresh);
    return refresh;
  }

  private async refresh(observed: Installation): Promise<TokenInfo> {
    // Another process may have refreshed since the row was read.
    const latest = await this.repository.getById(observed.id);
    if (!latest || !latest.isActive) {
      throw new InstallationNotFoundError({ platform: observed.platform, organizationId: observed.organizationId });
    }
    if (latest.version !== observed.version && !isTokenExpired(toTokenInfo(latest), this.now())) {
      return toTokenInfo(latest);
    }

    const refresher = this.refreshers[latest.platform];
    if (!refresher) {
      throw new TokenRefreshError(latest.id, `No refresh function configured for ${latest.platform}`, {
        retryable: false
      });
    }

    const fresh = await this.callRefresher(refresher, latest);

    try {
      await this.repository.update(
        latest.id,
        {
          accessToken: fresh.accessToken,
          refreshToken: fresh.refreshToken ?? latest.refreshToken ?? null,
          tokenExpiresAt: fresh.expiresAt ?? null,
          scopes: fresh.scopes.length > 0 ? fresh.scopes : latest.scopes
        },
        { expectedVersion: latest.version }
      );
    } catch (error) {
      if (!(error instanceof VersionConflictError)) {
        throw error;
      }
      const winner = await this.repository.getById(latest.id);
      if (!winner || !winner.isActive) {
        throw new InstallationNotFoundError({ platform: latest.platform, organizationId: latest.organizationId });
      }
      this.logger.info('Concurrent refresh already committed', { installationId: latest.id });
      return toTokenInfo(winner);
    }

    this.logger.info('Token refreshed', { installationId: latest.id, platform: latest.platform });
    return {
      ...fresh,
      refreshToken: fresh.refreshToken ?? latest.refreshToken,
      scopes: fresh.scopes.length > 0 ? fresh.scopes : latest.scopes
    };
  }

  private async callRefresher(refresher: RefreshFunction, installation: Installation): Promise<TokenInfo> {
    try {
      const raw = await withRetry(() => refresher(installation), {
        ...this.retry,
        shouldRetryError: (error) => !(error instanceof PermanentRefreshError),
        onRetry: (ctx) =>
          this.logger.warn('Token refresh failed, retrying', {
            installationId: installation.id,
            attempt: ctx.attempt,
            ...describeError(ctx.lastError)
          })
      });
      return parseTokenInfo(raw);
    } catch (error) {
      if (error instanceof PermanentRefreshError) {
        this.logger.error('Refresh credentials rejected, deactivating installation', {
          installationId: installation.id,
          platform: installation.platform,
          error: error.message
        });
        await this.repository.update(installation.id, { isActive: false });
        throw new TokenRefreshError(installation.id, `Refresh rejected for installation ${installation.id}`, {
          retryable: false,
          cause: error
        });
      }

      this.logger.error('Token refresh failed', { installationId: installation.id, ...describeError(error) });
      throw new TokenRefreshError(installation.id, `Token unavailable for installation ${installation.id}`, {
        retryable: true,
        cause: error
      });
    }
  }
}
