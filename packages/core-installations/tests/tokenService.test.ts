import { describe, expect, it, vi } from 'vitest';

import {
  InMemoryInstallationRepository,
  InstallationNotFoundError,
  DuplicateInstallationError,
  PermanentRefreshError,
  TokenRefreshError,
  TokenService,
  isTokenExpired,
  type Installation,
  type InstallationCreate,
  type RefreshFunction,
  type TokenInfo
} from '../src/index.js';

const NOW = Date.parse('2026-03-01T12:00:00.000Z');
const PAST = '2026-03-01T11:00:00.000Z';
const FUTURE = '2026-03-01T13:00:00.000Z';
const LATER = '2026-03-01T14:00:00.000Z';

const acme: InstallationCreate = {
  platform: 'github',
  organizationId: 'acme',
  accessToken: 'test-access-old',
  refreshToken: 'test-refresh-old',
  tokenExpiresAt: PAST,
  scopes: ['repo'],
  webhookSecret: 'test-secret',
  installedBy: 'octocat'
};

const freshToken: TokenInfo = {
  accessToken: 'test-access-new',
  tokenType: 'Bearer',
  refreshToken: 'test-refresh-new',
  expiresAt: LATER,
  scopes: []
};

function setup(refresher?: RefreshFunction) {
  const repository = new InMemoryInstallationRepository();
  const service = new TokenService({
    repository,
    refreshers: refresher ? { github: refresher } : {},
    retry: { initialDelayMs: 1, jitter: false },
    now: () => NOW
  });
  return { repository, service };
}

describe('isTokenExpired', () => {
  it('treats expiry at or before now as expired', () => {
    expect(isTokenExpired({ accessToken: 'a', tokenType: 'Bearer', scopes: [], expiresAt: PAST }, NOW)).toBe(true);
    expect(
      isTokenExpired({ accessToken: 'a', tokenType: 'Bearer', scopes: [], expiresAt: new Date(NOW).toISOString() }, NOW)
    ).toBe(true);
    expect(isTokenExpired({ accessToken: 'a', tokenType: 'Bearer', scopes: [], expiresAt: FUTURE }, NOW)).toBe(false);
    expect(isTokenExpired({ accessToken: 'a', tokenType: 'Bearer', scopes: [] }, NOW)).toBe(false);
  });
});

describe('TokenService', () => {
  it('returns the stored token when it has not expired', async () => {
    const refresher = vi.fn<RefreshFunction>();
    const { service } = setup(refresher);
    await service.createInstallation({ ...acme, tokenExpiresAt: FUTURE });

    const token = await service.getToken('github', 'acme');

    expect(token).toMatchObject({ accessToken: 'test-access-old', expiresAt: FUTURE, scopes: ['repo'] });
    expect(refresher).not.toHaveBeenCalled();
  });

  it('refreshes an expired token once and persists it before returning', async () => {
    const refresher = vi.fn<RefreshFunction>().mockResolvedValue(freshToken);
    const { service, repository } = setup(refresher);
    const installation = await service.createInstallation(acme);

    const token = await service.getToken('github', 'acme');

    expect(refresher).toHaveBeenCalledTimes(1);
    expect(token.accessToken).toBe('test-access-new');
    expect(token.scopes).toEqual(['repo']);
    const stored = await repository.getById(installation.id);
    expect(stored).toMatchObject({
      accessToken: 'test-access-new',
      refreshToken: 'test-refresh-new',
      tokenExpiresAt: LATER,
      version: 1
    });

    await service.getToken('github', 'acme');
    expect(refresher).toHaveBeenCalledTimes(1);
  });

  it('coalesces concurrent refreshes into one upstream call', async () => {
    let release: (token: TokenInfo) => void = () => {};
    const refresher = vi.fn<RefreshFunction>().mockImplementation(
      () =>
        new Promise<TokenInfo>((resolve) => {
          release = resolve;
        })
    );
    const { service } = setup(refresher);
    await service.createInstallation(acme);

    const callers = Promise.all(Array.from({ length: 5 }, () => service.getToken('github', 'acme')));
    await vi.waitFor(() => expect(refresher).toHaveBeenCalledTimes(1));
    release(freshToken);
    const tokens = await callers;

    expect(refresher).toHaveBeenCalledTimes(1);
    expect(new Set(tokens.map((token) => token.accessToken))).toEqual(new Set(['test-access-new']));
  });

  it('lets the first commit win when two services refresh the same row', async () => {
    const repository = new InMemoryInstallationRepository();
    let releaseSlow: (token: TokenInfo) => void = () => {};
    const slow = vi.fn<RefreshFunction>().mockImplementation(
      () =>
        new Promise<TokenInfo>((resolve) => {
          releaseSlow = resolve;
        })
    );
    const fast = vi.fn<RefreshFunction>().mockResolvedValue(freshToken);
    const serviceA = new TokenService({ repository, refreshers: { github: slow }, now: () => NOW });
    const serviceB = new TokenService({ repository, refreshers: { github: fast }, now: () => NOW });
    const installation = await serviceA.createInstallation(acme);

    const pendingA = serviceA.getToken('github', 'acme');
    await vi.waitFor(() => expect(slow).toHaveBeenCalledTimes(1));
    await expect(serviceB.getToken('github', 'acme')).resolves.toMatchObject({ accessToken: 'test-access-new' });

    releaseSlow({ ...freshToken, accessToken: 'test-access-loser' });
    await expect(pendingA).resolves.toMatchObject({ accessToken: 'test-access-new' });
    expect((await repository.getById(installation.id))?.version).toBe(1);
  });

  it('retries a transient refresh failure once', async () => {
    const refresher = vi.fn<RefreshFunction>().mockRejectedValueOnce(new Error('503')).mockResolvedValue(freshToken);
    const { service } = setup(refresher);
    await service.createInstallation(acme);

    await expect(service.getToken('github', 'acme')).resolves.toMatchObject({ accessToken: 'test-access-new' });
    expect(refresher).toHaveBeenCalledTimes(2);
  });

  it('surfaces a retryable TokenRefreshError after the retry also fails', async () => {
    const refresher = vi.fn<RefreshFunction>().mockRejectedValue(new Error('503'));
    const { service, repository } = setup(refresher);
    const installation = await service.createInstallation(acme);

    const error = await service.getToken('github', 'acme').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TokenRefreshError);
    expect(error).toMatchObject({ retryable: true });
    expect(refresher).toHaveBeenCalledTimes(2);
    expect((await repository.getById(installation.id))?.isActive).toBe(true);
  });

  it('deactivates the installation when the grant is revoked', async () => {
    const refresher = vi.fn<RefreshFunction>().mockRejectedValue(new PermanentRefreshError('invalid_grant'));
    const { service } = setup(refresher);
    await service.createInstallation(acme);

    const error = await service.getToken('github', 'acme').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TokenRefreshError);
    expect(error).toMatchObject({ retryable: false });
    expect(refresher).toHaveBeenCalledTimes(1);
    await expect(service.getToken('github', 'acme')).rejects.toBeInstanceOf(InstallationNotFoundError);
  });

  it('fails without a refresh function for the platform', async () => {
    const { service } = setup();
    await service.createInstallation(acme);

    await expect(service.getToken('github', 'acme')).rejects.toMatchObject({
      name: 'TokenRefreshError',
      retryable: false
    });
  });

  it('raises InstallationNotFoundError for unknown and deactivated tenants', async () => {
    const { service } = setup();
    await expect(service.getToken('github', 'nobody')).rejects.toBeInstanceOf(InstallationNotFoundError);
    await expect(service.getWebhookSecret('github', 'nobody')).rejects.toBeInstanceOf(InstallationNotFoundError);

    const installation: Installation = await service.createInstallation({ ...acme, tokenExpiresAt: FUTURE });
    expect(await service.getWebhookSecret('github', 'acme')).toBe('test-secret');

    const deactivated = await service.deactivateInstallation(installation.id);
    expect(deactivated.isActive).toBe(false);
    await expect(service.getToken('github', 'acme')).rejects.toBeInstanceOf(InstallationNotFoundError);
    await expect(service.getWebhookSecret('github', 'acme')).rejects.toBeInstanceOf(InstallationNotFoundError);
  });

  it('rejects duplicate installations and unknown deactivations', async () => {
    const { service } = setup();
    await service.createInstallation(acme);

    await expect(service.createInstallation(acme)).rejects.toBeInstanceOf(DuplicateInstallationError);
    await expect(service.deactivateInstallation('inst-missing')).rejects.toBeInstanceOf(InstallationNotFoundError);
  });
});
