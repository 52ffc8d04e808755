import type { Platform } from './schemas.js';

export type InstallationLookup =
  | { platform: Platform; organizationId: string }
  | { installationId: string };

function describeLookup(lookup: InstallationLookup): string {
  return 'installationId' in lookup
    ? `installation ${lookup.installationId}`
    : `${lookup.platform} organization ${lookup.organizationId}`;
}

/**
 * No active installation for the tenant: never provisioned, or deactivated.
 * Webhooks for such tenants are answered with 401.
 */
export class InstallationNotFoundError extends Error {
  readonly code = 'INSTALLATION_NOT_FOUND';
  readonly status = 401;
  readonly retryable = false;
  readonly lookup: InstallationLookup;

  constructor(lookup: InstallationLookup) {
    super(`No active installation for ${describeLookup(lookup)}`);
    this.name = 'InstallationNotFoundError';
    this.lookup = lookup;
  }
}

export class DuplicateInstallationError extends Error {
  readonly code = 'DUPLICATE_INSTALLATION';
  readonly status = 409;
  readonly retryable = false;
  readonly platform: Platform;
  readonly organizationId: string;

  constructor(platform: Platform, organizationId: string) {
    super(`An active ${platform} installation already exists for organization ${organizationId}`);
    this.name = 'DuplicateInstallationError';
    this.platform = platform;
    this.organizationId = organizationId;
  }
}

/**
 * The stored row changed between read and write.
 */
export class VersionConflictError extends Error {
  readonly code = 'VERSION_CONFLICT';
  readonly retryable = false;
  readonly installationId: string;
  readonly expectedVersion: number;

  constructor(installationId: string, expectedVersion: number) {
    super(`Installation ${installationId} is no longer at version ${expectedVersion}`);
    this.name = 'VersionConflictError';
    this.installationId = installationId;
    this.expectedVersion = expectedVersion;
  }
}

/**
 * Thrown by a platform refresh function when the provider rejects the
 * credentials outright (revoked grant, invalid refresh token). The installation
 * is deactivated and needs re-authorization.
 */
export class PermanentRefreshError extends Error {
  readonly code = 'PERMANENT_REFRESH_FAILURE';
  readonly retryable = false;

  constructor(message: string) {
    super(message);
    this.name = 'PermanentRefreshError';
  }
}

export class TokenRefreshError extends Error {
  readonly code = 'TOKEN_REFRESH_FAILED';
  readonly status = 503;
  readonly installationId: string;
  readonly retryable: boolean;

  constructor(installationId: string, message: string, options: { retryable: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'TokenRefreshError';
    this.installationId = installationId;
    this.retryable = options.retryable;
  }
}
