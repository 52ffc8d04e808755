import { randomBytes } from 'node:crypto';

import { safeParseOrThrow } from '@taskhook/core-validation';

import { DuplicateInstallationError, InstallationNotFoundError, VersionConflictError } from './errors.js';
import {
  applyInstallationUpdate,
  installationCreateSchema,
  installationUpdateSchema,
  matchesFilter,
  type Installation,
  type InstallationCreate,
  type InstallationFilter,
  type InstallationUpdate,
  type Platform
} from './schemas.js';

export type UpdateOptions = {
  /** Commit only if the stored row is still at this version. */
  expectedVersion?: number;
};

/**
 * Storage port for installations. Implementations keep at most one active row
 * per (platform, organizationId) and never hard-delete.
 */
export interface InstallationRepository {
  create: (data: InstallationCreate) => Promise<Installation>;
  getById: (installationId: string) => Promise<Installation | undefined>;
  getActive: (platform: Platform, organizationId: string) => Promise<Installation | undefined>;
  update: (installationId: string, patch: InstallationUpdate, options?: UpdateOptions) => Promise<Installation>;
  list: (filter?: InstallationFilter) => Promise<Installation[]>;
}

export function generateInstallationId(): string {
  return `inst-${randomBytes(6).toString('hex')}`;
}

export function buildInstallation(data: InstallationCreate, now: Date): Installation {
  const parsed = safeParseOrThrow(installationCreateSchema, data, 'installationCreate');
  const timestamp = now.toISOString();
  return {
    ...parsed,
    id: generateInstallationId(),
    installedAt: timestamp,
    updatedAt: timestamp,
    isActive: true,
    version: 0
  };
}

function activeKey(platform: Platform, organizationId: string): string {
  return `${platform}:${organizationId}`;
}

/**
 * In-memory repository for development and tests.
 */
export class InMemoryInstallationRepository implements InstallationRepository {
  private readonly rows = new Map<string, Installation>();
  private readonly activeIndex = new Map<string, string>();
  private readonly now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async create(data: InstallationCreate): Promise<Installation> {
    const installation = buildInstallation(data, this.now());
    const key = activeKey(installation.platform, installation.organizationId);
    if (this.activeIndex.has(key)) {
      throw new DuplicateInstallationError(installation.platform, installation.organizationId);
    }

    this.rows.set(installation.id, installation);
    this.activeIndex.set(key, installation.id);
    return installation;
  }

  async getById(installationId: string): Promise<Installation | undefined> {
    return this.rows.get(installationId);
  }

  async getActive(platform: Platform, organizationId: string): Promise<Installation | undefined> {
    const installationId = this.activeIndex.get(activeKey(platform, organizationId));
    return installationId ? this.rows.get(installationId) : undefined;
  }

  async update(installationId: string, patch: InstallationUpdate, options: UpdateOptions = {}): Promise<Installation> {
    const validPatch = safeParseOrThrow(installationUpdateSchema, patch, 'installationUpdate');
    const current = this.rows.get(installationId);
    if (!current) {
      throw new InstallationNotFoundError({ installationId });
    }
    if (options.expectedVersion !== undefined && current.version !== options.expectedVersion) {
      throw new VersionConflictError(installationId, options.expectedVersion);
    }

    const next = applyInstallationUpdate(current, validPatch, this.now());
    const key = activeKey(current.platform, current.organizationId);

    if (!current.isActive && next.isActive) {
      const holder = this.activeIndex.get(key);
      if (holder && holder !== installationId) {
        throw new DuplicateInstallationError(current.platform, current.organizationId);
      }
      this.activeIndex.set(key, installationId);
    } else if (current.isActive && !next.isActive) {
      this.activeIndex.delete(key);
    }

    this.rows.set(installationId, next);
    return next;
  }

  async list(filter: InstallationFilter = {}): Promise<Installation[]> {
    return [...this.rows.values()].filter((installation) => matchesFilter(installation, filter));
  }

  /** Drop all rows (for tests). */
  clear(): void {
    this.rows.clear();
    this.activeIndex.clear();
  }
}
