/**
 * Redis-backed installation repository, shared by every gateway and worker
 * process.
 *
 * Layout (all keys under `keyPrefix`):
 * - `installation:{id}`              JSON row
 * - `active:{platform}:{orgId}`      id of the active row for the tenant
 * - `installations`                  set of all ids
 *
 * Uniqueness of active rows rides on `SET NX` of the active key; row writes go
 * through a compare-and-set script on the stored `version`.
 */

import { safeParseOrThrow } from '@taskhook/core-validation';

import { DuplicateInstallationError, InstallationNotFoundError, VersionConflictError } from './errors.js';
import { buildInstallation, type InstallationRepository, type UpdateOptions } from './repository.js';
import {
  applyInstallationUpdate,
  installationSchema,
  installationUpdateSchema,
  matchesFilter,
  type Installation,
  type InstallationCreate,
  type InstallationFilter,
  type InstallationUpdate,
  type Platform
} from './schemas.js';

/**
 * Minimal Redis client surface. The gateway adapts ioredis to it.
 */
export interface InstallationRedisClient {
  get(key: string): Promise<string | null>;
  /** With mode 'NX': returns 'OK' when set, null when the key already exists. */
  set(key: string, value: string, mode?: 'NX'): Promise<string | null>;
  del(key: string): Promise<number>;
  sadd(key: string, member: string): Promise<number>;
  smembers(key: string): Promise<string[]>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
}

export interface RedisInstallationRepositoryOptions {
  client: InstallationRedisClient;
  /** @default 'taskhook:' */
  keyPrefix?: string;
  now?: () => Date;
  /** Read-modify-write attempts for updates without an expected version. @default 3 */
  maxWriteAttempts?: number;
}

/** KEYS[1]=row key, ARGV[1]=expected version, ARGV[2]=new JSON. Returns 1, 0 (conflict) or -1 (missing). */
export const COMPARE_AND_SET_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if not current then return -1 end
local decoded = cjson.decode(current)
if tonumber(decoded['version']) ~= tonumber(ARGV[1]) then return 0 end
redis.call('SET', KEYS[1], ARGV[2])
return 1
`;

/** KEYS[1]=active key, ARGV[1]=installation id. */
export const RELEASE_ACTIVE_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then return redis.call('DEL', KEYS[1]) end
return 0
`;

export class RedisInstallationRepository implements InstallationRepository {
  private readonly client: InstallationRedisClient;
  private readonly keyPrefix: string;
  private readonly now: () => Date;
  private readonly maxWriteAttempts: number;

  constructor(options: RedisInstallationRepositoryOptions) {
    this.client = options.client;
    this.keyPrefix = options.keyPrefix ?? 'taskhook:';
    this.now = options.now ?? (() => new Date());
    this.maxWriteAttempts = options.maxWriteAttempts ?? 3;
  }

  private rowKey(installationId: string): string {
    return `${this.keyPrefix}installation:${installationId}`;
  }

  private activeKey(platform: Platform, organizationId: string): string {
    return `${this.keyPrefix}active:${platform}:${organizationId}`;
  }

  private indexKey(): string {
    return `${this.keyPrefix}installations`;
  }

  async create(data: InstallationCreate): Promise<Installation> {
    const installation = buildInstallation(data, this.now());
    const activeKey = this.activeKey(installation.platform, installation.organizationId);

    const claimed = await this.client.set(activeKey, installation.id, 'NX');
    if (claimed === null) {
      throw new DuplicateInstallationError(installation.platform, installation.organizationId);
    }

    await this.client.set(this.rowKey(installation.id), JSON.stringify(installation));
    await this.client.sadd(this.indexKey(), installation.id);
    return installation;
  }

  async getById(installationId: string): Promise<Installation | undefined> {
    const raw = await this.client.get(this.rowKey(installationId));
    if (raw === null) {
      return undefined;
    }
    const decoded: unknown = JSON.parse(raw);
    return safeParseOrThrow(installationSchema, decoded, `installation(${installationId})`);
  }

  async getActive(platform: Platform, organizationId: string): Promise<Installation | undefined> {
    const installationId = await this.client.get(this.activeKey(platform, organizationId));
    if (installationId === null) {
      return undefined;
    }
    const installation = await this.getById(installationId);
    return installation?.isActive ? installation : undefined;
  }

  async update(installationId: string, patch: InstallationUpdate, options: UpdateOptions = {}): Promise<Installation> {
    const validPatch = safeParseOrThrow(installationUpdateSchema, patch, 'installationUpdate');
    const attempts = options.expectedVersion === undefined ? this.maxWriteAttempts : 1;

    for (let attempt = 1; ; attempt++) {
      const current = await this.getById(installationId);
      if (!current) {
        throw new InstallationNotFoundError({ installationId });
      }
      const expectedVersion = options.expectedVersion ?? current.version;
      if (current.version !== expectedVersion) {
        throw new VersionConflictError(installationId, expectedVersion);
      }

      const next = applyInstallationUpdate(current, validPatch, this.now());
      const activeKey = this.activeKey(current.platform, current.organizationId);
      const activating = !current.isActive && next.isActive;

      if (activating) {
        await this.claimActive(activeKey, current);
      }

      const outcome = await this.client.eval(
        COMPARE_AND_SET_SCRIPT,
        1,
        this.rowKey(installationId),
        String(expectedVersion),
        JSON.stringify(next)
      );

      if (outcome === 1) {
        if (current.isActive && !next.isActive) {
          await this.client.eval(RELEASE_ACTIVE_SCRIPT, 1, activeKey, installationId);
        }
        return next;
      }

      if (activating) {
        await this.client.eval(RELEASE_ACTIVE_SCRIPT, 1, activeKey, installationId);
      }
      if (outcome === -1) {
        throw new InstallationNotFoundError({ installationId });
      }
      if (attempt >= attempts) {
        throw new VersionConflictError(installationId, expectedVersion);
      }
    }
  }

  async list(filter: InstallationFilter = {}): Promise<Installation[]> {
    const ids = await this.client.smembers(this.indexKey());
    const rows = await Promise.all(ids.map((installationId) => this.getById(installationId)));
    return rows
      .filter((row): row is Installation => row !== undefined)
      .filter((row) => matchesFilter(row, filter));
  }

  private async claimActive(activeKey: string, installation: Installation): Promise<void> {
    const claimed = await this.client.set(activeKey, installation.id, 'NX');
    if (claimed !== null) {
      return;
    }
    const holder = await this.client.get(activeKey);
    if (holder !== installation.id) {
      throw new DuplicateInstallationError(installation.platform, installation.organizationId);
    }
  }
}
