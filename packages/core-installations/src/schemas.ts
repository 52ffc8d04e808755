import { z } from 'zod';

export const PLATFORMS = ['github', 'jira', 'slack', 'sentry'] as const;

export const platformSchema = z.enum(PLATFORMS);
export type Platform = z.infer<typeof platformSchema>;

export function isPlatform(value: unknown): value is Platform {
  return platformSchema.safeParse(value).success;
}

const isoDateStringSchema = z.string().datetime();
const stringMapSchema = z.record(z.string());

export const installationSchema = z.object({
  id: z.string().min(1),
  platform: platformSchema,
  organizationId: z.string().min(1),
  organizationName: z.string(),
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).optional(),
  tokenExpiresAt: isoDateStringSchema.optional(),
  scopes: z.array(z.string()),
  webhookSecret: z.string().min(1),
  installedBy: z.string(),
  installedAt: isoDateStringSchema,
  updatedAt: isoDateStringSchema,
  metadata: stringMapSchema,
  isActive: z.boolean(),
  /** Incremented on every write; refresh commits compare against it. */
  version: z.number().int().nonnegative()
});
export type Installation = z.infer<typeof installationSchema>;

export const installationCreateSchema = z.object({
  platform: platformSchema,
  organizationId: z.string().trim().min(1),
  organizationName: z.string().default(''),
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).optional(),
  tokenExpiresAt: isoDateStringSchema.optional(),
  scopes: z.array(z.string()).default([]),
  webhookSecret: z.string().min(1),
  installedBy: z.string().default('unknown'),
  metadata: stringMapSchema.default({})
});
export type InstallationCreate = z.input<typeof installationCreateSchema>;

/**
 * Partial update. `null` clears an optional field; `undefined` leaves it alone.
 */
export const installationUpdateSchema = z
  .object({
    accessToken: z.string().min(1),
    refreshToken: z.string().min(1).nullable(),
    tokenExpiresAt: isoDateStringSchema.nullable(),
    scopes: z.array(z.string()),
    webhookSecret: z.string().min(1),
    metadata: stringMapSchema,
    isActive: z.boolean()
  })
  .partial();
export type InstallationUpdate = z.infer<typeof installationUpdateSchema>;

export type InstallationFilter = {
  platform?: Platform;
  organizationId?: string;
  isActive?: boolean;
};

export const tokenInfoSchema = z.object({
  accessToken: z.string().min(1),
  tokenType: z.string().default('Bearer'),
  expiresAt: isoDateStringSchema.optional(),
  refreshToken: z.string().optional(),
  scopes: z.array(z.string()).default([])
});
export type TokenInfo = z.infer<typeof tokenInfoSchema>;

export function parseTokenInfo(data: unknown): TokenInfo {
  return tokenInfoSchema.parse(data);
}

/**
 * A token is expired once `expiresAt` is at or before `now` (minus an optional
 * safety buffer). Tokens without an expiry never expire.
 */
export function isTokenExpired(token: TokenInfo, now: number = Date.now(), bufferMs = 0): boolean {
  if (!token.expiresAt) {
    return false;
  }
  return Date.parse(token.expiresAt) - bufferMs <= now;
}

export function toTokenInfo(installation: Installation): TokenInfo {
  return {
    accessToken: installation.accessToken,
    tokenType: 'Bearer',
    expiresAt: installation.tokenExpiresAt,
    refreshToken: installation.refreshToken,
    scopes: installation.scopes
  };
}

export function matchesFilter(installation: Installation, filter: InstallationFilter): boolean {
  if (filter.platform && installation.platform !== filter.platform) {
    return false;
  }
  if (filter.organizationId && installation.organizationId !== filter.organizationId) {
    return false;
  }
  if (filter.isActive !== undefined && installation.isActive !== filter.isActive) {
    return false;
  }
  return true;
}

/**
 * Apply a validated patch to an installation, bumping version and updatedAt.
 */
export function applyInstallationUpdate(current: Installation, patch: InstallationUpdate, now: Date): Installation {
  const next: Installation = { ...current, version: current.version + 1, updatedAt: now.toISOString() };

  if (patch.accessToken !== undefined) next.accessToken = patch.accessToken;
  if (patch.scopes !== undefined) next.scopes = patch.scopes;
  if (patch.webhookSecret !== undefined) next.webhookSecret = patch.webhookSecret;
  if (patch.metadata !== undefined) next.metadata = patch.metadata;
  if (patch.isActive !== undefined) next.isActive = patch.isActive;

  if (patch.refreshToken === null) {
    delete next.refreshToken;
  } else if (patch.refreshToken !== undefined) {
    next.refreshToken = patch.refreshToken;
  }

  if (patch.tokenExpiresAt === null) {
    delete next.tokenExpiresAt;
  } else if (patch.tokenExpiresAt !== undefined) {
    next.tokenExpiresAt = patch.tokenExpiresAt;
  }

  return next;
}
