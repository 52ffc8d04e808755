export * from './schemas.js';
export * from './errors.js';
export {
  buildInstallation,
  generateInstallationId,
  InMemoryInstallationRepository,
  type InstallationRepository,
  type UpdateOptions
} from './repository.js';
export {
  COMPARE_AND_SET_SCRIPT,
  RELEASE_ACTIVE_SCRIPT,
  RedisInstallationRepository,
  type InstallationRedisClient,
  type RedisInstallationRepositoryOptions
} from './redis-repository.js';
export { TokenService, type RefreshFunction, type TokenServiceOptions } from './token-service.js';
