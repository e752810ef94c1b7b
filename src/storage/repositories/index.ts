/**
 * Repositories - Barrel Export
 */

export type { Repository, Pagination } from './base';
export {
  UserRepository,
  SqliteUserRepository,
  PostgresUserRepository,
  USER_CONFLICT_MESSAGE,
  isUniqueViolation,
} from './user.repository';
