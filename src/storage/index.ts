/**
 * Storage Module - Barrel Export
 *
 * Usage:
 *   import { PersistenceGateway, withSession } from '../storage';
 */

export {
  createDatabase,
  createPostgresDatabase,
  openConnection,
  resolveDatabaseTarget,
} from './db';
export type {
  AppDatabase,
  Connection,
  DatabaseDialect,
  DatabaseOptions,
  DatabaseTarget,
  PostgresDatabase,
} from './db';

export { PersistenceGateway, DatabaseSession, withSession } from './gateway';

export { users } from './schema';
export type { UserRow, NewUserRow } from './schema';
export { pgUsers } from './schema.pg';
export type { PgUserRow } from './schema.pg';

export {
  UserRepository,
  SqliteUserRepository,
  PostgresUserRepository,
  USER_CONFLICT_MESSAGE,
  isUniqueViolation,
} from './repositories';
export type { Repository, Pagination } from './repositories';
