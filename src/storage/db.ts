/**
 * Database Connection Factory
 *
 * Opens SQLite databases through better-sqlite3 and PostgreSQL pools through
 * node-postgres, each wrapped with Drizzle ORM. Also owns the translation
 * from DATABASE_URL to a connection target.
 *
 * Usage:
 *   import { openConnection, resolveDatabaseTarget } from './db';
 *
 *   const connection = openConnection(resolveDatabaseTarget('sqlite:///./app.db'));
 *
 *   // Testing with an in-memory database
 *   const { db, sqlite } = createDatabase(':memory:');
 */

import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { Logger as DrizzleLogger } from 'drizzle-orm/logger';
import { drizzle as drizzlePostgres } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { ConfigurationError } from '../core/errors';
import type { Logger } from '../logger';
import * as schema from './schema';
import * as pgSchema from './schema.pg';

export interface DatabaseOptions {
  /** Log every SQL statement (with params) at debug level */
  echo?: boolean;
  /** Logger used when `echo` is on, and for pool errors */
  logger?: Logger;
}

/**
 * Adapts a pino logger to Drizzle's query logger interface.
 */
class QueryLogger implements DrizzleLogger {
  constructor(private readonly logger: Logger) {}

  logQuery(query: string, params: unknown[]): void {
    this.logger.debug({ query, params }, 'SQL query');
  }
}

function queryLoggerFor(options: DatabaseOptions): DrizzleLogger | false {
  return options.echo && options.logger ? new QueryLogger(options.logger) : false;
}

/**
 * Opens (or creates) the SQLite database at `dbPath`.
 *
 * @param dbPath - Filesystem path, or ':memory:' for an in-memory database
 * @returns The Drizzle instance and the raw connection (needed for DDL and close)
 */
export function createDatabase(dbPath: string, options: DatabaseOptions = {}) {
  const sqlite = new Database(dbPath);

  sqlite.pragma('foreign_keys = ON');

  const db = drizzle(sqlite, { schema, logger: queryLoggerFor(options) });

  return { db, sqlite };
}

/**
 * Type alias for the Drizzle database instance over SQLite.
 */
export type AppDatabase = ReturnType<typeof createDatabase>['db'];

/**
 * Creates a PostgreSQL pool for `connectionString`. No connection is made
 * until the first query.
 */
export function createPostgresDatabase(connectionString: string, options: DatabaseOptions = {}) {
  const pool = new pg.Pool({ connectionString });

  // Idle clients that lose their server report here
  pool.on('error', (err) => {
    options.logger?.error({ err }, 'PostgreSQL pool error');
  });

  const db = drizzlePostgres(pool, { schema: pgSchema, logger: queryLoggerFor(options) });

  return { db, pool };
}

/**
 * Type alias for the Drizzle database instance over PostgreSQL.
 */
export type PostgresDatabase = ReturnType<typeof createPostgresDatabase>['db'];

export type DatabaseDialect = 'sqlite' | 'postgres';

/** Where a DATABASE_URL points, per dialect. */
export type DatabaseTarget =
  | { dialect: 'sqlite'; path: string }
  | { dialect: 'postgres'; connectionString: string };

/** An open database of either dialect. */
export type Connection =
  | { dialect: 'sqlite'; db: AppDatabase; sqlite: Database.Database }
  | { dialect: 'postgres'; db: PostgresDatabase; pool: pg.Pool };

const POSTGRES_SCHEME = /^postgres(?:ql)?(?:\+[a-z0-9]+)?:\/\//i;

/**
 * Turns a DATABASE_URL into a connection target.
 *
 * Accepted forms:
 * - `sqlite:///relative/path.db`, `sqlite:////absolute/path.db`
 * - `sqlite:///:memory:`, `sqlite://` (in-memory)
 * - `file:path.db`
 * - a bare filesystem path
 * - `postgres://…`, `postgresql://…`, and a driver suffix such as
 *   `postgresql+psycopg2://…`, which is dropped
 *
 * @throws {ConfigurationError} for URLs naming any other scheme
 *
 * @example
 * ```typescript
 * resolveDatabaseTarget('sqlite:///./data/app.db');
 * // { dialect: 'sqlite', path: './data/app.db' }
 * resolveDatabaseTarget('postgresql+asyncpg://app@db/app');
 * // { dialect: 'postgres', connectionString: 'postgresql://app@db/app' }
 * ```
 */
export function resolveDatabaseTarget(url: string): DatabaseTarget {
  if (POSTGRES_SCHEME.test(url)) {
    return {
      dialect: 'postgres',
      connectionString: url.replace(POSTGRES_SCHEME, 'postgresql://'),
    };
  }

  if (url.startsWith('sqlite:///')) {
    return { dialect: 'sqlite', path: url.slice('sqlite:///'.length) || ':memory:' };
  }

  if (url === 'sqlite://' || url === 'sqlite:') {
    return { dialect: 'sqlite', path: ':memory:' };
  }

  if (url.startsWith('file:')) {
    return { dialect: 'sqlite', path: url.slice('file:'.length) || ':memory:' };
  }

  const scheme = /^([a-z][a-z0-9+.-]*):\/\//i.exec(url);
  if (scheme) {
    throw new ConfigurationError(
      `Unsupported database URL scheme '${scheme[1]}'. Use a sqlite:/// or postgresql:// URL, or a file path.`
    );
  }

  return { dialect: 'sqlite', path: url };
}

/**
 * Opens the database a target describes.
 */
export function openConnection(target: DatabaseTarget, options: DatabaseOptions = {}): Connection {
  if (target.dialect === 'postgres') {
    return { dialect: 'postgres', ...createPostgresDatabase(target.connectionString, options) };
  }
  return { dialect: 'sqlite', ...createDatabase(target.path, options) };
}
