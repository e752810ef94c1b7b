/**
 * Persistence Gateway
 *
 * Owns the database connection for the lifetime of the process and hands
 * out one `DatabaseSession` per request. A gateway built without a
 * DATABASE_URL still exists, but every attempt to open a session on it fails
 * with a ConfigurationError.
 *
 * The DATABASE_URL scheme picks the dialect: SQLite through better-sqlite3,
 * or PostgreSQL through a node-postgres pool.
 *
 * Sessions are scoped: `withSession()` opens one, runs the body and closes
 * it on every exit path, including thrown errors.
 *
 * @example
 * ```typescript
 * const gateway = PersistenceGateway.fromConfig(config, logger);
 * await gateway.initializeSchema();
 *
 * const user = await withSession(gateway, (session) =>
 *   session.users.findById(1)
 * );
 * ```
 */

import { readFileSync } from 'node:fs';
import type { AppConfig } from '../config';
import { ConfigurationError } from '../core/errors';
import type { Logger } from '../logger';
import { createSilentLogger } from '../logger';
import {
  createDatabase,
  openConnection,
  resolveDatabaseTarget,
  type Connection,
  type DatabaseDialect,
} from './db';
import { PostgresUserRepository, SqliteUserRepository, type UserRepository } from './repositories';

/** DDL applied by `initializeSchema()`; every statement is IF NOT EXISTS. */
const SCHEMA_SQL: Record<DatabaseDialect, string> = {
  sqlite: readFileSync(new URL('./schema.sql', import.meta.url), 'utf8'),
  postgres: readFileSync(new URL('./schema.pg.sql', import.meta.url), 'utf8'),
};

function createUserRepository(connection: Connection): UserRepository {
  return connection.dialect === 'postgres'
    ? new PostgresUserRepository(connection.db)
    : new SqliteUserRepository(connection.db);
}

/**
 * Request-scoped handle onto the database. Unusable once closed.
 */
export class DatabaseSession {
  private closed = false;
  private userRepository: UserRepository | null = null;

  constructor(
    private readonly connection: Connection,
    private readonly onClose: () => void
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  get users(): UserRepository {
    this.assertOpen();
    this.userRepository ??= createUserRepository(this.connection);
    return this.userRepository;
  }

  /** Releases the session. Calling it again is a no-op. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.onClose();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Database session is closed');
    }
  }
}

export class PersistenceGateway {
  private activeSessions = 0;
  private readonly log: Logger;

  /**
   * @param connection - Open database, or null when persistence is not configured
   */
  constructor(
    private connection: Connection | null,
    logger: Logger = createSilentLogger()
  ) {
    this.log = logger.child({ module: 'storage' });
  }

  /**
   * Gateway for the configured DATABASE_URL; unconfigured when it is empty.
   *
   * @throws {ConfigurationError} when the URL names an unsupported scheme
   */
  static fromConfig(config: Pick<AppConfig, 'database'>, logger: Logger): PersistenceGateway {
    const { url, echo } = config.database;
    if (!url) {
      return new PersistenceGateway(null, logger);
    }

    const target = resolveDatabaseTarget(url);
    const log = logger.child({ module: 'storage' });
    if (target.dialect === 'sqlite') {
      log.info({ dialect: target.dialect, path: target.path }, 'Opening database');
    } else {
      // The connection string may carry a password
      log.info({ dialect: target.dialect }, 'Opening database');
    }
    return new PersistenceGateway(openConnection(target, { echo, logger }), logger);
  }

  /** Gateway onto a fresh in-memory SQLite database. */
  static inMemory(logger?: Logger): PersistenceGateway {
    return new PersistenceGateway({ dialect: 'sqlite', ...createDatabase(':memory:') }, logger);
  }

  isConfigured(): boolean {
    return this.connection !== null;
  }

  /** Dialect of the open connection, or null when not configured. */
  get dialect(): DatabaseDialect | null {
    return this.connection?.dialect ?? null;
  }

  /** Number of sessions opened and not yet closed. */
  get openSessions(): number {
    return this.activeSessions;
  }

  /**
   * Creates the tables if they do not exist yet. Safe to call repeatedly.
   */
  async initializeSchema(): Promise<void> {
    const connection = this.requireConnection();
    if (connection.dialect === 'postgres') {
      await connection.pool.query(SCHEMA_SQL.postgres);
    } else {
      connection.sqlite.exec(SCHEMA_SQL.sqlite);
    }
    this.log.info({ dialect: connection.dialect }, 'Database schema initialized');
  }

  /**
   * Opens a request-scoped session. Prefer `withSession()`, which guarantees
   * the matching `close()`.
   *
   * @throws {ConfigurationError} when no database is configured
   */
  openSession(): DatabaseSession {
    const connection = this.requireConnection();
    this.activeSessions += 1;
    return new DatabaseSession(connection, () => {
      this.activeSessions -= 1;
    });
  }

  /** Closes the underlying connection. Open sessions become unusable. */
  async close(): Promise<void> {
    const connection = this.connection;
    if (!connection) {
      return;
    }
    this.connection = null;
    if (connection.dialect === 'postgres') {
      await connection.pool.end();
    } else {
      connection.sqlite.close();
    }
    this.log.info('Database connection closed');
  }

  private requireConnection(): Connection {
    if (!this.connection) {
      throw new ConfigurationError(
        'Database not configured. Set DATABASE_URL environment variable.'
      );
    }
    return this.connection;
  }
}

/**
 * Runs `body` with a freshly opened session and closes it afterwards,
 * whether `body` resolves or throws.
 */
export async function withSession<T>(
  gateway: PersistenceGateway,
  body: (session: DatabaseSession) => Promise<T> | T
): Promise<T> {
  const session = gateway.openSession();
  try {
    return await body(session);
  } finally {
    session.close();
  }
}
