/**
 * User Repository Implementation
 *
 * Data access for the users table. Maps database rows onto the `User`
 * domain model and turns uniqueness violations into conflict errors.
 *
 * The query code exists once per dialect because Drizzle types SQLite and
 * PostgreSQL tables separately; the create flow is shared.
 */

import { asc, eq, or } from 'drizzle-orm';
import { conflictError } from '../../core/errors';
import type { NewUser, User } from '../../core/models';
import type { AppDatabase, PostgresDatabase } from '../db';
import { users, type UserRow } from '../schema';
import { pgUsers, type PgUserRow } from '../schema.pg';
import type { Pagination, Repository } from './base';

/** Conflict message returned for duplicate email or username. */
export const USER_CONFLICT_MESSAGE = 'User with this email or username already exists';

/** SQLSTATE for unique_violation */
const PG_UNIQUE_VIOLATION = '23505';

interface UserValues {
  email: string;
  username: string;
  fullName: string | null;
  isActive: boolean;
}

function mapToDomain(row: UserRow | PgUserRow): User {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    fullName: row.fullName,
    isActive: row.isActive,
  };
}

function firstOrNull(rows: (UserRow | PgUserRow)[]): User | null {
  const [row] = rows;
  return row ? mapToDomain(row) : null;
}

/**
 * True for UNIQUE constraint failures from either driver, whether raised
 * directly or wrapped by the ORM.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (
    'code' in error &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === PG_UNIQUE_VIOLATION)
  ) {
    return true;
  }
  return error.cause !== undefined && isUniqueViolation(error.cause);
}

/**
 * Repository for User entity data access operations.
 *
 * @example
 * ```typescript
 * const repo = new SqliteUserRepository(db);
 *
 * const user = await repo.create({ email: 'ada@example.com', username: 'ada' });
 * const page = await repo.findAll({ skip: 0, limit: 20 });
 * ```
 */
export abstract class UserRepository implements Repository<User, NewUser> {
  abstract findById(id: number): Promise<User | null>;

  abstract findAll(page: Pagination): Promise<User[]>;

  /**
   * Finds a user holding either the given email or the given username.
   */
  abstract findByEmailOrUsername(email: string, username: string): Promise<User | null>;

  protected abstract insert(values: UserValues): Promise<User>;

  /**
   * Creates a user.
   *
   * @throws {AppError} CONFLICT when the email or username is already taken
   */
  async create(input: NewUser): Promise<User> {
    const existing = await this.findByEmailOrUsername(input.email, input.username);
    if (existing) {
      throw conflictError(USER_CONFLICT_MESSAGE);
    }

    try {
      return await this.insert({
        email: input.email,
        username: input.username,
        fullName: input.fullName ?? null,
        isActive: input.isActive ?? true,
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw conflictError(USER_CONFLICT_MESSAGE);
      }
      throw error;
    }
  }
}

export class SqliteUserRepository extends UserRepository {
  constructor(private readonly db: AppDatabase) {
    super();
  }

  async findById(id: number): Promise<User | null> {
    const result = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return firstOrNull(result);
  }

  async findAll(page: Pagination): Promise<User[]> {
    const results = await this.db
      .select()
      .from(users)
      .orderBy(asc(users.id))
      .limit(page.limit)
      .offset(page.skip);

    return results.map(mapToDomain);
  }

  async findByEmailOrUsername(email: string, username: string): Promise<User | null> {
    const result = await this.db
      .select()
      .from(users)
      .where(or(eq(users.email, email), eq(users.username, username)))
      .limit(1);

    return firstOrNull(result);
  }

  protected async insert(values: UserValues): Promise<User> {
    const result = await this.db.insert(users).values(values).returning();
    return mapToDomain(result[0]);
  }
}

export class PostgresUserRepository extends UserRepository {
  constructor(private readonly db: PostgresDatabase) {
    super();
  }

  async findById(id: number): Promise<User | null> {
    const result = await this.db.select().from(pgUsers).where(eq(pgUsers.id, id)).limit(1);
    return firstOrNull(result);
  }

  async findAll(page: Pagination): Promise<User[]> {
    const results = await this.db
      .select()
      .from(pgUsers)
      .orderBy(asc(pgUsers.id))
      .limit(page.limit)
      .offset(page.skip);

    return results.map(mapToDomain);
  }

  async findByEmailOrUsername(email: string, username: string): Promise<User | null> {
    const result = await this.db
      .select()
      .from(pgUsers)
      .where(or(eq(pgUsers.email, email), eq(pgUsers.username, username)))
      .limit(1);

    return firstOrNull(result);
  }

  protected async insert(values: UserValues): Promise<User> {
    const result = await this.db.insert(pgUsers).values(values).returning();
    return mapToDomain(result[0]);
  }
}
