/**
 * Base Repository Interface
 *
 * The Repository pattern keeps route handlers working with domain models
 * rather than Drizzle queries, and lets tests swap in fakes.
 */

/**
 * Offset/limit window for list queries.
 */
export interface Pagination {
  /** Number of records to skip */
  skip: number;
  /** Maximum number of records to return */
  limit: number;
}

/**
 * Generic repository interface for entities with numeric primary keys.
 *
 * @typeParam T - The domain model type returned by the repository
 * @typeParam CreateInput - The type accepted when creating an entity
 *
 * @example
 * ```typescript
 * class UserRepository implements Repository<User, NewUser> {
 *   async findById(id: number): Promise<User | null> {
 *     // implementation
 *   }
 *   // ... other methods
 * }
 * ```
 */
export interface Repository<T, CreateInput> {
  /**
   * Retrieves an entity by its primary key, or null if it does not exist.
   */
  findById(id: number): Promise<T | null>;

  /**
   * Retrieves one page of entities ordered by primary key.
   */
  findAll(page: Pagination): Promise<T[]>;

  /**
   * Persists a new entity and returns it with its generated id.
   */
  create(input: CreateInput): Promise<T>;
}
