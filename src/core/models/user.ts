/**
 * User Domain Types
 *
 * The example resource persisted by the service. Email and username are each
 * unique across all users.
 *
 * @example
 * ```typescript
 * const user: User = {
 *   id: 1,
 *   email: 'ada@example.com',
 *   username: 'ada',
 *   fullName: 'Ada Lovelace',
 *   isActive: true,
 * };
 * ```
 */
export interface User {
  /** Auto-incremented primary key */
  id: number;

  /** Unique email address */
  email: string;

  /** Unique login name */
  username: string;

  /** Optional display name */
  fullName: string | null;

  /** Whether the account is active */
  isActive: boolean;
}

/**
 * Fields supplied when creating a user. The id is assigned by the database.
 */
export interface NewUser {
  email: string;
  username: string;
  fullName?: string | null;
  isActive?: boolean;
}
