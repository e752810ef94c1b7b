/**
 * Core Domain Models - Barrel Export
 *
 * @example
 * ```typescript
 * import type { User, NewUser } from '../core/models';
 * ```
 */

export type { User, NewUser } from './user';
